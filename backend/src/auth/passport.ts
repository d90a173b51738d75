import passport from 'passport';
import { Strategy as LocalStrategy } from 'passport-local';
import type { AccountService } from '../services/accountService';

/**
 * Build a Passport instance with the local username/password strategy and session serialization.
 *
 * Each app gets its own instance so tests can run several apps against separate databases.
 */
export function createAuthenticator(accounts: AccountService): passport.Authenticator {
  const authenticator = new passport.Passport();

  authenticator.use(
    new LocalStrategy(async (username, password, done) => {
      try {
        const user = await accounts.verifyCredentials(username, password);
        if (!user) {
          return done(null, false, { message: 'Invalid username or password.' });
        }
        return done(null, user);
      } catch (err) {
        return done(err);
      }
    })
  );

  // Only the id goes into the session; the rest is reloaded per request.
  authenticator.serializeUser<number>((user, done) => {
    done(null, user.id);
  });

  authenticator.deserializeUser<number>((id, done) => {
    try {
      done(null, accounts.findSessionUser(id) ?? false);
    } catch (err) {
      done(err);
    }
  });

  return authenticator;
}
