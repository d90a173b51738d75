import express from 'express';
import type passport from 'passport';
import type { AccountService } from '../services/accountService';
import { ValidationError } from '../utils/errors';
import { readFormValue } from '../utils/requestParsing';
import LoginPage from '../views/LoginPage';
import RegisterPage from '../views/RegisterPage';
import { sendPage } from '../views/render';

const INVALID_LOGIN_MESSAGE = 'Invalid username or password.';

export function createAuthRoutes(accounts: AccountService, authenticator: passport.Authenticator): express.Router {
    const router = express.Router();

    router.get('/register', (req, res) => {
        if (req.isAuthenticated()) {
            return res.redirect('/records');
        }
        sendPage(res, <RegisterPage />);
    });

    router.post('/register', async (req, res, next) => {
        const { username, email, password, confirmPassword } = req.body;
        try {
            const user = await accounts.register({ username, email, password, confirmPassword });

            req.login(user, (err) => {
                if (err) return next(err);
                res.redirect(303, '/records/new');
            });
        } catch (err) {
            if (err instanceof ValidationError) {
                const values = { username: readFormValue(username), email: readFormValue(email) };
                return sendPage(res, <RegisterPage values={values} errors={err.fieldErrors} />, 400);
            }
            next(err);
        }
    });

    router.get('/login', (req, res) => {
        if (req.isAuthenticated()) {
            return res.redirect('/records');
        }
        sendPage(res, <LoginPage />);
    });

    router.post('/login', (req, res, next) => {
        const username = readFormValue(req.body.username);
        if (!username.trim() || !readFormValue(req.body.password)) {
            return sendPage(res, <LoginPage username={username} error="Please enter username and password." />, 400);
        }

        authenticator.authenticate('local', (err: unknown, user?: Express.User | false | null) => {
            if (err) return next(err);
            if (!user) {
                return sendPage(res, <LoginPage username={username} error={INVALID_LOGIN_MESSAGE} />, 401);
            }

            req.login(user, (loginErr) => {
                if (loginErr) return next(loginErr);
                res.redirect(303, '/records');
            });
        })(req, res, next);
    });

    router.post('/logout', (req, res, next) => {
        req.logout((err) => {
            if (err) return next(err);
            res.redirect(303, '/login');
        });
    });

    return router;
}
