import express from 'express';
import session from 'express-session';
import { createAuthenticator } from './auth/passport';
import type { SqliteDatabase } from './config/database';
import { createApiRoutes } from './routes/api';
import { createAuthRoutes } from './routes/auth';
import { createRecordRoutes } from './routes/records';
import { createSummaryRoutes } from './routes/summary';
import { AccountService } from './services/accountService';
import { RecordService } from './services/recordService';
import { ActivityRecordStore } from './storage/activityRecordStore';
import { UserStore } from './storage/userStore';
import { AppError, StorageError } from './utils/errors';
import { SqliteSessionStore } from './utils/sqliteSessionStore';
import ErrorPage from './views/ErrorPage';
import { sendPage } from './views/render';

const SESSION_COOKIE_NAME = 'carbon.sid';

export type AppOptions = {
  db: SqliteDatabase;
  sessionSecret: string;
  sessionTtlMs: number;
  secureCookies?: boolean;
  /** bcrypt cost; tests lower it to keep registration fast. */
  passwordSaltRounds?: number;
};

export type CarbonLogApp = {
  app: express.Express;
  records: RecordService;
  accounts: AccountService;
  sessionStore: SqliteSessionStore;
};

/**
 * 4xx status carried by middleware errors such as body-parser's malformed or oversized bodies.
 */
function readClientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function describeFailure(err: unknown): { status: number; message: string } {
  if (err instanceof StorageError) {
    return { status: 500, message: 'We could not reach your saved data. Nothing was changed; please try again.' };
  }
  if (err instanceof AppError && err.status < 500) {
    return { status: err.status, message: err.message };
  }
  const clientStatus = readClientErrorStatus(err);
  if (clientStatus === 413) {
    return { status: 413, message: 'The request body is too large.' };
  }
  if (clientStatus !== undefined) {
    return { status: clientStatus, message: 'The request could not be read.' };
  }
  return { status: 500, message: 'An unexpected error occurred. Please try again.' };
}

/**
 * Wire storage, services, sessions and routes into an Express app. The caller owns `listen`.
 */
export function createApp(options: AppOptions): CarbonLogApp {
  const app = express();

  app.disable('x-powered-by');
  if (options.secureCookies) {
    app.set('trust proxy', 1);
  }

  const records = new RecordService(new ActivityRecordStore(options.db));
  const accounts = new AccountService(new UserStore(options.db), { saltRounds: options.passwordSaltRounds });
  const authenticator = createAuthenticator(accounts);
  const sessionStore = new SqliteSessionStore(options.db, options.sessionTtlMs);

  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(
    session({
      store: sessionStore,
      secret: options.sessionSecret,
      resave: false,
      saveUninitialized: false,
      name: SESSION_COOKIE_NAME,
      cookie: {
        httpOnly: true,
        secure: options.secureCookies ?? false,
        sameSite: 'lax',
        maxAge: options.sessionTtlMs,
      },
    })
  );
  app.use(authenticator.initialize());
  app.use(authenticator.session());

  app.get('/', (req, res) => {
    res.redirect(req.isAuthenticated() ? '/records' : '/login');
  });

  app.use('/', createAuthRoutes(accounts, authenticator));
  app.use('/records', createRecordRoutes(records));
  app.use('/summary', createSummaryRoutes(records));
  app.use('/api', createApiRoutes(records));

  app.use((req, res) => {
    if (req.path.startsWith('/api/')) {
      res.status(404).json({ message: 'Not found' });
      return;
    }
    sendPage(res, <ErrorPage title="Not found" message="That page does not exist." username={req.user?.username} />, 404);
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, message } = describeFailure(err);
    if (status >= 500) {
      console.error(`[http] ${req.method} ${req.originalUrl} failed:`, err);
    } else {
      console.warn(`[http] ${req.method} ${req.originalUrl} rejected with ${status}: ${message}`);
    }

    if (req.path.startsWith('/api/')) {
      res.status(status).json({ message: status >= 500 ? 'Server error' : message });
      return;
    }
    sendPage(res, <ErrorPage message={message} username={req.user?.username} />, status);
  });

  return { app, records, accounts, sessionStore };
}
