import dotenv from 'dotenv';
import { parsePositiveInteger } from './utils/requestParsing';

dotenv.config();

const DEFAULT_PORT = 5001;
const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_DATABASE_PATH = 'data/carbon-log.db';
const DEVELOPMENT_SESSION_SECRET = 'development_secret_key';
const SESSION_TTL_MS = 1000 * 60 * 60 * 24 * 7; // 7 days
// Staging gets production cookies and secret warnings.
const PRODUCTION_LIKE_ENVS = new Set(['production', 'staging']);

export type AppConfig = {
  port: number;
  host: string;
  databasePath: string;
  sessionSecret: string;
  sessionTtlMs: number;
  nodeEnv: string;
  secureCookies: boolean;
};

/**
 * Build the runtime configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV?.trim() || 'development';
  const productionLike = PRODUCTION_LIKE_ENVS.has(nodeEnv);

  const port = parsePositiveInteger(env.PORT);
  if (env.PORT && port === null) {
    console.warn(`PORT="${env.PORT}" is invalid; using ${DEFAULT_PORT}.`);
  }

  const sessionSecret = env.SESSION_SECRET?.trim();
  if (!sessionSecret && productionLike) {
    console.warn('SESSION_SECRET is not set. Sessions are signed with the development secret.');
  }

  const secureCookieEnv = env.SESSION_COOKIE_SECURE;

  return {
    port: port ?? DEFAULT_PORT,
    host: env.HOST?.trim() || DEFAULT_HOST,
    databasePath: env.DATABASE_PATH?.trim() || DEFAULT_DATABASE_PATH,
    sessionSecret: sessionSecret || DEVELOPMENT_SESSION_SECRET,
    sessionTtlMs: SESSION_TTL_MS,
    nodeEnv,
    secureCookies: secureCookieEnv ? secureCookieEnv === 'true' : productionLike,
  };
}

export const config = loadConfig();
