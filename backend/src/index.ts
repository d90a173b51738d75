import { createApp } from './app';
import { config } from './config';
import { openDatabase } from './config/database';

const SESSION_PRUNE_INTERVAL_MS = 1000 * 60 * 60; // hourly

/**
 * Open the database and start the HTTP server.
 */
const bootstrap = async (): Promise<void> => {
  const db = openDatabase(config.databasePath);
  const { app, sessionStore } = createApp({
    db,
    sessionSecret: config.sessionSecret,
    sessionTtlMs: config.sessionTtlMs,
    secureCookies: config.secureCookies,
  });

  sessionStore.pruneExpired();
  sessionStore.startPruning(SESSION_PRUNE_INTERVAL_MS);

  const server = app.listen(config.port, config.host, () => {
    console.log(`Server running on http://${config.host}:${config.port} (database: ${config.databasePath})`);
  });

  const shutdown = () => {
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

void bootstrap().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
