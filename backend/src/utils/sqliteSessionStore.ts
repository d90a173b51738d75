import session from 'express-session';
import type { SqliteDatabase } from '../config/database';

const DEFAULT_TTL_MS = 1000 * 60 * 60 * 24 * 7; // 7 days

type SessionRow = {
  sess: string;
  expire: number;
};

/**
 * SQLite-backed session store so logins survive a server restart. Sessions are serialized to JSON
 * alongside an expiry timestamp (epoch ms) so express-session can persist and prune them.
 *
 * better-sqlite3 is synchronous; callbacks are invoked before each method returns.
 */
export class SqliteSessionStore extends session.Store {
  private readonly db: SqliteDatabase;

  private readonly ttlMs: number;

  constructor(db: SqliteDatabase, ttlMs: number = DEFAULT_TTL_MS) {
    super();
    this.db = db;
    this.ttlMs = ttlMs;
  }

  get(sid: string, callback: (err: unknown, session?: session.SessionData | null) => void): void {
    let row: SessionRow | undefined;
    try {
      row = this.db.prepare<[string], SessionRow>('SELECT sess, expire FROM session_store WHERE sid = ?').get(sid);
    } catch (err) {
      callback(err);
      return;
    }

    if (!row) {
      callback(null, null);
      return;
    }

    if (row.expire <= Date.now()) {
      this.destroy(sid, (err) => callback(err ?? null, null));
      return;
    }

    try {
      const parsedSession: session.SessionData = JSON.parse(row.sess);
      callback(null, parsedSession);
    } catch (err) {
      callback(err);
    }
  }

  set(sid: string, sess: session.SessionData, callback?: (err?: unknown) => void): void {
    try {
      this.db
        .prepare<[string, string, number]>(
          `INSERT INTO session_store (sid, sess, expire)
           VALUES (?, ?, ?)
           ON CONFLICT (sid)
           DO UPDATE SET sess = excluded.sess, expire = excluded.expire`
        )
        .run(sid, JSON.stringify(sess), this.calculateExpiry(sess));
      callback?.();
    } catch (err) {
      callback?.(err);
    }
  }

  destroy(sid: string, callback?: (err?: unknown) => void): void {
    try {
      this.db.prepare<[string]>('DELETE FROM session_store WHERE sid = ?').run(sid);
      callback?.();
    } catch (err) {
      callback?.(err);
    }
  }

  touch(sid: string, sess: session.SessionData, callback?: (err?: unknown) => void): void {
    try {
      this.db
        .prepare<[number, string]>('UPDATE session_store SET expire = ? WHERE sid = ?')
        .run(this.calculateExpiry(sess), sid);
      callback?.();
    } catch (err) {
      callback?.(err);
    }
  }

  /**
   * Delete expired sessions. Returns the number of rows removed.
   */
  pruneExpired(now: number = Date.now()): number {
    return this.db.prepare<[number]>('DELETE FROM session_store WHERE expire <= ?').run(now).changes;
  }

  /**
   * Prune on an interval without keeping the process alive.
   */
  startPruning(intervalMs: number): NodeJS.Timeout {
    const timer = setInterval(() => {
      try {
        const removed = this.pruneExpired();
        if (removed > 0) {
          console.log(`[sessions] Pruned ${removed} expired session(s)`);
        }
      } catch (err) {
        console.error('[sessions] Failed to prune expired sessions:', err);
      }
    }, intervalMs);
    timer.unref();
    return timer;
  }

  private calculateExpiry(sess: session.SessionData): number {
    if (sess.cookie?.expires) {
      return new Date(sess.cookie.expires).getTime();
    }

    const maxAge = sess.cookie?.maxAge ?? this.ttlMs;
    return Date.now() + maxAge;
  }
}
