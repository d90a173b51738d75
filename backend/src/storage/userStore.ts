import type { SqliteDatabase } from '../config/database';
import { withStorage } from '../utils/errors';

export type UserRecord = {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: string;
};

type UserRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
};

const USER_COLUMNS = 'id, username, email, password_hash, created_at';

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

/**
 * SQLite access for the users table.
 */
export class UserStore {
  private readonly db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.db = db;
  }

  findById(id: number): UserRecord | null {
    const row = withStorage('load user', () =>
      this.db.prepare<[number], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ?`).get(id)
    );
    return row ? toUserRecord(row) : null;
  }

  findByUsername(username: string): UserRecord | null {
    const row = withStorage('load user', () =>
      this.db.prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = ?`).get(username)
    );
    return row ? toUserRecord(row) : null;
  }

  existsWithUsernameOrEmail(username: string, email: string): boolean {
    const row = withStorage('check existing users', () =>
      this.db
        .prepare<[string, string], { id: number }>('SELECT id FROM users WHERE username = ? OR email = ? LIMIT 1')
        .get(username, email)
    );
    return row !== undefined;
  }

  insert(user: { username: string; email: string; passwordHash: string }): UserRecord {
    return withStorage('create user', () => {
      const result = this.db
        .prepare<[string, string, string]>('INSERT INTO users (username, email, password_hash) VALUES (?, ?, ?)')
        .run(user.username, user.email, user.passwordHash);

      const row = this.db
        .prepare<[number], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ?`)
        .get(Number(result.lastInsertRowid));
      if (!row) {
        throw new Error('Inserted user could not be read back');
      }
      return toUserRecord(row);
    });
  }
}
