import bcrypt from 'bcryptjs';
import { z } from 'zod';
import type { UserRecord, UserStore } from '../storage/userStore';
import { toValidationError, ValidationError } from '../utils/errors';

const DEFAULT_SALT_ROUNDS = 10;
const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export type SessionUser = {
  id: number;
  username: string;
  email: string;
};

const registrationSchema = z
  .object({
    username: z
      .string({ required_error: 'All fields are required.', invalid_type_error: 'All fields are required.' })
      .trim()
      .min(3, 'Username must be at least 3 characters.')
      .max(32, 'Username cannot exceed 32 characters.')
      .regex(USERNAME_PATTERN, 'Username may only contain letters, digits, ".", "_" and "-".'),
    email: z
      .string({ required_error: 'All fields are required.', invalid_type_error: 'All fields are required.' })
      .trim()
      .toLowerCase()
      .email('Enter a valid email address.'),
    password: z
      .string({ required_error: 'All fields are required.', invalid_type_error: 'All fields are required.' })
      .min(6, 'Password must be at least 6 characters.'),
    confirmPassword: z.string({ invalid_type_error: 'Passwords do not match.' }).optional(),
  })
  .refine((value) => value.confirmPassword === undefined || value.confirmPassword === value.password, {
    message: 'Passwords do not match.',
    path: ['confirmPassword'],
  });

export function toSessionUser(user: UserRecord): SessionUser {
  return { id: user.id, username: user.username, email: user.email };
}

/**
 * Registration and credential checks backed by the users table.
 */
export class AccountService {
  private readonly users: UserStore;

  private readonly saltRounds: number;

  constructor(users: UserStore, options: { saltRounds?: number } = {}) {
    this.users = users;
    this.saltRounds = options.saltRounds ?? DEFAULT_SALT_ROUNDS;
  }

  async register(input: {
    username: unknown;
    email: unknown;
    password: unknown;
    confirmPassword?: unknown;
  }): Promise<SessionUser> {
    const parsed = registrationSchema.safeParse(input);
    if (!parsed.success) {
      throw toValidationError(parsed.error, 'Invalid registration');
    }

    const { username, email, password } = parsed.data;
    if (this.users.existsWithUsernameOrEmail(username, email)) {
      throw new ValidationError('User already exists', { username: 'Username or email already exists.' });
    }

    const salt = await bcrypt.genSalt(this.saltRounds);
    const passwordHash = await bcrypt.hash(password, salt);
    const user = this.users.insert({ username, email, passwordHash });
    console.log(`[accounts] Registered user ${user.id}`);
    return toSessionUser(user);
  }

  /**
   * Return the user when the password matches, otherwise null.
   */
  async verifyCredentials(username: string, password: string): Promise<SessionUser | null> {
    const user = this.users.findByUsername(username.trim());
    if (!user) return null;

    const isMatch = await bcrypt.compare(password, user.passwordHash);
    return isMatch ? toSessionUser(user) : null;
  }

  findSessionUser(id: number): SessionUser | null {
    const user = this.users.findById(id);
    return user ? toSessionUser(user) : null;
  }
}
