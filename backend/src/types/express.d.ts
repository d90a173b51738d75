import type { SessionUser } from '../services/accountService';

declare global {
  namespace Express {
    // Passport stores this shape on req.user after deserializing the session.
    interface User extends SessionUser {}
  }
}

export {};
