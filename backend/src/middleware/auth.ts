import type { NextFunction, Request, Response } from 'express';

/**
 * Gate HTML pages: anonymous visitors are sent to the login form.
 */
export function requireLogin(req: Request, res: Response, next: NextFunction) {
  if (req.isAuthenticated()) {
    return next();
  }
  res.redirect('/login');
}

/**
 * Gate JSON endpoints with a 401 instead of a redirect.
 */
export function requireApiAuth(req: Request, res: Response, next: NextFunction) {
  if (req.isAuthenticated()) {
    return next();
  }
  res.status(401).json({ message: 'Not authenticated' });
}

/**
 * The logged-in user for a route mounted behind requireLogin/requireApiAuth.
 */
export function getSessionUser(req: Request): Express.User {
  if (!req.user) {
    throw new Error('Route requires an authenticated user');
  }
  return req.user;
}
