import { NextFunction, Request, Response } from 'express';

export interface SessionUser {
  userId: number;
  email: string;
}

/**
 * Logged-in user from the signed session cookie
 */
export function getSessionUser(req: Request): SessionUser | null {
  const session = req.session;
  if (!session) {
    return null;
  }

  const userId: unknown = session.userId;
  const email: unknown = session.email;
  if (typeof userId !== 'number' || typeof email !== 'string') {
    return null;
  }

  return { userId, email };
}

export function startSession(req: Request, user: SessionUser): void {
  if (req.session) {
    req.session.userId = user.userId;
    req.session.email = user.email;
  }
}

export function endSession(req: Request): void {
  req.session = null;
}

/**
 * Redirect anonymous requests to the login page
 */
export function requireLogin(req: Request, res: Response, next: NextFunction): void {
  const user = getSessionUser(req);
  if (!user) {
    res.redirect('/login');
    return;
  }

  res.locals.user = user;
  next();
}

/**
 * Session user set by requireLogin
 */
export function currentUser(res: Response): SessionUser {
  const user: unknown = res.locals.user;
  if (
    typeof user === 'object' &&
    user !== null &&
    'userId' in user &&
    'email' in user &&
    typeof user.userId === 'number' &&
    typeof user.email === 'string'
  ) {
    return { userId: user.userId, email: user.email };
  }
  throw new Error('currentUser called on a route without requireLogin');
}
