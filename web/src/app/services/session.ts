// web/src/app/services/session.ts
import type { CookieOptions, NextFunction, Request, RequestHandler, Response } from 'express';
import { AuthError } from '../errors';
import type { AuthService, SessionContext } from './auth.service';

export const SESSION_COOKIE = 'session';

declare global {
  namespace Express {
    interface Request {
      /** Gesetzt von `sessionMiddleware`, wenn das Cookie gültig ist */
      session?: SessionContext;
    }
  }
}

export interface CookieSettings {
  ttlSeconds: number;
  secure: boolean;
}

function cookieOptions(settings: CookieSettings): CookieOptions {
  return { httpOnly: true, sameSite: 'lax', secure: settings.secure, path: '/' };
}

/** Liest das Session-Cookie und hängt den Kontext an den Request – kein globaler Login-Zustand. */
export function sessionMiddleware(auth: AuthService): RequestHandler {
  return (req, _res, next) => {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const token = cookies[SESSION_COOKIE];
    if (typeof token === 'string' && token) {
      req.session = auth.verifyToken(token);
    }
    next();
  };
}

export function requireSession(req: Request, res: Response, next: NextFunction): void {
  if (!req.session) {
    res.redirect(303, '/login');
    return;
  }
  next();
}

export function sessionOf(req: Request): SessionContext {
  if (!req.session) {
    throw new AuthError('Please log in.');
  }
  return req.session;
}

export function setSessionCookie(res: Response, token: string, settings: CookieSettings): void {
  res.cookie(SESSION_COOKIE, token, { ...cookieOptions(settings), maxAge: settings.ttlSeconds * 1000 });
}

export function clearSessionCookie(res: Response, settings: CookieSettings): void {
  res.clearCookie(SESSION_COOKIE, cookieOptions(settings));
}
