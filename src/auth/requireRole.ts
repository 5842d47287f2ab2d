import type { NextFunction, Request, RequestHandler, Response } from "express";

import { HttpError } from "../utils/httpError";
import type { AuthService } from "./authService";
import type { AuthSession, UserRole } from "./authTypes";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthSession;
    }
  }
}

const bearerToken = (req: Request): string | null => {
  const header = req.header("authorization") ?? "";
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1] ?? null;
};

/** Rejects with 401 without a known bearer token and 403 when its role is not listed. */
export const requireRole =
  (auth: AuthService, ...roles: UserRole[]): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    const session = token ? auth.resolveToken(token) : null;
    if (!session) return next(new HttpError(401, "Authentication required"));
    if (roles.length > 0 && !roles.includes(session.role)) return next(new HttpError(403, "Forbidden"));

    req.auth = session;
    next();
  };

/** The session attached by `requireRole`. */
export const getAuth = (req: Request): AuthSession => {
  if (!req.auth) throw new HttpError(401, "Authentication required");
  return req.auth;
};
