import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Services } from "../container.js";
import { UnauthenticatedError } from "../errors.js";
import type { User } from "../types.js";

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

/** The token from an `Authorization: Bearer <token>` header, if any. */
export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1] ?? null;
}

/** Resolve the bearer token to a live, active user and attach it to the request. */
export function requireAuth(services: Services): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      throw new UnauthenticatedError("Not authenticated");
    }
    req.user = await services.users.authenticateToken(token);
    next();
  };
}

export function currentUser(req: Request): User {
  if (!req.user) {
    throw new UnauthenticatedError("Not authenticated");
  }
  return req.user;
}
