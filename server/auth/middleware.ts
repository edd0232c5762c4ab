import type { Response, NextFunction, RequestHandler } from "express";
import type { IStorage } from "../storage";
import { describeError, logError } from "../utils/logger";
import { verifyUserSessionToken } from "./tokens";
import type { IdentityRequest } from "./types";

export const SESSION_COOKIE_NAME = "ca_session";

function readSessionCookie(req: IdentityRequest): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== "object" || cookies === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, SESSION_COOKIE_NAME);
  return typeof value === "string" ? value : undefined;
}

export function attachUserIdentity(storage: IStorage): RequestHandler {
  return async (req: IdentityRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const sessionToken = readSessionCookie(req);

      if (!sessionToken) {
        return next();
      }

      const payload = verifyUserSessionToken(sessionToken);
      if (!payload) {
        res.clearCookie(SESSION_COOKIE_NAME);
        return next();
      }

      const user = await storage.getUserById(payload.userId);
      if (!user) {
        res.clearCookie(SESSION_COOKIE_NAME);
        return next();
      }

      req.user = user;
      next();
    } catch (error) {
      logError("attach_user_identity_failed", { error: describeError(error) });
      next();
    }
  };
}

export function requireUser(
  req: IdentityRequest,
  res: Response,
  next: NextFunction
): void {
  if (!req.user) {
    res.status(401).json({ message: "Authentication required" });
    return;
  }
  next();
}
