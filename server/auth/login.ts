import { Router, type Response } from "express";
import bcrypt from "bcryptjs";
import { loginRequestSchema } from "@shared/schema";
import type { IStorage } from "../storage";
import { describeError, logError, logInfo, logWarn } from "../utils/logger";
import { SESSION_COOKIE_NAME } from "./middleware";
import { generateUserSessionToken } from "./tokens";
import type { IdentityRequest } from "./types";

const SESSION_COOKIE_MAX_AGE = 7 * 24 * 60 * 60 * 1000; // 7 days, matches the token expiry

export function createAuthRouter(storage: IStorage): Router {
  const router = Router();

  router.post("/login", async (req: IdentityRequest, res: Response) => {
    try {
      const parsed = loginRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success || !parsed.data.username || !parsed.data.password) {
        return res.status(400).json({ message: "Username and password are required" });
      }

      const { username, password } = parsed.data;
      const user = await storage.getUserByUsername(username);
      const passwordMatch = user ? await bcrypt.compare(password, user.passwordHash) : false;

      if (!user || !passwordMatch) {
        logWarn("login_failed", { reason: user ? "bad_password" : "unknown_user" });
        return res.status(401).json({ message: "Invalid username or password." });
      }

      await storage.updateUserLastLogin(user.id);

      res.cookie(SESSION_COOKIE_NAME, generateUserSessionToken(user.id, user.username), {
        httpOnly: true,
        secure: process.env.NODE_ENV === "production",
        sameSite: "lax",
        maxAge: SESSION_COOKIE_MAX_AGE,
      });

      logInfo("login_succeeded", { userId: user.id });
      return res.json({ message: "Login successful!", username: user.username });
    } catch (error) {
      logError("login_error", { error: describeError(error) });
      return res.status(500).json({ message: "Login failed" });
    }
  });

  router.post("/logout", (_req: IdentityRequest, res: Response) => {
    res.clearCookie(SESSION_COOKIE_NAME);
    res.json({ message: "You have been logged out." });
  });

  router.get("/me", (req: IdentityRequest, res: Response) => {
    if (!req.user) {
      return res.status(401).json({ message: "Authentication required" });
    }
    return res.json({ username: req.user.username });
  });

  return router;
}
