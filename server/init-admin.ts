import bcrypt from "bcryptjs";
import type { IStorage } from "./storage";
import { describeError, logError, logInfo, logWarn } from "./utils/logger";

export interface AdminCredentials {
  username?: string;
  password?: string;
}

export async function ensureAdminExists(storage: IStorage, credentials: AdminCredentials): Promise<void> {
  const { username, password } = credentials;

  if (!username || !password) {
    logWarn("admin_init_skipped", { reason: "PORTAL_ADMIN_USERNAME or PORTAL_ADMIN_PASSWORD not set" });
    return;
  }

  try {
    const existingAdmin = await storage.getUserByUsername(username);

    if (!existingAdmin) {
      const passwordHash = await bcrypt.hash(password, 10);
      await storage.createUser({ username, passwordHash });
      logInfo("admin_created", { username });
    } else {
      logInfo("admin_exists", { username });
    }
  } catch (error) {
    logError("admin_init_failed", { error: describeError(error) });
  }
}
