import jwt from "jsonwebtoken";

const SESSION_TTL = "7d";

function getJwtSecret(): string {
  return process.env.JWT_SECRET || "dev-secret-change-me";
}

export interface UserTokenPayload {
  userId: string;
  username: string;
  type: "user_session";
}

function isUserTokenPayload(value: unknown): value is UserTokenPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "user_session" &&
    "userId" in value &&
    typeof value.userId === "string" &&
    "username" in value &&
    typeof value.username === "string"
  );
}

export function generateUserSessionToken(userId: string, username: string): string {
  const payload: UserTokenPayload = {
    userId,
    username,
    type: "user_session",
  };
  return jwt.sign(payload, getJwtSecret(), { expiresIn: SESSION_TTL });
}

export function verifyUserSessionToken(token: string): UserTokenPayload | null {
  try {
    const decoded = jwt.verify(token, getJwtSecret());
    return isUserTokenPayload(decoded) ? decoded : null;
  } catch {
    return null;
  }
}
