export { attachUserIdentity, requireUser, SESSION_COOKIE_NAME } from "./middleware";
export { createAuthRouter } from "./login";
export type { IdentityRequest } from "./types";
