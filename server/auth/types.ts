import type { Request } from "express";
import type { PortalUser } from "@shared/schema";

export interface IdentityRequest extends Request {
  user?: PortalUser;
}
