/**
 * Storage module index
 *
 * Postgres when DATABASE_URL is set, process memory otherwise.
 */

import { DatabaseStorage } from "./databaseStorage";
import { MemStorage } from "./memStorage";
import type { IStorage } from "./types";

export type { IStorage } from "./types";
export { MemStorage } from "./memStorage";
export { DatabaseStorage } from "./databaseStorage";

export function createStorage(databaseUrl: string | undefined = process.env.DATABASE_URL): IStorage {
  return databaseUrl ? new DatabaseStorage(databaseUrl) : new MemStorage();
}
