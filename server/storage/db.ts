/**
 * Shared database connection
 *
 * Creates the drizzle database instance used by DatabaseStorage.
 */

import { drizzle } from "drizzle-orm/neon-serverless";
import { Pool, neonConfig } from "@neondatabase/serverless";
import ws from "ws";
import * as schema from "@shared/schema";

// Configure WebSocket for Neon serverless
neonConfig.webSocketConstructor = ws;

export function createDb(connectionString: string) {
  const pool = new Pool({ connectionString });
  return drizzle({ client: pool, schema });
}

export type Database = ReturnType<typeof createDb>;

// Re-export schema for convenience
export { schema };

// Re-export commonly used drizzle operators
export { eq, desc, sql } from "drizzle-orm";
