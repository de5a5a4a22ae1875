/**
 * Database Connection
 *
 * Purpose:
 * Builds the Drizzle ORM client over Neon's HTTP driver. Each query is a
 * single HTTP round trip, which matches the one-statement-per-operation
 * shape of the query and session layers.
 *
 * Layer: Infrastructure
 */

import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";

export function createDb(databaseUrl: string) {
  const queryClient = neon(databaseUrl);
  return drizzle(queryClient);
}

export type Database = ReturnType<typeof createDb>;
