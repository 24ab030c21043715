/**
 * Database Connection
 *
 * Purpose:
 * Provides a shared database connection using Drizzle ORM with Neon.
 * Created on first use so that tests and local runs without DATABASE_URL
 * never touch it.
 *
 * Layer: Infrastructure
 */

import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";

export type Database = NeonHttpDatabase<Record<string, never>>;

export function createDb(databaseUrl = process.env.DATABASE_URL): Database {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  const queryClient = neon(databaseUrl);
  return drizzle(queryClient);
}

let _db: Database | null = null;
export function getDb(): Database {
  if (!_db) {
    _db = createDb();
  }
  return _db;
}
