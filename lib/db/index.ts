/**
 * Database Client
 *
 * node-postgres pool wrapped by drizzle. Only created when a
 * DATABASE_URL is configured; the feed runs without persistence otherwise.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type ComplianceDb = NodePgDatabase<typeof schema>;

export interface DbHandle {
  db: ComplianceDb;
  close(): Promise<void>;
}

export function createDb(connectionString: string): DbHandle {
  const pool = new Pool({ connectionString });
  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
