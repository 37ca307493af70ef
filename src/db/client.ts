import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

export type Database = NodePgDatabase;

export function createDb(connectionString: string): { db: Database; pool: Pool } {
  const pool = new Pool({
    connectionString,
  });

  return { db: drizzle(pool), pool };
}
