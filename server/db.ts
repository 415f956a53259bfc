import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { logError } from "./lib/logger";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

export function createDb(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString, max: 10, idleTimeoutMillis: 30000 });

  pool.on("error", (err) => {
    logError("Unexpected error on idle client", "db", err);
  });

  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
