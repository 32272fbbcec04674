import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export type DatabaseHandle = {
  db: Database;
  close(): Promise<void>;
};

export function createDatabase(databaseUrl: string): DatabaseHandle {
  const pool = new Pool({ connectionString: databaseUrl });
  pool.on("error", (err) => {
    console.error("[db] Idle client error:", err.message);
  });

  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
