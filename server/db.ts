import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { config as loadEnv } from "dotenv";
import pg from "pg";
import * as schema from "@shared/schema";

loadEnv({ path: ".env" });
loadEnv({ path: ".env.local", override: true });

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

// Null in tool-only mode: the record store then lives in memory
let pool: pg.Pool | null = null;
let db: Database | null = null;

if (process.env.DATABASE_URL) {
  pool = new Pool({
    connectionString: process.env.DATABASE_URL,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    statement_timeout: 30_000,
  });
  db = drizzle(pool, { schema });
} else if (process.env.NODE_ENV !== "test") {
  console.warn("⚠️  DATABASE_URL not set - records are kept in memory for this run only");
}

export { pool, db };
