import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { drizzle } from "drizzle-orm/node-postgres";
import { sql } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import pg from "pg";
import * as schema from "@shared/schema";

/**
 * Any drizzle Postgres handle over our schema. Transactions are handles too,
 * so every store method takes one of these and works the same inside or
 * outside a transaction.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

const SCHEMA_FILE = fileURLToPath(new URL("./sql/schema.sql", import.meta.url));

export function createDatabase(connectionString: string) {
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return { pool, db };
}

/**
 * Runs the hand-written DDL in server/sql/schema.sql. Every statement is
 * idempotent.
 */
export async function applySchema(db: Database): Promise<void> {
  const ddl = await readFile(SCHEMA_FILE, "utf8");
  const statements = ddl
    .split(/;\s*$/m)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
}
