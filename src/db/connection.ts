import { promises as fs } from "fs";
import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** In-process Postgres for dry runs and tests; contents live as long as the pool. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createPool(databaseUrl: string | undefined = process.env.DATABASE_URL): pg.Pool {
  return databaseUrl ? createPgPool(databaseUrl) : createMemoryPool();
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
