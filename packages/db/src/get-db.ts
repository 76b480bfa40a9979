/**
 * packages/db - DB connection helper
 *
 * 各 app / script で繰り返しがちな `Pool` / `drizzle` 初期化を 1 箇所に集約します。
 * `connectionString` だけ外から渡せば、schema も自動で紐づいた `db` を返します。
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = NodePgDatabase<typeof schema> & { $client: Pool };

/**
 * Any drizzle Postgres database bound to this schema, whatever the driver.
 * Repositories accept this so they can run over node-postgres or pg-proxy.
 */
export type SchemaDatabase<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT> = PgDatabase<
  TQueryResult,
  typeof schema
>;

export interface GetDbOptions {
  /**
   * Pool size. The collector issues one statement at a time per loop, so a
   * small pool is enough.
   */
  maxConnections?: number;
}

export function getDb(connectionString: string, options: GetDbOptions = {}): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString, max: options.maxConnections ?? 5 });
  return drizzle(pool, { schema });
}

/**
 * Close the underlying pg pool.
 */
export async function closeDb(db: Db): Promise<void> {
  await db.$client.end();
}
