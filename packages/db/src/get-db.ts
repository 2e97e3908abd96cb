/**
 * packages/db - DB connection helper
 *
 * `Pool` / `drizzle` の初期化を 1 箇所に集約します。
 * `connectionString` だけ外から渡せば、schema も自動で紐づいた `db` を返します。
 *
 * 終了時は `db.$client.end()` で Pool を閉じてください。
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = NodePgDatabase<typeof schema> & { $client: Pool };

export function getDb(connectionString: string): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString });
  return drizzle(pool, { schema });
}
