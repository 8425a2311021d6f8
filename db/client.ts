/**
 * PostgreSQL Database Client
 *
 * Drizzle ORM over the Neon serverless driver's WebSocket `Pool`. The pooled
 * driver (unlike the one-shot HTTP driver) supports interactive
 * transactions, which the graph upsert needs.
 *
 * @example
 * ```typescript
 * import { getDb } from "@/db/client"
 *
 * const db = getDb()
 * const rows = await db.select().from(contracts).where(eq(contracts.id, id))
 * ```
 *
 * @module db/client
 */

import { Pool, neonConfig } from "@neondatabase/serverless"
import { drizzle } from "drizzle-orm/neon-serverless"
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core"
import ws from "ws"
import { ValidationError } from "@/lib/errors"
import * as schema from "./schema"

// Node has no global WebSocket the driver can rely on
neonConfig.webSocketConstructor = ws

/**
 * Any Drizzle PostgreSQL database carrying the contract graph schema.
 *
 * Query code depends on this rather than the Neon client so the in-memory
 * PGlite database used by tests fits the same seam.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>

let pool: Pool | null = null
let instance: Database | null = null

/**
 * Returns the shared client, creating the pool on first use.
 *
 * @throws ValidationError - no connection string configured
 */
export function getDb(databaseUrl: string | undefined = process.env.DATABASE_URL): Database {
  if (instance) return instance
  if (!databaseUrl) {
    throw new ValidationError("DATABASE_URL is required")
  }
  pool = new Pool({ connectionString: databaseUrl })
  instance = drizzle(pool, { schema })
  return instance
}

/**
 * Closes the pool so the process can exit.
 */
export async function closeDb(): Promise<void> {
  const current = pool
  pool = null
  instance = null
  await current?.end()
}
