/**
 * Database Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { GraphStore, SimilaritySearch, getDb } from "@/db"
 *
 * const store = new GraphStore(getDb())
 * const result = await store.get(contractId)
 * ```
 *
 * ## Available Exports
 *
 * - **From `./client`**: `getDb`, `closeDb`, `Database` (type)
 * - **From `./schema`**: table definitions and enums
 * - **From `./graph`**: `buildContractGraph` and graph types
 * - **From `./queries`**: `GraphStore`, `SimilaritySearch`
 *
 * @module db
 */

export { getDb, closeDb, type Database } from "./client"
export * from "./schema"
export * from "./graph"
export * from "./queries"
