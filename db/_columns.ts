/**
 * @fileoverview Reusable column helper objects for Drizzle ORM schema composition.
 *
 * @example
 * import { pgTable, text } from "drizzle-orm/pg-core"
 * import { timestamps } from "./_columns"
 *
 * export const contracts = pgTable("contracts", {
 *   id: text("id").primaryKey(),
 *   ...timestamps,     // Adds: createdAt, updatedAt (auto-managed)
 * })
 *
 * @module db/_columns
 */

import { timestamp } from "drizzle-orm/pg-core"

/**
 * Standard timestamp columns for tracking record creation and modification times.
 *
 * - `createdAt`: Set automatically when a record is inserted (via `defaultNow()`)
 * - `updatedAt`: Set on insert and refreshed by Drizzle's `$onUpdate()` hook
 *
 * @remarks
 * `$onUpdate()` does not fire for `onConflictDoUpdate`; upserts set
 * `updatedAt` explicitly.
 */
export const timestamps = {
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow()
    .$onUpdate(() => new Date()),
}
