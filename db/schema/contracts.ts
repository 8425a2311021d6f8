/**
 * @fileoverview Contract graph schema
 *
 * The knowledge graph is stored as PostgreSQL tables: each node label has a
 * table, ownership edges (HAS_CLAUSE, HAS_DATE) are foreign keys, the
 * IS_PARTY_TO edge has its own table because it carries `role`, and the five
 * clause facets share one table keyed by relationship type.
 *
 * Every child row cascades from its contract, so nothing outlives the
 * contract it belongs to.
 *
 * @module db/schema/contracts
 */

import { sql } from "drizzle-orm"
import {
  check,
  date,
  index,
  integer,
  pgTable,
  primaryKey,
  serial,
  text,
  unique,
  vector,
} from "drizzle-orm/pg-core"
import { timestamps } from "../_columns"

/** Dimension of stored embeddings (voyage-law-2) */
export const VECTOR_DIMENSIONS = 1024

export const EMBEDDING_STATUSES = ["nominal", "degraded"] as const
export type EmbeddingStatus = (typeof EMBEDDING_STATUSES)[number]

export const FACET_RELATIONSHIPS = [
  "HAS_RISK",
  "HAS_REASON",
  "HAS_OBLIGATION",
  "HAS_LIABILITY",
  "HAS_AI_SUMMARY",
] as const
export type FacetRelationship = (typeof FACET_RELATIONSHIPS)[number]

export const FACET_LABELS = [
  "Risk",
  "RiskReason",
  "Obligation",
  "Liability",
  "AISummary",
] as const
export type FacetLabel = (typeof FACET_LABELS)[number]

/** Whether a facet value came from the model or from defaulting */
export const FACET_SOURCES = ["model", "default"] as const
export type FacetSource = (typeof FACET_SOURCES)[number]

// ============================================================================
// Nodes
// ============================================================================

export const contracts = pgTable("contracts", {
  id: text("id").primaryKey(),
  title: text("title").notNull(),
  fileName: text("file_name").notNull(),
  governingLaw: text("governing_law").notNull(),
  embedding: vector("embedding", { dimensions: VECTOR_DIMENSIONS }).notNull(),
  embeddingStatus: text("embedding_status", { enum: EMBEDDING_STATUSES }).notNull(),
  ...timestamps,
})

/**
 * Organizations are scoped to one contract; the same company appearing in
 * two contracts is two nodes.
 */
export const organizations = pgTable(
  "organizations",
  {
    id: text("id").primaryKey(),
    contractId: text("contract_id")
      .notNull()
      .references(() => contracts.id, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    name: text("name").notNull(),
  },
  (table) => [index("idx_orgs_contract").on(table.contractId, table.position)]
)

/** IS_PARTY_TO edge: Organization -> Contract */
export const partyRelationships = pgTable(
  "party_relationships",
  {
    organizationId: text("organization_id")
      .notNull()
      .references(() => organizations.id, { onDelete: "cascade" }),
    contractId: text("contract_id")
      .notNull()
      .references(() => contracts.id, { onDelete: "cascade" }),
    role: text("role").notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.organizationId, table.contractId] }),
    index("idx_party_contract").on(table.contractId),
  ]
)

/** ImportantDate node; `contract_id` is the HAS_DATE edge */
export const importantDates = pgTable(
  "important_dates",
  {
    id: text("id").primaryKey(),
    contractId: text("contract_id")
      .notNull()
      .references(() => contracts.id, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    value: date("value", { mode: "string" }).notNull(),
    type: text("type").notNull(),
  },
  (table) => [index("idx_dates_contract").on(table.contractId, table.position)]
)

/**
 * Clause node; `contract_id` is the HAS_CLAUSE edge. `seq` records insertion
 * order and breaks ties in similarity search.
 */
export const clauses = pgTable(
  "clauses",
  {
    id: text("id").primaryKey(),
    contractId: text("contract_id")
      .notNull()
      .references(() => contracts.id, { onDelete: "cascade" }),
    seq: serial("seq").notNull(),
    position: integer("position").notNull(),
    name: text("name").notNull(),
    summary: text("summary").notNull(),
    embedding: vector("embedding", { dimensions: VECTOR_DIMENSIONS }).notNull(),
    embeddingStatus: text("embedding_status", { enum: EMBEDDING_STATUSES }).notNull(),
  },
  (table) => [
    index("idx_clauses_contract").on(table.contractId, table.position),
    index("idx_clauses_seq").on(table.seq),
  ]
)

/**
 * Risk, RiskReason, Obligation, Liability and AISummary nodes together with
 * the typed edge from their clause. One row per (clause, relationship).
 */
export const clauseFacets = pgTable(
  "clause_facets",
  {
    id: text("id").primaryKey(),
    clauseId: text("clause_id")
      .notNull()
      .references(() => clauses.id, { onDelete: "cascade" }),
    relationship: text("relationship", { enum: FACET_RELATIONSHIPS }).notNull(),
    label: text("label", { enum: FACET_LABELS }).notNull(),
    value: text("value").notNull(),
    source: text("source", { enum: FACET_SOURCES }).notNull(),
  },
  (table) => [
    unique("facet_clause_relationship").on(table.clauseId, table.relationship),
    index("idx_facets_relationship_value").on(table.relationship, table.value),
    check(
      "facet_risk_level",
      sql`${table.relationship} <> 'HAS_RISK' OR ${table.value} IN ('Low', 'Medium', 'High')`
    ),
  ]
)

export type Contract = typeof contracts.$inferSelect
export type NewContract = typeof contracts.$inferInsert
export type Organization = typeof organizations.$inferSelect
export type NewOrganization = typeof organizations.$inferInsert
export type NewPartyRelationship = typeof partyRelationships.$inferInsert
export type NewImportantDate = typeof importantDates.$inferInsert
export type Clause = typeof clauses.$inferSelect
export type NewClause = typeof clauses.$inferInsert
export type NewClauseFacet = typeof clauseFacets.$inferInsert
