/**
 * @fileoverview Contract Graph Store
 *
 * Persists a contract's analysis as a graph and reads it back whole.
 *
 * ## Upsert
 *
 * One transaction: upsert the contract row, delete every child of the
 * contract, insert the freshly built children. Re-ingesting a contract
 * therefore replaces its clauses, dates and parties without residue, and a
 * failure anywhere rolls the contract back to its previous version.
 *
 * ## Reads
 *
 * `get` runs its queries inside a REPEATABLE READ transaction so that a
 * concurrent upsert is seen either entirely or not at all.
 *
 * @module db/queries/contracts
 * @see {@link ../schema/contracts.ts} for table definitions
 */

import { and, asc, count, eq, inArray, sql } from "drizzle-orm"
import {
  CLAUSE_FACETS,
  RISK_LEVELS,
  riskLevelSchema,
  type ClauseFacet,
  type RiskLevel,
} from "@/agents/types"
import {
  NotFoundError,
  StorageError,
  driverErrorMessage,
  isAppError,
} from "@/lib/errors"
import { logger } from "@/lib/logger"
import { Err, Ok, type Result } from "@/lib/result"
import { withTimeout } from "@/lib/timeout"
import { getDb, type Database } from "../client"
import {
  FACET_EDGES,
  assertGraphInput,
  buildContractGraph,
  partyRows,
  type ContractGraphInput,
} from "../graph"
import {
  clauseFacets,
  clauses,
  contracts,
  importantDates,
  organizations,
  partyRelationships,
  type EmbeddingStatus,
  type FacetRelationship,
} from "../schema"

// ============================================================================
// Types
// ============================================================================

export interface PartyRecord {
  organizationId: string
  name: string
  role: string
}

export interface ImportantDateRecord {
  id: string
  value: string
  type: string
}

export interface ClauseRecord {
  id: string
  position: number
  name: string
  summary: string
  embedding: number[]
  embeddingStatus: EmbeddingStatus
  risk: { level: RiskLevel; reason: string }
  obligation: string
  liability: string
  aiSummary: string
  /** Facets whose value was substituted by defaulting */
  defaulted: ClauseFacet[]
}

/**
 * A contract with every node reachable from it.
 */
export interface ContractRecord {
  id: string
  title: string
  fileName: string
  governingLaw: string
  embedding: number[]
  embeddingStatus: EmbeddingStatus
  parties: PartyRecord[]
  dates: ImportantDateRecord[]
  clauses: ClauseRecord[]
  createdAt: Date
  updatedAt: Date
}

export type RiskDistribution = Record<RiskLevel, number>

export interface RiskClauseMatch {
  contractId: string
  contractTitle: string
  clauseId: string
  clauseName: string
  reason: string
}

export interface GraphStoreOptions {
  /** Budget for one upsert or read. Default: 30s */
  timeoutMs?: number
}

// ============================================================================
// Store
// ============================================================================

export class GraphStore {
  private readonly timeoutMs: number

  constructor(
    private readonly db: Database = getDb(),
    options: GraphStoreOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000
  }

  /**
   * Writes the contract graph, replacing any previous version.
   *
   * Each statement in the transaction is also bounded on the server by
   * `statement_timeout` set to the store timeout. A client-side timeout that
   * fires while COMMIT is already in flight can still let the write land, so
   * a TimeoutError means the outcome is unknown, not that nothing was written.
   *
   * @throws ValidationError - embedding dimension or count mismatch (nothing is written)
   * @throws StorageError - the transaction failed and was rolled back
   * @throws TimeoutError - the write exceeded its budget
   */
  async upsert(input: ContractGraphInput): Promise<void> {
    assertGraphInput(input)
    const graph = buildContractGraph(input)
    const contractId = graph.contract.id

    await this.guard("upsert", contractId, () =>
      this.db.transaction(async (tx) => {
        await tx.execute(sql.raw(`SET LOCAL statement_timeout = ${Math.ceil(this.timeoutMs)}`))
        await tx
          .insert(contracts)
          .values(graph.contract)
          .onConflictDoUpdate({
            target: contracts.id,
            set: {
              title: graph.contract.title,
              fileName: graph.contract.fileName,
              governingLaw: graph.contract.governingLaw,
              embedding: graph.contract.embedding,
              embeddingStatus: graph.contract.embeddingStatus,
              updatedAt: new Date(),
            },
          })

        // Facets and party edges cascade from these
        await tx.delete(clauses).where(eq(clauses.contractId, contractId))
        await tx.delete(importantDates).where(eq(importantDates.contractId, contractId))
        await tx.delete(organizations).where(eq(organizations.contractId, contractId))

        if (graph.organizations.length > 0) {
          await tx.insert(organizations).values(graph.organizations)
          await tx.insert(partyRelationships).values(partyRows(graph))
        }
        if (graph.dates.length > 0) {
          await tx.insert(importantDates).values(graph.dates)
        }
        if (graph.clauses.length > 0) {
          await tx.insert(clauses).values(graph.clauses)
          await tx.insert(clauseFacets).values(graph.facets)
        }
      })
    )

    logger.info("Contract graph stored", {
      contractId,
      clauses: graph.clauses.length,
      parties: graph.organizations.length,
      dates: graph.dates.length,
    })
  }

  /**
   * Full-depth read of one contract.
   *
   * @throws StorageError - the database could not be read
   */
  async get(contractId: string): Promise<Result<ContractRecord, NotFoundError>> {
    const record = await this.guard("get", contractId, () =>
      this.db.transaction(
        async (tx) => {
          const [contract] = await tx
            .select()
            .from(contracts)
            .where(eq(contracts.id, contractId))
          if (!contract) return null

          const parties = await tx
            .select({
              organizationId: organizations.id,
              name: organizations.name,
              role: partyRelationships.role,
            })
            .from(partyRelationships)
            .innerJoin(organizations, eq(partyRelationships.organizationId, organizations.id))
            .where(eq(partyRelationships.contractId, contractId))
            .orderBy(asc(organizations.position))

          const dates = await tx
            .select({
              id: importantDates.id,
              value: importantDates.value,
              type: importantDates.type,
            })
            .from(importantDates)
            .where(eq(importantDates.contractId, contractId))
            .orderBy(asc(importantDates.position))

          const clauseRows = await tx
            .select()
            .from(clauses)
            .where(eq(clauses.contractId, contractId))
            .orderBy(asc(clauses.position))

          const facetRows =
            clauseRows.length === 0
              ? []
              : await tx
                  .select()
                  .from(clauseFacets)
                  .where(
                    inArray(
                      clauseFacets.clauseId,
                      clauseRows.map((c) => c.id)
                    )
                  )

          const facetsByClause = new Map<string, Map<FacetRelationship, FacetRow>>()
          for (const row of facetRows) {
            const forClause = facetsByClause.get(row.clauseId) ?? new Map<FacetRelationship, FacetRow>()
            forClause.set(row.relationship, row)
            facetsByClause.set(row.clauseId, forClause)
          }

          return {
            id: contract.id,
            title: contract.title,
            fileName: contract.fileName,
            governingLaw: contract.governingLaw,
            embedding: contract.embedding,
            embeddingStatus: contract.embeddingStatus,
            parties,
            dates,
            clauses: clauseRows.map((row) =>
              toClauseRecord(row, facetsByClause.get(row.id) ?? new Map<FacetRelationship, FacetRow>())
            ),
            createdAt: contract.createdAt,
            updatedAt: contract.updatedAt,
          }
        },
        { isolationLevel: "repeatable read", accessMode: "read only" }
      )
    )

    return record ? Ok(record) : Err(new NotFoundError(`Contract ${contractId} not found`))
  }

  /**
   * Removes a contract and every node it owns.
   *
   * @returns false when no such contract existed
   */
  async delete(contractId: string): Promise<boolean> {
    const deleted = await this.guard("delete", contractId, () =>
      this.db
        .delete(contracts)
        .where(eq(contracts.id, contractId))
        .returning({ id: contracts.id })
    )
    return deleted.length > 0
  }

  /**
   * Number of clauses per risk level for one contract.
   */
  async getRiskDistribution(contractId: string): Promise<RiskDistribution> {
    const rows = await this.guard("getRiskDistribution", contractId, () =>
      this.db
        .select({ level: clauseFacets.value, count: count() })
        .from(clauseFacets)
        .innerJoin(clauses, eq(clauseFacets.clauseId, clauses.id))
        .where(and(eq(clauses.contractId, contractId), eq(clauseFacets.relationship, "HAS_RISK")))
        .groupBy(clauseFacets.value)
    )

    const distribution: RiskDistribution = { Low: 0, Medium: 0, High: 0 }
    for (const row of rows) {
      distribution[parseRiskLevel(row.level)] = row.count
    }
    return distribution
  }

  /**
   * Clauses rated `level` across all contracts, in insertion order.
   */
  async findClausesByRiskLevel(
    level: RiskLevel,
    { limit = 50 }: { limit?: number } = {}
  ): Promise<RiskClauseMatch[]> {
    const rows = await this.guard("findClausesByRiskLevel", level, () =>
      this.db
        .select({
          contractId: contracts.id,
          contractTitle: contracts.title,
          clauseId: clauses.id,
          clauseName: clauses.name,
        })
        .from(clauseFacets)
        .innerJoin(clauses, eq(clauseFacets.clauseId, clauses.id))
        .innerJoin(contracts, eq(clauses.contractId, contracts.id))
        .where(and(eq(clauseFacets.relationship, "HAS_RISK"), eq(clauseFacets.value, level)))
        .orderBy(asc(clauses.seq))
        .limit(limit)
    )
    if (rows.length === 0) return []

    const reasons = await this.guard("findClausesByRiskLevel", level, () =>
      this.db
        .select({ clauseId: clauseFacets.clauseId, value: clauseFacets.value })
        .from(clauseFacets)
        .where(
          and(
            eq(clauseFacets.relationship, "HAS_REASON"),
            inArray(
              clauseFacets.clauseId,
              rows.map((r) => r.clauseId)
            )
          )
        )
    )
    const reasonByClause = new Map(reasons.map((r) => [r.clauseId, r.value]))

    return rows.map((row) => ({ ...row, reason: reasonByClause.get(row.clauseId) ?? "" }))
  }

  /**
   * Bounds an operation by the store timeout and maps driver errors to
   * StorageError. App errors pass through unchanged.
   */
  private async guard<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`storage ${operation}`, this.timeoutMs, fn)
    } catch (error) {
      if (isAppError(error)) throw error
      const message = driverErrorMessage(error)
      logger.error("Graph storage failed", { operation, key, error: message })
      throw new StorageError(`Graph storage ${operation} failed: ${message}`, {
        cause: error,
      })
    }
  }
}

function parseRiskLevel(value: string): RiskLevel {
  const parsed = riskLevelSchema.safeParse(value)
  if (!parsed.success) {
    throw new StorageError(`Stored risk level "${value}" is not one of ${RISK_LEVELS.join(", ")}`)
  }
  return parsed.data
}

type FacetRow = typeof clauseFacets.$inferSelect
type ClauseRow = typeof clauses.$inferSelect

function toClauseRecord(row: ClauseRow, facets: Map<FacetRelationship, FacetRow>): ClauseRecord {
  const value = (relationship: FacetRelationship) => {
    const facet = facets.get(relationship)
    if (!facet) {
      throw new StorageError(`Clause ${row.id} is missing its ${relationship} facet`)
    }
    return facet
  }

  const defaulted = CLAUSE_FACETS.filter(
    (facet) => facets.get(FACET_EDGES[facet].relationship)?.source === "default"
  )

  return {
    id: row.id,
    position: row.position,
    name: row.name,
    summary: row.summary,
    embedding: row.embedding,
    embeddingStatus: row.embeddingStatus,
    risk: {
      level: parseRiskLevel(value("HAS_RISK").value),
      reason: value("HAS_REASON").value,
    },
    obligation: value("HAS_OBLIGATION").value,
    liability: value("HAS_LIABILITY").value,
    aiSummary: value("HAS_AI_SUMMARY").value,
    defaulted,
  }
}
