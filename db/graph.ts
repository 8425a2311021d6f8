/**
 * @fileoverview Typed graph construction
 *
 * `buildContractGraph` turns a structured analysis and its embeddings into
 * the nodes and typed edges the store writes. It is pure: identical input
 * yields identical ids, which is what makes re-ingestion idempotent.
 *
 * @module db/graph
 */

import {
  CLAUSE_FACETS,
  type ClauseAnalysis,
  type ClauseFacet,
  type StructuredAnalysis,
} from "@/agents/types"
import { ValidationError, type ErrorDetail } from "@/lib/errors"
import {
  VECTOR_DIMENSIONS,
  type EmbeddingStatus,
  type FacetLabel,
  type FacetRelationship,
  type NewClause,
  type NewClauseFacet,
  type NewContract,
  type NewImportantDate,
  type NewOrganization,
  type NewPartyRelationship,
} from "./schema"

export interface StoredEmbedding {
  vector: number[]
  status: EmbeddingStatus
}

export interface ContractGraphInput {
  contractId: string
  fileName: string
  analysis: StructuredAnalysis
  contractEmbedding: StoredEmbedding
  /** One per analysis clause, same order */
  clauseEmbeddings: StoredEmbedding[]
}

/** Facet relationship and node label for each clause facet */
export const FACET_EDGES = {
  riskLevel: { relationship: "HAS_RISK", label: "Risk" },
  riskReason: { relationship: "HAS_REASON", label: "RiskReason" },
  obligation: { relationship: "HAS_OBLIGATION", label: "Obligation" },
  liability: { relationship: "HAS_LIABILITY", label: "Liability" },
  aiSummary: { relationship: "HAS_AI_SUMMARY", label: "AISummary" },
} as const satisfies Record<ClauseFacet, { relationship: FacetRelationship; label: FacetLabel }>

export type GraphEdge =
  | { type: "IS_PARTY_TO"; from: string; to: string; role: string }
  | { type: "HAS_DATE"; from: string; to: string }
  | { type: "HAS_CLAUSE"; from: string; to: string }
  | { type: FacetRelationship; from: string; to: string }

export interface ContractGraph {
  contract: NewContract
  organizations: NewOrganization[]
  dates: NewImportantDate[]
  clauses: NewClause[]
  facets: NewClauseFacet[]
  edges: GraphEdge[]
}

export const nodeIds = {
  organization: (contractId: string, index: number) => `${contractId}/org/${index}`,
  date: (contractId: string, index: number) => `${contractId}/date/${index}`,
  clause: (contractId: string, index: number) => `${contractId}/clause/${index}`,
  facet: (clauseId: string, relationship: FacetRelationship) => `${clauseId}/${relationship}`,
}

function facetValue(clause: ClauseAnalysis, facet: ClauseFacet): string {
  switch (facet) {
    case "riskLevel":
      return clause.risk.level
    case "riskReason":
      return clause.risk.reason
    case "obligation":
      return clause.obligation
    case "liability":
      return clause.liability
    case "aiSummary":
      return clause.aiSummary
  }
}

/**
 * Checks embedding dimensions and the clause/embedding pairing.
 *
 * @throws ValidationError - one detail per offending vector
 */
export function assertGraphInput(
  input: ContractGraphInput,
  dimensions: number = VECTOR_DIMENSIONS
): void {
  const details: ErrorDetail[] = []
  const check = (field: string, vector: number[]) => {
    if (vector.length !== dimensions) {
      details.push({ field, message: `expected ${dimensions} dimensions, got ${vector.length}` })
    } else if (!vector.every(Number.isFinite)) {
      details.push({ field, message: "contains non-finite values" })
    }
  }

  if (input.contractId.trim().length === 0) {
    details.push({ field: "contractId", message: "must not be empty" })
  }
  check("contractEmbedding", input.contractEmbedding.vector)
  if (input.clauseEmbeddings.length !== input.analysis.clauses.length) {
    details.push({
      field: "clauseEmbeddings",
      message: `expected ${input.analysis.clauses.length} embeddings, got ${input.clauseEmbeddings.length}`,
    })
  }
  input.clauseEmbeddings.forEach((e, i) => check(`clauseEmbeddings.${i}`, e.vector))

  if (details.length > 0) {
    throw new ValidationError("Contract graph input is invalid", details)
  }
}

export function buildContractGraph(input: ContractGraphInput): ContractGraph {
  const { contractId, analysis } = input
  const edges: GraphEdge[] = []

  const organizations = analysis.parties.map((party, i) => {
    const id = nodeIds.organization(contractId, i)
    edges.push({ type: "IS_PARTY_TO", from: id, to: contractId, role: party.role })
    return { id, contractId, position: i, name: party.name }
  })

  const dates = analysis.dates.map((d, i) => {
    const id = nodeIds.date(contractId, i)
    edges.push({ type: "HAS_DATE", from: contractId, to: id })
    return { id, contractId, position: i, value: d.value, type: d.type }
  })

  const facets: NewClauseFacet[] = []
  const clauses = analysis.clauses.map((clause, i) => {
    const id = nodeIds.clause(contractId, i)
    edges.push({ type: "HAS_CLAUSE", from: contractId, to: id })

    for (const facet of CLAUSE_FACETS) {
      const { relationship, label } = FACET_EDGES[facet]
      const facetId = nodeIds.facet(id, relationship)
      edges.push({ type: relationship, from: id, to: facetId })
      facets.push({
        id: facetId,
        clauseId: id,
        relationship,
        label,
        value: facetValue(clause, facet),
        source: clause.defaulted.includes(facet) ? "default" : "model",
      })
    }

    const embedding = input.clauseEmbeddings[i]
    return {
      id,
      contractId,
      position: i,
      name: clause.name,
      summary: clause.summary,
      embedding: embedding.vector,
      embeddingStatus: embedding.status,
    }
  })

  return {
    contract: {
      id: contractId,
      title: analysis.title,
      fileName: input.fileName,
      governingLaw: analysis.governingLaw,
      embedding: input.contractEmbedding.vector,
      embeddingStatus: input.contractEmbedding.status,
    },
    organizations,
    dates,
    clauses,
    facets,
    edges,
  }
}

/** IS_PARTY_TO edges as rows */
export function partyRows(graph: ContractGraph): NewPartyRelationship[] {
  return graph.edges.flatMap((edge) =>
    edge.type === "IS_PARTY_TO"
      ? [{ organizationId: edge.from, contractId: edge.to, role: edge.role }]
      : []
  )
}
