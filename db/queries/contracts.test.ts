import { describe, it, expect } from "vitest"
import { GraphStore, type ContractRecord } from "./contracts"
import { clauseFacets } from "../schema"
import { NotFoundError, StorageError, ValidationError } from "@/lib/errors"
import { testClient, testDb } from "@/test/setup"
import {
  countRows,
  createGraphInput,
  degradedEmbedding,
  failFacetInsertsWithValue,
  nominalEmbedding,
} from "@/test/factories"
import { SAMPLE_ANALYSIS, SAMPLE_REVISED_ANALYSIS } from "@/agents/testing/fixtures"

async function getRecord(store: GraphStore, contractId: string): Promise<ContractRecord> {
  const result = await store.get(contractId)
  if (!result.ok) throw result.error
  return result.value
}

function structureOf(record: ContractRecord) {
  const { createdAt: _createdAt, updatedAt: _updatedAt, ...rest } = record
  return rest
}

describe("GraphStore", () => {
  describe("upsert and get", () => {
    it("stores a contract with one high-risk payment clause", async () => {
      const store = new GraphStore()
      const input = createGraphInput({ contractId: "contract-a" })

      await store.upsert(input)
      const record = await getRecord(store, "contract-a")

      expect(record.clauses).toHaveLength(1)
      expect(record.clauses[0].name).toBe("Payment Terms")
      expect(record.clauses[0].risk.level).toBe("High")
      expect(record.clauses[0].obligation).toBe("Pay within 15 days")
    })

    it("returns the full-depth record", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-a", fileName: "msa.pdf" }))

      const record = await getRecord(store, "contract-a")

      expect(structureOf(record)).toEqual({
        id: "contract-a",
        title: "Master Services Agreement",
        fileName: "msa.pdf",
        governingLaw: "State of Delaware",
        embedding: nominalEmbedding(0).vector,
        embeddingStatus: "nominal",
        parties: [
          { organizationId: "contract-a/org/0", name: "Acme Corp", role: "Service Provider" },
          { organizationId: "contract-a/org/1", name: "Globex LLC", role: "Client" },
        ],
        dates: [{ id: "contract-a/date/0", value: "2024-03-01", type: "effective" }],
        clauses: [
          {
            id: "contract-a/clause/0",
            position: 0,
            name: "Payment Terms",
            summary: SAMPLE_ANALYSIS.clauses[0].summary,
            embedding: nominalEmbedding(1).vector,
            embeddingStatus: "nominal",
            risk: SAMPLE_ANALYSIS.clauses[0].risk,
            obligation: "Pay within 15 days",
            liability: "Interest of 1.5% per month on late payments",
            aiSummary: "Invoices are due fast and lateness is expensive.",
            defaulted: [],
          },
        ],
      })
      expect(record.createdAt).toBeInstanceOf(Date)
    })

    it("keeps clause order and defaulting provenance", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-b", analysis: SAMPLE_REVISED_ANALYSIS }))

      const record = await getRecord(store, "contract-b")

      expect(record.clauses.map((c) => c.name)).toEqual(["Limitation of Liability", "Termination"])
      expect(record.clauses.map((c) => c.defaulted)).toEqual([["obligation"], []])
    })

    it("replaces every child on re-ingest", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-a", analysis: SAMPLE_ANALYSIS }))
      await store.upsert(createGraphInput({ contractId: "contract-a", analysis: SAMPLE_REVISED_ANALYSIS }))

      const record = await getRecord(store, "contract-a")

      expect(record.title).toBe("Master Services Agreement (Amended)")
      expect(record.governingLaw).toBe("State of New York")
      expect(record.parties).toEqual([
        { organizationId: "contract-a/org/0", name: "Acme Corp", role: "Vendor" },
      ])
      expect(record.dates).toEqual([])
      expect(record.clauses.map((c) => c.name)).toEqual(["Limitation of Liability", "Termination"])
      expect(await countRows("contracts")).toBe(1)
      expect(await countRows("organizations")).toBe(1)
      expect(await countRows("party_relationships")).toBe(1)
      expect(await countRows("important_dates")).toBe(0)
      expect(await countRows("clauses")).toBe(2)
      expect(await countRows("clause_facets")).toBe(10)
    })

    it("leaves the same observable state when the same input is written twice", async () => {
      const store = new GraphStore()
      const input = createGraphInput({ contractId: "contract-a" })

      await store.upsert(input)
      const once = await getRecord(store, "contract-a")
      await store.upsert(input)
      const twice = await getRecord(store, "contract-a")

      expect(structureOf(twice)).toEqual(structureOf(once))
      expect(await countRows("clauses")).toBe(1)
      expect(await countRows("clause_facets")).toBe(5)
    })

    it("stores a contract without clauses", async () => {
      const store = new GraphStore()
      await store.upsert(
        createGraphInput({
          contractId: "contract-empty",
          analysis: { title: "Untitled", governingLaw: "Not specified", parties: [], dates: [], clauses: [] },
          contractEmbedding: degradedEmbedding(),
        })
      )

      const record = await getRecord(store, "contract-empty")

      expect(record.clauses).toEqual([])
      expect(record.embeddingStatus).toBe("degraded")
      expect(record.embedding.every((v) => v === 0)).toBe(true)
    })

    it("rejects mismatched embeddings before writing anything", async () => {
      const store = new GraphStore()
      const input = createGraphInput({ contractEmbedding: { vector: [1, 0], status: "nominal" } })

      await expect(store.upsert(input)).rejects.toBeInstanceOf(ValidationError)
      expect(await countRows("contracts")).toBe(0)
    })
  })

  describe("transaction failure", () => {
    it("keeps the prior version when a write fails mid-transaction", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-a", analysis: SAMPLE_ANALYSIS }))
      await failFacetInsertsWithValue("Capped at 12 months of fees")

      const failing = store.upsert(
        createGraphInput({ contractId: "contract-a", analysis: SAMPLE_REVISED_ANALYSIS })
      )

      await expect(failing).rejects.toBeInstanceOf(StorageError)
      const record = await getRecord(store, "contract-a")
      expect(record.title).toBe("Master Services Agreement")
      expect(record.clauses.map((c) => c.name)).toEqual(["Payment Terms"])
      expect(record.parties).toHaveLength(2)
      expect(await countRows("clause_facets")).toBe(5)
    })

    it("reports the database error without the query text", async () => {
      const store = new GraphStore()
      await failFacetInsertsWithValue("Pay within 15 days")

      const error = await store
        .upsert(createGraphInput({ contractId: "contract-a" }))
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(StorageError)
      expect(error instanceof Error && error.message).toBe(
        "Graph storage upsert failed: simulated storage failure"
      )
    })

    it("bounds each statement of the write by the store timeout", async () => {
      await testClient.exec(`
        CREATE TABLE seen_timeouts (value text);
        CREATE FUNCTION record_statement_timeout() RETURNS trigger AS $$
        BEGIN
          INSERT INTO seen_timeouts VALUES (current_setting('statement_timeout'));
          RETURN NEW;
        END;
        $$ LANGUAGE plpgsql;
        CREATE TRIGGER record_statement_timeout BEFORE INSERT ON contracts
          FOR EACH ROW EXECUTE FUNCTION record_statement_timeout();
      `)
      const store = new GraphStore(testDb, { timeoutMs: 1500 })

      await store.upsert(createGraphInput({ contractId: "contract-a" }))

      const seen = await testClient.query<{ value: string }>("SELECT value FROM seen_timeouts")
      expect(seen.rows).toEqual([{ value: "1500ms" }])
      const after = await testClient.query<{ statement_timeout: string }>("SHOW statement_timeout")
      expect(after.rows[0].statement_timeout).toBe("0")
    })

    it("leaves nothing behind when a first write fails", async () => {
      const store = new GraphStore()
      await failFacetInsertsWithValue("Pay within 15 days")

      await expect(
        store.upsert(createGraphInput({ contractId: "contract-new" }))
      ).rejects.toThrow(StorageError)

      const result = await store.get("contract-new")
      expect(result.ok).toBe(false)
      expect(await countRows("contracts")).toBe(0)
      expect(await countRows("clauses")).toBe(0)
    })
  })

  describe("get", () => {
    it("returns NotFoundError for an unknown id", async () => {
      const result = await new GraphStore().get("contract-missing")

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NotFoundError)
        expect(result.error.message).toBe("Contract contract-missing not found")
      }
    })
  })

  describe("delete", () => {
    it("removes the contract and every node it owns", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-a" }))

      expect(await store.delete("contract-a")).toBe(true)
      expect((await store.get("contract-a")).ok).toBe(false)
      expect(await countRows("clauses")).toBe(0)
      expect(await countRows("clause_facets")).toBe(0)
      expect(await countRows("organizations")).toBe(0)
      expect(await countRows("party_relationships")).toBe(0)
      expect(await countRows("important_dates")).toBe(0)
    })

    it("returns false for an unknown id", async () => {
      expect(await new GraphStore().delete("contract-missing")).toBe(false)
    })
  })

  describe("risk queries", () => {
    it("counts clauses per risk level", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-b", analysis: SAMPLE_REVISED_ANALYSIS }))

      expect(await store.getRiskDistribution("contract-b")).toEqual({ Low: 1, Medium: 1, High: 0 })
      expect(await store.getRiskDistribution("contract-missing")).toEqual({ Low: 0, Medium: 0, High: 0 })
    })

    it("finds clauses by risk level across contracts in insertion order", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-1" }))
      await store.upsert(createGraphInput({ contractId: "contract-2", analysis: SAMPLE_REVISED_ANALYSIS }))
      await store.upsert(createGraphInput({ contractId: "contract-3" }))

      const high = await store.findClausesByRiskLevel("High")

      expect(high).toEqual([
        {
          contractId: "contract-1",
          contractTitle: "Master Services Agreement",
          clauseId: "contract-1/clause/0",
          clauseName: "Payment Terms",
          reason: "Short payment window with compounding late interest",
        },
        {
          contractId: "contract-3",
          contractTitle: "Master Services Agreement",
          clauseId: "contract-3/clause/0",
          clauseName: "Payment Terms",
          reason: "Short payment window with compounding late interest",
        },
      ])
      expect(await store.findClausesByRiskLevel("High", { limit: 1 })).toHaveLength(1)
      expect(await store.findClausesByRiskLevel("Low")).toHaveLength(1)
    })
  })

  describe("schema constraints", () => {
    it("rejects a risk facet outside Low, Medium and High", async () => {
      const store = new GraphStore()
      await store.upsert(createGraphInput({ contractId: "contract-a" }))

      await expect(
        testDb.insert(clauseFacets).values({
          id: "contract-a/clause/0/extra",
          clauseId: "contract-a/clause/0",
          relationship: "HAS_RISK",
          label: "Risk",
          value: "Severe",
          source: "model",
        })
      ).rejects.toThrow()
    })
  })
})
