import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import {
  EmbeddingGenerator,
  VOYAGE_CONFIG,
  getVoyageAIClient,
  resetVoyageAIClient,
  type EmbeddingProvider,
} from "./embeddings"
import { clearEmbeddingCache } from "./cache"
import { ValidationError } from "./errors"

function voyageResponse(embeddings: number[][], totalTokens = 50) {
  return {
    ok: true,
    json: async () => ({
      object: "list",
      data: embeddings.map((embedding, index) => ({
        object: "embedding",
        index,
        embedding,
      })),
      model: "voyage-law-2",
      usage: { total_tokens: totalTokens },
    }),
  } as Response
}

describe("VoyageAIClient", () => {
  beforeEach(() => {
    resetVoyageAIClient()
    clearEmbeddingCache()
    vi.stubEnv("VOYAGE_API_KEY", "test-key")
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
  })

  describe("configuration", () => {
    it("uses environment variable if no key provided", () => {
      expect(() => getVoyageAIClient()).not.toThrow()
    })

    it("throws if no API key available", () => {
      vi.stubEnv("VOYAGE_API_KEY", "")
      resetVoyageAIClient()
      expect(() => getVoyageAIClient()).toThrow("VOYAGE_API_KEY")
    })

    it("declares the voyage-law-2 dimension", () => {
      expect(getVoyageAIClient().dimensions).toBe(1024)
      expect(VOYAGE_CONFIG.model).toBe("voyage-law-2")
    })
  })

  describe("embedBatch", () => {
    it("returns empty for empty input", async () => {
      const result = await getVoyageAIClient().embedBatch([])
      expect(result.embeddings).toHaveLength(0)
      expect(result.totalTokens).toBe(0)
    })

    it("rejects batches over 128 texts", async () => {
      const oversized = Array(129).fill("text")
      await expect(getVoyageAIClient().embedBatch(oversized)).rejects.toThrow(
        "exceeds limit"
      )
    })

    it("calls API with bearer auth and input type", async () => {
      const fetchSpy = vi
        .spyOn(global, "fetch")
        .mockResolvedValueOnce(voyageResponse([Array(1024).fill(0.1)]))

      const result = await getVoyageAIClient().embedBatch(["governing law"], "query")

      expect(result.embeddings[0]).toHaveLength(1024)
      expect(result.totalTokens).toBe(50)
      const [url, init] = fetchSpy.mock.calls[0]
      expect(url).toBe("https://api.voyageai.com/v1/embeddings")
      expect(init?.headers).toMatchObject({ Authorization: "Bearer test-key" })
      expect(JSON.parse(String(init?.body))).toEqual({
        model: "voyage-law-2",
        input: ["governing law"],
        input_type: "query",
      })
    })

    it("only calls API for uncached texts", async () => {
      const fetchSpy = vi
        .spyOn(global, "fetch")
        .mockResolvedValue(voyageResponse([Array(1024).fill(0.1)], 25))
      const client = getVoyageAIClient()

      await client.embedBatch(["cached text"])
      const second = await client.embedBatch(["cached text"])

      expect(fetchSpy).toHaveBeenCalledTimes(1)
      expect(second.cacheHits).toBe(1)
      expect(second.totalTokens).toBe(0)
    })

    it("keeps query and document embeddings apart in the cache", async () => {
      const fetchSpy = vi
        .spyOn(global, "fetch")
        .mockResolvedValue(voyageResponse([Array(1024).fill(0.1)]))
      const client = getVoyageAIClient()

      await client.embedBatch(["indemnity"], "document")
      await client.embedBatch(["indemnity"], "query")

      expect(fetchSpy).toHaveBeenCalledTimes(2)
    })

    it("throws on API error", async () => {
      vi.spyOn(global, "fetch").mockResolvedValueOnce({
        ok: false,
        status: 429,
        text: async () => "Rate limit exceeded",
      } as Response)

      await expect(getVoyageAIClient().embedBatch(["test"])).rejects.toThrow(
        "Voyage AI API error (429): Rate limit exceeded"
      )
    })

    it("throws on a malformed response body", async () => {
      vi.spyOn(global, "fetch").mockResolvedValueOnce({
        ok: true,
        json: async () => ({ data: "nope" }),
      } as Response)

      await expect(getVoyageAIClient().embedBatch(["test"])).rejects.toThrow(
        "Voyage AI returned a malformed response"
      )
    })
  })
})

describe("EmbeddingGenerator", () => {
  const provider = (embed: EmbeddingProvider["embed"], dimensions = 3): EmbeddingProvider => ({
    model: "fake-model",
    dimensions,
    embed,
  })

  it("returns the provider vector as nominal", async () => {
    const generator = new EmbeddingGenerator(provider(async () => [0, 0.5, 1]))

    await expect(generator.embed("Payment Terms")).resolves.toEqual({
      status: "nominal",
      vector: [0, 0.5, 1],
    })
  })

  it("degrades to a zero vector when the provider throws", async () => {
    const generator = new EmbeddingGenerator(
      provider(async () => {
        throw new Error("connection refused")
      })
    )

    await expect(generator.embed("Payment Terms")).resolves.toEqual({
      status: "degraded",
      vector: [0, 0, 0],
      reason: "connection refused",
    })
  })

  it("degrades on a dimension mismatch", async () => {
    const generator = new EmbeddingGenerator(provider(async () => [1, 2]))

    await expect(generator.embed("Payment Terms")).resolves.toEqual({
      status: "degraded",
      vector: [0, 0, 0],
      reason: "expected 3 dimensions, got 2",
    })
  })

  it("degrades on non-finite values", async () => {
    const generator = new EmbeddingGenerator(provider(async () => [1, Number.NaN, 0]))

    const outcome = await generator.embed("Payment Terms")
    expect(outcome.status).toBe("degraded")
  })

  it("degrades when the provider exceeds the timeout", async () => {
    let seen: AbortSignal | undefined
    const generator = new EmbeddingGenerator(
      provider((_text, _type, signal) => {
        seen = signal
        return new Promise<number[]>(() => {})
      }),
      { timeoutMs: 10 }
    )

    await expect(generator.embed("Payment Terms")).resolves.toEqual({
      status: "degraded",
      vector: [0, 0, 0],
      reason: "embedding timed out after 10ms",
    })
    expect(seen?.aborted).toBe(true)
  })

  it("throws ValidationError for empty input", async () => {
    const generator = new EmbeddingGenerator(provider(async () => [1, 0, 0]))

    await expect(generator.embed("   ")).rejects.toBeInstanceOf(ValidationError)
  })

  it("truncates input to the character budget", async () => {
    const embed = vi.fn(async () => [1, 0, 0])
    const generator = new EmbeddingGenerator(provider(embed), { maxInputChars: 5 })

    await generator.embed("Confidentiality", "query")

    expect(embed).toHaveBeenCalledWith("Confi", "query", expect.any(AbortSignal))
  })

  it("embeds many texts in input order", async () => {
    const generator = new EmbeddingGenerator(
      provider(async (text) => (text === "b" ? [0, 1, 0] : [1, 0, 0]))
    )

    const outcomes = await generator.embedMany(["a", "b"])

    expect(outcomes.map((o) => o.vector)).toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ])
  })

  describe("embedMany with a batching provider", () => {
    const batching = (
      embedBatch: NonNullable<EmbeddingProvider["embedBatch"]>
    ): EmbeddingProvider => ({
      model: "fake-model",
      dimensions: 3,
      embed: async () => {
        throw new Error("single embed not expected")
      },
      embedBatch,
    })

    it("sends one request per batch and keeps input order", async () => {
      const sizes: number[] = []
      const generator = new EmbeddingGenerator(
        batching(async (texts) => {
          sizes.push(texts.length)
          return { embeddings: texts.map((t) => [Number(t), 0, 0]) }
        }),
        { batchSize: 2 }
      )

      const outcomes = await generator.embedMany(["1", "2", "3", "4", "5"])

      expect(sizes).toEqual([2, 2, 1])
      expect(outcomes.map((o) => o.vector[0])).toEqual([1, 2, 3, 4, 5])
      expect(outcomes.every((o) => o.status === "nominal")).toBe(true)
    })

    it("degrades only the batch whose request failed", async () => {
      let request = 0
      const generator = new EmbeddingGenerator(
        batching(async (texts) => {
          request++
          if (request === 2) throw new Error("rate limited")
          return { embeddings: texts.map(() => [1, 0, 0]) }
        }),
        { batchSize: 2 }
      )

      const outcomes = await generator.embedMany(["a", "b", "c", "d", "e"])

      expect(outcomes.map((o) => o.status)).toEqual([
        "nominal",
        "nominal",
        "degraded",
        "degraded",
        "nominal",
      ])
      expect(outcomes[2]).toEqual({ status: "degraded", vector: [0, 0, 0], reason: "rate limited" })
    })

    it("degrades a batch answered with the wrong number of vectors", async () => {
      const generator = new EmbeddingGenerator(
        batching(async () => ({ embeddings: [[1, 0, 0]] }))
      )

      const outcomes = await generator.embedMany(["a", "b"])

      expect(outcomes).toEqual([
        { status: "degraded", vector: [0, 0, 0], reason: "expected 2 embeddings, got 1" },
        { status: "degraded", vector: [0, 0, 0], reason: "expected 2 embeddings, got 1" },
      ])
    })

    it("degrades a single bad vector within a batch", async () => {
      const generator = new EmbeddingGenerator(
        batching(async () => ({ embeddings: [[1, 0, 0], [1, 0]] }))
      )

      const outcomes = await generator.embedMany(["a", "b"])

      expect(outcomes[0].status).toBe("nominal")
      expect(outcomes[1]).toEqual({
        status: "degraded",
        vector: [0, 0, 0],
        reason: "expected 3 dimensions, got 2",
      })
    })

    it("truncates each input before sending it", async () => {
      const embedBatch = vi.fn(async (texts: string[]) => ({
        embeddings: texts.map(() => [1, 0, 0]),
      }))
      const generator = new EmbeddingGenerator(batching(embedBatch), { maxInputChars: 3 })

      await generator.embedMany(["Payment", "Term"], "query")

      expect(embedBatch).toHaveBeenCalledWith(["Pay", "Ter"], "query", expect.any(AbortSignal))
    })
  })

  it("limits parallel calls when the provider cannot batch", async () => {
    let inFlight = 0
    let peak = 0
    const generator = new EmbeddingGenerator(
      provider(async () => {
        inFlight++
        peak = Math.max(peak, inFlight)
        await new Promise((resolve) => setTimeout(resolve, 5))
        inFlight--
        return [1, 0, 0]
      }),
      { concurrency: 2 }
    )

    const outcomes = await generator.embedMany(["a", "b", "c", "d", "e"])

    expect(outcomes).toHaveLength(5)
    expect(peak).toBe(2)
  })

  it("rejects a blank text in a batch before calling the provider", async () => {
    const embed = vi.fn(async () => [1, 0, 0])
    const generator = new EmbeddingGenerator(provider(embed))

    await expect(generator.embedMany(["a", " "])).rejects.toBeInstanceOf(ValidationError)
    expect(embed).not.toHaveBeenCalled()
  })
})
