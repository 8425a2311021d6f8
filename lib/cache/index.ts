/**
 * @fileoverview Cache Utilities Barrel Export
 *
 * @module lib/cache
 */

export {
  getCachedEmbedding,
  setCachedEmbedding,
  clearEmbeddingCache,
  getCacheKey,
  type CachedEmbedding,
} from "./embedding-cache"
