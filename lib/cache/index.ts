/**
 * @fileoverview Cache Utilities Barrel Export
 *
 * @module lib/cache
 */

export {
  EmbeddingCache,
  type EmbeddingVector,
  type CachedEmbedding,
  type EmbeddingCacheStats,
  type EmbeddingCacheOptions,
  type EmbeddingLoader,
} from "./embedding-cache"
