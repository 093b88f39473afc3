/**
 * @fileoverview Embedding Cache
 *
 * LRU cache for embedding vectors, keyed by model version and content hash.
 * An explicit component: the gateway receives an instance instead of
 * sharing module state, so each process (or test) decides its own size and
 * TTL.
 *
 * Per-key access is linearizable. A request for a key that another request
 * is already loading waits for that in-flight load instead of calling the
 * provider again, and a loaded vector is written to the LRU before the
 * in-flight entry is released.
 *
 * @module lib/cache/embedding-cache
 */

import { LRUCache } from "lru-cache"
import { hashText } from "@/lib/content-hash"
import { DataError } from "@/lib/errors"

export type EmbeddingVector = readonly number[]

/**
 * Cached embedding entry.
 */
export interface CachedEmbedding {
  embedding: EmbeddingVector
  cachedAt: number
}

/**
 * Cache statistics.
 */
export interface EmbeddingCacheStats {
  hits: number
  misses: number
  inFlightJoins: number
  size: number
  hitRate: number
}

export interface EmbeddingCacheOptions {
  /** Max entries (default 10,000, about 40MB at 1024 dimensions) */
  max?: number
  /** Entry lifetime in ms (default 1 hour) */
  ttlMs?: number
}

/**
 * Loads vectors for texts that are neither cached nor in flight.
 * Must return one vector per text, in order.
 */
export type EmbeddingLoader = (texts: string[]) => Promise<EmbeddingVector[]>

export class EmbeddingCache {
  private readonly lru: LRUCache<string, CachedEmbedding>
  private readonly inFlight = new Map<string, Promise<EmbeddingVector>>()
  private stats = { hits: 0, misses: 0, inFlightJoins: 0 }

  constructor(options: EmbeddingCacheOptions = {}) {
    this.lru = new LRUCache<string, CachedEmbedding>({
      max: options.max ?? 10_000,
      ttl: options.ttlMs ?? 1000 * 60 * 60,
    })
  }

  /**
   * Cache key for a text under a model version.
   */
  static key(modelVersion: string, text: string): string {
    return `emb:${modelVersion}:${hashText(text)}`
  }

  get(key: string): EmbeddingVector | undefined {
    return this.lru.get(key)?.embedding
  }

  set(key: string, embedding: EmbeddingVector): void {
    this.lru.set(key, { embedding, cachedAt: Date.now() })
  }

  /**
   * Resolve vectors for `texts` (same order), loading only what is missing.
   *
   * Duplicate texts in one call, and texts already being loaded by another
   * call, share a single load. If the load fails every waiter sees the same
   * error and nothing is cached.
   */
  async resolve(
    modelVersion: string,
    texts: readonly string[],
    load: EmbeddingLoader
  ): Promise<EmbeddingVector[]> {
    const keys = texts.map((text) => EmbeddingCache.key(modelVersion, text))
    const pending = new Map<string, Promise<EmbeddingVector>>()
    const missingKeys: string[] = []
    const missingTexts: string[] = []

    keys.forEach((key, i) => {
      if (pending.has(key)) return

      const cached = this.lru.get(key)
      if (cached) {
        this.stats.hits++
        pending.set(key, Promise.resolve(cached.embedding))
        return
      }

      const running = this.inFlight.get(key)
      if (running) {
        this.stats.inFlightJoins++
        pending.set(key, running)
        return
      }

      this.stats.misses++
      missingKeys.push(key)
      missingTexts.push(texts[i])
    })

    if (missingKeys.length > 0) {
      // Deferred to a microtask so every in-flight entry is registered
      // before the loader can settle and release them.
      const loading = Promise.resolve().then(() =>
        this.loadMissing(missingKeys, missingTexts, load)
      )
      for (const key of missingKeys) {
        const vector = loading.then((loaded) => pickVector(loaded, key))
        this.inFlight.set(key, vector)
        pending.set(key, vector)
      }
    }

    // Every pending promise is awaited here, so failed loads never go unobserved.
    return Promise.all(keys.map((key) => pendingFor(pending, key)))
  }

  private async loadMissing(
    keys: string[],
    texts: string[],
    load: EmbeddingLoader
  ): Promise<Map<string, EmbeddingVector>> {
    try {
      const vectors = await load(texts)
      if (vectors.length !== keys.length) {
        throw new DataError(
          `Embedding loader returned ${vectors.length} vectors for ${keys.length} texts`
        )
      }
      const loaded = new Map<string, EmbeddingVector>()
      keys.forEach((key, i) => {
        loaded.set(key, vectors[i])
        this.set(key, vectors[i])
      })
      return loaded
    } finally {
      for (const key of keys) {
        this.inFlight.delete(key)
      }
    }
  }

  /**
   * Get cache statistics.
   */
  getStats(): EmbeddingCacheStats {
    const total = this.stats.hits + this.stats.misses
    return {
      ...this.stats,
      size: this.lru.size,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    }
  }

  /** Number of keys currently being loaded. */
  get inFlightCount(): number {
    return this.inFlight.size
  }

  /**
   * Clear the cache and reset stats.
   */
  clear(): void {
    this.lru.clear()
    this.stats = { hits: 0, misses: 0, inFlightJoins: 0 }
  }
}

function pickVector(
  loaded: Map<string, EmbeddingVector>,
  key: string
): EmbeddingVector {
  const vector = loaded.get(key)
  if (!vector) {
    throw new DataError(`Embedding loader returned no vector for ${key}`)
  }
  return vector
}

function pendingFor(
  pending: Map<string, Promise<EmbeddingVector>>,
  key: string
): Promise<EmbeddingVector> {
  const promise = pending.get(key)
  if (!promise) {
    return Promise.reject(new DataError(`No pending embedding for ${key}`))
  }
  return promise
}
