/**
 * @fileoverview Embedding Gateway
 *
 * Wraps an `EmbeddingProvider` with the behaviour the matching pipeline
 * relies on:
 *
 * - Output is order-aligned with input and independent of batching
 * - Provider calls carry at most `maxBatchSize` texts
 * - Vectors are cached by model version + content hash, with concurrent
 *   requests for the same text sharing one provider call
 * - Each provider call has a timeout; transient failures are retried with
 *   exponential backoff, and exhaustion fails the whole batch
 * - Every vector must have the configured dimension (fatal `ConfigError`
 *   otherwise, never truncated or padded)
 *
 * @module lib/embeddings/gateway
 */

import { EmbeddingCache, type EmbeddingVector } from "@/lib/cache"
import {
  ConfigError,
  EmbeddingFailedError,
  isAppError,
} from "@/lib/errors"
import { logger } from "@/lib/logger"
import { exponentialBackoff, withRetry, withTimeout } from "@/lib/retry"
import type { EmbeddingProvider } from "./types"

export interface EmbeddingGatewayOptions {
  /** Process-wide vector dimension */
  dimensions: number
  /** Max texts per provider call */
  maxBatchSize: number
  /** Per-call timeout in ms */
  timeoutMs: number
  /** Attempts per provider call, including the first */
  maxAttempts: number
  /** First retry delay; doubles per retry */
  baseDelayMs: number
  /** Cap for a single retry delay */
  maxDelayMs?: number
  /** Shared cache; a private one is created when omitted */
  cache?: EmbeddingCache
}

export class EmbeddingGateway {
  readonly dimensions: number
  private readonly cache: EmbeddingCache
  private readonly backoff: number[]

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingGatewayOptions
  ) {
    if (!Number.isInteger(options.dimensions) || options.dimensions < 1) {
      throw new ConfigError(
        `Embedding dimensions must be a positive integer, got ${options.dimensions}`
      )
    }
    if (!Number.isInteger(options.maxBatchSize) || options.maxBatchSize < 1) {
      throw new ConfigError(
        `Embedding batch size must be a positive integer, got ${options.maxBatchSize}`
      )
    }
    if (options.maxAttempts < 1) {
      throw new ConfigError("Embedding maxAttempts must be at least 1")
    }

    this.dimensions = options.dimensions
    this.cache = options.cache ?? new EmbeddingCache()
    this.backoff = exponentialBackoff(
      options.maxAttempts,
      options.baseDelayMs,
      options.maxDelayMs
    )
  }

  /** Model version included in every cache key. */
  get modelVersion(): string {
    return this.provider.model
  }

  /**
   * Embed a single text.
   */
  async embed(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedBatch([text])
    return vector
  }

  /**
   * Embed texts, returning vectors in input order.
   *
   * All or nothing: if any provider call fails after retries the whole
   * batch rejects with `EmbeddingFailedError`. A dimension mismatch
   * rejects with `ConfigError`.
   */
  async embedBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) {
      return []
    }

    try {
      return await this.cache.resolve(this.modelVersion, texts, (missing) =>
        this.loadInBatches(missing)
      )
    } catch (error) {
      if (error instanceof ConfigError || error instanceof EmbeddingFailedError) {
        throw error
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new EmbeddingFailedError(
        `Embedding batch of ${texts.length} texts failed: ${reason}`,
        { cause: error, retriable: isAppError(error) ? error.retriable : true }
      )
    }
  }

  /** Cache statistics for monitoring. */
  getCacheStats() {
    return this.cache.getStats()
  }

  private async loadInBatches(texts: string[]): Promise<EmbeddingVector[]> {
    const vectors: EmbeddingVector[] = []
    const batchCount = Math.ceil(texts.length / this.options.maxBatchSize)

    for (let i = 0; i < texts.length; i += this.options.maxBatchSize) {
      const batch = texts.slice(i, i + this.options.maxBatchSize)
      const batchIndex = i / this.options.maxBatchSize

      const embedded = await withRetry(
        () => this.callProvider(batch),
        {
          maxAttempts: this.options.maxAttempts,
          backoff: this.backoff,
          onRetry: (error, attempt) => {
            logger.warn("Embedding call retry", {
              model: this.modelVersion,
              batchIndex,
              batchCount,
              attempt,
              error: error.message,
            })
          },
        }
      )
      vectors.push(...embedded)
    }

    return vectors
  }

  private async callProvider(batch: string[]): Promise<EmbeddingVector[]> {
    const raw = await withTimeout(
      (signal) => this.provider.embed(batch, { signal }),
      this.options.timeoutMs,
      "embedding"
    )

    if (raw.length !== batch.length) {
      throw new EmbeddingFailedError(
        `Embedding provider returned ${raw.length} vectors for ${batch.length} texts`,
        { retriable: false }
      )
    }

    return raw.map((vector) => this.checkVector(vector))
  }

  private checkVector(vector: number[]): EmbeddingVector {
    if (vector.length !== this.dimensions) {
      throw new ConfigError(
        `Embedding dimension mismatch: model ${this.modelVersion} returned ` +
          `${vector.length} dimensions, expected ${this.dimensions}`
      )
    }
    if (!vector.every(Number.isFinite)) {
      throw new EmbeddingFailedError(
        "Embedding provider returned a non-finite value",
        { retriable: false }
      )
    }
    return Object.freeze([...vector])
  }
}
