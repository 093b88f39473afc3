/**
 * @fileoverview Embedding provider contract
 *
 * The external embedding capability, seen from the gateway. Providers do
 * the network call and nothing else: batching, caching, retries, timeouts
 * and dimension checks live in `EmbeddingGateway`.
 *
 * @module lib/embeddings/types
 */

import type { EmbeddingVector } from "@/lib/cache"

export type { EmbeddingVector }

export interface EmbedCallOptions {
  /** Aborted when the gateway's per-call timeout expires */
  signal: AbortSignal
}

export interface EmbeddingProvider {
  /** Model identifier; part of every cache key */
  readonly model: string

  /**
   * Embed texts, returning one vector per text in input order.
   * Throw `UpstreamError` (retriable) for transient failures and a
   * non-retriable `EmbeddingFailedError` for requests that cannot succeed.
   */
  embed(texts: string[], options: EmbedCallOptions): Promise<number[][]>
}
