/**
 * @fileoverview Vector index contract.
 *
 * @module lib/vector-index/types
 */

import type {
  VectorMetadataRecord,
  VectorMetadataValue,
} from "@/db/schema/vectors"

export type MetadataValue = VectorMetadataValue
export type VectorMetadata = VectorMetadataRecord

/** Equality predicate over metadata; every listed key must match. */
export type MetadataFilter = Readonly<Record<string, MetadataValue>>

export interface VectorHit {
  id: string
  /** Cosine similarity in [-1, 1] */
  score: number
  metadata: VectorMetadata
}

/**
 * Nearest-neighbour index over cosine similarity.
 *
 * - Vectors must have exactly `dimensions` entries (`ConfigError`) and a
 *   non-zero norm (`DataError`)
 * - `query` applies the filter before ranking, sorts by descending score
 *   then ascending id, and returns at most `k` hits (none when `k <= 0`)
 * - `upsert` replaces vector and metadata together; upserts of one id are
 *   serialized
 */
export interface VectorIndex {
  readonly dimensions: number

  upsert(
    id: string,
    vector: readonly number[],
    metadata?: VectorMetadata
  ): Promise<void>

  query(
    vector: readonly number[],
    k: number,
    filter?: MetadataFilter
  ): Promise<VectorHit[]>

  /** Returns true when an entry was removed */
  delete(id: string): Promise<boolean>

  /** Number of entries */
  size(): Promise<number>

  /** Remove every entry */
  clear(): Promise<void>
}
