/**
 * @fileoverview In-process vector index.
 *
 * Brute-force cosine ranking over normalised vectors. Used in tests and for
 * small libraries where a database round trip costs more than the scan.
 *
 * @module lib/vector-index/memory-index
 */

import { KeyedLock } from "@/lib/keyed-lock"
import {
  assertDimensions,
  clampScore,
  compareHits,
  dot,
  matchesFilter,
  normalize,
} from "./similarity"
import type {
  MetadataFilter,
  VectorHit,
  VectorIndex,
  VectorMetadata,
} from "./types"

interface StoredEntry {
  vector: number[]
  metadata: VectorMetadata
}

export class MemoryVectorIndex implements VectorIndex {
  private readonly entries = new Map<string, StoredEntry>()
  private readonly locks = new KeyedLock()

  constructor(readonly dimensions: number) {}

  async upsert(
    id: string,
    vector: readonly number[],
    metadata: VectorMetadata = {}
  ): Promise<void> {
    assertDimensions(vector, this.dimensions)
    const entry = { vector: normalize(vector), metadata: { ...metadata } }

    await this.locks.run(id, async () => {
      this.entries.set(id, entry)
    })
  }

  async query(
    vector: readonly number[],
    k: number,
    filter?: MetadataFilter
  ): Promise<VectorHit[]> {
    assertDimensions(vector, this.dimensions)
    const unit = normalize(vector)
    if (k <= 0) return []

    const hits: VectorHit[] = []
    for (const [id, entry] of this.entries) {
      if (!matchesFilter(entry.metadata, filter)) continue
      hits.push({
        id,
        score: clampScore(dot(unit, entry.vector)),
        metadata: { ...entry.metadata },
      })
    }

    return hits.sort(compareHits).slice(0, k)
  }

  async delete(id: string): Promise<boolean> {
    return this.locks.run(id, async () => this.entries.delete(id))
  }

  async size(): Promise<number> {
    return this.entries.size
  }

  async clear(): Promise<void> {
    this.entries.clear()
  }
}
