/**
 * @fileoverview pgvector-backed vector index.
 *
 * Entries live in `vector_entries`, partitioned by namespace. Ranking is
 * done by Postgres with `ORDER BY cosine_distance, id`, so ties break on id
 * exactly as in `MemoryVectorIndex`.
 *
 * @module lib/vector-index/pg-index
 */

import { and, cosineDistance, count, eq, sql } from "drizzle-orm"
import type { Database } from "@/db/client"
import { VECTOR_DIMENSIONS, vectorEntries } from "@/db/schema/vectors"
import { ConfigError } from "@/lib/errors"
import { KeyedLock } from "@/lib/keyed-lock"
import { assertDimensions, clampScore, normalize } from "./similarity"
import type {
  MetadataFilter,
  VectorHit,
  VectorIndex,
  VectorMetadata,
} from "./types"

export interface PgVectorIndexOptions {
  /** Partition within `vector_entries` */
  namespace: string
  /** Must equal the column dimension */
  dimensions?: number
}

export class PgVectorIndex implements VectorIndex {
  readonly dimensions: number
  readonly namespace: string
  private readonly locks = new KeyedLock()

  constructor(
    private readonly db: Database,
    options: PgVectorIndexOptions
  ) {
    const dimensions = options.dimensions ?? VECTOR_DIMENSIONS
    if (dimensions !== VECTOR_DIMENSIONS) {
      throw new ConfigError(
        `PgVectorIndex stores ${VECTOR_DIMENSIONS}-dimension vectors, got ${dimensions}`
      )
    }
    this.dimensions = dimensions
    this.namespace = options.namespace
  }

  async upsert(
    id: string,
    vector: readonly number[],
    metadata: VectorMetadata = {}
  ): Promise<void> {
    assertDimensions(vector, this.dimensions)
    const embedding = normalize(vector)

    await this.locks.run(id, async () => {
      await this.db
        .insert(vectorEntries)
        .values({ namespace: this.namespace, id, embedding, metadata })
        .onConflictDoUpdate({
          target: [vectorEntries.namespace, vectorEntries.id],
          set: { embedding, metadata, updatedAt: new Date() },
        })
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

    const distance = cosineDistance(vectorEntries.embedding, unit)

    const rows = await this.db
      .select({
        id: vectorEntries.id,
        metadata: vectorEntries.metadata,
        distance,
      })
      .from(vectorEntries)
      .where(
        and(
          eq(vectorEntries.namespace, this.namespace),
          filter
            ? sql`${vectorEntries.metadata} @> ${JSON.stringify(filter)}::jsonb`
            : undefined
        )
      )
      // Byte order on ties, matching the in-memory index whatever the database locale
      .orderBy(distance, sql`${vectorEntries.id} COLLATE "C"`)
      .limit(k)

    return rows.map((row) => ({
      id: row.id,
      score: clampScore(1 - Number(row.distance)),
      metadata: row.metadata,
    }))
  }

  async delete(id: string): Promise<boolean> {
    return this.locks.run(id, async () => {
      const removed = await this.db
        .delete(vectorEntries)
        .where(
          and(eq(vectorEntries.namespace, this.namespace), eq(vectorEntries.id, id))
        )
        .returning({ id: vectorEntries.id })
      return removed.length > 0
    })
  }

  async size(): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(vectorEntries)
      .where(eq(vectorEntries.namespace, this.namespace))
    return row?.value ?? 0
  }

  async clear(): Promise<void> {
    await this.db
      .delete(vectorEntries)
      .where(eq(vectorEntries.namespace, this.namespace))
  }
}
