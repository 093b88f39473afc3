/**
 * @fileoverview Vector index storage.
 *
 * One table backs every `PgVectorIndex`; each index owns a `namespace`
 * (`clauses` for the clause library, `chunks` for contract Q&A). Vectors are
 * stored L2-normalised, so cosine distance ranks them the same way as
 * similarity.
 *
 * HNSW indexes should be created after bulk ingestion:
 * ```sql
 * CREATE INDEX idx_vector_entries_hnsw ON vector_entries
 *   USING hnsw (embedding vector_cosine_ops);
 * ```
 *
 * @module db/schema/vectors
 */

import {
  pgTable,
  text,
  jsonb,
  timestamp,
  vector,
  primaryKey,
  index,
} from "drizzle-orm/pg-core"

/** Dimension of the `embedding` column (voyage-law-2) */
export const VECTOR_DIMENSIONS = 1024

export type VectorMetadataValue = string | number | boolean
export type VectorMetadataRecord = Record<string, VectorMetadataValue>

export const vectorEntries = pgTable(
  "vector_entries",
  {
    /** Index the entry belongs to */
    namespace: text("namespace").notNull(),

    /** Caller-chosen id, unique per namespace */
    id: text("id").notNull(),

    /** L2-normalised embedding */
    embedding: vector("embedding", { dimensions: VECTOR_DIMENSIONS }).notNull(),

    /**
     * Flat metadata used for equality filters (`@>`).
     * Clause entries: `{ category, version, textHash, embeddingModel }`.
     * Chunk entries: `{ contractId, sequenceIndex, chunkCount, text, sectionTitle? }`.
     */
    metadata: jsonb("metadata").$type<VectorMetadataRecord>().notNull().default({}),

    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.namespace, table.id] }),
    index("idx_vector_entries_namespace").on(table.namespace),
  ]
)

export type VectorEntry = typeof vectorEntries.$inferSelect
export type NewVectorEntry = typeof vectorEntries.$inferInsert
