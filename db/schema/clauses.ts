/**
 * @fileoverview Standard clause library schema.
 *
 * Each row is one versioned standard clause. `embedding` is only usable
 * while `embedding_text_hash` equals the SHA-256 of the current `text`;
 * `ClauseLibrary` keeps the two in step and the matcher refuses anything
 * else.
 *
 * @module db/schema/clauses
 */

import {
  pgTable,
  text,
  integer,
  timestamp,
  vector,
  index,
} from "drizzle-orm/pg-core"
import { VECTOR_DIMENSIONS } from "./vectors"

export const standardClauses = pgTable(
  "standard_clauses",
  {
    clauseId: text("clause_id").primaryKey(),
    title: text("title").notNull(),
    text: text("text").notNull(),

    /** Grouping key; `prohibited` marks clauses that must not appear */
    category: text("category").notNull(),

    /** Incremented on every update */
    version: integer("version").notNull().default(1),

    description: text("description"),
    tags: text("tags").array().notNull().default([]),

    embedding: vector("embedding", { dimensions: VECTOR_DIMENSIONS }),

    /** SHA-256 of the text the embedding was computed from */
    embeddingTextHash: text("embedding_text_hash"),
    embeddingModel: text("embedding_model"),

    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index("idx_standard_clauses_category").on(table.category)]
)

export type StandardClauseRow = typeof standardClauses.$inferSelect
export type NewStandardClauseRow = typeof standardClauses.$inferInsert
