/**
 * @fileoverview Postgres-backed clause store.
 *
 * Rows are parsed with `clauseSchema` on the way out; a row that does not
 * form a valid clause raises `DataError`.
 *
 * @module db/queries/clauses
 */

import { eq } from "drizzle-orm"
import type { Database } from "../client"
import { standardClauses, type StandardClauseRow } from "../schema"
import { clauseSchema, type Clause } from "@/lib/clause-library/schema"
import { DataError } from "@/lib/errors"
import { compareOrdinal, type ClauseStore } from "@/lib/clause-library/store"

export class DrizzleClauseStore implements ClauseStore {
  constructor(private readonly db: Database) {}

  async getAll(): Promise<Clause[]> {
    const rows = await this.db.select().from(standardClauses)
    // Database collation may differ from ordinal order
    return rows
      .map(toClause)
      .sort((a, b) => compareOrdinal(a.clauseId, b.clauseId))
  }

  async get(clauseId: string): Promise<Clause | null> {
    const [row] = await this.db
      .select()
      .from(standardClauses)
      .where(eq(standardClauses.clauseId, clauseId))
      .limit(1)
    return row ? toClause(row) : null
  }

  async put(clause: Clause): Promise<void> {
    const values = {
      title: clause.title,
      text: clause.text,
      category: clause.category,
      version: clause.version,
      description: clause.description,
      tags: clause.tags,
      embedding: clause.embedding,
      embeddingTextHash: clause.embeddingTextHash,
      embeddingModel: clause.embeddingModel,
      updatedAt: clause.updatedAt,
    }

    await this.db
      .insert(standardClauses)
      .values({ clauseId: clause.clauseId, createdAt: clause.createdAt, ...values })
      .onConflictDoUpdate({ target: standardClauses.clauseId, set: values })
  }

  async delete(clauseId: string): Promise<boolean> {
    const removed = await this.db
      .delete(standardClauses)
      .where(eq(standardClauses.clauseId, clauseId))
      .returning({ clauseId: standardClauses.clauseId })
    return removed.length > 0
  }
}

function toClause(row: StandardClauseRow): Clause {
  const parsed = clauseSchema.safeParse(row)
  if (!parsed.success) {
    throw DataError.fromZodError(parsed.error, `Invalid clause row ${row.clauseId}`)
  }
  return parsed.data
}
