/**
 * @fileoverview Clause storage contract and in-memory implementation.
 *
 * The Postgres implementation lives in `db/queries/clauses.ts`.
 *
 * @module lib/clause-library/store
 */

import type { Clause } from "./schema"

export interface ClauseStore {
  /** Every clause, ordered by clauseId (ordinal) */
  getAll(): Promise<Clause[]>
  get(clauseId: string): Promise<Clause | null>
  /** Insert or replace */
  put(clause: Clause): Promise<void>
  /** Returns true when a clause was removed */
  delete(clauseId: string): Promise<boolean>
}

/** Ordinal (code unit) string order, independent of locale */
export function compareOrdinal(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

export class MemoryClauseStore implements ClauseStore {
  private readonly clauses = new Map<string, Clause>()

  constructor(initial: Clause[] = []) {
    for (const clause of initial) {
      this.clauses.set(clause.clauseId, copyClause(clause))
    }
  }

  async getAll(): Promise<Clause[]> {
    return [...this.clauses.values()]
      .sort((a, b) => compareOrdinal(a.clauseId, b.clauseId))
      .map(copyClause)
  }

  async get(clauseId: string): Promise<Clause | null> {
    const clause = this.clauses.get(clauseId)
    return clause ? copyClause(clause) : null
  }

  async put(clause: Clause): Promise<void> {
    this.clauses.set(clause.clauseId, copyClause(clause))
  }

  async delete(clauseId: string): Promise<boolean> {
    return this.clauses.delete(clauseId)
  }
}

function copyClause(clause: Clause): Clause {
  return {
    ...clause,
    tags: [...clause.tags],
    embedding: clause.embedding ? [...clause.embedding] : null,
  }
}
