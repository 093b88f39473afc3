/**
 * @fileoverview Clause Library service.
 *
 * Owns the three copies of a clause that must agree: the stored record, its
 * embedding, and its vector index entry. Every write for one clause id runs
 * under a per-id lock, and the embedding is recomputed whenever the text
 * changes, so a stored clause never carries an embedding of other text.
 *
 * Index entries carry `{ category, version, textHash }` so the matcher can
 * reject entries that no longer describe the clause's current text.
 *
 * @module lib/clause-library/library
 */

import { hashText } from "@/lib/content-hash"
import type { EmbeddingGateway } from "@/lib/embeddings"
import { DuplicateError, NotFoundError, ValidationError } from "@/lib/errors"
import { KeyedLock } from "@/lib/keyed-lock"
import { logger } from "@/lib/logger"
import type { VectorIndex, VectorMetadata } from "@/lib/vector-index"
import {
  clauseInputSchema,
  clauseUpdateSchema,
  isEmbeddingFresh,
  PROHIBITED_CATEGORY,
  type Clause,
  type ClauseInput,
  type ClauseUpdate,
} from "./schema"
import type { ClauseStore } from "./store"

export interface ClauseLibrarySummary {
  total: number
  byCategory: Record<string, number>
  prohibited: number
  /** Clauses whose embedding is missing or no longer matches their text */
  stale: number
}

export interface ClauseLibraryOptions {
  /** Clock for createdAt/updatedAt */
  now?: () => Date
}

export class ClauseLibrary {
  private readonly locks = new KeyedLock()
  private readonly now: () => Date

  constructor(
    private readonly store: ClauseStore,
    private readonly gateway: EmbeddingGateway,
    private readonly index: VectorIndex,
    options: ClauseLibraryOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Add a clause, embedding its text and indexing it.
   *
   * @throws {ValidationError} for malformed input
   * @throws {DuplicateError} if the clause id exists
   */
  async add(input: ClauseInput): Promise<Clause> {
    const parsed = clauseInputSchema.safeParse(input)
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, "Invalid clause")
    }
    const data = parsed.data

    return this.locks.run(data.clauseId, async () => {
      if (await this.store.get(data.clauseId)) {
        throw new DuplicateError(`Clause ${data.clauseId} already exists`)
      }

      const timestamp = this.now()
      const clause = await this.withEmbedding({
        clauseId: data.clauseId,
        title: data.title,
        text: data.text,
        category: data.category,
        version: 1,
        description: data.description ?? null,
        tags: data.tags,
        embedding: null,
        embeddingTextHash: null,
        embeddingModel: null,
        createdAt: timestamp,
        updatedAt: timestamp,
      })

      await this.persist(clause, null)

      logger.info("Clause added", {
        clauseId: clause.clauseId,
        category: clause.category,
      })
      return clause
    })
  }

  /**
   * @throws {NotFoundError}
   */
  async get(clauseId: string): Promise<Clause> {
    const clause = await this.store.get(clauseId)
    if (!clause) {
      throw new NotFoundError(`Clause ${clauseId} not found`)
    }
    return clause
  }

  async list(filter: { category?: string } = {}): Promise<Clause[]> {
    const clauses = await this.store.getAll()
    if (filter.category === undefined) return clauses
    const category = filter.category.toLowerCase()
    return clauses.filter((clause) => clause.category === category)
  }

  /**
   * Apply a partial update. Bumps `version`; re-embeds when the text
   * changes and refreshes the index entry.
   *
   * @throws {ValidationError} for malformed input
   * @throws {NotFoundError} if the clause does not exist
   */
  async update(clauseId: string, patch: ClauseUpdate): Promise<Clause> {
    const parsed = clauseUpdateSchema.safeParse(patch)
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, "Invalid clause update")
    }
    const changes = parsed.data

    return this.locks.run(clauseId, async () => {
      const existing = await this.get(clauseId)
      const merged: Clause = {
        ...existing,
        title: changes.title ?? existing.title,
        text: changes.text ?? existing.text,
        category: changes.category ?? existing.category,
        description:
          changes.description === undefined ? existing.description : changes.description,
        tags: changes.tags ?? existing.tags,
        version: existing.version + 1,
        updatedAt: this.now(),
      }

      const clause = isEmbeddingFresh(merged, this.gateway.modelVersion)
        ? merged
        : await this.withEmbedding(merged)

      await this.persist(clause, existing)

      logger.info("Clause updated", {
        clauseId,
        version: clause.version,
        reembedded: clause.embedding !== existing.embedding,
      })
      return clause
    })
  }

  /**
   * Remove a clause from the store and the index.
   *
   * @throws {NotFoundError}
   */
  async delete(clauseId: string): Promise<void> {
    await this.locks.run(clauseId, async () => {
      const removed = await this.store.delete(clauseId)
      await this.index.delete(clauseId)
      if (!removed) {
        throw new NotFoundError(`Clause ${clauseId} not found`)
      }
      logger.info("Clause deleted", { clauseId })
    })
  }

  /**
   * Re-embed every clause whose embedding is missing, was computed from
   * other text, or by another model. Returns the refreshed clause ids.
   */
  async refreshStale(): Promise<string[]> {
    const stale = (await this.store.getAll()).filter(
      (clause) => !isEmbeddingFresh(clause, this.gateway.modelVersion)
    )
    if (stale.length === 0) return []

    const vectors = await this.gateway.embedBatch(stale.map((clause) => clause.text))

    const refreshed = await Promise.all(
      stale.map((clause, i) =>
        this.locks.run(clause.clauseId, async () => {
          // Skip clauses edited or removed since the snapshot
          const current = await this.store.get(clause.clauseId)
          if (!current || current.text !== clause.text) return null

          const updated: Clause = {
            ...current,
            embedding: [...vectors[i]],
            embeddingTextHash: hashText(current.text),
            embeddingModel: this.gateway.modelVersion,
            updatedAt: this.now(),
          }
          await this.persist(updated, current)
          return updated.clauseId
        })
      )
    )

    const ids = refreshed.filter((id): id is string => id !== null)
    logger.info("Stale clause embeddings refreshed", { count: ids.length })
    return ids
  }

  /**
   * Clear the index and re-insert every clause with a fresh embedding.
   */
  async rebuildIndex(): Promise<{ indexed: string[]; skipped: string[] }> {
    const clauses = await this.store.getAll()
    await this.index.clear()

    const indexed: string[] = []
    const skipped: string[] = []
    for (const clause of clauses) {
      if (isEmbeddingFresh(clause, this.gateway.modelVersion)) {
        await this.indexClause(clause)
        indexed.push(clause.clauseId)
      } else {
        skipped.push(clause.clauseId)
      }
    }

    if (skipped.length > 0) {
      logger.warn("Clauses left out of the index with stale embeddings", {
        count: skipped.length,
      })
    }
    return { indexed, skipped }
  }

  async summary(): Promise<ClauseLibrarySummary> {
    const clauses = await this.store.getAll()
    const byCategory: Record<string, number> = {}
    let stale = 0

    for (const clause of clauses) {
      byCategory[clause.category] = (byCategory[clause.category] ?? 0) + 1
      if (!isEmbeddingFresh(clause, this.gateway.modelVersion)) stale++
    }

    return {
      total: clauses.length,
      byCategory,
      prohibited: byCategory[PROHIBITED_CATEGORY] ?? 0,
      stale,
    }
  }

  /**
   * Clauses keyed by id, as the matcher and validator consume them.
   */
  async snapshot(): Promise<Map<string, Clause>> {
    const clauses = await this.store.getAll()
    return new Map(clauses.map((clause) => [clause.clauseId, clause]))
  }

  private async withEmbedding(clause: Clause): Promise<Clause> {
    const vector = await this.gateway.embed(clause.text)
    return {
      ...clause,
      embedding: [...vector],
      embeddingTextHash: hashText(clause.text),
      embeddingModel: this.gateway.modelVersion,
    }
  }

  /**
   * Write the index entry, then the store row, so a stored clause with a
   * fresh embedding always has an index entry. When the store write fails
   * the previous entry is put back (or the new one removed).
   */
  private async persist(clause: Clause, previous: Clause | null): Promise<void> {
    await this.indexClause(clause)
    try {
      await this.store.put(clause)
    } catch (error) {
      try {
        if (previous && isEmbeddingFresh(previous, this.gateway.modelVersion)) {
          await this.indexClause(previous)
        } else {
          await this.index.delete(clause.clauseId)
        }
      } catch (restoreError) {
        logger.error("Failed to restore clause index entry", {
          clauseId: clause.clauseId,
          error: restoreError instanceof Error ? restoreError.message : String(restoreError),
        })
      }
      throw error
    }
  }

  private async indexClause(clause: Clause): Promise<void> {
    if (clause.embedding === null || clause.embeddingTextHash === null) return
    const metadata: VectorMetadata = {
      category: clause.category,
      version: clause.version,
      textHash: clause.embeddingTextHash,
      ...(clause.embeddingModel !== null ? { embeddingModel: clause.embeddingModel } : {}),
    }
    await this.index.upsert(clause.clauseId, clause.embedding, metadata)
  }
}
