/**
 * @fileoverview Chunk-to-clause matcher.
 *
 * Retrieves the nearest library clauses for one embedded chunk and
 * classifies each candidate by similarity:
 *
 * | Score                      | Decision                                  |
 * |----------------------------|-------------------------------------------|
 * | `>= matchThreshold`        | `matched` (`rejected` for prohibited)     |
 * | `>= borderlineThreshold`   | `borderline`                              |
 * | below                      | omitted                                   |
 *
 * Candidates whose clause embedding is stale or from another model, or whose
 * index entry was built from other text or by another model, are never
 * matched.
 * They come back as clause failures so the validator can degrade the
 * affected verdicts.
 *
 * @module lib/matching/matcher
 */

import { isEmbeddingFresh, isProhibited, type Clause } from "@/lib/clause-library"
import type { EmbeddedChunk } from "@/lib/document-chunking"
import {
  ConfigError,
  StaleEmbeddingError,
  UpstreamError,
  isAppError,
} from "@/lib/errors"
import { logger } from "@/lib/logger"
import { exponentialBackoff, withRetry, withTimeout } from "@/lib/retry"
import { norm, type VectorHit, type VectorIndex } from "@/lib/vector-index"

export type MatchDecision = "matched" | "borderline" | "rejected"

export interface MatchResult {
  chunkId: string
  clauseId: string
  similarityScore: number
  decision: MatchDecision
}

export interface ClauseFailure {
  chunkId: string
  clauseId: string
  error: StaleEmbeddingError
}

export interface MatchOutcome {
  chunkId: string
  /** Ordered by descending score, then clauseId */
  results: MatchResult[]
  clauseFailures: ClauseFailure[]
}

export interface MatcherOptions {
  /** Model that embeds the chunks; clause embeddings must come from it too */
  modelVersion: string
  matchThreshold: number
  borderlineThreshold: number
  /** Per index query */
  queryTimeoutMs: number
  /** Attempts per index query, including the first */
  maxAttempts?: number
  baseDelayMs?: number
}

export class Matcher {
  readonly modelVersion: string
  readonly matchThreshold: number
  readonly borderlineThreshold: number
  private readonly backoff: number[]

  constructor(
    private readonly index: VectorIndex,
    private readonly options: MatcherOptions
  ) {
    const { matchThreshold, borderlineThreshold } = options
    if (!(matchThreshold > borderlineThreshold)) {
      throw new ConfigError(
        `matchThreshold (${matchThreshold}) must be greater than borderlineThreshold (${borderlineThreshold})`
      )
    }
    this.modelVersion = options.modelVersion
    this.matchThreshold = matchThreshold
    this.borderlineThreshold = borderlineThreshold
    this.backoff = exponentialBackoff(options.maxAttempts ?? 3, options.baseDelayMs ?? 200)
  }

  /**
   * Match one chunk against the clause library.
   *
   * @param library - Clause snapshot keyed by id; index hits for ids not in
   *   the snapshot are ignored
   * @throws {UpstreamError} when the index query fails after retries
   */
  async match(
    chunk: EmbeddedChunk,
    candidateK: number,
    library: ReadonlyMap<string, Clause>
  ): Promise<MatchOutcome> {
    const outcome: MatchOutcome = {
      chunkId: chunk.chunkId,
      results: [],
      clauseFailures: [],
    }

    if (candidateK <= 0) return outcome
    if (norm(chunk.embedding) === 0) {
      logger.warn("Skipping chunk with zero-norm embedding", { chunkId: chunk.chunkId })
      return outcome
    }

    const hits = await this.queryIndex(chunk.embedding, candidateK)

    for (const hit of hits) {
      const clause = library.get(hit.id)
      if (!clause) {
        logger.warn("Index entry has no library clause", { clauseId: hit.id })
        continue
      }

      const staleReason = this.staleReason(clause, hit)
      if (staleReason) {
        outcome.clauseFailures.push({
          chunkId: chunk.chunkId,
          clauseId: clause.clauseId,
          error: new StaleEmbeddingError(clause.clauseId, staleReason),
        })
        continue
      }

      const decision = this.classify(hit.score, clause)
      if (decision) {
        outcome.results.push({
          chunkId: chunk.chunkId,
          clauseId: clause.clauseId,
          similarityScore: hit.score,
          decision,
        })
      }
    }

    return outcome
  }

  /**
   * Decision for a score, or null when the candidate is dropped.
   */
  classify(score: number, clause: Pick<Clause, "category">): MatchDecision | null {
    if (score >= this.matchThreshold) {
      return isProhibited(clause) ? "rejected" : "matched"
    }
    if (score >= this.borderlineThreshold) {
      return "borderline"
    }
    return null
  }

  private staleReason(clause: Clause, hit: VectorHit): string | null {
    if (!isEmbeddingFresh(clause, this.modelVersion)) {
      return "embedding is stale"
    }
    if (hit.metadata.textHash !== clause.embeddingTextHash) {
      return "index entry does not match current text"
    }
    if (hit.metadata.embeddingModel !== this.modelVersion) {
      return "index entry was built by another model"
    }
    return null
  }

  private async queryIndex(vector: readonly number[], k: number): Promise<VectorHit[]> {
    try {
      return await withRetry(
        () =>
          withTimeout(
            () => this.index.query(vector, k),
            this.options.queryTimeoutMs,
            "vector-index"
          ),
        {
          maxAttempts: this.options.maxAttempts ?? 3,
          backoff: this.backoff,
          onRetry: (error, attempt) => {
            logger.warn("Vector index query retry", { attempt, error: error.message })
          },
        }
      )
    } catch (error) {
      if (isAppError(error)) throw error
      const reason = error instanceof Error ? error.message : String(error)
      throw new UpstreamError("vector-index", `Vector index query failed: ${reason}`, {
        cause: error,
      })
    }
  }
}
