/**
 * @fileoverview Contract validator.
 *
 * Runs the matcher over every embedded chunk (bounded concurrency), collects
 * the results per clause, and reduces each clause to a verdict:
 *
 * 1. any `rejected` result → `conflicting`
 * 2. any `matched` result at or above the match threshold → `satisfied`
 * 3. any `borderline` result → `partial`
 * 4. otherwise → `missing`
 *
 * Collection happens first and the reduction runs once, sequentially, over
 * data sorted by document position, so the report does not depend on the
 * order in which chunks finish.
 *
 * Failures degrade instead of aborting: a clause with a stale embedding is
 * reported `missing` and degraded; chunks that could not be embedded or
 * matched degrade every verdict they could have changed. `ConfigError`s
 * propagate.
 *
 * @module lib/validation/validator
 */

import { compareOrdinal, isEmbeddingFresh, type Clause } from "@/lib/clause-library"
import { mapWithConcurrency } from "@/lib/concurrency"
import type { EmbeddedChunk } from "@/lib/document-chunking"
import { ConfigError, StaleEmbeddingError, toAppError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import type { Matcher, MatchOutcome, MatchResult } from "@/lib/matching"
import { partition, tryCatchWith } from "@/lib/result"
import type {
  ChunkFailure,
  ContractReport,
  ValidationVerdict,
  VerdictStatus,
} from "./types"

export const EMPTY_LIBRARY_WARNING =
  "Clause library is empty; there is no baseline to validate against"

export interface ValidatorOptions {
  /** Candidates retrieved per chunk */
  candidateK: number
  /** Chunks matched in parallel */
  concurrency: number
}

export interface ValidateOptions {
  /** Chunks that failed before matching (e.g. embedding) */
  chunkFailures?: ChunkFailure[]
}

export class Validator {
  constructor(
    private readonly matcher: Matcher,
    private readonly options: ValidatorOptions
  ) {}

  async validate(
    contractId: string,
    chunks: readonly EmbeddedChunk[],
    clauses: readonly Clause[],
    { chunkFailures = [] }: ValidateOptions = {}
  ): Promise<ContractReport> {
    const library = new Map(clauses.map((clause) => [clause.clauseId, clause]))

    // Phase 1: collect (parallel)
    const attempts = await mapWithConcurrency(chunks, this.options.concurrency, (chunk) =>
      tryCatchWith<MatchOutcome, ChunkFailure>(
        () => this.matcher.match(chunk, this.options.candidateK, library),
        (error) => ({
          chunkId: chunk.chunkId,
          sequenceIndex: chunk.sequenceIndex,
          error: toAppError(error),
        })
      )
    )
    const { values: outcomes, errors: matchFailures } = partition(attempts)

    const fatal = matchFailures.find((failure) => failure.error instanceof ConfigError)
    if (fatal) throw fatal.error

    // Phase 2: reduce (sequential, order-independent)
    const positions = new Map(chunks.map((chunk) => [chunk.chunkId, chunk.sequenceIndex]))
    const failures = [...chunkFailures, ...matchFailures].sort(byDocumentOrder)
    const totalChunks = chunks.length + chunkFailures.length

    const resultsByClause = groupResults(outcomes)
    const staleReasons = collectStaleReasons(outcomes, clauses, this.matcher.modelVersion)

    let verdicts = [...clauses]
      .sort(byCategoryThenId)
      .map((clause) =>
        reduceClause(
          contractId,
          clause,
          resultsByClause.get(clause.clauseId) ?? [],
          staleReasons.get(clause.clauseId) ?? null,
          this.matcher.matchThreshold,
          positions
        )
      )

    if (failures.length > 0) {
      const reason = `${failures.length} of ${totalChunks} chunks could not be matched`
      verdicts = verdicts.map((verdict) =>
        verdict.status === "conflicting" || verdict.degraded
          ? verdict
          : { ...verdict, degraded: true, degradedReason: reason }
      )
    }

    const warnings: string[] = []
    if (clauses.length === 0) {
      warnings.push(EMPTY_LIBRARY_WARNING)
    }
    if (staleReasons.size > 0) {
      const ids = [...staleReasons.keys()].sort(compareOrdinal)
      warnings.push(
        `${ids.length} clauses were not matched because their embeddings are stale: ${ids.join(", ")}`
      )
    }
    if (failures.length > 0) {
      warnings.push(
        `${failures.length} of ${totalChunks} chunks could not be matched: ` +
          failures.map((failure) => failure.chunkId).join(", ")
      )
    }

    const satisfied = verdicts.filter((verdict) => verdict.status === "satisfied").length
    const report: ContractReport = {
      contractId,
      verdicts,
      overallComplianceRatio: clauses.length === 0 ? null : satisfied / clauses.length,
      noBaseline: clauses.length === 0,
      degraded: failures.length > 0 || verdicts.some((verdict) => verdict.degraded),
      warnings,
      chunkCount: totalChunks,
      failedChunkIds: failures.map((failure) => failure.chunkId),
    }

    logger.info("Contract validated", {
      contractId,
      clauses: clauses.length,
      chunks: totalChunks,
      failedChunks: failures.length,
      satisfied,
      degraded: report.degraded,
    })
    for (const failure of failures) {
      logger.warn("Chunk could not be matched", {
        contractId,
        chunkId: failure.chunkId,
        code: failure.error.code,
        error: failure.error.message,
      })
    }

    return report
  }
}

// ============================================================================
// Reduction
// ============================================================================

function groupResults(outcomes: MatchOutcome[]): Map<string, MatchResult[]> {
  const grouped = new Map<string, MatchResult[]>()
  for (const outcome of outcomes) {
    for (const result of outcome.results) {
      const list = grouped.get(result.clauseId)
      if (list) list.push(result)
      else grouped.set(result.clauseId, [result])
    }
  }
  return grouped
}

/**
 * Stale clauses: reported by the matcher, or visibly stale in the library
 * even if the index never returned them.
 */
function collectStaleReasons(
  outcomes: MatchOutcome[],
  clauses: readonly Clause[],
  modelVersion: string
): Map<string, string> {
  const reasons = new Map<string, string>()
  const keep = (clauseId: string, message: string) => {
    const current = reasons.get(clauseId)
    // Smallest message wins so the result is independent of chunk order
    if (current === undefined || message < current) reasons.set(clauseId, message)
  }

  for (const clause of clauses) {
    if (!isEmbeddingFresh(clause, modelVersion)) {
      keep(clause.clauseId, new StaleEmbeddingError(clause.clauseId).message)
    }
  }
  for (const outcome of outcomes) {
    for (const failure of outcome.clauseFailures) {
      keep(failure.clauseId, failure.error.message)
    }
  }
  return reasons
}

function reduceClause(
  contractId: string,
  clause: Clause,
  results: MatchResult[],
  staleReason: string | null,
  matchThreshold: number,
  positions: ReadonlyMap<string, number>
): ValidationVerdict {
  if (staleReason !== null) {
    return {
      contractId,
      clauseId: clause.clauseId,
      status: "missing",
      evidenceChunkIds: [],
      bestScore: null,
      degraded: true,
      degradedReason: staleReason,
    }
  }

  let status: VerdictStatus = "missing"
  if (results.some((r) => r.decision === "rejected")) {
    status = "conflicting"
  } else if (
    results.some((r) => r.decision === "matched" && r.similarityScore >= matchThreshold)
  ) {
    status = "satisfied"
  } else if (results.some((r) => r.decision === "borderline")) {
    status = "partial"
  }

  const evidenceChunkIds = [...new Set(results.map((r) => r.chunkId))].sort(
    (a, b) => (positions.get(a) ?? 0) - (positions.get(b) ?? 0) || compareOrdinal(a, b)
  )
  const bestScore =
    results.length === 0 ? null : Math.max(...results.map((r) => r.similarityScore))

  return {
    contractId,
    clauseId: clause.clauseId,
    status,
    evidenceChunkIds,
    bestScore,
    degraded: false,
    degradedReason: null,
  }
}

function byCategoryThenId(a: Clause, b: Clause): number {
  return (
    compareOrdinal(a.category, b.category) || compareOrdinal(a.clauseId, b.clauseId)
  )
}

function byDocumentOrder(a: ChunkFailure, b: ChunkFailure): number {
  return a.sequenceIndex - b.sequenceIndex || compareOrdinal(a.chunkId, b.chunkId)
}
