/**
 * @fileoverview Validation report types.
 *
 * @module lib/validation/types
 */

import type { AppError } from "@/lib/errors"

export const VERDICT_STATUSES = ["satisfied", "partial", "missing", "conflicting"] as const

export type VerdictStatus = (typeof VERDICT_STATUSES)[number]

export interface ValidationVerdict {
  contractId: string
  clauseId: string
  status: VerdictStatus
  /** Contributing chunks in document order */
  evidenceChunkIds: string[]
  /** Highest observed similarity, null without evidence */
  bestScore: number | null
  /** The verdict may be wrong because some input could not be processed */
  degraded: boolean
  degradedReason: string | null
}

export interface ContractReport {
  contractId: string
  /** Ordered by clause category, then clauseId */
  verdicts: ValidationVerdict[]
  /** satisfied / total; null when the library is empty */
  overallComplianceRatio: number | null
  noBaseline: boolean
  degraded: boolean
  warnings: string[]
  chunkCount: number
  /** Chunks that could not be embedded or matched, in document order */
  failedChunkIds: string[]
}

/**
 * A chunk that produced no match outcome.
 */
export interface ChunkFailure {
  chunkId: string
  sequenceIndex: number
  error: AppError
}
