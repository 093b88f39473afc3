/**
 * @fileoverview Validation report serialization.
 *
 * Turns a `ContractReport` into the stable, snake_case record that is
 * stored and returned to clients. Field order is fixed and the record is
 * checked against `reportRecordSchema` before it leaves this module.
 *
 * @module lib/validation/report-builder
 */

import { z } from "zod"
import { compareOrdinal, type Clause } from "@/lib/clause-library"
import { DataError, ValidationError } from "@/lib/errors"
import { VERDICT_STATUSES, type ContractReport, type VerdictStatus } from "./types"

const statusCountsSchema = z.object({
  total: z.number().int().nonnegative(),
  satisfied: z.number().int().nonnegative(),
  partial: z.number().int().nonnegative(),
  missing: z.number().int().nonnegative(),
  conflicting: z.number().int().nonnegative(),
})

export type StatusCounts = z.infer<typeof statusCountsSchema>

export const verdictRecordSchema = z.object({
  clause_id: z.string().min(1),
  title: z.string(),
  category: z.string(),
  status: z.enum(VERDICT_STATUSES),
  best_score: z.number().min(-1).max(1).nullable(),
  evidence_chunk_ids: z.array(z.string()),
  degraded: z.boolean(),
  degraded_reason: z.string().nullable(),
})

export const reportRecordSchema = z.object({
  contract_id: z.string().min(1),
  verdicts: z.array(verdictRecordSchema),
  overall_compliance_ratio: z.number().min(0).max(1).nullable(),
  no_baseline: z.boolean(),
  degraded: z.boolean(),
  warnings: z.array(z.string()),
  summary: statusCountsSchema,
  generated_at: z.iso.datetime(),
})

export type VerdictRecord = z.infer<typeof verdictRecordSchema>
export type ReportRecord = z.infer<typeof reportRecordSchema>

export interface BuildReportOptions {
  generatedAt: Date
}

/**
 * Build the serialized report.
 *
 * @param clauses - The library the report was validated against; supplies
 *   titles and categories
 * @throws {DataError} if a verdict names a clause not in `clauses`
 */
export function buildReportRecord(
  report: ContractReport,
  clauses: readonly Clause[],
  { generatedAt }: BuildReportOptions
): ReportRecord {
  const byId = new Map(clauses.map((clause) => [clause.clauseId, clause]))

  const verdicts: VerdictRecord[] = report.verdicts.map((verdict) => {
    const clause = byId.get(verdict.clauseId)
    if (!clause) {
      throw new DataError(`Report references unknown clause ${verdict.clauseId}`)
    }
    return {
      clause_id: verdict.clauseId,
      title: clause.title,
      category: clause.category,
      status: verdict.status,
      best_score: verdict.bestScore,
      evidence_chunk_ids: [...verdict.evidenceChunkIds],
      degraded: verdict.degraded,
      degraded_reason: verdict.degradedReason,
    }
  })

  const record: ReportRecord = {
    contract_id: report.contractId,
    verdicts,
    overall_compliance_ratio: report.overallComplianceRatio,
    no_baseline: report.noBaseline,
    degraded: report.degraded,
    warnings: [...report.warnings],
    summary: countStatuses(verdicts.map((v) => v.status)),
    generated_at: generatedAt.toISOString(),
  }

  const parsed = reportRecordSchema.safeParse(record)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, "Invalid report record")
  }
  return parsed.data
}

/**
 * Status counts per clause category, categories in ordinal order.
 */
export function summarizeByCategory(record: ReportRecord): Array<{
  category: string
  counts: StatusCounts
}> {
  const grouped = new Map<string, VerdictStatus[]>()
  for (const verdict of record.verdicts) {
    const statuses = grouped.get(verdict.category) ?? []
    statuses.push(verdict.status)
    grouped.set(verdict.category, statuses)
  }

  return [...grouped.keys()]
    .sort(compareOrdinal)
    .map((category) => ({
      category,
      counts: countStatuses(grouped.get(category) ?? []),
    }))
}

function countStatuses(statuses: VerdictStatus[]): StatusCounts {
  const counts: StatusCounts = {
    total: statuses.length,
    satisfied: 0,
    partial: 0,
    missing: 0,
    conflicting: 0,
  }
  for (const status of statuses) counts[status]++
  return counts
}
