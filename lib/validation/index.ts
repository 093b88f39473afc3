export {
  Validator,
  EMPTY_LIBRARY_WARNING,
  type ValidateOptions,
  type ValidatorOptions,
} from "./validator"
export {
  buildReportRecord,
  summarizeByCategory,
  reportRecordSchema,
  verdictRecordSchema,
  type BuildReportOptions,
  type ReportRecord,
  type StatusCounts,
  type VerdictRecord,
} from "./report-builder"
export {
  VERDICT_STATUSES,
  type ChunkFailure,
  type ContractReport,
  type ValidationVerdict,
  type VerdictStatus,
} from "./types"
