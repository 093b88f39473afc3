import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Calls are no-ops until `instrument.ts` has initialised Sentry with
 * `enableLogs`, so library code and tests can log freely.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Contract validated", { contractId, verdicts: 12 })
 * logger.warn("Embedding retry", { attempt: 2, error: err.message })
 * ```
 */
export const logger = Sentry.logger
