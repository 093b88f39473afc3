/**
 * @fileoverview Validation Pipeline Configuration
 *
 * Reads thresholds, chunking, embedding and concurrency settings from the
 * environment and checks them once at startup. Any invalid value is a
 * `ConfigError`: the process must refuse to start rather than validate
 * contracts with a broken setup.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ConfigError } from "./errors"

const threshold = z.coerce.number().min(-1).max(1)
const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()

/**
 * Schema for the full pipeline configuration.
 *
 * Defaults are tuned for voyage-law-2 (1024 dims, 128 texts per request).
 */
export const validationConfigSchema = z
  .object({
    matchThreshold: threshold.default(0.85),
    borderlineThreshold: threshold.default(0.7),
    candidateK: nonNegativeInt.default(5),

    chunkMaxTokens: positiveInt.default(200),
    chunkOverlapTokens: nonNegativeInt.default(20),

    embeddingModel: z.string().min(1).default("voyage-law-2"),
    embeddingDimensions: positiveInt.default(1024),
    embeddingBatchSize: positiveInt.default(128),
    embeddingMaxAttempts: positiveInt.default(3),
    embeddingBaseDelayMs: nonNegativeInt.default(500),
    embeddingMaxDelayMs: nonNegativeInt.default(8_000),
    embeddingTimeoutMs: positiveInt.default(15_000),
    embeddingCacheMax: positiveInt.default(10_000),
    embeddingCacheTtlMs: positiveInt.default(1000 * 60 * 60),

    vectorQueryTimeoutMs: positiveInt.default(5_000),
    matchConcurrency: positiveInt.default(8),

    voyageApiKey: z.string().min(1).optional(),
    voyageBaseUrl: z.string().min(1).default("https://api.voyageai.com/v1"),
    databaseUrl: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.matchThreshold <= config.borderlineThreshold) {
      ctx.addIssue({
        code: "custom",
        path: ["matchThreshold"],
        message: "matchThreshold must be greater than borderlineThreshold",
      })
    }
    if (config.chunkOverlapTokens >= config.chunkMaxTokens) {
      ctx.addIssue({
        code: "custom",
        path: ["chunkOverlapTokens"],
        message: "chunkOverlapTokens must be smaller than chunkMaxTokens",
      })
    }
  })

export type ValidationConfig = z.infer<typeof validationConfigSchema>

/**
 * Environment variable backing each config field.
 */
export const CONFIG_ENV_KEYS = {
  matchThreshold: "MATCH_THRESHOLD",
  borderlineThreshold: "BORDERLINE_THRESHOLD",
  candidateK: "CANDIDATE_K",
  chunkMaxTokens: "CHUNK_MAX_TOKENS",
  chunkOverlapTokens: "CHUNK_OVERLAP_TOKENS",
  embeddingModel: "EMBEDDING_MODEL",
  embeddingDimensions: "EMBEDDING_DIMENSIONS",
  embeddingBatchSize: "EMBEDDING_BATCH_SIZE",
  embeddingMaxAttempts: "EMBEDDING_MAX_ATTEMPTS",
  embeddingBaseDelayMs: "EMBEDDING_BASE_DELAY_MS",
  embeddingMaxDelayMs: "EMBEDDING_MAX_DELAY_MS",
  embeddingTimeoutMs: "EMBEDDING_TIMEOUT_MS",
  embeddingCacheMax: "EMBEDDING_CACHE_MAX",
  embeddingCacheTtlMs: "EMBEDDING_CACHE_TTL_MS",
  vectorQueryTimeoutMs: "VECTOR_QUERY_TIMEOUT_MS",
  matchConcurrency: "MATCH_CONCURRENCY",
  voyageApiKey: "VOYAGE_API_KEY",
  voyageBaseUrl: "VOYAGE_BASE_URL",
  databaseUrl: "DATABASE_URL",
} as const satisfies Record<keyof ValidationConfig, string>

/**
 * Parse a config object, throwing `ConfigError` with per-field details.
 */
export function parseConfig(input: unknown): ValidationConfig {
  const parsed = validationConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw ConfigError.fromZodError(parsed.error)
  }
  return parsed.data
}

/**
 * Load configuration from environment variables.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ValidationConfig {
  const raw: Record<string, string> = {}
  for (const [field, envKey] of Object.entries(CONFIG_ENV_KEYS)) {
    const value = env[envKey]?.trim()
    if (value) raw[field] = value
  }
  return parseConfig(raw)
}
