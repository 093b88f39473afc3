/**
 * @fileoverview Contract validation entry point.
 *
 * Chunks a contract, embeds the chunks in gateway-sized groups, and runs the
 * validator against the clause library as it stands when the run starts.
 * An embedding group that fails becomes a set of chunk failures and degrades
 * the report; configuration errors abort the run.
 *
 * `createValidationPipeline` wires the gateway, clause library and service
 * from a `ValidationConfig` so scripts and tests share one setup path.
 *
 * @module lib/contract-validation
 */

import { EmbeddingCache } from "@/lib/cache"
import { ClauseLibrary, type ClauseStore } from "@/lib/clause-library"
import { mapWithConcurrency } from "@/lib/concurrency"
import type { ValidationConfig } from "@/lib/config"
import {
  chunkText,
  initVoyageTokenizer,
  type Chunk,
  type EmbeddedChunk,
  type TokenCounter,
} from "@/lib/document-chunking"
import { EmbeddingGateway, type EmbeddingProvider } from "@/lib/embeddings"
import { ConfigError, toAppError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { Matcher } from "@/lib/matching"
import { partition, tryCatchWith } from "@/lib/result"
import { Validator, type ChunkFailure, type ContractReport } from "@/lib/validation"
import type { VectorIndex } from "@/lib/vector-index"

export type ContractValidationConfig = Pick<
  ValidationConfig,
  | "matchThreshold"
  | "borderlineThreshold"
  | "candidateK"
  | "chunkMaxTokens"
  | "chunkOverlapTokens"
  | "embeddingBatchSize"
  | "vectorQueryTimeoutMs"
  | "matchConcurrency"
>

export interface ContractValidationDeps {
  gateway: EmbeddingGateway
  /** Index holding the clause library's embeddings */
  clauseIndex: VectorIndex
  library: ClauseLibrary
  /** Chunk budget counter; the Voyage tokenizer when omitted */
  countTokens?: TokenCounter
}

export class ContractValidationService {
  private readonly validator: Validator

  constructor(
    private readonly deps: ContractValidationDeps,
    private readonly config: ContractValidationConfig
  ) {
    const { gateway, clauseIndex } = deps
    if (gateway.dimensions !== clauseIndex.dimensions) {
      throw new ConfigError(
        `Embedding dimension ${gateway.dimensions} does not match clause index dimension ${clauseIndex.dimensions}`
      )
    }

    const matcher = new Matcher(clauseIndex, {
      modelVersion: gateway.modelVersion,
      matchThreshold: config.matchThreshold,
      borderlineThreshold: config.borderlineThreshold,
      queryTimeoutMs: config.vectorQueryTimeoutMs,
    })
    this.validator = new Validator(matcher, {
      candidateK: config.candidateK,
      concurrency: config.matchConcurrency,
    })
  }

  /**
   * Validate one contract against the clause library.
   *
   * @throws {ConfigError} on dimension mismatch or invalid chunking options
   */
  async validate(contractId: string, text: string): Promise<ContractReport> {
    const startTime = Date.now()
    if (!this.deps.countTokens) await initVoyageTokenizer()
    const chunks = chunkText(contractId, text, {
      maxTokens: this.config.chunkMaxTokens,
      overlapTokens: this.config.chunkOverlapTokens,
      countTokens: this.deps.countTokens,
    })

    const { embedded, failures } = await this.embedChunks(chunks)
    const clauses = await this.deps.library.list()

    const report = await this.validator.validate(contractId, embedded, clauses, {
      chunkFailures: failures,
    })

    logger.info("Contract validation complete", {
      contractId,
      chunks: chunks.length,
      embeddingFailures: failures.length,
      durationMs: Date.now() - startTime,
    })
    return report
  }

  private async embedChunks(
    chunks: Chunk[]
  ): Promise<{ embedded: EmbeddedChunk[]; failures: ChunkFailure[] }> {
    const groups: Chunk[][] = []
    for (let i = 0; i < chunks.length; i += this.config.embeddingBatchSize) {
      groups.push(chunks.slice(i, i + this.config.embeddingBatchSize))
    }

    const attempts = await mapWithConcurrency(groups, this.config.matchConcurrency, (group) =>
      tryCatchWith<EmbeddedChunk[], ChunkFailure[]>(
        async () => {
          const vectors = await this.deps.gateway.embedBatch(group.map((chunk) => chunk.text))
          return group.map((chunk, i) => ({ ...chunk, embedding: vectors[i] }))
        },
        (error) => {
          const appError = toAppError(error)
          return group.map((chunk) => ({
            chunkId: chunk.chunkId,
            sequenceIndex: chunk.sequenceIndex,
            error: appError,
          }))
        }
      )
    )

    const { values, errors } = partition(attempts)
    const failures = errors.flat()
    const fatal = failures.find((failure) => failure.error instanceof ConfigError)
    if (fatal) throw fatal.error

    for (const group of errors) {
      logger.warn("Chunk embedding group failed", {
        chunks: group.length,
        firstChunkId: group[0]?.chunkId,
        error: group[0]?.error.message,
      })
    }

    return { embedded: values.flat(), failures }
  }
}

export interface ValidationPipeline {
  gateway: EmbeddingGateway
  library: ClauseLibrary
  service: ContractValidationService
}

/**
 * Wire a gateway, clause library and validation service from configuration.
 */
export function createValidationPipeline(
  config: ValidationConfig,
  deps: {
    provider: EmbeddingProvider
    store: ClauseStore
    clauseIndex: VectorIndex
    countTokens?: TokenCounter
  }
): ValidationPipeline {
  const gateway = new EmbeddingGateway(deps.provider, {
    dimensions: config.embeddingDimensions,
    maxBatchSize: config.embeddingBatchSize,
    timeoutMs: config.embeddingTimeoutMs,
    maxAttempts: config.embeddingMaxAttempts,
    baseDelayMs: config.embeddingBaseDelayMs,
    maxDelayMs: config.embeddingMaxDelayMs,
    cache: new EmbeddingCache({
      max: config.embeddingCacheMax,
      ttlMs: config.embeddingCacheTtlMs,
    }),
  })
  const library = new ClauseLibrary(deps.store, gateway, deps.clauseIndex)
  const service = new ContractValidationService(
    { gateway, clauseIndex: deps.clauseIndex, library, countTokens: deps.countTokens },
    config
  )
  return { gateway, library, service }
}
