/**
 * @fileoverview Contract Q&A service
 *
 * Indexes a contract's chunks in their own vector index (one entry per
 * chunk, id = chunkId, metadata `{ contractId, sequenceIndex, chunkCount,
 * text, sectionTitle? }`) and answers questions from the top-k chunks of
 * that contract.
 *
 * @module lib/contract-qa
 */

import type { Answerer, ContextChunk } from "@/lib/ai/answerer"
import { buildChecklist, type Checklist } from "@/lib/checklist"
import type { ValidationConfig } from "@/lib/config"
import {
  chunkText,
  generateChunkMap,
  initVoyageTokenizer,
  type ChunkMap,
  type TokenCounter,
} from "@/lib/document-chunking"
import type { EmbeddingGateway } from "@/lib/embeddings"
import { ConfigError, ValidationError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import type { TextExtractor } from "@/lib/text-extraction"
import type { VectorIndex } from "@/lib/vector-index"

export type ContractQaConfig = Pick<
  ValidationConfig,
  "chunkMaxTokens" | "chunkOverlapTokens" | "candidateK"
>

export interface ContractQaDeps {
  gateway: EmbeddingGateway
  /** Index holding contract chunks, separate from the clause index */
  chunkIndex: VectorIndex
  answerer: Answerer
  extractor: TextExtractor
  /** Chunk budget counter; the Voyage tokenizer when omitted */
  countTokens?: TokenCounter
}

export interface IndexedContract {
  contractId: string
  chunkMap: ChunkMap
  checklist: Checklist
}

export interface QaAnswer {
  contractId: string
  question: string
  answer: string
  /** Retrieved passages, best first */
  context: ContextChunk[]
}

export class ContractQaService {
  constructor(
    private readonly deps: ContractQaDeps,
    private readonly config: ContractQaConfig
  ) {
    if (deps.gateway.dimensions !== deps.chunkIndex.dimensions) {
      throw new ConfigError(
        `Embedding dimension ${deps.gateway.dimensions} does not match chunk index dimension ${deps.chunkIndex.dimensions}`
      )
    }
  }

  /**
   * Chunk, embed and index a contract, replacing any earlier version.
   *
   * @throws {ValidationError} if the text has no content
   */
  async indexContract(contractId: string, text: string): Promise<IndexedContract> {
    if (!this.deps.countTokens) await initVoyageTokenizer()
    const chunks = chunkText(contractId, text, {
      maxTokens: this.config.chunkMaxTokens,
      overlapTokens: this.config.chunkOverlapTokens,
      countTokens: this.deps.countTokens,
    })
    if (chunks.length === 0) {
      throw new ValidationError(`Contract ${contractId} has no text to index`)
    }

    const vectors = await this.deps.gateway.embedBatch(chunks.map((chunk) => chunk.text))
    const removed = await this.removeSurplusChunks(contractId, vectors[0], chunks.length)

    for (const [i, chunk] of chunks.entries()) {
      await this.deps.chunkIndex.upsert(chunk.chunkId, vectors[i], {
        contractId,
        sequenceIndex: chunk.sequenceIndex,
        chunkCount: chunks.length,
        text: chunk.text,
        ...(chunk.sectionTitle !== null ? { sectionTitle: chunk.sectionTitle } : {}),
      })
    }

    const chunkMap = generateChunkMap(chunks, contractId)
    logger.info("Contract indexed", {
      contractId,
      chunks: chunkMap.totalChunks,
      avgTokens: chunkMap.avgTokens,
      removedChunks: removed,
    })
    return { contractId, chunkMap, checklist: buildChecklist(text) }
  }

  /**
   * Extract text from document bytes, then index it.
   *
   * @throws {OcrError} when the extractor yields no text
   */
  async ingestDocument(
    contractId: string,
    bytes: Uint8Array,
    language = "eng"
  ): Promise<IndexedContract> {
    const text = await this.deps.extractor.extractText(bytes, language)
    return this.indexContract(contractId, text)
  }

  /**
   * Answer a question from the contract's most similar chunks.
   *
   * @throws {ValidationError} for an empty question or a non-positive k
   */
  async ask(
    contractId: string,
    question: string,
    k: number = this.config.candidateK
  ): Promise<QaAnswer> {
    const trimmed = question.trim()
    if (trimmed.length === 0) {
      throw new ValidationError("Question is required")
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError(`k must be a positive integer, got ${k}`)
    }

    const vector = await this.deps.gateway.embed(trimmed)
    const hits = await this.deps.chunkIndex.query(vector, k, { contractId })

    const context: ContextChunk[] = []
    for (const hit of hits) {
      const text = hit.metadata.text
      if (typeof text !== "string") {
        logger.warn("Chunk index entry has no text", { contractId, chunkId: hit.id })
        continue
      }
      const { sectionTitle } = hit.metadata
      context.push({
        chunkId: hit.id,
        text,
        score: hit.score,
        ...(typeof sectionTitle === "string" ? { sectionTitle } : {}),
      })
    }

    const answer = await this.deps.answerer.answer(trimmed, context)
    return { contractId, question: trimmed, answer, context }
  }

  /**
   * Delete chunks left over from a longer earlier version of the contract.
   */
  private async removeSurplusChunks(
    contractId: string,
    queryVector: readonly number[],
    chunkCount: number
  ): Promise<number> {
    const [previous] = await this.deps.chunkIndex.query(queryVector, 1, { contractId })
    const previousCount = previous?.metadata.chunkCount
    if (typeof previousCount !== "number" || previousCount <= chunkCount) return 0

    let removed = 0
    for (let i = chunkCount; i < previousCount; i++) {
      if (await this.deps.chunkIndex.delete(`${contractId}:chunk-${i}`)) removed++
    }
    return removed
  }
}
