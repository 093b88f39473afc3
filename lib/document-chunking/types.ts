/**
 * @fileoverview Type definitions for contract chunking.
 *
 * The chunker turns extracted contract text into overlapping,
 * sentence-aligned chunks that are embedded and matched against the clause
 * library. Every chunk keeps half-open character offsets into the source
 * text so evidence can be highlighted in the original document.
 *
 * @module lib/document-chunking/types
 */

// ============================================================================
// Tokens
// ============================================================================

/**
 * A word: a maximal run of non-whitespace characters, the unit at which
 * chunks are cut. Offsets are half-open (`text.slice(start, end)`).
 */
export interface TokenSpan {
  start: number
  end: number
}

// ============================================================================
// Core Chunk Type
// ============================================================================

/**
 * A contiguous slice of a contract.
 *
 * Invariants:
 * - `text === source.slice(startOffset, endOffset)`
 * - `0 <= startOffset <= contentStartOffset < endOffset <= source.length`
 * - `[startOffset, contentStartOffset)` repeats the tail of the previous
 *   chunk (`overlapTokens` tokens); the first chunk has no overlap
 * - `[contentStartOffset, endOffset)` lies within one section
 */
export interface Chunk {
  /** `${contractId}:chunk-${sequenceIndex}` */
  chunkId: string

  contractId: string

  text: string

  /** Character offset where the chunk starts, overlap included */
  startOffset: number

  /** Character offset where the chunk's own content starts */
  contentStartOffset: number

  /** Character offset where the chunk ends (exclusive) */
  endOffset: number

  /** 0-based position in the document */
  sequenceIndex: number

  /** Tokens in `text`, overlap included */
  tokenCount: number

  /** Tokens in the leading text repeated from the previous chunk */
  overlapTokens: number

  /** Heading of the section holding the chunk's content, `null` before the first heading */
  sectionTitle: string | null
}

// ============================================================================
// Chunking Options
// ============================================================================

/**
 * Token budget for chunking.
 *
 * No chunk exceeds `maxTokens` as measured by `countTokens`. Each chunk
 * after the first starts with the longest tail of its predecessor that fits
 * in `overlapTokens`.
 */
export interface ChunkOptions {
  /** Hard maximum tokens per chunk, overlap included */
  maxTokens: number

  /** Token budget for text repeated from the previous chunk; below `maxTokens` */
  overlapTokens: number

  /** Defaults to `countVoyageTokensSync` */
  countTokens?: (text: string) => number
}

// ============================================================================
// Chunk Statistics & Mapping
// ============================================================================

/**
 * Aggregate statistics about the chunks produced for a contract.
 */
export interface ChunkStats {
  totalChunks: number
  avgTokens: number
  minTokens: number
  maxTokens: number
  /** Sum of overlap tokens across chunks */
  overlapTokens: number
}

/**
 * Summary entry for a single chunk in the chunk map.
 */
export interface ChunkMapEntry {
  chunkId: string
  sequenceIndex: number
  startOffset: number
  endOffset: number
  tokenCount: number
  sectionTitle: string | null
  /** First 100 characters of chunk text */
  preview: string
}

/**
 * Chunk map for a contract, used in logs and operator output.
 */
export interface ChunkMap extends ChunkStats {
  contractId: string
  entries: ChunkMapEntry[]
}

// ============================================================================
// Embedded Chunk
// ============================================================================

/**
 * A chunk together with its embedding, as the matcher consumes it.
 */
export type EmbeddedChunk = Chunk & {
  embedding: readonly number[]
}
