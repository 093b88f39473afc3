/**
 * @fileoverview Chunk map and statistics generator.
 *
 * Summaries of the chunks produced for a contract, logged after chunking
 * and printed by the operator script.
 *
 * @module lib/document-chunking/chunk-map
 * @see {@link ./types} for ChunkMap, ChunkStats, ChunkMapEntry types
 */

import type { Chunk, ChunkMap, ChunkStats } from "./types"

// ============================================================================
// Chunk Map Generation
// ============================================================================

/**
 * Generates a chunk map: aggregate statistics plus one preview entry per
 * chunk.
 */
export function generateChunkMap(chunks: Chunk[], contractId: string): ChunkMap {
  return {
    contractId,
    ...computeChunkStats(chunks),
    entries: chunks.map((chunk) => ({
      chunkId: chunk.chunkId,
      sequenceIndex: chunk.sequenceIndex,
      startOffset: chunk.startOffset,
      endOffset: chunk.endOffset,
      tokenCount: chunk.tokenCount,
      sectionTitle: chunk.sectionTitle,
      preview: chunk.text.slice(0, 100),
    })),
  }
}

// ============================================================================
// Chunk Statistics
// ============================================================================

/**
 * Computes aggregate token statistics for a set of chunks.
 *
 * @example
 * ```typescript
 * const stats = computeChunkStats(chunks)
 * // stats.totalChunks: 42
 * // stats.avgTokens: 180
 * ```
 */
export function computeChunkStats(chunks: Chunk[]): ChunkStats {
  if (chunks.length === 0) {
    return {
      totalChunks: 0,
      avgTokens: 0,
      minTokens: 0,
      maxTokens: 0,
      overlapTokens: 0,
    }
  }

  const tokenCounts = chunks.map((c) => c.tokenCount)
  const totalTokens = tokenCounts.reduce((sum, t) => sum + t, 0)

  return {
    totalChunks: chunks.length,
    avgTokens: Math.round(totalTokens / chunks.length),
    minTokens: Math.min(...tokenCounts),
    maxTokens: Math.max(...tokenCounts),
    overlapTokens: chunks.reduce((sum, c) => sum + c.overlapTokens, 0),
  }
}
