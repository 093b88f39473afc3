/**
 * @fileoverview Contract chunking barrel export.
 *
 * @module lib/document-chunking
 */

export { chunkText } from "./contract-chunker"
export { computeChunkStats, generateChunkMap } from "./chunk-map"
export {
  countVoyageTokens,
  countVoyageTokensSync,
  countWords,
  initVoyageTokenizer,
  tokenize,
  type TokenCounter,
} from "./token-counter"
export type {
  Chunk,
  ChunkMap,
  ChunkMapEntry,
  ChunkOptions,
  ChunkStats,
  EmbeddedChunk,
  TokenSpan,
} from "./types"
