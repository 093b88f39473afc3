export { MemoryVectorIndex } from "./memory-index"
export { PgVectorIndex, type PgVectorIndexOptions } from "./pg-index"
export {
  assertDimensions,
  cosineSimilarity,
  compareHits,
  matchesFilter,
  norm,
  normalize,
} from "./similarity"
export type {
  MetadataFilter,
  MetadataValue,
  VectorHit,
  VectorIndex,
  VectorMetadata,
} from "./types"
