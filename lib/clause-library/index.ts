export { ClauseLibrary, type ClauseLibrarySummary, type ClauseLibraryOptions } from "./library"
export {
  clauseSchema,
  clauseInputSchema,
  clauseUpdateSchema,
  clauseLibraryFileSchema,
  isEmbeddingFresh,
  isProhibited,
  PROHIBITED_CATEGORY,
  type Clause,
  type ClauseInput,
  type ClauseUpdate,
} from "./schema"
export { MemoryClauseStore, compareOrdinal, type ClauseStore } from "./store"
