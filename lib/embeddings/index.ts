export { EmbeddingGateway, type EmbeddingGatewayOptions } from "./gateway"
export {
  VoyageEmbeddingProvider,
  VOYAGE_DEFAULTS,
  type VoyageInputType,
  type VoyageProviderOptions,
} from "./voyage"
export type { EmbedCallOptions, EmbeddingProvider, EmbeddingVector } from "./types"
