export { PlainTextExtractor } from "./plain-text"
export type { TextExtractor } from "./types"
