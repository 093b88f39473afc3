/**
 * @fileoverview Token counting for chunk budgets.
 *
 * voyage-law-2 counts tokens with the Llama 2 SentencePiece tokenizer, and
 * `llama-tokenizer-js` is its JavaScript implementation. Chunk budgets are
 * measured with it so a chunk never exceeds what the embedding model sees.
 *
 * The tokenizer weights load once through a dynamic import. Call
 * `initVoyageTokenizer()` before chunking; until then the synchronous
 * counter falls back to a character estimate that overcounts.
 *
 * `tokenize` is separate: it locates word spans, the positions at which the
 * chunker may cut the text.
 *
 * @module lib/document-chunking/token-counter
 * @see {@link https://docs.voyageai.com/docs/tokenization} Voyage AI tokenization docs
 */

import type { TokenSpan } from "./types"

/** Counts tokens in a text */
export type TokenCounter = (text: string) => number

const WORD_PATTERN = /\S+/g

/** Characters per token for legal English, used before the tokenizer loads */
const CHARS_PER_TOKEN = 4.5

let _llamaTokenizer: { encode: (text: string) => number[] } | null = null

async function getLlamaTokenizer(): Promise<{ encode: (text: string) => number[] }> {
  if (_llamaTokenizer) return _llamaTokenizer
  const mod = await import("llama-tokenizer-js")
  const tokenizer = mod.default
  _llamaTokenizer = tokenizer
  return tokenizer
}

/**
 * Load the Llama 2 tokenizer weights. Later calls are no-ops.
 *
 * @example
 * ```typescript
 * await initVoyageTokenizer()
 * countVoyageTokensSync("The Receiving Party shall not disclose") // exact
 * ```
 */
export async function initVoyageTokenizer(): Promise<void> {
  await getLlamaTokenizer()
}

/**
 * Count tokens as voyage-law-2 would.
 */
export async function countVoyageTokens(text: string): Promise<number> {
  if (!text) return 0
  const tokenizer = await getLlamaTokenizer()
  return tokenizer.encode(text).length
}

/**
 * Count tokens synchronously: exact once `initVoyageTokenizer()` has run,
 * otherwise `Math.ceil(text.length / 4.5)`.
 */
export function countVoyageTokensSync(text: string): number {
  if (!text) return 0
  if (_llamaTokenizer) {
    return _llamaTokenizer.encode(text).length
  }
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/**
 * Locate every word (maximal run of non-whitespace), in order.
 *
 * @example
 * ```typescript
 * tokenize("  Term  ends.")
 * // [{ start: 2, end: 6 }, { start: 8, end: 13 }]
 * ```
 */
export function tokenize(text: string): TokenSpan[] {
  const spans: TokenSpan[] = []
  for (const match of text.matchAll(WORD_PATTERN)) {
    const start = match.index ?? 0
    spans.push({ start, end: start + match[0].length })
  }
  return spans
}

/**
 * Count whitespace-delimited words. Useful as a `TokenCounter` where
 * budgets should be read as words.
 */
export function countWords(text: string): number {
  if (!text) return 0
  return text.match(WORD_PATTERN)?.length ?? 0
}
