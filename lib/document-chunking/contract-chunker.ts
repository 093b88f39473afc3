/**
 * @fileoverview Section-aware, sentence-aligned contract chunker.
 *
 * Pipeline: locate words → split the text into sections at headings →
 * mark sentence ends (terminal punctuation, paragraph breaks, heading
 * lines) → pack whole sentences greedily, hard-cutting a sentence that
 * cannot fit → prepend overlap from the previous chunk.
 *
 * A chunk's own content never crosses a section boundary; its overlap may
 * reach back into the previous section.
 *
 * Budgets are measured with a token counter over the chunk's actual text,
 * so `tokenCount <= maxTokens` holds for whatever the counter reports.
 * Chunks are pure functions of `(contractId, text, options)` once the
 * counter is fixed, and the text is never modified.
 *
 * @module lib/document-chunking/contract-chunker
 */

import { ConfigError } from "@/lib/errors"
import { findSectionBreaks } from "./section-headings"
import { countVoyageTokensSync, tokenize, type TokenCounter } from "./token-counter"
import type { Chunk, ChunkOptions, TokenSpan } from "./types"

// ============================================================================
// Boundaries
// ============================================================================

/** Sentence-final punctuation, optionally followed by closing quotes/brackets */
const SENTENCE_END = /[.!?]["'”’)\]]*$/

/** A blank line (possibly holding spaces) between two words */
const PARAGRAPH_BREAK = /\n[^\S\n]*\n/

/** A cut position: a word, or a piece of a word too long for one chunk */
interface Unit extends TokenSpan {
  /** A sentence or heading ends after this unit */
  endsSentence: boolean
  /** Last unit of its section */
  endsSection: boolean
  sectionTitle: string | null
}

/** Unit indices of one chunk: `[first, contentFirst)` is the overlap */
interface ChunkRange {
  first: number
  contentFirst: number
  end: number
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Split contract text into overlapping chunks.
 *
 * @throws {ConfigError} if `maxTokens < 1`, `overlapTokens < 0` or
 *   `overlapTokens >= maxTokens`
 *
 * @example
 * ```typescript
 * await initVoyageTokenizer()
 * const chunks = chunkText("c-1", text, { maxTokens: 200, overlapTokens: 20 })
 * chunks[0].chunkId // "c-1:chunk-0"
 * chunks[0].sectionTitle // "1. Definitions"
 * ```
 */
export function chunkText(
  contractId: string,
  text: string,
  options: ChunkOptions
): Chunk[] {
  validateOptions(options)

  const words = tokenize(text)
  if (words.length === 0) return []

  const count = options.countTokens ?? countVoyageTokensSync
  const units = buildUnits(text, words, options.maxTokens, count)

  return packUnits(text, units, options, count).map((range, sequenceIndex) => {
    const startOffset = units[range.first].start
    const endOffset = units[range.end - 1].end
    const body = text.slice(startOffset, endOffset)

    return {
      chunkId: `${contractId}:chunk-${sequenceIndex}`,
      contractId,
      text: body,
      startOffset,
      contentStartOffset: units[range.contentFirst].start,
      endOffset,
      sequenceIndex,
      tokenCount: count(body),
      overlapTokens:
        range.first < range.contentFirst
          ? count(text.slice(startOffset, units[range.contentFirst - 1].end))
          : 0,
      sectionTitle: units[range.contentFirst].sectionTitle,
    }
  })
}

function validateOptions({ maxTokens, overlapTokens }: ChunkOptions): void {
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ConfigError(`maxTokens must be a positive integer, got ${maxTokens}`)
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    throw new ConfigError(
      `overlapTokens must be a non-negative integer, got ${overlapTokens}`
    )
  }
  if (overlapTokens >= maxTokens) {
    throw new ConfigError(
      `overlapTokens (${overlapTokens}) must be smaller than maxTokens (${maxTokens})`
    )
  }
}

// ============================================================================
// Segmentation
// ============================================================================

/**
 * Turn words into units carrying sentence and section boundaries. Words
 * that alone exceed `maxTokens` are split into pieces that fit.
 */
function buildUnits(
  text: string,
  words: TokenSpan[],
  maxTokens: number,
  count: TokenCounter
): Unit[] {
  const breaks = findSectionBreaks(text)
  const units: Unit[] = []
  let sectionTitle: string | null = null
  let headingEnd: number | null = null
  let nextBreak = 0

  for (let i = 0; i < words.length; i++) {
    const word = words[i]
    while (nextBreak < breaks.length && breaks[nextBreak].start <= word.start) {
      sectionTitle = breaks[nextBreak].title
      headingEnd = breaks[nextBreak].headingEnd
      nextBreak++
    }

    const isLast = i === words.length - 1
    const endsSection =
      isLast || (nextBreak < breaks.length && breaks[nextBreak].start <= words[i + 1].start)
    const endsSentence =
      endsSection ||
      word.end === headingEnd ||
      SENTENCE_END.test(text.slice(word.start, word.end)) ||
      PARAGRAPH_BREAK.test(text.slice(word.end, words[i + 1].start))

    const pieces =
      count(text.slice(word.start, word.end)) > maxTokens
        ? splitWord(text, word, maxTokens, count)
        : [word]
    pieces.forEach((piece, p) => {
      const closes = p === pieces.length - 1
      units.push({
        ...piece,
        endsSentence: endsSentence && closes,
        endsSection: endsSection && closes,
        sectionTitle,
      })
    })
  }

  return units
}

/**
 * Cut one word into the longest character runs that fit `maxTokens`.
 */
function splitWord(
  text: string,
  word: TokenSpan,
  maxTokens: number,
  count: TokenCounter
): TokenSpan[] {
  const pieces: TokenSpan[] = []
  let start = word.start

  while (start < word.end) {
    let lo = start + 1
    let hi = word.end
    while (lo < hi) {
      const mid = Math.ceil((lo + hi) / 2)
      if (count(text.slice(start, mid)) <= maxTokens) lo = mid
      else hi = mid - 1
    }
    pieces.push({ start, end: lo })
    start = lo
  }

  return pieces
}

// ============================================================================
// Packing
// ============================================================================

/**
 * Pack units into chunk ranges.
 *
 * Each chunk takes the longest tail of its predecessor that fits
 * `overlapTokens`, then whole sentences of one section while the chunk fits
 * `maxTokens`. A sentence that fits no chunk on its own is hard-cut at the
 * last unit that fits; when not even one unit fits beside the overlap, the
 * overlap is dropped.
 */
function packUnits(
  text: string,
  units: Unit[],
  { maxTokens, overlapTokens }: ChunkOptions,
  count: TokenCounter
): ChunkRange[] {
  const measure = (first: number, end: number) =>
    count(text.slice(units[first].start, units[end - 1].end))
  const fits = (first: number, end: number) => measure(first, end) <= maxTokens

  const sentenceEndAfter = (from: number): number => {
    for (let i = from; i < units.length; i++) {
      if (units[i].endsSentence) return i + 1
    }
    return units.length
  }

  const overlapStart = (previous: ChunkRange): number => {
    let first = previous.end
    for (let i = previous.end - 1; i >= previous.first; i--) {
      if (measure(i, previous.end) > overlapTokens) break
      first = i
    }
    return first
  }

  const extend = (first: number, pos: number): number => {
    let end = pos
    while (end < units.length && !(end > pos && units[end - 1].endsSection)) {
      const next = sentenceEndAfter(end)
      if (!fits(first, next)) break
      end = next
    }
    if (end > pos) return end

    let lo = pos
    let hi = sentenceEndAfter(pos) - 1
    while (lo < hi) {
      const mid = Math.ceil((lo + hi) / 2)
      if (fits(first, mid)) lo = mid
      else hi = mid - 1
    }
    return lo
  }

  const ranges: ChunkRange[] = []
  let pos = 0

  while (pos < units.length) {
    const previous = ranges.at(-1)
    let first = previous && overlapTokens > 0 ? overlapStart(previous) : pos
    let end = extend(first, pos)
    if (end === pos && first < pos) {
      first = pos
      end = extend(first, pos)
    }
    // A single unit always fits once split
    if (end === pos) end = pos + 1

    ranges.push({ first, contentFirst: pos, end })
    pos = end
  }

  return ranges
}
