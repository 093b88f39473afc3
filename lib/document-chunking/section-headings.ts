/**
 * @fileoverview Section heading detection for contract text.
 *
 * A heading is a short line that reads as a title:
 *
 * - `ARTICLE IV`, `Section 2. Term`, `§ 3`
 * - `1. Definitions`, `1.2 Return of Materials`, `(a) Permitted Use`, `B. Remedies`
 * - an all-caps line such as `CONFIDENTIALITY AGREEMENT`
 *
 * Numbered lines count only when the text after the number is in title case,
 * so `1.1 Confidential Information means any data` stays body text. A
 * WHEREAS paragraph opens a `Recitals` section without a heading line.
 *
 * @module lib/document-chunking/section-headings
 */

/** Where a section opens */
export interface SectionBreak {
  /** Offset of the first character of the section */
  start: number
  /** End of the heading line, or `null` when the section has none */
  headingEnd: number | null
  title: string
}

export const RECITALS_TITLE = "Recitals"

const MAX_HEADING_WORDS = 10

const ARTICLE_PREFIX =
  /^(?:(?:ARTICLE|Article|SECTION|Section)\s+|§\s*)(?:\d+(?:\.\d+)*|[IVXLC]+)\b[.:)]?\s*/

const NUMBER_PREFIX = /^(?:\d+(?:\.\d+)*\.?|\([a-z0-9]{1,4}\)|[A-Z]\.)\s+/

const RECITAL_START = /^WHEREAS\b/i

const LINE_PATTERN = /[^\n]+/g

const SMALL_WORDS = new Set([
  "a",
  "an",
  "and",
  "as",
  "at",
  "by",
  "for",
  "from",
  "in",
  "of",
  "on",
  "or",
  "the",
  "to",
  "with",
])

function isTitleText(text: string): boolean {
  if (/;/.test(text) || text.endsWith(",")) return false
  const words = text.replace(/[.:]$/, "").split(/\s+/).filter(Boolean)
  if (words.length === 0) return false
  return words.every((word, i) =>
    /^\P{Ll}/u.test(word) ? true : i > 0 && SMALL_WORDS.has(word)
  )
}

function isAllCaps(line: string): boolean {
  const upper = line.match(/\p{Lu}/gu)?.length ?? 0
  return upper >= 2 && !/\p{Ll}/u.test(line) && !/[;,]$/.test(line)
}

/**
 * Whether a trimmed line is a section heading.
 */
export function isHeadingLine(line: string): boolean {
  if (!line || line.split(/\s+/).length > MAX_HEADING_WORDS) return false

  const article = ARTICLE_PREFIX.exec(line)
  if (article) {
    const rest = line.slice(article[0].length).replace(/^[-–—]\s*/, "")
    return rest === "" || isTitleText(rest)
  }

  const numbered = NUMBER_PREFIX.exec(line)
  if (numbered) {
    return isTitleText(line.slice(numbered[0].length))
  }

  return isAllCaps(line)
}

/**
 * Find every section break in `text`, in document order.
 *
 * @example
 * ```typescript
 * findSectionBreaks("Preamble.\n1. Term\nOne year.")
 * // [{ start: 10, headingEnd: 17, title: "1. Term" }]
 * ```
 */
export function findSectionBreaks(text: string): SectionBreak[] {
  const breaks: SectionBreak[] = []

  for (const match of text.matchAll(LINE_PATTERN)) {
    const raw = match[0]
    const line = raw.trim()
    if (!line) continue
    const start = (match.index ?? 0) + raw.length - raw.trimStart().length

    if (isHeadingLine(line)) {
      breaks.push({
        start,
        headingEnd: start + line.length,
        title: line.replace(/\s+/g, " "),
      })
      continue
    }

    const currentTitle = breaks.at(-1)?.title.toLowerCase()
    if (RECITAL_START.test(line) && currentTitle !== RECITALS_TITLE.toLowerCase()) {
      breaks.push({ start, headingEnd: null, title: RECITALS_TITLE })
    }
  }

  return breaks
}
