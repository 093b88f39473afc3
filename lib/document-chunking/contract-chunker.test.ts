import { describe, it, expect } from "vitest"
import { chunkText } from "./contract-chunker"
import { computeChunkStats, generateChunkMap } from "./chunk-map"
import { findSectionBreaks, isHeadingLine } from "./section-headings"
import {
  countVoyageTokens,
  countVoyageTokensSync,
  countWords,
  initVoyageTokenizer,
  tokenize,
} from "./token-counter"
import { ConfigError } from "@/lib/errors"

function longContract(): string {
  return Array.from(
    { length: 40 },
    (_, i) => `Clause ${i} requires the parties to act in good faith.`
  )
    .map((sentence, i) => (i % 5 === 4 ? `${sentence}\n\n` : `${sentence} `))
    .join("")
}

describe("tokenize", () => {
  it("returns half-open spans of non-whitespace runs", () => {
    expect(tokenize("  Term  ends.")).toEqual([
      { start: 2, end: 6 },
      { start: 8, end: 13 },
    ])
  })

  it("counts words", () => {
    expect(countWords("")).toBe(0)
    expect(countWords(" \n\t ")).toBe(0)
    expect(countWords("one two\nthree")).toBe(3)
  })
})

describe("chunkText", () => {
  describe("options", () => {
    it.each([
      { maxTokens: 0, overlapTokens: 0 },
      { maxTokens: 10, overlapTokens: -1 },
      { maxTokens: 10, overlapTokens: 10 },
      { maxTokens: 10, overlapTokens: 12 },
      { maxTokens: 2.5, overlapTokens: 0 },
    ])("rejects $maxTokens/$overlapTokens", (options) => {
      expect(() => chunkText("c1", "Some text.", options)).toThrow(ConfigError)
    })
  })

  it("returns no chunks for empty or whitespace-only text", () => {
    const options = { maxTokens: 10, overlapTokens: 2 }
    expect(chunkText("c1", "", options)).toEqual([])
    expect(chunkText("c1", " \n\n\t ", options)).toEqual([])
  })

  it("keeps a short contract in one chunk with exact offsets", () => {
    const text = "  Term one. Term two.  "
    const chunks = chunkText("c1", text, {
      maxTokens: 200,
      overlapTokens: 20,
      countTokens: countWords,
    })

    expect(chunks).toEqual([
      {
        chunkId: "c1:chunk-0",
        contractId: "c1",
        text: "Term one. Term two.",
        startOffset: 2,
        contentStartOffset: 2,
        endOffset: 21,
        sequenceIndex: 0,
        tokenCount: 4,
        overlapTokens: 0,
        sectionTitle: null,
      },
    ])
  })

  it("packs whole sentences and repeats overlap tokens", () => {
    const text = "a1 a2 a3. b1 b2 b3. c1 c2 c3. d1 d2 d3."
    const chunks = chunkText("c1", text, {
      maxTokens: 6,
      overlapTokens: 2,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.text)).toEqual([
      "a1 a2 a3. b1 b2 b3.",
      "b2 b3. c1 c2 c3.",
      "c2 c3. d1 d2 d3.",
    ])
    expect(chunks.map((c) => c.tokenCount)).toEqual([6, 5, 5])
    expect(chunks.map((c) => c.overlapTokens)).toEqual([0, 2, 2])
    expect(chunks.map((c) => c.chunkId)).toEqual([
      "c1:chunk-0",
      "c1:chunk-1",
      "c1:chunk-2",
    ])
    expect(text.slice(chunks[1].contentStartOffset, chunks[1].endOffset)).toBe(
      "c1 c2 c3."
    )
  })

  it("hard-cuts a sentence longer than the chunk budget", () => {
    const text = Array.from({ length: 10 }, (_, i) => `w${i}`).join(" ")
    const chunks = chunkText("c1", text, {
      maxTokens: 4,
      overlapTokens: 1,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.text)).toEqual([
      "w0 w1 w2 w3",
      "w3 w4 w5 w6",
      "w6 w7 w8 w9",
    ])
    expect(chunks.map((c) => c.overlapTokens)).toEqual([0, 1, 1])
  })

  it("ends a sentence at a paragraph break", () => {
    const text = "Heading one\n\nBody text here"
    const chunks = chunkText("c1", text, {
      maxTokens: 3,
      overlapTokens: 0,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.text)).toEqual(["Heading one", "Body text here"])
  })

  it("treats closing quotes after punctuation as a sentence end", () => {
    const text = 'He said "stop." Then left.'
    const chunks = chunkText("c1", text, {
      maxTokens: 3,
      overlapTokens: 0,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.text)).toEqual(['He said "stop."', "Then left."])
  })

  it("is deterministic", () => {
    const text = longContract()
    const options = { maxTokens: 25, overlapTokens: 5, countTokens: countWords }
    expect(chunkText("c1", text, options)).toEqual(chunkText("c1", text, options))
  })

  describe("invariants on a longer contract", () => {
    const text = longContract()
    const options = { maxTokens: 25, overlapTokens: 5, countTokens: countWords }
    const chunks = chunkText("c9", text, options)

    it("produces several chunks", () => {
      expect(chunks.length).toBeGreaterThan(10)
    })

    it("slices text exactly at the recorded offsets", () => {
      for (const chunk of chunks) {
        expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset))
        expect(chunk.startOffset).toBeGreaterThanOrEqual(0)
        expect(chunk.startOffset).toBeLessThanOrEqual(chunk.contentStartOffset)
        expect(chunk.contentStartOffset).toBeLessThan(chunk.endOffset)
        expect(chunk.endOffset).toBeLessThanOrEqual(text.length)
      }
    })

    it("never exceeds maxTokens", () => {
      for (const chunk of chunks) {
        expect(countWords(chunk.text)).toBe(chunk.tokenCount)
        expect(chunk.tokenCount).toBeLessThanOrEqual(options.maxTokens)
      }
    })

    it("covers the text without loss outside whitespace", () => {
      expect(chunks[0].contentStartOffset).toBe(0)
      for (let i = 1; i < chunks.length; i++) {
        const gap = text.slice(chunks[i - 1].endOffset, chunks[i].contentStartOffset)
        expect(gap).toMatch(/^\s+$/)
      }
      expect(chunks[chunks.length - 1].endOffset).toBe(text.trimEnd().length)
    })

    it("starts each chunk with the tail of its predecessor", () => {
      for (let i = 1; i < chunks.length; i++) {
        const overlap = text
          .slice(chunks[i].startOffset, chunks[i].contentStartOffset)
          .split(/\s+/)
          .filter(Boolean)
        const previousTail = chunks[i - 1].text
          .split(/\s+/)
          .slice(-chunks[i].overlapTokens)

        expect(chunks[i].overlapTokens).toBe(options.overlapTokens)
        expect(overlap).toEqual(previousTail)
      }
    })

    it("numbers chunks in document order", () => {
      chunks.forEach((chunk, i) => {
        expect(chunk.sequenceIndex).toBe(i)
        expect(chunk.chunkId).toBe(`c9:chunk-${i}`)
        expect(chunk.contractId).toBe("c9")
      })
    })
  })
})

describe("chunk map", () => {
  const chunks = chunkText("c1", "a1 a2 a3. b1 b2 b3. c1 c2 c3. d1 d2 d3.", {
    maxTokens: 6,
    overlapTokens: 2,
    countTokens: countWords,
  })

  it("computes token statistics", () => {
    expect(computeChunkStats(chunks)).toEqual({
      totalChunks: 3,
      avgTokens: 5,
      minTokens: 5,
      maxTokens: 6,
      overlapTokens: 4,
    })
  })

  it("returns zeroed statistics for no chunks", () => {
    expect(computeChunkStats([])).toEqual({
      totalChunks: 0,
      avgTokens: 0,
      minTokens: 0,
      maxTokens: 0,
      overlapTokens: 0,
    })
  })

  it("lists one entry per chunk", () => {
    const map = generateChunkMap(chunks, "c1")

    expect(map.contractId).toBe("c1")
    expect(map.totalChunks).toBe(3)
    expect(map.entries[1]).toEqual({
      chunkId: "c1:chunk-1",
      sequenceIndex: 1,
      startOffset: 13,
      endOffset: 29,
      tokenCount: 5,
      sectionTitle: null,
      preview: "b2 b3. c1 c2 c3.",
    })
  })
})

describe("section headings", () => {
  it.each([
    "ARTICLE IV",
    "Section 2. Term",
    "§ 3",
    "1. Definitions",
    "1.2 Return of Materials",
    "(a) Permitted Use",
    "B. Remedies",
    "CONFIDENTIALITY AGREEMENT",
  ])("recognises %s", (line) => {
    expect(isHeadingLine(line)).toBe(true)
  })

  it.each([
    "1.1 Confidential Information means any data.",
    "Section 2 of this Agreement shall survive.",
    "(a) to keep it secret;",
    "30 days after termination",
    "The term is one year.",
    "Preamble.",
  ])("leaves body text %s alone", (line) => {
    expect(isHeadingLine(line)).toBe(false)
  })

  it("locates headings and the start of the recitals", () => {
    const text =
      "NON-DISCLOSURE AGREEMENT\nWHEREAS, the parties wish to talk; and\nWHEREAS, they agree.\nARTICLE I\nTerms apply."

    expect(findSectionBreaks(text)).toEqual([
      { start: 0, headingEnd: 24, title: "NON-DISCLOSURE AGREEMENT" },
      { start: 25, headingEnd: null, title: "Recitals" },
      { start: 85, headingEnd: 94, title: "ARTICLE I" },
    ])
  })
})

describe("chunkText sections", () => {
  it("starts a chunk at every heading and records its title", () => {
    const text = [
      "CONFIDENTIALITY AGREEMENT",
      "This Agreement is made today.",
      "",
      "1. Definitions",
      "Terms have meanings.",
      "",
      "2. Obligations",
      "The Recipient shall keep secrets.",
    ].join("\n")

    const chunks = chunkText("c1", text, {
      maxTokens: 50,
      overlapTokens: 0,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.text)).toEqual([
      "CONFIDENTIALITY AGREEMENT\nThis Agreement is made today.",
      "1. Definitions\nTerms have meanings.",
      "2. Obligations\nThe Recipient shall keep secrets.",
    ])
    expect(chunks.map((c) => c.sectionTitle)).toEqual([
      "CONFIDENTIALITY AGREEMENT",
      "1. Definitions",
      "2. Obligations",
    ])
    expect(generateChunkMap(chunks, "c1").entries[2].sectionTitle).toBe("2. Obligations")
  })

  it("ends a sentence at the end of a heading line", () => {
    const text = "Intro text without a stop\nSection 2. Term\nThe term is one year."
    const chunks = chunkText("c1", text, {
      maxTokens: 5,
      overlapTokens: 0,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.text)).toEqual([
      "Intro text without a stop",
      "Section 2. Term",
      "The term is one year.",
    ])
    expect(chunks.map((c) => c.sectionTitle)).toEqual([
      null,
      "Section 2. Term",
      "Section 2. Term",
    ])
  })

  it("repeats overlap across a heading but starts new content at it", () => {
    const text = "Alpha beta gamma.\n1. Scope\nDelta epsilon."
    const chunks = chunkText("c1", text, {
      maxTokens: 3,
      overlapTokens: 1,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.text)).toEqual([
      "Alpha beta gamma.",
      "gamma.\n1. Scope",
      "Scope\nDelta epsilon.",
    ])
    expect(chunks.map((c) => c.overlapTokens)).toEqual([0, 1, 1])
    expect(text.slice(chunks[1].contentStartOffset, chunks[1].endOffset)).toBe("1. Scope")
    expect(chunks.map((c) => c.sectionTitle)).toEqual([null, "1. Scope", "1. Scope"])
  })

  it("puts a whereas preamble in a recitals section", () => {
    const text =
      "NON-DISCLOSURE AGREEMENT\nWHEREAS, the parties wish to talk; and\nWHEREAS, they agree.\nARTICLE I\nTerms apply."
    const chunks = chunkText("c1", text, {
      maxTokens: 50,
      overlapTokens: 0,
      countTokens: countWords,
    })

    expect(chunks.map((c) => c.sectionTitle)).toEqual([
      "NON-DISCLOSURE AGREEMENT",
      "Recitals",
      "ARTICLE I",
    ])
    expect(chunks[1].text).toBe(
      "WHEREAS, the parties wish to talk; and\nWHEREAS, they agree."
    )
  })
})

describe("chunkText token counting", () => {
  it("cuts a word longer than the budget into pieces that fit", () => {
    const word = "x".repeat(50)
    const chunks = chunkText("c1", word, {
      maxTokens: 20,
      overlapTokens: 0,
      countTokens: (text) => text.length,
    })

    expect(chunks.map((c) => c.text)).toEqual(["x".repeat(20), "x".repeat(20), "x".repeat(10)])
    expect(chunks.map((c) => c.startOffset)).toEqual([0, 20, 40])
  })

  it("measures overlap with the counter", () => {
    const text = "aaaa bb cc. dddd eeee."
    const chunks = chunkText("c1", text, {
      maxTokens: 14,
      overlapTokens: 5,
      countTokens: (t) => t.replace(/\s/g, "").length,
    })

    expect(chunks.map((c) => c.text)).toEqual(["aaaa bb cc.", "bb cc. dddd eeee."])
    expect(chunks[1].overlapTokens).toBe(5)
    expect(chunks[1].tokenCount).toBe(14)
  })

  describe("default counter", () => {
    const text = longContract()
    const options = { maxTokens: 30, overlapTokens: 6 }

    it("estimates from characters until the tokenizer loads", () => {
      expect(countVoyageTokensSync("abcdefghij")).toBe(3)
      expect(countVoyageTokensSync("")).toBe(0)

      for (const chunk of chunkText("c1", text, options)) {
        expect(chunk.tokenCount).toBe(countVoyageTokensSync(chunk.text))
        expect(chunk.tokenCount).toBeLessThanOrEqual(options.maxTokens)
      }
    })

    it("keeps every chunk within the embedding model's token count", async () => {
      await initVoyageTokenizer()
      const chunks = chunkText("c1", text, options)

      expect(chunks.length).toBeGreaterThan(1)
      for (const chunk of chunks) {
        const exact = await countVoyageTokens(chunk.text)
        expect(chunk.tokenCount).toBe(exact)
        expect(exact).toBeLessThanOrEqual(options.maxTokens)
        expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset))
      }
    })
  })
})
