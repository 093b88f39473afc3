import { describe, it, expect, vi } from "vitest"
import { ContractQaService } from "./contract-qa"
import type { Answerer } from "@/lib/ai/answerer"
import { ConfigError, ValidationError } from "@/lib/errors"
import { countWords } from "@/lib/document-chunking"
import type { TextExtractor } from "@/lib/text-extraction"
import { MemoryVectorIndex } from "@/lib/vector-index"
import { createFakeGateway } from "@/test/fakes"

vi.mock("@/lib/logger", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}))

const FIRST = "Alpha beta gamma."
const SECOND = "Delta epsilon zeta."
const QUESTION = "Which letters come first?"

const config = { chunkMaxTokens: 3, chunkOverlapTokens: 0, candidateK: 5 }

function setup() {
  const { gateway } = createFakeGateway(3, {
    [FIRST]: [1, 0, 0],
    [SECOND]: [0, 1, 0],
    [QUESTION]: [0.9, 0.1, 0],
  })
  const chunkIndex = new MemoryVectorIndex(3)
  const answer = vi.fn(async (_question: string, context: readonly unknown[]) =>
    `answered from ${context.length} passages`
  )
  const answerer: Answerer = { answer }
  const extractText = vi.fn(async () => FIRST)
  const extractor: TextExtractor = { extractText }
  const service = new ContractQaService(
    { gateway, chunkIndex, answerer, extractor, countTokens: countWords },
    config
  )
  return { service, chunkIndex, answer, extractText }
}

describe("ContractQaService", () => {
  describe("indexContract", () => {
    it("indexes one entry per chunk", async () => {
      const { service, chunkIndex } = setup()

      const indexed = await service.indexContract("contract-1", `${FIRST} ${SECOND}`)

      expect(indexed.chunkMap.totalChunks).toBe(2)
      expect(indexed.chunkMap.entries.map((e) => e.chunkId)).toEqual([
        "contract-1:chunk-0",
        "contract-1:chunk-1",
      ])
      expect(indexed.checklist.presentCount).toBe(0)
      expect(await chunkIndex.size()).toBe(2)
    })

    it("removes chunks a shorter version no longer has", async () => {
      const { service, chunkIndex } = setup()
      await service.indexContract("contract-1", `${FIRST} ${SECOND}`)

      await service.indexContract("contract-1", FIRST)

      expect(await chunkIndex.size()).toBe(1)
      const hits = await chunkIndex.query([0, 1, 0], 5, { contractId: "contract-1" })
      expect(hits.map((hit) => hit.id)).toEqual(["contract-1:chunk-0"])
    })

    it("rejects a contract without text", async () => {
      const { service } = setup()

      await expect(service.indexContract("contract-1", " \n ")).rejects.toThrow(
        ValidationError
      )
    })
  })

  describe("ingestDocument", () => {
    it("extracts text before indexing", async () => {
      const { service, extractText } = setup()
      const bytes = new TextEncoder().encode("scanned")

      const indexed = await service.ingestDocument("contract-1", bytes, "deu")

      expect(extractText).toHaveBeenCalledWith(bytes, "deu")
      expect(indexed.chunkMap.entries[0].preview).toBe(FIRST)
    })
  })

  describe("ask", () => {
    it("answers from the closest chunks of the contract", async () => {
      const { service, answer } = setup()
      await service.indexContract("contract-1", `${FIRST} ${SECOND}`)

      const result = await service.ask("contract-1", `  ${QUESTION} `, 1)

      expect(result.question).toBe(QUESTION)
      expect(result.answer).toBe("answered from 1 passages")
      expect(result.context).toHaveLength(1)
      expect(result.context[0].chunkId).toBe("contract-1:chunk-0")
      expect(result.context[0].text).toBe(FIRST)
      expect(result.context[0].score).toBeCloseTo(0.9 / Math.sqrt(0.82), 6)
      expect(answer).toHaveBeenCalledWith(QUESTION, result.context)
    })

    it("retrieves only chunks of the asked contract", async () => {
      const { service } = setup()
      await service.indexContract("contract-1", `${FIRST} ${SECOND}`)
      await service.indexContract("contract-2", "Omega only here.")

      const result = await service.ask("contract-1", QUESTION)

      expect(result.context.map((c) => c.chunkId)).toEqual([
        "contract-1:chunk-0",
        "contract-1:chunk-1",
      ])
    })

    it("passes the section heading of each passage to the answerer", async () => {
      const { service } = setup()
      await service.indexContract("contract-1", `1. Scope\n${FIRST}`)

      const result = await service.ask("contract-1", QUESTION, 2)

      const passage = result.context.find((c) => c.chunkId === "contract-1:chunk-1")
      expect(passage).toMatchObject({ text: FIRST, sectionTitle: "1. Scope" })
    })

    it("validates the question and k", async () => {
      const { service } = setup()

      await expect(service.ask("contract-1", "   ")).rejects.toThrow("Question is required")
      await expect(service.ask("contract-1", QUESTION, 0)).rejects.toThrow(ValidationError)
    })
  })

  it("refuses a chunk index of another dimension", () => {
    const { gateway } = createFakeGateway(3)
    const answerer: Answerer = { answer: async () => "" }
    const extractor: TextExtractor = { extractText: async () => "" }

    expect(
      () =>
        new ContractQaService(
          { gateway, chunkIndex: new MemoryVectorIndex(2), answerer, extractor },
          config
        )
    ).toThrow(ConfigError)
  })
})
