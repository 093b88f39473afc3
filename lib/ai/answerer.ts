/**
 * @fileoverview Contract question answering
 *
 * `Answerer` turns a question plus retrieved contract passages into a
 * free-form answer. `AiSdkAnswerer` calls the model gateway through the AI
 * SDK; a question with no passages is answered without a model call.
 *
 * @module lib/ai/answerer
 */

import { generateText, type LanguageModel } from "ai"
import { UpstreamError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { GENERATION_CONFIG, getTaskModel } from "./config"

export interface ContextChunk {
  chunkId: string
  text: string
  score: number
  /** Heading of the section the passage comes from */
  sectionTitle?: string
}

export interface Answerer {
  answer(question: string, contextChunks: readonly ContextChunk[]): Promise<string>
}

export const NO_CONTEXT_ANSWER =
  "The contract does not contain passages relevant to this question."

export const QA_SYSTEM_PROMPT = `You answer questions about a single contract.
Use only the numbered passages provided. Cite passages as [1], [2].
If the passages do not answer the question, say so.`

export function buildQaPrompt(question: string, contextChunks: readonly ContextChunk[]): string {
  const passages = contextChunks
    .map((chunk, i) =>
      chunk.sectionTitle
        ? `[${i + 1}] (${chunk.sectionTitle}) ${chunk.text}`
        : `[${i + 1}] ${chunk.text}`
    )
    .join("\n\n")
  return `Passages:\n\n${passages}\n\nQuestion: ${question}`
}

export class AiSdkAnswerer implements Answerer {
  private readonly model: LanguageModel

  constructor(options: { model?: LanguageModel } = {}) {
    this.model = options.model ?? getTaskModel("contractQa")
  }

  async answer(question: string, contextChunks: readonly ContextChunk[]): Promise<string> {
    if (contextChunks.length === 0) {
      return NO_CONTEXT_ANSWER
    }

    try {
      const result = await generateText({
        model: this.model,
        system: QA_SYSTEM_PROMPT,
        prompt: buildQaPrompt(question, contextChunks),
        ...GENERATION_CONFIG,
      })

      logger.info("Question answered", {
        passages: contextChunks.length,
        inputTokens: result.usage.inputTokens,
        outputTokens: result.usage.outputTokens,
      })
      return result.text.trim()
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new UpstreamError("llm", `Answer generation failed: ${reason}`, { cause: error })
    }
  }
}
