/**
 * @fileoverview Voyage AI Embedding Provider
 *
 * HTTP provider for Voyage AI's legal embedding models (voyage-law-2 by
 * default). Caching, batching and retries are the gateway's job; this
 * class performs one API call per `embed`.
 *
 * @module lib/embeddings/voyage
 */

import { z } from "zod"
import { ConfigError, EmbeddingFailedError, UpstreamError } from "@/lib/errors"
import type { EmbedCallOptions, EmbeddingProvider } from "./types"

export const VOYAGE_DEFAULTS = {
  model: "voyage-law-2",
  baseUrl: "https://api.voyageai.com/v1",
} as const

/**
 * Input type for embedding generation.
 */
export type VoyageInputType = "document" | "query"

/**
 * Voyage AI API response schema.
 */
const voyageResponseSchema = z.object({
  object: z.literal("list"),
  data: z.array(
    z.object({
      object: z.literal("embedding"),
      index: z.number(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string(),
  usage: z.object({
    total_tokens: z.number(),
  }),
})

export interface VoyageProviderOptions {
  apiKey: string
  model?: string
  baseUrl?: string
  inputType?: VoyageInputType
}

export class VoyageEmbeddingProvider implements EmbeddingProvider {
  readonly model: string
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly inputType: VoyageInputType

  constructor(options: VoyageProviderOptions) {
    if (!options.apiKey) {
      throw new ConfigError("VOYAGE_API_KEY is required")
    }
    this.apiKey = options.apiKey
    this.model = options.model ?? VOYAGE_DEFAULTS.model
    this.baseUrl = options.baseUrl ?? VOYAGE_DEFAULTS.baseUrl
    this.inputType = options.inputType ?? "document"
  }

  async embed(texts: string[], { signal }: EmbedCallOptions): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
        input_type: this.inputType,
      }),
      signal,
    })

    if (!response.ok) {
      const body = await response.text()
      const message = `Voyage AI API error (${response.status}): ${body}`
      // Rate limits and server errors are transient; other 4xx are not
      if (response.status === 429 || response.status >= 500) {
        throw new UpstreamError("embedding", message)
      }
      throw new EmbeddingFailedError(message, { retriable: false })
    }

    const parsed = voyageResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new EmbeddingFailedError("Voyage AI returned an unexpected response", {
        cause: parsed.error,
        retriable: false,
      })
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding)
  }
}
