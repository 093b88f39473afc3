// test/fakes.ts
// In-process stand-ins for the embedding provider

import { vi } from "vitest"
import type { EmbeddingProvider } from "@/lib/embeddings"
import { EmbeddingGateway } from "@/lib/embeddings"

/**
 * Deterministic non-zero vector derived from the text.
 */
export function derivedVector(text: string, dimensions: number): number[] {
  let seed = 0
  for (const char of text) seed = (seed * 31 + char.charCodeAt(0)) % 9973
  return Array.from({ length: dimensions }, (_, i) => ((seed + i * 17) % 11) + 1)
}

/**
 * Provider that returns vectors from `table` when the text is listed there
 * and a derived vector otherwise.
 */
export function createFakeProvider(
  dimensions: number,
  table: Record<string, number[]> = {},
  model = "fake-embedder"
) {
  const embed = vi.fn(async (texts: string[]) =>
    texts.map((text) => table[text] ?? derivedVector(text, dimensions))
  )
  const provider: EmbeddingProvider = { model, embed }
  return { provider, embed }
}

/**
 * Gateway over a fake provider with immediate retries.
 */
export function createFakeGateway(
  dimensions: number,
  table: Record<string, number[]> = {},
  model = "fake-embedder"
) {
  const { provider, embed } = createFakeProvider(dimensions, table, model)
  const gateway = new EmbeddingGateway(provider, {
    dimensions,
    maxBatchSize: 16,
    timeoutMs: 1000,
    maxAttempts: 2,
    baseDelayMs: 0,
  })
  return { gateway, provider, embed }
}
