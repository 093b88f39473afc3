import { describe, it, expect } from "vitest"
import { loadConfig, parseConfig } from "./config"
import { ConfigError } from "./errors"

describe("Validation configuration", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({})
    expect(config.matchThreshold).toBe(0.85)
    expect(config.borderlineThreshold).toBe(0.7)
    expect(config.candidateK).toBe(5)
    expect(config.chunkMaxTokens).toBe(200)
    expect(config.chunkOverlapTokens).toBe(20)
    expect(config.embeddingModel).toBe("voyage-law-2")
    expect(config.embeddingDimensions).toBe(1024)
    expect(config.embeddingBatchSize).toBe(128)
    expect(config.voyageApiKey).toBeUndefined()
  })

  it("reads and coerces environment variables", () => {
    const config = loadConfig({
      MATCH_THRESHOLD: "0.9",
      BORDERLINE_THRESHOLD: "0.6",
      CANDIDATE_K: "3",
      EMBEDDING_DIMENSIONS: "384",
      VOYAGE_API_KEY: "test-key",
    })
    expect(config.matchThreshold).toBe(0.9)
    expect(config.borderlineThreshold).toBe(0.6)
    expect(config.candidateK).toBe(3)
    expect(config.embeddingDimensions).toBe(384)
    expect(config.voyageApiKey).toBe("test-key")
  })

  it("treats blank values as unset", () => {
    const config = loadConfig({ MATCH_THRESHOLD: "  ", VOYAGE_API_KEY: "" })
    expect(config.matchThreshold).toBe(0.85)
    expect(config.voyageApiKey).toBeUndefined()
  })

  it("rejects a match threshold that does not exceed the borderline threshold", () => {
    expect(() =>
      loadConfig({ MATCH_THRESHOLD: "0.7", BORDERLINE_THRESHOLD: "0.7" })
    ).toThrow(ConfigError)

    try {
      parseConfig({ matchThreshold: 0.5, borderlineThreshold: 0.8 })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (error instanceof ConfigError) {
        expect(error.details).toEqual([
          {
            field: "matchThreshold",
            message: "matchThreshold must be greater than borderlineThreshold",
          },
        ])
      }
    }
  })

  it("rejects overlap that is not smaller than the chunk size", () => {
    expect(() =>
      parseConfig({ chunkMaxTokens: 10, chunkOverlapTokens: 10 })
    ).toThrow("Invalid configuration")
  })

  it("rejects non-numeric dimensions", () => {
    expect(() => loadConfig({ EMBEDDING_DIMENSIONS: "many" })).toThrow(ConfigError)
  })
})
