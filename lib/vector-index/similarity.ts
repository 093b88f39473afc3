/**
 * @fileoverview Vector math shared by index implementations.
 *
 * @module lib/vector-index/similarity
 */

import { ConfigError, DataError } from "@/lib/errors"
import type { MetadataFilter, VectorHit, VectorMetadata } from "./types"

/**
 * Throw `ConfigError` unless `vector` has exactly `dimensions` entries.
 */
export function assertDimensions(vector: readonly number[], dimensions: number): void {
  if (vector.length !== dimensions) {
    throw new ConfigError(
      `Vector dimension mismatch: got ${vector.length}, index expects ${dimensions}`
    )
  }
}

/**
 * Euclidean norm.
 */
export function norm(vector: readonly number[]): number {
  let sum = 0
  for (const value of vector) sum += value * value
  return Math.sqrt(sum)
}

/**
 * Scale to unit length.
 *
 * @throws {DataError} for zero-norm or non-finite vectors
 */
export function normalize(vector: readonly number[]): number[] {
  const length = norm(vector)
  if (!Number.isFinite(length)) {
    throw new DataError("Vector contains non-finite values")
  }
  if (length === 0) {
    throw new DataError("Zero-norm vector has no direction")
  }
  return vector.map((value) => value / length)
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i]
  return sum
}

/**
 * Cosine similarity, clamped to [-1, 1] against rounding.
 *
 * @throws {DataError} if either vector has zero norm
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  return clampScore(dot(normalize(a), normalize(b)))
}

export function clampScore(score: number): number {
  return Math.max(-1, Math.min(1, score))
}

export function matchesFilter(
  metadata: VectorMetadata,
  filter: MetadataFilter | undefined
): boolean {
  if (!filter) return true
  return Object.entries(filter).every(([key, value]) => metadata[key] === value)
}

/**
 * Ranking order: descending score, then ascending id (ordinal).
 */
export function compareHits(a: VectorHit, b: VectorHit): number {
  if (a.score !== b.score) return b.score - a.score
  if (a.id === b.id) return 0
  return a.id < b.id ? -1 : 1
}
