import { createHash } from "crypto"

/**
 * SHA-256 hex digest of text content.
 *
 * Used as the staleness fingerprint for clause embeddings and as part of
 * embedding cache keys. No normalization: any change to the text, including
 * whitespace, produces a new hash.
 */
export function hashText(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex")
}
