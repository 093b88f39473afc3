/**
 * @fileoverview Text extraction contract
 * @module lib/text-extraction/types
 */

/**
 * Turns document bytes into plain text.
 *
 * Implementations reject with `OcrError` when no usable text comes out.
 */
export interface TextExtractor {
  /**
   * @param language - Language hint for recognition, e.g. "eng"
   */
  extractText(bytes: Uint8Array, language: string): Promise<string>
}
