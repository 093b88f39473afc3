/**
 * @fileoverview Plain text extractor
 *
 * Decodes UTF-8 text documents. Bytes that are not valid UTF-8 (a scanned
 * image, a PDF) are rejected so the caller can route them to OCR.
 *
 * @module lib/text-extraction/plain-text
 */

import { OcrError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import type { TextExtractor } from "./types"

export class PlainTextExtractor implements TextExtractor {
  private readonly decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false })

  async extractText(bytes: Uint8Array, language: string): Promise<string> {
    let decoded: string
    try {
      decoded = this.decoder.decode(bytes)
    } catch (error) {
      throw new OcrError("Document is not valid UTF-8 text", { cause: error })
    }

    // CRLF and lone CR become LF so chunk offsets are stable across platforms
    const text = decoded.normalize("NFC").replace(/\r\n?/g, "\n")
    if (text.trim().length === 0) {
      throw new OcrError("Document contains no text")
    }

    logger.info("Text extracted", {
      language,
      bytes: bytes.byteLength,
      charCount: text.length,
    })
    return text
  }
}
