/**
 * @fileoverview Clause records and their validation schemas.
 *
 * @module lib/clause-library/schema
 */

import { z } from "zod"
import { hashText } from "@/lib/content-hash"

/** Category marking clauses whose presence in a contract is a conflict */
export const PROHIBITED_CATEGORY = "prohibited"

export const clauseSchema = z.object({
  clauseId: z.string().min(1),
  title: z.string().min(1),
  text: z.string().min(1),
  category: z.string().min(1),
  version: z.number().int().positive(),
  description: z.string().nullable(),
  tags: z.array(z.string()),
  embedding: z.array(z.number()).nullable(),
  /** SHA-256 of the text `embedding` was computed from */
  embeddingTextHash: z.string().nullable(),
  embeddingModel: z.string().nullable(),
  createdAt: z.date(),
  updatedAt: z.date(),
})

export type Clause = z.infer<typeof clauseSchema>

const clauseFields = {
  title: z.string().trim().min(1, "title is required"),
  text: z.string().trim().min(1, "text is required"),
  category: z.string().trim().toLowerCase().min(1, "category is required"),
  description: z.string().trim().nullable(),
  tags: z.array(z.string().trim().min(1)),
}

/**
 * Caller-supplied fields for a new clause.
 */
export const clauseInputSchema = z.object({
  clauseId: z
    .string()
    .trim()
    .min(1, "clauseId is required")
    .max(200)
    .regex(/^[\w.:-]+$/, "clauseId may only contain letters, digits, _ . : -"),
  ...clauseFields,
  description: clauseFields.description.optional(),
  tags: clauseFields.tags.default([]),
})

export type ClauseInput = z.input<typeof clauseInputSchema>

/**
 * Partial update; at least one field must be present.
 */
export const clauseUpdateSchema = z
  .object(clauseFields)
  .partial()
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: "At least one field must be updated",
  })

export type ClauseUpdate = z.input<typeof clauseUpdateSchema>

/**
 * Clause library file accepted by the operator script.
 */
export const clauseLibraryFileSchema = z.object({
  clauses: z.array(clauseInputSchema),
})

/**
 * True when the clause carries an embedding computed from its current text
 * (and, when given, by `modelVersion`). Anything else must not be matched.
 */
export function isEmbeddingFresh(clause: Clause, modelVersion?: string): boolean {
  if (clause.embedding === null || clause.embeddingTextHash === null) {
    return false
  }
  if (modelVersion !== undefined && clause.embeddingModel !== modelVersion) {
    return false
  }
  return clause.embeddingTextHash === hashText(clause.text)
}

export function isProhibited(clause: Pick<Clause, "category">): boolean {
  return clause.category === PROHIBITED_CATEGORY
}
