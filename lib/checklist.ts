/**
 * @fileoverview Keyword checklist
 *
 * Quick rule-based scan for the clause families most contracts should
 * mention. Complements clause validation; it does not use embeddings.
 *
 * @module lib/checklist
 */

export const CHECKLIST_ITEMS = [
  { key: "confidentiality", label: "Confidentiality clause", pattern: /\bconfidential(?:ity)?\b/i },
  { key: "liability", label: "Liability clause", pattern: /\bliabilit(?:y|ies)\b/i },
  { key: "payment", label: "Payment terms", pattern: /\bpayments?\b/i },
  {
    key: "intellectualProperty",
    label: "Intellectual property",
    pattern: /\bintellectual\s+property\b/i,
  },
  { key: "termination", label: "Termination clause", pattern: /\bterminat(?:e|es|ed|ion)\b/i },
] as const

export type ChecklistKey = (typeof CHECKLIST_ITEMS)[number]["key"]

export interface ChecklistItem {
  key: ChecklistKey
  label: string
  present: boolean
}

export interface Checklist {
  items: ChecklistItem[]
  presentCount: number
}

export function buildChecklist(text: string): Checklist {
  const items = CHECKLIST_ITEMS.map(({ key, label, pattern }) => ({
    key,
    label,
    present: pattern.test(text),
  }))
  return {
    items,
    presentCount: items.filter((item) => item.present).length,
  }
}
