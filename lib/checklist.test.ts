import { describe, it, expect } from "vitest"
import { buildChecklist } from "./checklist"

describe("buildChecklist", () => {
  it("reports each clause family found in the text", () => {
    const checklist = buildChecklist(
      "The Recipient shall hold all Confidential Information in trust. " +
        "Either party may terminate this Agreement on notice. " +
        "Payment is due within 30 days."
    )

    expect(checklist.items).toEqual([
      { key: "confidentiality", label: "Confidentiality clause", present: true },
      { key: "liability", label: "Liability clause", present: false },
      { key: "payment", label: "Payment terms", present: true },
      { key: "intellectualProperty", label: "Intellectual property", present: false },
      { key: "termination", label: "Termination clause", present: true },
    ])
    expect(checklist.presentCount).toBe(3)
  })

  it("matches across line breaks and case", () => {
    const checklist = buildChecklist("All INTELLECTUAL\nPROPERTY remains with the Discloser.")

    expect(checklist.items.find((item) => item.key === "intellectualProperty")?.present).toBe(
      true
    )
  })

  it("ignores words that only contain a keyword", () => {
    const checklist = buildChecklist("Prepayments and nonconfidentiality are not clauses.")

    expect(checklist.presentCount).toBe(0)
  })
})
