import { describe, it, expect } from "vitest"
import { Ok, Err, tryCatchWith, partition } from "./result"

describe("Result Type", () => {
  describe("constructors", () => {
    it("builds success and failure results", () => {
      const error = new Error("stale")
      expect(Ok(2)).toEqual({ ok: true, value: 2 })
      expect(Err(error)).toEqual({ ok: false, error })
    })
  })

  describe("tryCatchWith", () => {
    it("wraps resolved values", async () => {
      const result = await tryCatchWith(async () => 7, () => "mapped")
      expect(result).toEqual({ ok: true, value: 7 })
    })

    it("maps thrown errors", async () => {
      const result = await tryCatchWith(
        async () => {
          throw new Error("timeout")
        },
        (e) => (e instanceof Error ? e.message.toUpperCase() : "unknown")
      )
      expect(result).toEqual({ ok: false, error: "TIMEOUT" })
    })
  })

  describe("partition", () => {
    it("splits values and errors in order", () => {
      const { values, errors } = partition<number, string>([
        Ok(1),
        Err("a"),
        Ok(2),
        Err("b"),
      ])
      expect(values).toEqual([1, 2])
      expect(errors).toEqual(["a", "b"])
    })
  })
})
