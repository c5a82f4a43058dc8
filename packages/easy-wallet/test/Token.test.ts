import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import * as Token from "../src/sdk/Token.js"
import * as TokenPolicy from "../src/sdk/TokenPolicy.js"
import { hash } from "./utils/fixtures.js"

const policy = TokenPolicy.fromPolicyId("pixels", hash("a0"))

describe("Token", () => {
  it.effect("derives the hex name from the name", () =>
    Effect.gen(function* () {
      const token = yield* Token.make({ policy, amount: 5, name: "abc" })
      expect(token.amount).toBe(5n)
      expect(token.name).toBe("abc")
      expect(token.hexName).toBe("616263")
      expect(token.metadata).toBeUndefined()
    })
  )

  it.effect("prefers the hex name when both are given", () =>
    Effect.gen(function* () {
      const token = yield* Token.make({ policy, amount: -1n, name: "zzz", hexName: "616263" })
      expect(token.name).toBe("abc")
      expect(token.hexName).toBe("616263")
      expect(Token.isMint(token)).toBe(false)
    })
  )

  it.effect("rejects fractional amounts", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Token.make({ policy, amount: 1.5, name: "abc" }))
      expect(error.message).toBe("Token amount must be a whole number, got 1.5")
    })
  )

  it.effect("limits asset names to 32 bytes", () =>
    Effect.gen(function* () {
      const longest = yield* Token.make({ policy, amount: 1, name: "x".repeat(32) })
      expect(longest.hexName).toHaveLength(64)

      const error = yield* Effect.flip(Token.make({ policy, amount: 1, name: "x".repeat(33) }))
      expect(error._tag).toBe("TokenError")
    })
  )

  it.effect("rejects invalid hex names", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Token.make({ policy, amount: 1, hexName: "zz" }))
      expect(error.message).toBe("Asset name is not valid hex: zz")
    })
  )

  it.effect("validates metadata with the shared validator", () =>
    Effect.gen(function* () {
      const token = yield* Token.make({ policy, amount: 1, name: "abc", metadata: { name: "Pixel #1", tags: ["a"] } })
      expect(token.metadata).toEqual({ name: "Pixel #1", tags: ["a"] })

      const error = yield* Effect.flip(Token.make({ policy, amount: 1, name: "abc", metadata: { visible: true } }))
      expect(error._tag).toBe("MetadataNotSerializable")
    })
  )

  it("throws from the synchronous constructor", () => {
    expect(() => Token.makeUnsafe({ policy, amount: 0.5 })).toThrow(Token.TokenError)
    expect(Token.withAmount(Token.makeUnsafe({ policy, amount: 3 }), -3n).amount).toBe(-3n)
  })
})
