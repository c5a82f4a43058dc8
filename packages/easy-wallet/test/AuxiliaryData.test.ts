import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import * as AuxiliaryData from "../src/sdk/composer/phases/AuxiliaryData.js"
import type { MintMetadata } from "../src/sdk/composer/phases/MintLedger.js"
import { hash } from "./utils/fixtures.js"

const noMintMetadata: MintMetadata = new Map()

describe("AuxiliaryData", () => {
  it.effect("is undefined without any source", () =>
    Effect.gen(function* () {
      expect(yield* AuxiliaryData.assemble({ mintMetadata: noMintMetadata })).toBeUndefined()
      expect(yield* AuxiliaryData.assemble({ mintMetadata: noMintMetadata, message: "", metadata: {} })).toBeUndefined()
    })
  )

  it.effect("puts mint metadata under 721", () =>
    Effect.gen(function* () {
      const mintMetadata: MintMetadata = new Map([[hash("aa"), new Map([["abc", { name: "Pixel" }]])]])
      const document = yield* AuxiliaryData.assemble({ mintMetadata })
      expect(document).toEqual(new Map([[721, new Map([[hash("aa"), new Map([["abc", { name: "Pixel" }]])]])]]))
    })
  )

  it.effect("puts the message under 674", () =>
    Effect.gen(function* () {
      const document = yield* AuxiliaryData.assemble({ mintMetadata: noMintMetadata, message: "b".repeat(70) })
      expect(document?.get(674)).toEqual({ msg: ["b".repeat(64), "b".repeat(6)] })
    })
  )

  it.effect("merges caller labels over reserved ones", () =>
    Effect.gen(function* () {
      const document = yield* AuxiliaryData.assemble({
        mintMetadata: noMintMetadata,
        message: "hello",
        metadata: { "1337": { app: "demo" }, "674": { msg: ["custom"] } }
      })
      expect(document).toEqual(
        new Map<number, unknown>([
          [674, { msg: ["custom"] }],
          [1337, { app: "demo" }]
        ])
      )
    })
  )

  it.effect("rejects labels that are not non-negative integers", () =>
    Effect.gen(function* () {
      for (const label of ["abc", "-1", "1.5"]) {
        const error = yield* Effect.flip(
          AuxiliaryData.assemble({ mintMetadata: noMintMetadata, metadata: { [label]: "x" } })
        )
        expect(error.message).toBe(`Metadata label must be a non-negative integer, got ${label}`)
      }
    })
  )

  it.effect("validates caller metadata", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        AuxiliaryData.assemble({ mintMetadata: noMintMetadata, metadata: { "1": { note: "n".repeat(65) } } })
      )
      expect(error._tag).toBe("MetadataFieldTooLong")
    })
  )
})
