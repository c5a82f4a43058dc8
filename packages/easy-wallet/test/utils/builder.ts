import { Effect } from "effect"

import type { TransactionRequest } from "../../src/sdk/builders/TransactionBuilder.js"
import * as TransactionBuilder from "../../src/sdk/builders/TransactionBuilder.js"

export const BUILT_HASH = "ef".repeat(32)

export interface FakeBuilder {
  readonly builder: TransactionBuilder.TransactionBuilder
  readonly requests: Array<TransactionRequest>
  /** Key hashes handed to each `buildAndSign` call. */
  readonly signatures: Array<ReadonlyArray<string>>
}

/**
 * Records every request; `fail` makes both operations fail after recording.
 */
export const makeFakeBuilder = (options: { readonly fail?: boolean } = {}): FakeBuilder => {
  const requests: Array<TransactionRequest> = []
  const signatures: Array<ReadonlyArray<string>> = []

  const record = (request: TransactionRequest) =>
    Effect.suspend(() => {
      requests.push(request)
      return options.fail
        ? Effect.fail(new TransactionBuilder.TransactionBuilderError({ message: "Insufficient funds" }))
        : Effect.void
    })

  const builder = TransactionBuilder.make({
    build: (request) => record(request).pipe(Effect.as({ txHash: BUILT_HASH, bodyCborHex: "a0", fee: 170_000n })),
    buildAndSign: (request, keys) =>
      record(request).pipe(
        Effect.tap(() => {
          signatures.push(keys.map((key) => key.keyHash))
        }),
        Effect.as({ txHash: BUILT_HASH, cborHex: `84a0${BUILT_HASH}` })
      )
  })

  return { builder, requests, signatures }
}
