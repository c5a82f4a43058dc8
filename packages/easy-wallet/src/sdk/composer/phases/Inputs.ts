/**
 * Inputs Phase - sources to spendable UTxOs
 *
 * Addresses and wallets are expanded to whatever the chain context reports for
 * them; raw UTxOs pass through. Duplicates (by out-ref) are dropped, first seen wins.
 *
 * @since 1.0.0
 */

import { Data, Effect } from "effect"

import type { ChainContext, ProviderError } from "../../provider/ChainContext.js"
import * as UTxO from "../../UTxO.js"
import type { Source } from "../Source.js"

/**
 * @since 1.0.0
 * @category errors
 */
export class EmptyInputSetError extends Data.TaggedError("EmptyInputSet")<{
  readonly message: string
}> {}

const utxosOf = (source: Source, context: ChainContext): Effect.Effect<Array<UTxO.UTxO>, ProviderError> => {
  switch (source._tag) {
    case "RawUtxo":
      return Effect.succeed([source.utxo])
    case "RawAddress":
      return context.Effect.getUtxos(source.address.bech32)
    case "SigningWallet":
      return context.Effect.getUtxos(source.wallet.address.bech32)
  }
}

/**
 * @since 1.0.0
 * @category phases
 */
export const resolveInputs = (
  sources: ReadonlyArray<Source>,
  context: ChainContext
): Effect.Effect<Array<UTxO.UTxO>, EmptyInputSetError | ProviderError> =>
  Effect.gen(function* () {
    const resolved = yield* Effect.forEach(sources, (source) => utxosOf(source, context))
    const inputs = UTxO.dedupe(resolved.flat())
    if (inputs.length === 0) {
      return yield* new EmptyInputSetError({
        message: `No UTxOs found in ${sources.length} input source(s)`
      })
    }
    yield* Effect.logDebug(`Resolved ${inputs.length} input UTxOs holding ${UTxO.totalLovelace(inputs)} lovelace`)
    return inputs
  })
