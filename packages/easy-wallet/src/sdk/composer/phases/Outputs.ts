/**
 * Outputs Phase - logical outputs to builder-ready records
 *
 * Tokens are merged by (policy, name) within each output. An amount of zero is
 * replaced with the minimum value of a record carrying that output's bundle; any
 * other amount passes through, even below the minimum.
 *
 * @since 1.0.0
 */

import { Effect } from "effect"

import * as Address from "../../Address.js"
import * as Amount from "../../Amount.js"
import type { TransactionOutput } from "../../builders/TransactionBuilder.js"
import * as MultiAsset from "../../MultiAsset.js"
import type { ChainContext, ProviderError } from "../../provider/ChainContext.js"
import type { Token } from "../../Token.js"
import type { WalletHandle } from "../Source.js"
import { isWallet } from "../Source.js"

/**
 * A transaction destination. A bare number amount is lovelace; a missing or zero
 * amount means "the minimum for this output".
 *
 * @since 1.0.0
 * @category model
 */
export interface Output {
  readonly address: WalletHandle | Address.Address | string
  readonly amount?: Amount.AmountLike
  readonly tokens?: ReadonlyArray<Token>
}

const lovelaceOf = (amount: Amount.AmountLike): Effect.Effect<bigint, Amount.TypeMismatchError> =>
  Effect.try({
    try: () => Amount.fromAmountLike(amount).lovelace,
    catch: (cause) =>
      cause instanceof Amount.TypeMismatchError
        ? cause
        : new Amount.TypeMismatchError({ message: `Invalid output amount: ${String(amount)}`, operand: amount })
  })

/**
 * The output's own bundle: token quantities summed per (policy, name), non-positive
 * totals dropped.
 *
 * @since 1.0.0
 * @category phases
 */
export const bundle = (tokens: ReadonlyArray<Token>): MultiAsset.MultiAsset => {
  const assets = MultiAsset.empty()
  for (const token of tokens) {
    MultiAsset.add(assets, token.policy.policyId, token.hexName, token.amount)
  }
  return MultiAsset.filter(assets, (quantity) => quantity > 0n)
}

/**
 * @since 1.0.0
 * @category phases
 */
export const formatOne = (
  output: Output,
  context: ChainContext
): Effect.Effect<TransactionOutput, Address.AddressError | Amount.TypeMismatchError | ProviderError> =>
  Effect.gen(function* () {
    const address = isWallet(output.address) ? output.address.address : yield* Address.resolve(output.address)
    const assets = bundle(output.tokens ?? [])
    const requested = yield* lovelaceOf(output.amount ?? 0n)
    if (requested !== 0n) {
      return { address, lovelace: requested, assets }
    }
    const lovelace = yield* context.Effect.minimumValue({ address, assets })
    yield* Effect.logDebug(`Output to ${address.bech32} set to its minimum value of ${lovelace} lovelace`)
    return { address, lovelace, assets }
  })

/**
 * @since 1.0.0
 * @category phases
 */
export const format = (
  outputs: ReadonlyArray<Output>,
  context: ChainContext
): Effect.Effect<Array<TransactionOutput>, Address.AddressError | Amount.TypeMismatchError | ProviderError> =>
  Effect.forEach(outputs, (output) => formatOne(output, context))
