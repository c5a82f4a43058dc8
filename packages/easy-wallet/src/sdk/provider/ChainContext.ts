import type { Effect } from "effect"
import { Data } from "effect"

import { runEffect } from "../../utils/effect-runtime.js"
import type * as Address from "../Address.js"
import type * as MultiAsset from "../MultiAsset.js"
import type { EffectToPromiseAPI } from "../Type.js"
import type { UTxO } from "../UTxO.js"

// Base chain context error
export class ProviderError extends Data.TaggedError("ProviderError")<{
  readonly cause: unknown
  readonly message: string
}> {}

/**
 * No chain context was given, none is attached to the wallet and none is
 * configured in the environment.
 *
 * @since 1.0.0
 * @category errors
 */
export class ChainContextMissingError extends Data.TaggedError("ChainContextMissing")<{
  readonly message: string
}> {}

/**
 * What a stake address looks like on chain. `undefined` from
 * {@link ChainContextEffect.getStakeInfo} means the address was never registered.
 *
 * @since 1.0.0
 * @category model
 */
export interface StakeInfo {
  readonly stakeAddress: string
  readonly active: boolean
  readonly poolId: string | null
  readonly withdrawable: bigint
  readonly controlled: bigint
}

/**
 * @since 1.0.0
 * @category model
 */
export type RewardBalance =
  | { readonly _tag: "Registered"; readonly withdrawable: bigint }
  | { readonly _tag: "Unregistered" }

/**
 * An output as far as the minimum-value rule is concerned.
 *
 * @since 1.0.0
 * @category model
 */
export interface OutputTemplate {
  readonly address: Address.Address
  readonly assets: MultiAsset.MultiAsset
}

/**
 * Effect-based chain context (the source of truth).
 *
 * `getRewardBalance` and `getStakeInfo` are optional capabilities: contexts that
 * cannot report stake accounts leave them out.
 *
 * @since 1.0.0
 * @category interfaces
 */
export interface ChainContextEffect {
  readonly getUtxos: (address: string) => Effect.Effect<Array<UTxO>, ProviderError>
  readonly minimumValue: (output: OutputTemplate) => Effect.Effect<bigint, ProviderError>
  readonly submitTx: (cborHex: string) => Effect.Effect<string, ProviderError>
  readonly isTxConfirmed: (txHash: string) => Effect.Effect<boolean, ProviderError>
  readonly currentSlot: () => Effect.Effect<number, ProviderError>
  readonly getRewardBalance?: (stakeAddress: string) => Effect.Effect<RewardBalance, ProviderError>
  readonly getStakeInfo?: (stakeAddress: string) => Effect.Effect<StakeInfo | undefined, ProviderError>
}

// Promise-based chain context (mirrors the Effect interface)
export interface ChainContext extends EffectToPromiseAPI<ChainContextEffect> {
  readonly Effect: ChainContextEffect
  readonly network: Address.Network
}

/**
 * Pair an Effect chain context with its Promise mirror.
 *
 * @since 1.0.0
 * @category constructors
 */
export const make = (network: Address.Network, effect: ChainContextEffect): ChainContext => {
  const { getRewardBalance, getStakeInfo } = effect
  return {
    Effect: effect,
    network,
    getUtxos: (address) => runEffect(effect.getUtxos(address)),
    minimumValue: (output) => runEffect(effect.minimumValue(output)),
    submitTx: (cborHex) => runEffect(effect.submitTx(cborHex)),
    isTxConfirmed: (txHash) => runEffect(effect.isTxConfirmed(txHash)),
    currentSlot: () => runEffect(effect.currentSlot()),
    ...(getRewardBalance ? { getRewardBalance: (stakeAddress: string) => runEffect(getRewardBalance(stakeAddress)) } : {}),
    ...(getStakeInfo ? { getStakeInfo: (stakeAddress: string) => runEffect(getStakeInfo(stakeAddress)) } : {})
  }
}
