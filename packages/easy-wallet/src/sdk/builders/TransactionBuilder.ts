/**
 * The transaction builder collaborator.
 *
 * The composer hands a fully normalized {@link TransactionRequest} to a builder,
 * which selects coins, balances, computes the fee and serializes. Building and
 * signing are the builder's business; this module only fixes the contract.
 *
 * @since 1.0.0
 */

import type { Effect } from "effect"
import { Data } from "effect"

import { runEffect } from "../../utils/effect-runtime.js"
import type * as Address from "../Address.js"
import type { Certificate } from "../Certificate.js"
import type * as Metadata from "../Metadata.js"
import type * as MultiAsset from "../MultiAsset.js"
import type * as NativeScript from "../NativeScript.js"
import type { EffectToPromiseAPI } from "../Type.js"
import type { UTxO } from "../UTxO.js"
import type { SigningKey } from "../wallet/SigningKey.js"

/**
 * Error type for failures occurring during transaction builder operations.
 *
 * @since 1.0.0
 * @category errors
 */
export class TransactionBuilderError extends Data.TaggedError("TransactionBuilderError")<{
  message?: string
  cause?: unknown
}> {}

// ============================================================================
// Request
// ============================================================================

/**
 * A builder-ready output: lovelace already resolved to its final amount.
 *
 * @since 1.0.0
 * @category model
 */
export interface TransactionOutput {
  readonly address: Address.Address
  readonly lovelace: bigint
  readonly assets: MultiAsset.MultiAsset
}

/**
 * Everything a builder needs to assemble one transaction.
 *
 * `mint` is the signed ledger (burns negative); every policy in it has its
 * script in `nativeScripts`. `mintOnly` keeps the strictly positive entries and
 * is the value a builder sizes minimum ADA against. `withdrawals` is keyed by stake key hash hex.
 *
 * @since 1.0.0
 * @category model
 */
export interface TransactionRequest {
  readonly inputs: ReadonlyArray<UTxO>
  readonly outputs: ReadonlyArray<TransactionOutput>
  readonly mint: MultiAsset.MultiAsset | undefined
  readonly mintOnly: MultiAsset.MultiAsset | undefined
  readonly nativeScripts: ReadonlyArray<NativeScript.NativeScript>
  readonly certificates: ReadonlyArray<Certificate>
  readonly withdrawals: ReadonlyMap<string, bigint>
  readonly auxiliaryData: Metadata.AuxiliaryData | undefined
  readonly changeAddress: Address.Address
  readonly mergeChange: boolean
  /** Invalid-hereafter slot. */
  readonly ttl: number | undefined
}

/**
 * @since 1.0.0
 * @category model
 */
export interface UnsignedTransaction {
  readonly txHash: string
  readonly bodyCborHex: string
  readonly fee: bigint
}

/**
 * @since 1.0.0
 * @category model
 */
export interface SignedTransaction {
  readonly txHash: string
  readonly cborHex: string
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Effect-based builder API.
 *
 * @since 1.0.0
 * @category interfaces
 */
export interface TransactionBuilderEffect {
  readonly build: (request: TransactionRequest) => Effect.Effect<UnsignedTransaction, TransactionBuilderError>
  readonly buildAndSign: (
    request: TransactionRequest,
    keys: ReadonlyArray<SigningKey>
  ) => Effect.Effect<SignedTransaction, TransactionBuilderError>
}

/**
 * @since 1.0.0
 * @category interfaces
 */
export interface TransactionBuilder extends EffectToPromiseAPI<TransactionBuilderEffect> {
  readonly Effect: TransactionBuilderEffect
}

/**
 * Pair an Effect builder with its Promise mirror.
 *
 * @since 1.0.0
 * @category constructors
 */
export const make = (effect: TransactionBuilderEffect): TransactionBuilder => ({
  Effect: effect,
  build: (request) => runEffect(effect.build(request)),
  buildAndSign: (request, keys) => runEffect(effect.buildAndSign(request, keys))
})
