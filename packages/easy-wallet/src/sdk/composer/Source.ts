/**
 * Where a transaction's inputs come from, and who the caller is.
 *
 * Every input the caller names is resolved once into a {@link Source}; later
 * phases never look at the original shape again.
 *
 * @since 1.0.0
 */

import type { ConfigError } from "effect"
import { Data, Effect, Option } from "effect"

import * as Address from "../Address.js"
import type { TransactionBuilder } from "../builders/TransactionBuilder.js"
import type * as Environment from "../config/Environment.js"
import * as Blockfrost from "../provider/Blockfrost.js"
import type { ChainContext } from "../provider/ChainContext.js"
import { ChainContextMissingError } from "../provider/ChainContext.js"
import type { UTxO } from "../UTxO.js"
import type { SigningKey } from "../wallet/SigningKey.js"

/**
 * What the composer needs to know about a wallet.
 *
 * @since 1.0.0
 * @category model
 */
export interface WalletHandle {
  readonly _tag: "Wallet"
  readonly name: string
  /** Full address: base when a stake credential is known, enterprise otherwise. */
  readonly address: Address.Address
  readonly network: Environment.CardanoNetwork
  readonly signingKey: SigningKey | undefined
  readonly stakeSigningKey: SigningKey | undefined
  readonly context: ChainContext | undefined
  readonly builder: TransactionBuilder | undefined
  readonly Effect: {
    /** Refresh the UTxO snapshot through `context`, or the wallet's own context. */
    readonly sync: (context?: ChainContext) => Effect.Effect<void, ChainContextMissingError | ConfigError.ConfigError>
  }
}

/**
 * @since 1.0.0
 * @category predicates
 */
export const isWallet = (value: unknown): value is WalletHandle =>
  typeof value === "object" && value !== null && "_tag" in value && value._tag === "Wallet"

/**
 * @since 1.0.0
 * @category model
 */
export type Source = Data.TaggedEnum<{
  RawAddress: { readonly address: Address.Address }
  RawUtxo: { readonly utxo: UTxO }
  SigningWallet: { readonly wallet: WalletHandle }
}>

/**
 * @since 1.0.0
 * @category constructors
 */
export const Source = Data.taggedEnum<Source>()

/**
 * @since 1.0.0
 * @category model
 */
export type SourceInput = WalletHandle | Address.Address | string | UTxO

/**
 * @since 1.0.0
 * @category constructors
 */
export const normalize = (input: SourceInput): Effect.Effect<Source, Address.AddressError> => {
  if (typeof input === "string" || Address.isAddress(input)) {
    return Address.resolve(input).pipe(Effect.map((address) => Source.RawAddress({ address })))
  }
  if (isWallet(input)) {
    return Effect.succeed(Source.SigningWallet({ wallet: input }))
  }
  return Effect.succeed(Source.RawUtxo({ utxo: input }))
}

/**
 * Active chain context: the explicit one, else the wallet's own, else a
 * Blockfrost context configured through `BLOCKFROST_ID_<NETWORK>`.
 *
 * @since 1.0.0
 * @category resolution
 */
export const resolveContext = (
  wallet: Pick<WalletHandle, "context" | "name" | "network">,
  explicit?: ChainContext
): Effect.Effect<ChainContext, ChainContextMissingError | ConfigError.ConfigError> => {
  const context = explicit ?? wallet.context
  if (context) return Effect.succeed(context)
  return Blockfrost.fromEnvironment(wallet.network).pipe(
    Effect.flatMap(
      Option.match({
        onNone: () =>
          Effect.fail(
            new ChainContextMissingError({
              message: `No chain context for wallet ${wallet.name}: pass one, or set BLOCKFROST_ID_${wallet.network.toUpperCase()}`
            })
          ),
        onSome: (blockfrost): Effect.Effect<ChainContext> => Effect.succeed(blockfrost)
      })
    )
  )
}
