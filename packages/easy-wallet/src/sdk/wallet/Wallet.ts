/**
 * Wallet facade: keys, addresses, a UTxO snapshot and the convenience intents
 * built on top of {@link TransactionComposer.transact}.
 *
 * @since 1.0.0
 */

import { hexToBytes } from "@noble/hashes/utils"
import type { ConfigError } from "effect"
import { Array as Arr, Data, Effect, Ref } from "effect"

import { runEffect } from "../../utils/effect-runtime.js"
import * as Address from "../Address.js"
import * as Amount from "../Amount.js"
import type { TransactionBuilder } from "../builders/TransactionBuilder.js"
import type { WalletHandle } from "../composer/Source.js"
import { resolveContext } from "../composer/Source.js"
import type { PoolInput } from "../composer/StakeInput.js"
import type { TransactError, TransactParams, TransactResult } from "../composer/TransactionComposer.js"
import * as TransactionComposer from "../composer/TransactionComposer.js"
import type * as Environment from "../config/Environment.js"
import * as MultiAsset from "../MultiAsset.js"
import type { ChainContext, ChainContextMissingError, ProviderError, StakeInfo } from "../provider/ChainContext.js"
import * as Token from "../Token.js"
import type { EffectToPromiseAPI } from "../Type.js"
import * as UTxO from "../UTxO.js"
import type { SigningKey } from "./SigningKey.js"

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error class for Wallet related operations.
 *
 * @since 1.0.0
 * @category errors
 */
export class WalletError extends Data.TaggedError("WalletError")<{
  message?: string
  cause?: unknown
}> {}

// ============================================================================
// Model
// ============================================================================

/**
 * A native asset held across the wallet's UTxOs.
 *
 * @since 1.0.0
 * @category model
 */
export interface HeldToken {
  readonly policyId: string
  readonly hexName: string
  readonly name: string
  readonly amount: bigint
}

/**
 * What the wallet held at its last `sync`.
 *
 * @since 1.0.0
 * @category model
 */
export interface WalletSnapshot {
  readonly utxos: ReadonlyArray<UTxO.UTxO>
  readonly lovelace: Amount.Lovelace
  readonly ada: Amount.Ada
  readonly tokens: ReadonlyArray<HeldToken>
}

type UtxoSelection = UTxO.UTxO | ReadonlyArray<UTxO.UTxO>

/**
 * The `transact` params every convenience intent passes through.
 *
 * @since 1.0.0
 * @category model
 */
export type TransactOptions = Omit<
  TransactParams,
  "inputs" | "outputs" | "mints" | "stakeRegistration" | "delegations" | "withdrawals"
>

export type WalletTransactError = TransactError | WalletError

type StakeQueryError = WalletError | ChainContextMissingError | ConfigError.ConfigError | ProviderError

/**
 * Effect-based wallet API.
 *
 * @since 1.0.0
 * @category interfaces
 */
export interface WalletEffect {
  readonly sync: (context?: ChainContext) => Effect.Effect<void, ChainContextMissingError | ConfigError.ConfigError>
  readonly snapshot: () => Effect.Effect<WalletSnapshot>
  readonly transact: (params?: TransactParams) => Effect.Effect<TransactResult, TransactError>
  /** Send ADA to one recipient, spending `utxos` or the whole wallet. */
  readonly sendAda: (
    to: WalletHandle | Address.Address | string,
    amount: Amount.AmountLike,
    options?: TransactOptions & { readonly utxos?: UtxoSelection }
  ) => Effect.Effect<TransactResult, TransactError>
  /** Send the whole contents of `utxos` to one recipient. */
  readonly sendUtxo: (
    to: WalletHandle | Address.Address | string,
    utxos: UtxoSelection,
    options?: TransactOptions
  ) => Effect.Effect<TransactResult, TransactError>
  /** Send everything in the last snapshot to one recipient. */
  readonly emptyWallet: (
    to: WalletHandle | Address.Address | string,
    options?: TransactOptions
  ) => Effect.Effect<TransactResult, TransactError>
  /**
   * Delegate to a pool, attaching `amount` (2 ADA by default) to an output back to
   * the wallet. With `register` (the default) the stake key is registered unless it
   * already is; without it an unregistered stake key fails.
   */
  readonly delegate: (
    pool: PoolInput,
    options?: TransactOptions & {
      readonly register?: boolean
      readonly amount?: Amount.AmountLike
      readonly utxos?: UtxoSelection
    }
  ) => Effect.Effect<TransactResult, WalletTransactError>
  /** Withdraw `amount`, or the full reward balance, with a 1 ADA output back to the wallet. */
  readonly withdrawRewards: (
    options?: TransactOptions & { readonly amount?: Amount.AmountLike; readonly outputAmount?: Amount.AmountLike }
  ) => Effect.Effect<TransactResult, WalletTransactError>
  /** Mint `mints` and send them to `to`, with the minimum ADA unless `amount` is given. */
  readonly mintTokens: (
    to: WalletHandle | Address.Address | string,
    mints: Token.Token | ReadonlyArray<Token.Token>,
    options?: TransactOptions & { readonly amount?: Amount.AmountLike; readonly utxos?: UtxoSelection }
  ) => Effect.Effect<TransactResult, TransactError>
  /** Burn `tokens` (amounts are negated), sending `amount` (1 ADA by default) to `to`. */
  readonly burnTokens: (
    tokens: Token.Token | ReadonlyArray<Token.Token>,
    to: WalletHandle | Address.Address | string,
    options?: TransactOptions & { readonly amount?: Amount.AmountLike; readonly utxos?: UtxoSelection }
  ) => Effect.Effect<TransactResult, TransactError>
  readonly stakeInfo: (context?: ChainContext) => Effect.Effect<StakeInfo | undefined, StakeQueryError>
  readonly poolId: (context?: ChainContext) => Effect.Effect<string | null, StakeQueryError>
  readonly withdrawableAmount: (context?: ChainContext) => Effect.Effect<Amount.Lovelace, StakeQueryError>
}

/**
 * A wallet: the handle the composer works with, plus Effect and Promise APIs.
 *
 * @since 1.0.0
 * @category interfaces
 */
export interface Wallet extends EffectToPromiseAPI<WalletEffect> {
  readonly Effect: WalletEffect
  readonly _tag: "Wallet"
  readonly name: string
  readonly address: Address.Address
  readonly network: Environment.CardanoNetwork
  readonly signingKey: SigningKey | undefined
  readonly stakeSigningKey: SigningKey | undefined
  readonly context: ChainContext | undefined
  readonly builder: TransactionBuilder | undefined
  /** Enterprise form of the address. */
  readonly paymentAddress: Address.Address | undefined
  readonly stakeAddress: Address.Address | undefined
}

// ============================================================================
// Snapshot
// ============================================================================

const decoder = new TextDecoder("utf-8", { fatal: false })

const heldTokens = (utxos: ReadonlyArray<UTxO.UTxO>): Array<HeldToken> => {
  const totals = MultiAsset.empty()
  for (const utxo of utxos) {
    for (const [policyId, bundle] of MultiAsset.fromAssets(utxo.assets)) {
      for (const [hexName, quantity] of bundle) MultiAsset.add(totals, policyId, hexName, quantity)
    }
  }
  return [...totals].flatMap(([policyId, bundle]) =>
    [...bundle].map(([hexName, amount]) => ({
      policyId,
      hexName,
      name: decoder.decode(hexToBytes(hexName)),
      amount
    }))
  )
}

/**
 * @since 1.0.0
 * @category constructors
 */
export const snapshotOf = (utxos: ReadonlyArray<UTxO.UTxO>): WalletSnapshot => {
  const lovelace = Amount.fromMinor(UTxO.totalLovelace(utxos))
  return { utxos, lovelace, ada: lovelace.toAda(), tokens: heldTokens(utxos) }
}

// ============================================================================
// Constructors
// ============================================================================

const ADDRESS_NETWORK: Record<Environment.CardanoNetwork, Address.Network> = {
  mainnet: "mainnet",
  preprod: "testnet",
  preview: "testnet"
}

interface WalletParts {
  readonly name: string
  readonly address: Address.Address
  readonly network: Environment.CardanoNetwork
  readonly signingKey: SigningKey | undefined
  readonly stakeSigningKey: SigningKey | undefined
  readonly context: ChainContext | undefined
  readonly builder: TransactionBuilder | undefined
}

const toAmount = (value: Amount.AmountLike): Effect.Effect<Amount.Lovelace | Amount.Ada, Amount.TypeMismatchError> =>
  Effect.try({
    try: () => Amount.fromAmountLike(value),
    catch: (cause) =>
      cause instanceof Amount.TypeMismatchError
        ? cause
        : new Amount.TypeMismatchError({ message: `Invalid amount: ${String(value)}`, operand: value })
  })

const inputsOf = (utxos: UtxoSelection | undefined, wallet: WalletHandle) =>
  utxos === undefined ? [wallet] : Arr.ensure<UTxO.UTxO>(utxos)

const assemble = (parts: WalletParts): Wallet => {
  const snapshot = Ref.unsafeMake(snapshotOf([]))
  const stakeAddress = Address.toRewardAddress(parts.address)

  const requireStakeAddress: Effect.Effect<Address.Address, WalletError> = stakeAddress
    ? Effect.succeed(stakeAddress)
    : Effect.fail(new WalletError({ message: `Wallet ${parts.name} does not have staking keys` }))

  const effect: WalletEffect = {
    sync: (context) =>
      Effect.gen(function* () {
        const active = yield* resolveContext(parts, context)
        const utxos = yield* active.Effect.getUtxos(parts.address.bech32).pipe(
          Effect.catchAll((error) =>
            Effect.logWarning(
              `Error getting UTxOs. Address has likely not transacted yet. Details: ${error.message}`
            ).pipe(Effect.as([]))
          )
        )
        const next = snapshotOf(utxos)
        yield* Ref.set(snapshot, next)
        yield* utxos.length > 0
          ? Effect.logInfo(`Wallet ${parts.name} has ${utxos.length} UTxOs containing a total of ${next.ada} ADA`)
          : Effect.logInfo(`Wallet ${parts.name} has no UTxOs`)
      }),

    snapshot: () => Ref.get(snapshot),

    transact: (params) => TransactionComposer.transact(wallet, params),

    sendAda: (to, amount, options = {}) => {
      const { utxos, ...rest } = options
      return TransactionComposer.transact(wallet, {
        ...rest,
        inputs: inputsOf(utxos, wallet),
        outputs: [{ address: to, amount }]
      })
    },

    sendUtxo: (to, utxos, options = {}) =>
      TransactionComposer.transact(wallet, {
        ...options,
        inputs: Arr.ensure<UTxO.UTxO>(utxos),
        changeAddress: to
      }),

    emptyWallet: (to, options = {}) =>
      Ref.get(snapshot).pipe(
        Effect.flatMap(({ utxos }) => TransactionComposer.transact(wallet, { ...options, inputs: utxos, changeAddress: to }))
      ),

    delegate: (pool, options = {}) =>
      Effect.gen(function* () {
        const { amount, register = true, utxos, ...rest } = options
        yield* requireStakeAddress
        const active = yield* resolveContext(parts, rest.context)
        // Without stake queries the ledger is left to reject an unregistered delegation.
        if (!register && active.Effect.getStakeInfo) {
          const info = yield* effect.stakeInfo(active)
          if (!info?.active) {
            return yield* new WalletError({
              message: "Cannot delegate to a pool. This wallet is not yet registered. Try again with register: true"
            })
          }
        }
        return yield* TransactionComposer.transact(wallet, {
          ...rest,
          context: active,
          inputs: inputsOf(utxos, wallet),
          outputs: [{ address: wallet, amount: amount ?? Amount.ada(2) }],
          stakeRegistration: register,
          delegations: pool
        })
      }),

    withdrawRewards: (options = {}) =>
      Effect.gen(function* () {
        const { amount, outputAmount, ...rest } = options
        yield* requireStakeAddress
        const requested = amount === undefined ? undefined : yield* toAmount(amount)
        const withdrawal =
          requested === undefined || requested.isZero() ? yield* effect.withdrawableAmount(rest.context) : requested
        if (withdrawal.isZero()) {
          return yield* new WalletError({ message: "No rewards to withdraw" })
        }
        return yield* TransactionComposer.transact(wallet, {
          ...rest,
          inputs: [wallet],
          outputs: [{ address: wallet, amount: outputAmount ?? Amount.ada(1) }],
          withdrawals: [[wallet, withdrawal]]
        })
      }),

    mintTokens: (to, mints, options = {}) => {
      const { amount, utxos, ...rest } = options
      const tokens = Arr.ensure<Token.Token>(mints)
      return TransactionComposer.transact(wallet, {
        ...rest,
        inputs: inputsOf(utxos, wallet),
        outputs: [{ address: to, amount: amount ?? 0n, tokens }],
        mints: tokens
      })
    },

    burnTokens: (tokens, to, options = {}) => {
      const { amount, utxos, ...rest } = options
      const burns = Arr.ensure<Token.Token>(tokens).map((token) =>
        Token.withAmount(token, token.amount < 0n ? token.amount : -token.amount)
      )
      return TransactionComposer.transact(wallet, {
        ...rest,
        inputs: inputsOf(utxos, wallet),
        outputs: [{ address: to, amount: amount ?? Amount.ada(1), tokens: burns }],
        mints: burns
      })
    },

    stakeInfo: (context) =>
      Effect.gen(function* () {
        const stake = yield* requireStakeAddress
        const active = yield* resolveContext(parts, context)
        const getStakeInfo = active.Effect.getStakeInfo
        if (!getStakeInfo) {
          return yield* new WalletError({ message: "The chain context cannot report stake accounts" })
        }
        const info = yield* getStakeInfo(stake.bech32)
        if (!info) yield* Effect.logWarning(`Stake address ${stake.bech32} is not registered yet`)
        return info
      }),

    poolId: (context) => effect.stakeInfo(context).pipe(Effect.map((info) => info?.poolId ?? null)),

    withdrawableAmount: (context) =>
      effect.stakeInfo(context).pipe(Effect.map((info) => Amount.fromMinor(info?.withdrawable ?? 0n)))
  }

  const wallet: Wallet = {
    ...parts,
    _tag: "Wallet",
    Effect: effect,
    paymentAddress: Address.toPaymentAddress(parts.address),
    stakeAddress,
    sync: (context) => runEffect(effect.sync(context)),
    snapshot: () => runEffect(effect.snapshot()),
    transact: (params) => runEffect(effect.transact(params)),
    sendAda: (to, amount, options) => runEffect(effect.sendAda(to, amount, options)),
    sendUtxo: (to, utxos, options) => runEffect(effect.sendUtxo(to, utxos, options)),
    emptyWallet: (to, options) => runEffect(effect.emptyWallet(to, options)),
    delegate: (pool, options) => runEffect(effect.delegate(pool, options)),
    withdrawRewards: (options) => runEffect(effect.withdrawRewards(options)),
    mintTokens: (to, mints, options) => runEffect(effect.mintTokens(to, mints, options)),
    burnTokens: (tokens, to, options) => runEffect(effect.burnTokens(tokens, to, options)),
    stakeInfo: (context) => runEffect(effect.stakeInfo(context)),
    poolId: (context) => runEffect(effect.poolId(context)),
    withdrawableAmount: (context) => runEffect(effect.withdrawableAmount(context))
  }
  return wallet
}

/**
 * A signing wallet from its payment key and, optionally, its stake key.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect"
 * import { SigningKey, makeWallet } from "easy-wallet"
 *
 * const program = Effect.gen(function* () {
 *   const key = yield* SigningKey.SigningKey.fromHex("11".repeat(32))
 *   return makeWallet({ name: "alice", signingKey: key, network: "preprod" })
 * })
 * ```
 *
 * @since 1.0.0
 * @category constructors
 */
export const makeWallet = (params: {
  readonly name: string
  readonly signingKey: SigningKey
  readonly stakeSigningKey?: SigningKey
  readonly network?: Environment.CardanoNetwork
  readonly context?: ChainContext
  readonly builder?: TransactionBuilder
}): Wallet => {
  const network = params.network ?? "mainnet"
  return assemble({
    name: params.name,
    address: Address.make({
      network: ADDRESS_NETWORK[network],
      payment: { type: "key", hash: params.signingKey.keyHash },
      stake: params.stakeSigningKey ? { type: "key", hash: params.stakeSigningKey.keyHash } : undefined
    }),
    network,
    signingKey: params.signingKey,
    stakeSigningKey: params.stakeSigningKey,
    context: params.context,
    builder: params.builder
  })
}

/**
 * A watch-only wallet. Fails when the address does not belong to `network`.
 *
 * @since 1.0.0
 * @category constructors
 */
export const makeWalletFromAddress = (params: {
  readonly name: string
  readonly address: Address.Address | string
  readonly network?: Environment.CardanoNetwork
  readonly context?: ChainContext
  readonly builder?: TransactionBuilder
}): Effect.Effect<Wallet, WalletError | Address.AddressError> =>
  Effect.gen(function* () {
    const network = params.network ?? "mainnet"
    const address = yield* Address.resolve(params.address)
    if (address.network !== ADDRESS_NETWORK[network]) {
      return yield* new WalletError({
        message: `${network} does not match the network of the provided address (${address.network})`
      })
    }
    return assemble({
      name: params.name,
      address,
      network,
      signingKey: undefined,
      stakeSigningKey: undefined,
      context: params.context,
      builder: params.builder
    })
  })
