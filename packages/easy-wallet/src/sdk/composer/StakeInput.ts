/**
 * Stake registration, delegation and withdrawal inputs.
 *
 * Callers may use shorthands (`true` for "my own stake key", a bare pool id for
 * "delegate me"). Each parameter is normalized once into a tagged variant; the
 * certificate phase works only on those variants.
 *
 * @since 1.0.0
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils"
import { bech32 } from "bech32"
import { Data, Effect } from "effect"

import * as Address from "../Address.js"
import type { AmountLike } from "../Amount.js"
import type { WalletHandle } from "./Source.js"
import { isWallet } from "./Source.js"

// ============================================================================
// Errors
// ============================================================================

/**
 * A stake target resolved to an address without a staking credential.
 *
 * @since 1.0.0
 * @category errors
 */
export class InvalidStakeTargetError extends Data.TaggedError("InvalidStakeTarget")<{
  readonly message: string
  readonly target?: string
}> {}

/**
 * "Withdraw all" against a chain context that cannot report reward balances.
 *
 * @since 1.0.0
 * @category errors
 */
export class UnsupportedWithdrawAllError extends Data.TaggedError("UnsupportedWithdrawAll")<{
  readonly message: string
}> {}

/**
 * @since 1.0.0
 * @category errors
 */
export class InvalidPoolIdError extends Data.TaggedError("InvalidPoolId")<{
  readonly message: string
  readonly cause?: unknown
}> {}

// ============================================================================
// Pool ids
// ============================================================================

const POOL_PREFIX = "pool"
const POOL_HASH_HEX_LENGTH = 56

/**
 * A stake pool operator key hash.
 *
 * @since 1.0.0
 * @category model
 */
export class PoolKeyHash extends Data.TaggedClass("PoolKeyHash")<{ readonly hash: string }> {
  toBech32(): string {
    return bech32.encode(POOL_PREFIX, bech32.toWords(hexToBytes(this.hash)))
  }

  toString(): string {
    return this.toBech32()
  }
}

/**
 * Parse a pool id given as hex or as bech32 `pool1…`.
 *
 * @since 1.0.0
 * @category constructors
 */
export const parsePoolId = (pool: string | PoolKeyHash): Effect.Effect<PoolKeyHash, InvalidPoolIdError> => {
  if (pool instanceof PoolKeyHash) return Effect.succeed(pool)
  if (/^[0-9a-fA-F]+$/.test(pool)) {
    return pool.length === POOL_HASH_HEX_LENGTH
      ? Effect.succeed(new PoolKeyHash({ hash: pool.toLowerCase() }))
      : Effect.fail(new InvalidPoolIdError({ message: `Pool key hash must be 28 bytes of hex, got ${pool}` }))
  }
  return Effect.try({
    try: () => bech32.decode(pool),
    catch: (cause) => new InvalidPoolIdError({ message: `Invalid pool id: ${pool}`, cause })
  }).pipe(
    Effect.filterOrFail(
      ({ prefix, words }) => prefix === POOL_PREFIX && words.length > 0,
      () => new InvalidPoolIdError({ message: `Invalid pool id: ${pool}` })
    ),
    Effect.map(({ words }) => bytesToHex(Uint8Array.from(bech32.fromWords(words)))),
    Effect.filterOrFail(
      (hash) => hash.length === POOL_HASH_HEX_LENGTH,
      () => new InvalidPoolIdError({ message: `Pool key hash must be 28 bytes: ${pool}` })
    ),
    Effect.map((hash) => new PoolKeyHash({ hash }))
  )
}

// ============================================================================
// Inputs
// ============================================================================

/**
 * A wallet, a bech32 address or a parsed address.
 *
 * @since 1.0.0
 * @category model
 */
export type StakeTarget = WalletHandle | Address.Address | string

export type PoolInput = string | PoolKeyHash

/** An amount, or `true` / `"all"` for the whole reward balance. */
export type WithdrawalAmount = AmountLike | true | "all"

export type RegistrationInput = boolean | StakeTarget | ReadonlyArray<StakeTarget>

export type DelegationInput = PoolInput | ReadonlyArray<readonly [StakeTarget, PoolInput]>

export type WithdrawalInput = boolean | "all" | ReadonlyArray<readonly [StakeTarget, WithdrawalAmount]>

/**
 * @since 1.0.0
 * @category model
 */
export type Registration = Data.TaggedEnum<{
  Absent: {}
  Flag: {}
  Single: { readonly target: StakeTarget }
  Batch: { readonly targets: ReadonlyArray<StakeTarget> }
}>

export const Registration = Data.taggedEnum<Registration>()

/**
 * @since 1.0.0
 * @category model
 */
export type Delegation = Data.TaggedEnum<{
  Absent: {}
  Pool: { readonly pool: PoolInput }
  Explicit: { readonly entries: ReadonlyArray<readonly [StakeTarget, PoolInput]> }
}>

export const Delegation = Data.taggedEnum<Delegation>()

/**
 * @since 1.0.0
 * @category model
 */
export type Withdrawal = Data.TaggedEnum<{
  Absent: {}
  All: {}
  Explicit: { readonly entries: ReadonlyArray<readonly [StakeTarget, WithdrawalAmount]> }
}>

export const Withdrawal = Data.taggedEnum<Withdrawal>()

const isList = <A>(value: A | ReadonlyArray<A>): value is ReadonlyArray<A> => Array.isArray(value)

/**
 * @since 1.0.0
 * @category normalization
 */
export const normalizeRegistration = (input: RegistrationInput | undefined): Registration => {
  if (input === undefined || input === false) return Registration.Absent()
  if (input === true) return Registration.Flag()
  if (isList(input)) return input.length === 0 ? Registration.Absent() : Registration.Batch({ targets: input })
  return Registration.Single({ target: input })
}

/**
 * @since 1.0.0
 * @category normalization
 */
export const normalizeDelegation = (input: DelegationInput | undefined): Delegation => {
  if (input === undefined) return Delegation.Absent()
  if (typeof input === "string" || input instanceof PoolKeyHash) return Delegation.Pool({ pool: input })
  return input.length === 0 ? Delegation.Absent() : Delegation.Explicit({ entries: input })
}

/**
 * @since 1.0.0
 * @category normalization
 */
export const normalizeWithdrawal = (input: WithdrawalInput | undefined): Withdrawal => {
  if (input === undefined || input === false) return Withdrawal.Absent()
  if (input === true || input === "all") return Withdrawal.All()
  return input.length === 0 ? Withdrawal.Absent() : Withdrawal.Explicit({ entries: input })
}

// ============================================================================
// Targets
// ============================================================================

/**
 * @since 1.0.0
 * @category resolution
 */
export const targetAddress = (target: StakeTarget): Effect.Effect<Address.Address, Address.AddressError> =>
  isWallet(target) ? Effect.succeed(target.address) : Address.resolve(target)

/**
 * The staking credential of a target. Enterprise, Byron and pointer addresses
 * fail with `InvalidStakeTarget`.
 *
 * @since 1.0.0
 * @category resolution
 */
export const stakeCredentialOf = (
  target: StakeTarget
): Effect.Effect<Address.Credential, InvalidStakeTargetError | Address.AddressError> =>
  targetAddress(target).pipe(
    Effect.flatMap((address) => {
      const credential = Address.stakeCredential(address)
      return credential
        ? Effect.succeed(credential)
        : Effect.fail(
            new InvalidStakeTargetError({
              message: `Address ${address.bech32} has no staking credential`,
              target: address.bech32
            })
          )
    })
  )
