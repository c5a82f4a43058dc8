/**
 * Stake Certificates Phase - registrations, delegations and withdrawals
 *
 * Resolves the normalized stake inputs into ordered certificates (registrations
 * first, then delegations, each in input order) and a withdrawal map keyed by
 * stake key hash. Reports whether the caller's own stake key has to sign.
 *
 * @since 1.0.0
 */

import { Effect } from "effect"

import * as Address from "../../Address.js"
import * as Amount from "../../Amount.js"
import { Certificate } from "../../Certificate.js"
import * as MultiAsset from "../../MultiAsset.js"
import type { ChainContext, ProviderError } from "../../provider/ChainContext.js"
import type { WalletHandle } from "../Source.js"
import type {
  Delegation,
  InvalidPoolIdError,
  Registration,
  StakeTarget,
  Withdrawal,
  WithdrawalAmount
} from "../StakeInput.js"
import { InvalidStakeTargetError, parsePoolId, stakeCredentialOf, UnsupportedWithdrawAllError } from "../StakeInput.js"

export interface StakeRequest {
  readonly registration: Registration
  readonly delegation: Delegation
  readonly withdrawal: Withdrawal
}

export interface ResolvedStake {
  readonly certificates: ReadonlyArray<Certificate>
  /** Stake key hash hex → lovelace. */
  readonly withdrawals: Map<string, bigint>
  readonly requiresCallerStakeKey: boolean
}

export type StakeCertificatesError =
  | InvalidStakeTargetError
  | InvalidPoolIdError
  | UnsupportedWithdrawAllError
  | Amount.TypeMismatchError
  | Address.AddressError
  | ProviderError

const toLovelace = (amount: Amount.AmountLike): Effect.Effect<bigint, Amount.TypeMismatchError> =>
  Effect.try({
    try: () => Amount.fromAmountLike(amount).lovelace,
    catch: (cause) =>
      cause instanceof Amount.TypeMismatchError
        ? cause
        : new Amount.TypeMismatchError({ message: `Invalid withdrawal amount: ${String(amount)}`, operand: amount })
  })

/**
 * Resolve stake inputs against the caller and the active chain context.
 *
 * @since 1.0.0
 * @category phases
 */
export const resolve = (
  request: StakeRequest,
  caller: WalletHandle,
  context: ChainContext
): Effect.Effect<ResolvedStake, StakeCertificatesError> =>
  Effect.gen(function* () {
    const callerStake = Address.stakeCredential(caller.address)
    let requiresCallerStakeKey = false

    const credentialOf = (target: StakeTarget) =>
      stakeCredentialOf(target).pipe(
        Effect.tap((credential) => {
          if (callerStake !== undefined && credential.hash === callerStake.hash) {
            requiresCallerStakeKey = true
          }
        })
      )

    const callerCredential = Effect.suspend(() =>
      callerStake === undefined
        ? Effect.fail(
            new InvalidStakeTargetError({
              message: `Wallet ${caller.name} has no stake credential`,
              target: caller.address.bech32
            })
          )
        : credentialOf(caller)
    )

    const rewardAddressOf = (credential: Address.Credential) => Address.reward(credential, caller.address.network)

    const rewardBalance = (credential: Address.Credential): Effect.Effect<bigint, StakeCertificatesError> => {
      const getRewardBalance = context.Effect.getRewardBalance
      if (!getRewardBalance) {
        return Effect.fail(
          new UnsupportedWithdrawAllError({
            message: "Withdrawing all rewards needs a chain context that reports reward balances"
          })
        )
      }
      const stakeAddress = rewardAddressOf(credential).bech32
      return getRewardBalance(stakeAddress).pipe(
        Effect.flatMap((balance) =>
          balance._tag === "Registered"
            ? Effect.succeed(balance.withdrawable)
            : Effect.logWarning(`Stake address ${stakeAddress} is not registered, withdrawing 0`).pipe(Effect.as(0n))
        )
      )
    }

    // Registrations

    const registrations: Array<Certificate> = []
    switch (request.registration._tag) {
      case "Absent":
        break
      case "Flag": {
        const credential = yield* callerCredential
        const getStakeInfo = context.Effect.getStakeInfo
        const info = getStakeInfo ? yield* getStakeInfo(rewardAddressOf(credential).bech32) : undefined
        if (info?.active) {
          yield* Effect.logInfo(`Stake address ${info.stakeAddress} is already registered, skipping registration`)
        } else {
          registrations.push(Certificate.StakeRegistration({ credential }))
        }
        break
      }
      case "Single":
        registrations.push(Certificate.StakeRegistration({ credential: yield* credentialOf(request.registration.target) }))
        break
      case "Batch":
        for (const target of request.registration.targets) {
          registrations.push(Certificate.StakeRegistration({ credential: yield* credentialOf(target) }))
        }
        break
    }

    // Delegations

    const delegations: Array<Certificate> = []
    switch (request.delegation._tag) {
      case "Absent":
        break
      case "Pool": {
        const credential = yield* callerCredential
        const pool = yield* parsePoolId(request.delegation.pool)
        delegations.push(Certificate.StakeDelegation({ credential, poolKeyHash: pool.hash }))
        break
      }
      case "Explicit":
        for (const [target, poolInput] of request.delegation.entries) {
          const credential = yield* credentialOf(target)
          const pool = yield* parsePoolId(poolInput)
          delegations.push(Certificate.StakeDelegation({ credential, poolKeyHash: pool.hash }))
        }
        break
    }

    // Withdrawals

    const withdrawals = new Map<string, bigint>()
    const withdraw = (credential: Address.Credential, lovelace: bigint) =>
      MultiAsset.merge(withdrawals, credential.hash, lovelace, (a, b) => a + b)

    const entryAmount = (credential: Address.Credential, amount: WithdrawalAmount) =>
      amount === true || amount === "all" ? rewardBalance(credential) : toLovelace(amount)

    switch (request.withdrawal._tag) {
      case "Absent":
        break
      case "All": {
        const credential = yield* callerCredential
        withdraw(credential, yield* rewardBalance(credential))
        break
      }
      case "Explicit":
        for (const [target, amount] of request.withdrawal.entries) {
          const credential = yield* credentialOf(target)
          withdraw(credential, yield* entryAmount(credential, amount))
        }
        break
    }

    return {
      certificates: [...registrations, ...delegations],
      withdrawals,
      requiresCallerStakeKey
    }
  })
