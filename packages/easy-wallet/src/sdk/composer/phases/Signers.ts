/**
 * Signers Phase - the keys that sign the transaction
 *
 * @since 1.0.0
 */

import { Data, Effect } from "effect"

import type { SigningKey } from "../../wallet/SigningKey.js"
import { isSigningKey } from "../../wallet/SigningKey.js"
import type { WalletHandle } from "../Source.js"
import { InvalidStakeTargetError } from "../StakeInput.js"

/**
 * @since 1.0.0
 * @category errors
 */
export class NoSigningKeyError extends Data.TaggedError("NoSigningKey")<{
  readonly message: string
}> {}

export type Signer = WalletHandle | SigningKey

const keyOf = (signer: Signer): Effect.Effect<SigningKey, NoSigningKeyError> => {
  if (isSigningKey(signer)) return Effect.succeed(signer)
  return signer.signingKey
    ? Effect.succeed(signer.signingKey)
    : Effect.fail(new NoSigningKeyError({ message: `Signing wallet ${signer.name} does not have associated keys` }))
}

/**
 * Explicit signers deduplicated by key hash, the caller's payment key first, and the
 * caller's stake key last when a stake operation needs it.
 *
 * @since 1.0.0
 * @category phases
 */
export const resolve = (params: {
  readonly caller: WalletHandle
  readonly signers?: ReadonlyArray<Signer>
  readonly requiresCallerStakeKey: boolean
}): Effect.Effect<Array<SigningKey>, NoSigningKeyError | InvalidStakeTargetError> =>
  Effect.gen(function* () {
    const { caller, requiresCallerStakeKey } = params
    const keys: Array<SigningKey> = []
    const seen = new Set<string>()
    const push = (key: SigningKey, atStart = false) => {
      if (seen.has(key.keyHash)) return
      seen.add(key.keyHash)
      if (atStart) {
        keys.unshift(key)
      } else {
        keys.push(key)
      }
    }

    for (const signer of params.signers ?? []) {
      push(yield* keyOf(signer))
    }

    if (caller.signingKey) {
      push(caller.signingKey, true)
    } else if (keys.length > 0) {
      yield* Effect.logWarning(`Wallet ${caller.name} has no signing key, signing with the given signers only`)
    }

    if (requiresCallerStakeKey) {
      if (!caller.stakeSigningKey) {
        return yield* new InvalidStakeTargetError({
          message: `Wallet ${caller.name} has no stake signing key, which this stake operation requires`,
          target: caller.address.bech32
        })
      }
      push(caller.stakeSigningKey)
    }

    if (keys.length === 0) {
      return yield* new NoSigningKeyError({ message: "There are no signing keys to sign the transaction with" })
    }
    return keys
  })
