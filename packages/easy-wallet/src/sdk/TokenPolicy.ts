/**
 * Minting policies backed by native scripts.
 *
 * A policy with a script can mint and burn; its id is the script hash. A policy
 * known only by its id (a token someone else controls) can be referenced but not
 * minted with.
 *
 * @since 1.0.0
 */

import { Array as Arr, Clock, Data, Effect } from "effect"

import * as Address from "./Address.js"
import type { WalletHandle } from "./composer/Source.js"
import type { ChainContext, ProviderError } from "./provider/ChainContext.js"
import * as NativeScript from "./NativeScript.js"

/**
 * @since 1.0.0
 * @category errors
 */
export class TokenPolicyError extends Data.TaggedError("TokenPolicyError")<{
  readonly message: string
  readonly cause?: unknown
}> {}

/**
 * @since 1.0.0
 * @category model
 */
export interface TokenPolicy {
  readonly _tag: "TokenPolicy"
  readonly name: string
  readonly policyId: string
  readonly script: NativeScript.NativeScript | undefined
}

/**
 * Who must sign for a generated policy: a wallet (its payment key), or an address
 * (its payment credential).
 *
 * @since 1.0.0
 * @category model
 */
export type PolicySigner = WalletHandle | Address.Address | string

// ============================================================================
// Constructors
// ============================================================================

/**
 * @since 1.0.0
 * @category constructors
 */
export const fromScript = (
  name: string,
  script: NativeScript.NativeScript,
  hasher: NativeScript.NativeScriptHasher
): TokenPolicy => ({ _tag: "TokenPolicy", name, policyId: hasher(script), script })

/**
 * Load a policy from the JSON of a policy script file.
 *
 * @since 1.0.0
 * @category constructors
 */
export const fromScriptJson = (
  name: string,
  json: unknown,
  hasher: NativeScript.NativeScriptHasher
): Effect.Effect<TokenPolicy, NativeScript.NativeScriptError> =>
  NativeScript.fromJson(json).pipe(Effect.map((script) => fromScript(name, script, hasher)))

/**
 * Reference a policy by id only.
 *
 * @since 1.0.0
 * @category constructors
 */
export const fromPolicyId = (name: string, policyId: string): TokenPolicy => ({
  _tag: "TokenPolicy",
  name,
  policyId,
  script: undefined
})

const signerKeyHash = (signer: PolicySigner): Effect.Effect<string, TokenPolicyError | Address.AddressError> => {
  if (typeof signer !== "string" && signer._tag === "Wallet") {
    return signer.signingKey
      ? Effect.succeed(signer.signingKey.keyHash)
      : Effect.fail(new TokenPolicyError({ message: `Signing wallet ${signer.name} does not have associated keys` }))
  }
  return Address.resolve(signer).pipe(
    Effect.flatMap((address) =>
      address.payment
        ? Effect.succeed(address.payment.hash)
        : Effect.fail(new TokenPolicyError({ message: `Address ${address.bech32} has no payment credential` }))
    )
  )
}

/**
 * Slot reached `expiration` from now, at one slot per second.
 */
const slotAt = (expiration: Date, context: ChainContext): Effect.Effect<number, ProviderError> =>
  Effect.gen(function* () {
    const now = yield* Clock.currentTimeMillis
    const slot = yield* context.Effect.currentSlot()
    return slot + Math.trunc((expiration.getTime() - now) / 1000)
  })

/**
 * Generate `all[sig(signer)…, before(expiration)]`, a CIP-25 style policy.
 *
 * The expiration is either a slot number or a `Date`; a `Date` is converted
 * through the context's current slot.
 *
 * @since 1.0.0
 * @category constructors
 */
export const generateMintingPolicy = (params: {
  readonly name: string
  readonly signers: PolicySigner | ReadonlyArray<PolicySigner>
  readonly expiration?: number | Date
  readonly context?: ChainContext
  readonly hasher: NativeScript.NativeScriptHasher
}): Effect.Effect<TokenPolicy, TokenPolicyError | Address.AddressError | ProviderError> =>
  Effect.gen(function* () {
    const { context, expiration, hasher, name } = params
    const keyHashes = yield* Effect.forEach(Arr.ensure<PolicySigner>(params.signers), signerKeyHash)
    const scripts: Array<NativeScript.NativeScript> = keyHashes.map(NativeScript.sig)

    if (typeof expiration === "number") {
      scripts.push(NativeScript.before(expiration))
    } else if (expiration instanceof Date) {
      if (!context) {
        return yield* new TokenPolicyError({
          message: "An expiration given as a Date needs a chain context to estimate its slot"
        })
      }
      scripts.push(NativeScript.before(yield* slotAt(expiration, context)))
    }

    const policy = fromScript(name, NativeScript.all(scripts), hasher)
    yield* Effect.logDebug(`Generated minting policy ${policy.name} (${policy.policyId})`)
    return policy
  })

// ============================================================================
// Getters
// ============================================================================

const requireScript = (policy: TokenPolicy): Effect.Effect<NativeScript.NativeScript, TokenPolicyError> =>
  policy.script
    ? Effect.succeed(policy.script)
    : Effect.fail(new TokenPolicyError({ message: `The script of policy ${policy.name} is not set` }))

/**
 * The slot after which the policy can no longer mint.
 *
 * @since 1.0.0
 * @category getters
 */
export const expirationSlot = (policy: TokenPolicy): Effect.Effect<number, TokenPolicyError> =>
  requireScript(policy).pipe(
    Effect.flatMap((script) => {
      const slot = NativeScript.invalidHereafter(script)
      return slot === undefined
        ? Effect.fail(new TokenPolicyError({ message: `Policy ${policy.name} does not have an expiration slot` }))
        : Effect.succeed(slot)
    })
  )

/**
 * Key hashes of every required signer.
 *
 * @since 1.0.0
 * @category getters
 */
export const requiredSignatures = (policy: TokenPolicy): Effect.Effect<Array<string>, TokenPolicyError> =>
  requireScript(policy).pipe(Effect.map(NativeScript.requiredSignatures))

/**
 * @since 1.0.0
 * @category getters
 */
export const isExpired = (
  policy: TokenPolicy,
  context: ChainContext
): Effect.Effect<boolean, TokenPolicyError | ProviderError> =>
  Effect.gen(function* () {
    const expiration = yield* expirationSlot(policy)
    const slot = yield* context.Effect.currentSlot()
    return expiration - slot < 0
  })

/**
 * Wall-clock estimate of the expiration, at one slot per second.
 *
 * @since 1.0.0
 * @category getters
 */
export const expirationDate = (
  policy: TokenPolicy,
  context: ChainContext
): Effect.Effect<Date, TokenPolicyError | ProviderError> =>
  Effect.gen(function* () {
    const expiration = yield* expirationSlot(policy)
    const slot = yield* context.Effect.currentSlot()
    const now = yield* Clock.currentTimeMillis
    return new Date(now + (expiration - slot) * 1000)
  })
