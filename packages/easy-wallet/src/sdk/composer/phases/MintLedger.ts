/**
 * Mint Ledger Phase - aggregates minted and burned tokens across the whole transaction
 *
 * Produces the signed ledger the builder mints with, the mint-only ledger used for
 * minimum-value estimation, one native script per policy, the CIP-25 metadata of
 * minted tokens and the earliest policy expiration.
 *
 * @since 1.0.0
 */

import { Data, Effect } from "effect"

import * as Metadata from "../../Metadata.js"
import * as MultiAsset from "../../MultiAsset.js"
import * as NativeScript from "../../NativeScript.js"
import type { Token } from "../../Token.js"

/**
 * @since 1.0.0
 * @category errors
 */
export class PolicyScriptMissingError extends Data.TaggedError("PolicyScriptMissing")<{
  readonly message: string
  readonly policyId: string
}> {}

/**
 * @since 1.0.0
 * @category errors
 */
export class PolicyScriptConflictError extends Data.TaggedError("PolicyScriptConflict")<{
  readonly message: string
  readonly policyId: string
}> {}

/**
 * CIP-25 shape: policy id → asset name → metadata.
 */
export type MintMetadata = Map<string, Map<string, Metadata.MetadataValue>>

export interface MintLedger {
  /** Net quantities, burns negative. Entries that cancel out are left out. */
  readonly assets: MultiAsset.MultiAsset
  /** Strictly positive net quantities only. */
  readonly mintOnly: MultiAsset.MultiAsset
  readonly nativeScripts: ReadonlyArray<NativeScript.NativeScript>
  readonly mintMetadata: MintMetadata
  /** Earliest invalid-hereafter slot among the policies' scripts. */
  readonly ttl: number | undefined
}

const earliest = (a: number | undefined, b: number | undefined): number | undefined =>
  a === undefined ? b : b === undefined ? a : Math.min(a, b)

/**
 * Walk `tokens` in order and build the ledgers.
 *
 * @since 1.0.0
 * @category phases
 */
export const collect = (
  tokens: ReadonlyArray<Token>
): Effect.Effect<MintLedger, PolicyScriptMissingError | PolicyScriptConflictError> =>
  Effect.gen(function* () {
    const signed = MultiAsset.empty()
    const scripts = new Map<string, NativeScript.NativeScript>()
    const mintMetadata: MintMetadata = new Map()

    for (const token of tokens) {
      const { policyId, script } = token.policy
      if (!script) {
        return yield* new PolicyScriptMissingError({
          message: `Policy ${token.policy.name} (${policyId}) has no script, so ${token.name} cannot be minted or burned`,
          policyId
        })
      }
      const known = scripts.get(policyId)
      if (known === undefined) {
        scripts.set(policyId, script)
      } else if (!NativeScript.equals(known, script)) {
        return yield* new PolicyScriptConflictError({
          message: `Policy ${policyId} is attached with two different scripts`,
          policyId
        })
      }

      MultiAsset.add(signed, policyId, token.hexName, token.amount)

      if (token.amount > 0n && token.metadata !== undefined && Metadata.isNonEmpty(token.metadata)) {
        MultiAsset.merge(mintMetadata, policyId, new Map([[token.name, token.metadata]]), (bundle, delta) => {
          for (const [name, metadata] of delta) bundle.set(name, metadata)
          return bundle
        })
      }
    }

    const nativeScripts = [...scripts.values()]
    const ttl = nativeScripts.map(NativeScript.invalidHereafter).reduce<number | undefined>(earliest, undefined)
    const assets = MultiAsset.filter(signed, (quantity) => quantity !== 0n)

    yield* Effect.logDebug(`Mint ledger: ${assets.size} policies, ${nativeScripts.length} scripts`)

    return {
      assets,
      mintOnly: MultiAsset.filter(signed, (quantity) => quantity > 0n),
      nativeScripts,
      mintMetadata,
      ttl
    }
  })
