/**
 * Ordered policy → asset name → quantity maps.
 *
 * Asset names are keyed by their hex encoding, which is their on-chain identity.
 * Insertion order is preserved so that the order in which callers list tokens
 * survives into the transaction request.
 *
 * @since 1.0.0
 */

import * as Assets from "./Assets.js"
import type * as ProtocolParameters from "./ProtocolParameters.js"

export type AssetBundle = Map<string, bigint>

export type MultiAsset = Map<string, AssetBundle>

export const empty = (): MultiAsset => new Map()

/**
 * Upsert `delta` under `key`, combining with the existing value when there is one.
 * Mutates and returns `map`.
 *
 * @since 1.0.0
 * @category combinators
 */
export const merge = <K, V>(map: Map<K, V>, key: K, delta: V, combine: (current: V, delta: V) => V): Map<K, V> => {
  const current = map.get(key)
  map.set(key, current === undefined ? delta : combine(current, delta))
  return map
}

const sum = (a: bigint, b: bigint): bigint => a + b

/**
 * Add `quantity` of `(policyId, assetNameHex)`, summing with what is already there.
 *
 * @since 1.0.0
 * @category combinators
 */
export const add = (multiAsset: MultiAsset, policyId: string, assetNameHex: string, quantity: bigint): MultiAsset =>
  merge(multiAsset, policyId, new Map([[assetNameHex, quantity]]), (bundle, delta) => {
    for (const [name, q] of delta) merge(bundle, name, q, sum)
    return bundle
  })

/**
 * Keep the entries matching `predicate`, dropping policies left empty.
 *
 * @since 1.0.0
 * @category combinators
 */
export const filter = (multiAsset: MultiAsset, predicate: (quantity: bigint) => boolean): MultiAsset => {
  const result: MultiAsset = new Map()
  for (const [policyId, bundle] of multiAsset) {
    const kept: AssetBundle = new Map([...bundle].filter(([, quantity]) => predicate(quantity)))
    if (kept.size > 0) result.set(policyId, kept)
  }
  return result
}

export const isEmpty = (multiAsset: MultiAsset): boolean => multiAsset.size === 0

export const quantityOf = (multiAsset: MultiAsset, policyId: string, assetNameHex: string): bigint =>
  multiAsset.get(policyId)?.get(assetNameHex) ?? 0n

/**
 * Collect the native assets of a flat {@link Assets.Assets} record.
 *
 * @since 1.0.0
 * @category conversions
 */
export const fromAssets = (assets: Assets.Assets): MultiAsset => {
  const result = empty()
  for (const unit of Assets.units(assets)) {
    const { assetNameHex, policyId } = Assets.fromUnit(unit)
    add(result, policyId, assetNameHex, assets[unit])
  }
  return result
}

/**
 * Flatten into `policyId + assetNameHex` units with the given lovelace.
 *
 * @since 1.0.0
 * @category conversions
 */
export const toAssets = (multiAsset: MultiAsset, lovelace: bigint = 0n): Assets.Assets => {
  const units: Record<string, bigint> = {}
  for (const [policyId, bundle] of multiAsset) {
    for (const [name, quantity] of bundle) {
      units[Assets.toUnit(policyId, name)] = quantity
    }
  }
  return { ...units, lovelace }
}

/**
 * The output-size drivers of an address carrying this bundle.
 *
 * @since 1.0.0
 * @category conversions
 */
export const toOutputShape = (addressBytes: number, multiAsset: MultiAsset): ProtocolParameters.OutputShape => ({
  addressBytes,
  policies: [...multiAsset.values()].map((bundle) => ({
    assetNameBytes: [...bundle.keys()].map((name) => name.length / 2)
  }))
})
