/**
 * Flat multi-asset value as chain contexts report it: lovelace plus
 * `policyId + assetNameHex` units.
 *
 * @since 1.0.0
 */

export type Assets = {
  readonly lovelace: bigint
  readonly [unit: string]: bigint
}

export const POLICY_ID_HEX_LENGTH = 56

export const empty = (): Assets => ({ lovelace: 0n })

export const fromLovelace = (lovelace: bigint): Assets => ({ lovelace })

export const lovelaceOf = (assets: Assets): bigint => assets.lovelace

/**
 * Add two asset bundles unit by unit. Units that cancel out are dropped.
 *
 * @since 1.0.0
 * @category combinators
 */
export const add = (a: Assets, b: Assets): Assets => {
  const result: Record<string, bigint> = { ...a }
  for (const [unit, quantity] of Object.entries(b)) {
    const next = (result[unit] ?? 0n) + quantity
    if (next === 0n && unit !== "lovelace") {
      delete result[unit]
    } else {
      result[unit] = next
    }
  }
  return { ...result, lovelace: result.lovelace ?? 0n }
}

/**
 * Native asset units, lovelace excluded.
 *
 * @since 1.0.0
 * @category getters
 */
export const units = (assets: Assets): Array<string> => Object.keys(assets).filter((unit) => unit !== "lovelace")

export const toUnit = (policyId: string, assetNameHex: string): string => `${policyId}${assetNameHex}`

export const fromUnit = (unit: string): { readonly policyId: string; readonly assetNameHex: string } => ({
  policyId: unit.slice(0, POLICY_ID_HEX_LENGTH),
  assetNameHex: unit.slice(POLICY_ID_HEX_LENGTH)
})
