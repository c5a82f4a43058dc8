import type * as Assets from "./Assets.js"

/**
 * Unspent transaction output as returned by a chain context.
 *
 * @since 1.0.0
 * @category model
 */
export interface UTxO {
  readonly txHash: string
  readonly outputIndex: number
  readonly address: string
  readonly assets: Assets.Assets
  readonly datumHash?: string
  readonly inlineDatum?: string
}

/**
 * `txHash#index`, the identity of an output on chain.
 *
 * @since 1.0.0
 * @category getters
 */
export const outRef = (utxo: Pick<UTxO, "txHash" | "outputIndex">): string => `${utxo.txHash}#${utxo.outputIndex}`

/**
 * Keep the first occurrence of every out-ref, preserving order.
 *
 * @since 1.0.0
 * @category combinators
 */
export const dedupe = (utxos: ReadonlyArray<UTxO>): Array<UTxO> => {
  const seen = new Set<string>()
  const result: Array<UTxO> = []
  for (const utxo of utxos) {
    const key = outRef(utxo)
    if (!seen.has(key)) {
      seen.add(key)
      result.push(utxo)
    }
  }
  return result
}

export const totalLovelace = (utxos: ReadonlyArray<UTxO>): bigint =>
  utxos.reduce((sum, utxo) => sum + utxo.assets.lovelace, 0n)
