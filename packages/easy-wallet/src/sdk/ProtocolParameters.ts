/**
 * Protocol parameters and the minimum-value rule derived from them.
 *
 * The ledger requires every output to carry at least
 * `(UTXO_ENTRY_OVERHEAD + serialized output size) * coinsPerUtxoByte` lovelace.
 * The size used here is an estimate of the CBOR encoding of a post-Alonzo output
 * (address plus value, no datum or script reference).
 */

export type ProtocolParameters = {
  readonly minFeeA: number
  readonly minFeeB: number
  readonly maxTxSize: number
  readonly maxValSize: number
  readonly keyDeposit: bigint
  readonly poolDeposit: bigint
  readonly coinsPerUtxoByte: bigint
}

/**
 * Bytes the ledger charges for every UTxO entry on top of the output itself.
 *
 * @since 1.0.0
 * @category constants
 */
export const UTXO_ENTRY_OVERHEAD = 160

/**
 * Shape of an output, reduced to the sizes that drive its encoded length.
 *
 * @since 1.0.0
 * @category model
 */
export interface OutputShape {
  readonly addressBytes: number
  readonly policies: ReadonlyArray<{ readonly assetNameBytes: ReadonlyArray<number> }>
}

// map header + address key/bytes header + coin (key + up to 9 bytes)
const OUTPUT_BASE = 1 + 2 + 10
// array header for [coin, multiasset] + multiasset map header
const MULTI_ASSET_BASE = 2
// bytes header + 28 byte policy id + inner map header
const POLICY_ENTRY = 31
// bytes header + quantity (up to 9 bytes)
const ASSET_ENTRY = 10

/**
 * Estimated serialized size of an output, in bytes.
 *
 * @since 1.0.0
 * @category utilities
 */
export const estimateOutputSize = (shape: OutputShape): number => {
  let size = OUTPUT_BASE + shape.addressBytes
  if (shape.policies.length > 0) {
    size += MULTI_ASSET_BASE
    for (const policy of shape.policies) {
      size += POLICY_ENTRY
      for (const nameBytes of policy.assetNameBytes) {
        size += ASSET_ENTRY + nameBytes
      }
    }
  }
  return size
}

/**
 * Calculate the UTxO cost based on the protocol parameters.
 *
 */
export const calculateUtxoCost = (protocolParams: ProtocolParameters, utxoSize: number): bigint => {
  return protocolParams.coinsPerUtxoByte * BigInt(utxoSize)
}

/**
 * Minimum lovelace an output of the given shape must carry.
 *
 * @since 1.0.0
 * @category utilities
 */
export const minimumUtxoValue = (protocolParams: ProtocolParameters, shape: OutputShape): bigint =>
  calculateUtxoCost(protocolParams, UTXO_ENTRY_OVERHEAD + estimateOutputSize(shape))
