/**
 * @fileoverview Blockfrost API schemas and transformation utilities
 * Internal module for the Blockfrost chain context
 */

import { Schema } from "effect"

import type * as Assets from "../../Assets.js"
import type * as ProtocolParameters from "../../ProtocolParameters.js"
import type { UTxO } from "../../UTxO.js"
import type { StakeInfo } from "../ChainContext.js"

// ============================================================================
// Blockfrost API Response Schemas
// ============================================================================

/**
 * Blockfrost protocol parameters response schema (the fields this package reads)
 */
export const BlockfrostProtocolParameters = Schema.Struct({
  min_fee_a: Schema.Number,
  min_fee_b: Schema.Number,
  pool_deposit: Schema.String,
  key_deposit: Schema.String,
  max_tx_size: Schema.Number,
  max_val_size: Schema.optional(Schema.NullOr(Schema.String)),
  coins_per_utxo_size: Schema.optional(Schema.NullOr(Schema.String))
})

export type BlockfrostProtocolParameters = Schema.Schema.Type<typeof BlockfrostProtocolParameters>

/**
 * Blockfrost UTxO amount schema (for multi-asset support)
 */
export const BlockfrostAmount = Schema.Struct({
  unit: Schema.String,
  quantity: Schema.String
})

export type BlockfrostAmount = Schema.Schema.Type<typeof BlockfrostAmount>

/**
 * Blockfrost address UTxO response schema
 */
export const BlockfrostUTxO = Schema.Struct({
  address: Schema.String,
  tx_hash: Schema.String,
  output_index: Schema.Number,
  amount: Schema.Array(BlockfrostAmount),
  data_hash: Schema.NullOr(Schema.String),
  inline_datum: Schema.NullOr(Schema.String)
})

export type BlockfrostUTxO = Schema.Schema.Type<typeof BlockfrostUTxO>

/**
 * Blockfrost account (stake address) response schema
 */
export const BlockfrostAccount = Schema.Struct({
  stake_address: Schema.String,
  active: Schema.Boolean,
  pool_id: Schema.NullOr(Schema.String),
  controlled_amount: Schema.String,
  withdrawable_amount: Schema.String
})

export type BlockfrostAccount = Schema.Schema.Type<typeof BlockfrostAccount>

/**
 * Latest block response schema, reduced to its slot
 */
export const BlockfrostBlock = Schema.Struct({
  slot: Schema.Number
})

/**
 * Transaction lookup response schema, reduced to its hash
 */
export const BlockfrostTransaction = Schema.Struct({
  hash: Schema.String
})

/**
 * Blockfrost transaction submit response schema
 */
export const BlockfrostSubmitResponse = Schema.String

export type BlockfrostSubmitResponse = Schema.Schema.Type<typeof BlockfrostSubmitResponse>

// ============================================================================
// Transformation Functions
// ============================================================================

/**
 * Transform Blockfrost protocol parameters
 */
export const transformProtocolParameters = (
  blockfrostParams: BlockfrostProtocolParameters
): ProtocolParameters.ProtocolParameters => ({
  minFeeA: blockfrostParams.min_fee_a,
  minFeeB: blockfrostParams.min_fee_b,
  poolDeposit: BigInt(blockfrostParams.pool_deposit),
  keyDeposit: BigInt(blockfrostParams.key_deposit),
  maxTxSize: blockfrostParams.max_tx_size,
  maxValSize: blockfrostParams.max_val_size ? Number(blockfrostParams.max_val_size) : 0,
  coinsPerUtxoByte: blockfrostParams.coins_per_utxo_size ? BigInt(blockfrostParams.coins_per_utxo_size) : 0n
})

/**
 * Transform Blockfrost amounts to a flat asset record
 */
export const transformAmounts = (amounts: ReadonlyArray<BlockfrostAmount>): Assets.Assets => {
  const units: Record<string, bigint> = {}
  let lovelace = 0n

  for (const amount of amounts) {
    if (amount.unit === "lovelace") {
      lovelace += BigInt(amount.quantity)
    } else {
      units[amount.unit] = (units[amount.unit] ?? 0n) + BigInt(amount.quantity)
    }
  }

  return { ...units, lovelace }
}

/**
 * Transform Blockfrost UTxO
 */
export const transformUTxO = (blockfrostUtxo: BlockfrostUTxO): UTxO => ({
  txHash: blockfrostUtxo.tx_hash,
  outputIndex: blockfrostUtxo.output_index,
  address: blockfrostUtxo.address,
  assets: transformAmounts(blockfrostUtxo.amount),
  ...(blockfrostUtxo.data_hash ? { datumHash: blockfrostUtxo.data_hash } : {}),
  ...(blockfrostUtxo.inline_datum ? { inlineDatum: blockfrostUtxo.inline_datum } : {})
})

/**
 * Transform a Blockfrost account
 */
export const transformAccount = (account: BlockfrostAccount): StakeInfo => ({
  stakeAddress: account.stake_address,
  active: account.active,
  poolId: account.pool_id,
  withdrawable: BigInt(account.withdrawable_amount),
  controlled: BigInt(account.controlled_amount)
})
