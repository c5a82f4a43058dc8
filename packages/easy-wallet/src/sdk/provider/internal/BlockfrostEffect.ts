/**
 * @fileoverview Effect-based Blockfrost chain context functions
 * Internal module implementing all chain context operations using Effect pattern
 */

import type { HttpClient } from "@effect/platform"
import { hexToBytes } from "@noble/hashes/utils"
import type { Duration } from "effect"
import { Effect, Option, Schema } from "effect"

import * as MultiAsset from "../../MultiAsset.js"
import * as ProtocolParameters from "../../ProtocolParameters.js"
import type { UTxO } from "../../UTxO.js"
import type { OutputTemplate, RewardBalance, StakeInfo } from "../ChainContext.js"
import { ProviderError } from "../ChainContext.js"
import * as Blockfrost from "./Blockfrost.js"
import * as HttpUtils from "./HttpUtils.js"

/**
 * Connection settings shared by every call
 */
export interface BlockfrostConfig {
  readonly baseUrl: string
  readonly projectId?: string
  readonly rateLimit: Duration.DurationInput
}

type Request<A> = Effect.Effect<A, ProviderError, HttpClient.HttpClient>

// Blockfrost pages list endpoints by 100 items
const PAGE_SIZE = 100

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Apply rate limiting to an Effect by delaying execution
 */
const withRateLimit =
  (config: BlockfrostConfig) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.delay(effect, config.rateLimit)

/**
 * Create Blockfrost API headers with project ID
 */
const createHeaders = (projectId?: string): Record<string, string> => (projectId ? { project_id: projectId } : {})

/**
 * Wrap HTTP errors into ProviderError
 */
const wrapError = (operation: string) => (error: unknown) =>
  new ProviderError({
    message: `Blockfrost ${operation} failed`,
    cause: error
  })

// ============================================================================
// Blockfrost Effect Functions (Curry Pattern)
// ============================================================================

/**
 * Current protocol parameters
 */
export const getProtocolParameters = (config: BlockfrostConfig): Request<ProtocolParameters.ProtocolParameters> =>
  withRateLimit(config)(
    HttpUtils.get(
      `${config.baseUrl}/epochs/latest/parameters`,
      Blockfrost.BlockfrostProtocolParameters,
      createHeaders(config.projectId)
    )
  ).pipe(Effect.map(Blockfrost.transformProtocolParameters), Effect.mapError(wrapError("getProtocolParameters")))

/**
 * Every UTxO at an address, following pagination. An address Blockfrost has
 * never seen holds nothing.
 */
export const getUtxos =
  (config: BlockfrostConfig) =>
  (address: string): Request<Array<UTxO>> =>
    Effect.gen(function* () {
      const utxos: Array<UTxO> = []
      for (let page = 1; ; page++) {
        const batch = yield* withRateLimit(config)(
          HttpUtils.getOptional(
            `${config.baseUrl}/addresses/${address}/utxos?page=${page}`,
            Schema.Array(Blockfrost.BlockfrostUTxO),
            createHeaders(config.projectId)
          )
        )
        if (Option.isNone(batch)) break
        utxos.push(...batch.value.map(Blockfrost.transformUTxO))
        if (batch.value.length < PAGE_SIZE) break
      }
      return utxos
    }).pipe(Effect.mapError(wrapError("getUtxos")))

/**
 * Minimum lovelace for an output, from the current `coins_per_utxo_size`
 */
export const minimumValue =
  (config: BlockfrostConfig) =>
  (output: OutputTemplate): Request<bigint> =>
    getProtocolParameters(config).pipe(
      Effect.map((params) =>
        ProtocolParameters.minimumUtxoValue(
          params,
          MultiAsset.toOutputShape(output.address.byteLength, output.assets)
        )
      )
    )

/**
 * Submit a signed transaction, returning its hash
 */
export const submitTx =
  (config: BlockfrostConfig) =>
  (cborHex: string): Request<string> =>
    Effect.try({
      try: () => hexToBytes(cborHex),
      catch: (cause) => new ProviderError({ message: "Transaction CBOR is not valid hex", cause })
    }).pipe(
      Effect.flatMap((body) =>
        withRateLimit(config)(
          HttpUtils.postCbor(
            `${config.baseUrl}/tx/submit`,
            body,
            Blockfrost.BlockfrostSubmitResponse,
            createHeaders(config.projectId)
          )
        ).pipe(Effect.mapError(wrapError("submitTx")))
      )
    )

/**
 * Whether a transaction is in a block
 */
export const isTxConfirmed =
  (config: BlockfrostConfig) =>
  (txHash: string): Request<boolean> =>
    withRateLimit(config)(
      HttpUtils.getOptional(
        `${config.baseUrl}/txs/${txHash}`,
        Blockfrost.BlockfrostTransaction,
        createHeaders(config.projectId)
      )
    ).pipe(Effect.map(Option.isSome), Effect.mapError(wrapError("isTxConfirmed")))

/**
 * Slot of the latest block
 */
export const currentSlot = (config: BlockfrostConfig): Request<number> =>
  withRateLimit(config)(
    HttpUtils.get(`${config.baseUrl}/blocks/latest`, Blockfrost.BlockfrostBlock, createHeaders(config.projectId))
  ).pipe(
    Effect.map((block) => block.slot),
    Effect.mapError(wrapError("currentSlot"))
  )

/**
 * Stake account of a reward address, `undefined` when never registered
 */
export const getStakeInfo =
  (config: BlockfrostConfig) =>
  (stakeAddress: string): Request<StakeInfo | undefined> =>
    withRateLimit(config)(
      HttpUtils.getOptional(
        `${config.baseUrl}/accounts/${stakeAddress}`,
        Blockfrost.BlockfrostAccount,
        createHeaders(config.projectId)
      )
    ).pipe(
      Effect.map((account) => Option.getOrUndefined(Option.map(account, Blockfrost.transformAccount))),
      Effect.mapError(wrapError("getStakeInfo"))
    )

/**
 * Withdrawable rewards of a reward address
 */
export const getRewardBalance =
  (config: BlockfrostConfig) =>
  (stakeAddress: string): Request<RewardBalance> =>
    getStakeInfo(config)(stakeAddress).pipe(
      Effect.map(
        (info): RewardBalance =>
          info === undefined || !info.active
            ? { _tag: "Unregistered" }
            : { _tag: "Registered", withdrawable: info.withdrawable }
      )
    )
