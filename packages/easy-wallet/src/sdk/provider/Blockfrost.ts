/**
 * @fileoverview Blockfrost chain context implementation
 * Public class implementing both Effect and Promise APIs
 */

import type { HttpClient } from "@effect/platform"
import { FetchHttpClient } from "@effect/platform"
import type { ConfigError, Duration } from "effect"
import { Effect, Layer, Option, Redacted } from "effect"

import { runEffect } from "../../utils/effect-runtime.js"
import type * as Address from "../Address.js"
import * as Environment from "../config/Environment.js"
import type { ChainContext, ChainContextEffect } from "./ChainContext.js"
import * as BlockfrostEffect from "./internal/BlockfrostEffect.js"

export interface BlockfrostOptions {
  /** Delay applied before every request. Defaults to 100 millis. */
  readonly rateLimit?: Duration.DurationInput
  /** HTTP client to send requests with. Defaults to the fetch based client. */
  readonly httpClient?: Layer.Layer<HttpClient.HttpClient>
}

const BASE_URLS: Record<Environment.CardanoNetwork, string> = {
  mainnet: "https://cardano-mainnet.blockfrost.io/api/v0",
  preprod: "https://cardano-preprod.blockfrost.io/api/v0",
  preview: "https://cardano-preview.blockfrost.io/api/v0"
}

/**
 * Blockfrost chain context for Cardano blockchain data access.
 *
 * Reports stake accounts, so it supports withdrawing the full reward balance
 * and skipping the registration of already registered stake addresses.
 *
 * @example
 * ```typescript
 * const blockfrost = preprod("your-preprod-project-id")
 *
 * // Using Promise API
 * const slot = await blockfrost.currentSlot()
 *
 * // Using Effect API
 * const slotEffect = blockfrost.Effect.currentSlot()
 * ```
 */
export class BlockfrostChainContext implements ChainContext {
  readonly Effect: Required<ChainContextEffect>
  readonly baseUrl: string
  readonly projectId?: string
  readonly network: Address.Network

  /**
   * @param baseUrl - The Blockfrost API base URL (e.g., "https://cardano-mainnet.blockfrost.io/api/v0")
   * @param network - Address network the API serves
   * @param projectId - Optional project ID for authenticated requests
   */
  constructor(baseUrl: string, network: Address.Network, projectId?: string, options: BlockfrostOptions = {}) {
    this.baseUrl = baseUrl
    this.network = network
    this.projectId = projectId

    const config: BlockfrostEffect.BlockfrostConfig = {
      baseUrl,
      projectId,
      rateLimit: options.rateLimit ?? "100 millis"
    }
    const client = options.httpClient ?? FetchHttpClient.layer
    const withClient = <A, E>(effect: Effect.Effect<A, E, HttpClient.HttpClient>) => Effect.provide(effect, client)

    this.Effect = {
      getUtxos: (address) => withClient(BlockfrostEffect.getUtxos(config)(address)),
      minimumValue: (output) => withClient(BlockfrostEffect.minimumValue(config)(output)),
      submitTx: (cborHex) => withClient(BlockfrostEffect.submitTx(config)(cborHex)),
      isTxConfirmed: (txHash) => withClient(BlockfrostEffect.isTxConfirmed(config)(txHash)),
      currentSlot: () => withClient(BlockfrostEffect.currentSlot(config)),
      getRewardBalance: (stakeAddress) => withClient(BlockfrostEffect.getRewardBalance(config)(stakeAddress)),
      getStakeInfo: (stakeAddress) => withClient(BlockfrostEffect.getStakeInfo(config)(stakeAddress))
    }
  }

  // ============================================================================
  // Promise-based API
  // ============================================================================

  getUtxos = (address: string) => runEffect(this.Effect.getUtxos(address))

  minimumValue = (output: Parameters<ChainContext["minimumValue"]>[0]) => runEffect(this.Effect.minimumValue(output))

  submitTx = (cborHex: string) => runEffect(this.Effect.submitTx(cborHex))

  isTxConfirmed = (txHash: string) => runEffect(this.Effect.isTxConfirmed(txHash))

  currentSlot = () => runEffect(this.Effect.currentSlot())

  getRewardBalance = (stakeAddress: string) => runEffect(this.Effect.getRewardBalance(stakeAddress))

  getStakeInfo = (stakeAddress: string) => runEffect(this.Effect.getStakeInfo(stakeAddress))
}

// ============================================================================
// Network Configuration Helpers
// ============================================================================

/**
 * Pre-configured Blockfrost chain context for Cardano mainnet
 */
export const mainnet = (projectId: string, options?: BlockfrostOptions): BlockfrostChainContext =>
  new BlockfrostChainContext(BASE_URLS.mainnet, "mainnet", projectId, options)

/**
 * Pre-configured Blockfrost chain context for Cardano preprod testnet
 */
export const preprod = (projectId: string, options?: BlockfrostOptions): BlockfrostChainContext =>
  new BlockfrostChainContext(BASE_URLS.preprod, "testnet", projectId, options)

/**
 * Pre-configured Blockfrost chain context for Cardano preview testnet
 */
export const preview = (projectId: string, options?: BlockfrostOptions): BlockfrostChainContext =>
  new BlockfrostChainContext(BASE_URLS.preview, "testnet", projectId, options)

const byNetwork = { mainnet, preprod, preview }

/**
 * Blockfrost chain context for `network` when `BLOCKFROST_ID_<NETWORK>` is set.
 *
 * @since 1.0.0
 * @category constructors
 */
export const fromEnvironment = (
  network: Environment.CardanoNetwork,
  options?: BlockfrostOptions
): Effect.Effect<Option.Option<BlockfrostChainContext>, ConfigError.ConfigError> =>
  Environment.blockfrostProjectId(network).pipe(
    Effect.map(Option.map((projectId) => byNetwork[network](Redacted.value(projectId), options)))
  )
