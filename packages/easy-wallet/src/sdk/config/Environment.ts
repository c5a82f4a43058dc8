/**
 * Settings read from the environment through Effect `Config`.
 *
 * | Variable | Meaning | Default |
 * |---|---|---|
 * | `BLOCKFROST_ID_MAINNET` / `_PREPROD` / `_PREVIEW` | Blockfrost project id per network | unset |
 * | `CONFIRMATION_POLL_INTERVAL` | delay between confirmation checks | `10 seconds` |
 * | `LOG_LEVEL` | minimum level of the Promise API logger | `Info` |
 *
 * @since 1.0.0
 */

import { Config, Duration, LogLevel } from "effect"

/**
 * Networks a chain context can be configured for.
 *
 * @since 1.0.0
 * @category model
 */
export type CardanoNetwork = "mainnet" | "preprod" | "preview"

export const DEFAULT_CONFIRMATION_POLL_INTERVAL = Duration.seconds(10)

/**
 * @since 1.0.0
 * @category config
 */
export const blockfrostProjectId = (network: CardanoNetwork) =>
  Config.option(Config.redacted(`BLOCKFROST_ID_${network.toUpperCase()}`))

/**
 * @since 1.0.0
 * @category config
 */
export const confirmationPollInterval: Config.Config<Duration.Duration> = Config.duration(
  "CONFIRMATION_POLL_INTERVAL"
).pipe(Config.withDefault(DEFAULT_CONFIRMATION_POLL_INTERVAL))

/**
 * @since 1.0.0
 * @category config
 */
export const logLevel: Config.Config<LogLevel.LogLevel> = Config.logLevel("LOG_LEVEL").pipe(
  Config.withDefault(LogLevel.Info)
)
