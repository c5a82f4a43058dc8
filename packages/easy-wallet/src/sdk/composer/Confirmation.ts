import type { Duration } from "effect"
import { Effect, Schedule } from "effect"

import type { ChainContext } from "../provider/ChainContext.js"

/**
 * One confirmation check. Query failures count as "not yet".
 *
 * @since 1.0.0
 * @category confirmation
 */
export const checkConfirmed = (context: ChainContext, txHash: string): Effect.Effect<boolean> =>
  context.Effect.isTxConfirmed(txHash).pipe(
    Effect.catchAll((error) =>
      Effect.logDebug(`Confirmation check of ${txHash} failed: ${error.message}`).pipe(Effect.as(false))
    )
  )

/**
 * Check now, then every `interval`, until the transaction is seen on chain.
 * There is no timeout; interrupt the fiber to give up.
 *
 * @since 1.0.0
 * @category confirmation
 */
export const awaitConfirmation = (
  context: ChainContext,
  txHash: string,
  interval: Duration.DurationInput
): Effect.Effect<void> =>
  checkConfirmed(context, txHash).pipe(
    Effect.tap((confirmed) =>
      confirmed ? Effect.logInfo(`Transaction ${txHash} confirmed`) : Effect.logDebug(`Waiting for ${txHash}`)
    ),
    Effect.repeat({ schedule: Schedule.spaced(interval), until: (confirmed) => confirmed }),
    Effect.asVoid
  )
