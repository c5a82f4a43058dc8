import { Cause, Effect, Exit, Logger } from "effect"

import * as Environment from "../sdk/config/Environment.js"

/**
 * Patterns to filter from stack traces - Effect.ts internal implementation details
 */
const EFFECT_INTERNAL_PATTERNS = [
  /node_modules\/.*effect@.*\/node_modules\/effect\//,
  /node_modules\/effect\//,
  /at FiberRuntime\./,
  /at EffectPrimitive\./,
  /at Object\.Iterator/,
  /at runLoop/,
  /at evaluateEffect/,
  /at body \(/,
  /effect_instruction_i\d+/,
  /at pipeArguments/,
  /at pipe \(/,
  /at Arguments\./,
  /at Module\./,
  /at issue \(/,
  /at \.\.\.$/ // Lines like "... 7 lines matching cause stack trace ..."
]

/**
 * Clean a single error's stack trace by removing Effect.ts internals
 */
export function cleanStackTrace(stack: string | undefined): string {
  if (!stack) return ""

  const lines = stack.split("\n")
  const cleaned = lines.filter((line) => {
    // Keep the error message line (first line)
    if (!line.trim().startsWith("at ")) return true

    return !EFFECT_INTERNAL_PATTERNS.some((pattern) => pattern.test(line))
  })

  return cleaned.join("\n")
}

/**
 * Recursively clean error chain (error and all causes)
 */
function cleanErrorChain(error: unknown, depth = 0): unknown {
  if (!(error instanceof Error) || depth > 16) return error

  if (error.stack) {
    error.stack = cleanStackTrace(error.stack)
  }

  if (error.cause !== undefined) {
    cleanErrorChain(error.cause, depth + 1)
  }

  return error
}

const squash = <E>(cause: Cause.Cause<E>): unknown => cleanErrorChain(Cause.squash(cause))

/**
 * Pretty console logging at the configured minimum level.
 */
const withLogging = <A, E>(effect: Effect.Effect<A, E>) =>
  Effect.gen(function* () {
    const level = yield* Environment.logLevel
    return yield* Logger.withMinimumLogLevel(effect, level)
  }).pipe(Effect.provide(Logger.pretty))

/**
 * Run an Effect and convert it to a Promise with clean error handling.
 *
 * - Executes the Effect using Effect.runPromiseExit, logging through `Logger.pretty`
 * - On failure, extracts the error from the Exit and cleans stack traces
 * - Throws the cleaned error for standard Promise error handling
 *
 * @example
 * ```typescript
 * import { Effect } from "effect"
 * import { runEffect } from "easy-wallet"
 *
 * const lovelace = await runEffect(Effect.succeed(42n))
 * ```
 *
 * @since 1.0.0
 * @category utilities
 */
export async function runEffect<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(withLogging(effect))

  if (Exit.isFailure(exit)) {
    throw squash(exit.cause)
  }

  return exit.value
}

/**
 * Synchronous counterpart of {@link runEffect}, for Effects without async boundaries.
 * The failure is thrown as the tagged error itself rather than a FiberFailure.
 *
 * @since 1.0.0
 * @category utilities
 */
export function runSyncEffect<A, E>(effect: Effect.Effect<A, E>): A {
  const exit = Effect.runSyncExit(withLogging(effect))

  if (Exit.isFailure(exit)) {
    throw squash(exit.cause)
  }

  return exit.value
}
