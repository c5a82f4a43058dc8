/**
 * A quantity of one native asset under a policy: positive to mint, negative to burn.
 *
 * @since 1.0.0
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils"
import { Data, Effect } from "effect"

import { runSyncEffect } from "../utils/effect-runtime.js"
import * as Metadata from "./Metadata.js"
import type { TokenPolicy } from "./TokenPolicy.js"

/**
 * @since 1.0.0
 * @category errors
 */
export class TokenError extends Data.TaggedError("TokenError")<{
  readonly message: string
  readonly cause?: unknown
}> {}

/**
 * @since 1.0.0
 * @category model
 */
export interface Token {
  readonly _tag: "Token"
  readonly policy: TokenPolicy
  readonly amount: bigint
  readonly name: string
  readonly hexName: string
  readonly metadata: Metadata.MetadataValue | undefined
}

export const MAX_ASSET_NAME_BYTES = 32

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: false })

const wholeAmount = (amount: bigint | number): Effect.Effect<bigint, TokenError> =>
  typeof amount === "bigint"
    ? Effect.succeed(amount)
    : Number.isSafeInteger(amount)
      ? Effect.succeed(BigInt(amount))
      : Effect.fail(new TokenError({ message: `Token amount must be a whole number, got ${amount}` }))

const names = (
  name: string | undefined,
  hexName: string | undefined
): Effect.Effect<{ readonly name: string; readonly hexName: string }, TokenError> =>
  Effect.gen(function* () {
    if (hexName !== undefined) {
      const bytes = yield* Effect.try({
        try: () => hexToBytes(hexName),
        catch: (cause) => new TokenError({ message: `Asset name is not valid hex: ${hexName}`, cause })
      })
      return { name: decoder.decode(bytes), hexName: bytesToHex(bytes), size: bytes.length }
    }
    const bytes = encoder.encode(name ?? "")
    return { name: name ?? "", hexName: bytesToHex(bytes), size: bytes.length }
  }).pipe(
    Effect.filterOrFail(
      ({ size }) => size <= MAX_ASSET_NAME_BYTES,
      ({ hexName, size }) =>
        new TokenError({ message: `Asset name ${hexName} is ${size} bytes, at most ${MAX_ASSET_NAME_BYTES} allowed` })
    ),
    Effect.map(({ hexName, name }) => ({ name, hexName }))
  )

/**
 * Create a token. When both `name` and `hexName` are given, `hexName` wins and
 * `name` is decoded from it.
 *
 * @example
 * ```typescript
 * import { Token, TokenPolicy } from "easy-wallet"
 *
 * const policy = TokenPolicy.fromPolicyId("pixels", "a0".repeat(28))
 * const program = Token.make({ policy, amount: 1, name: "Pixel1", metadata: { name: "Pixel #1" } })
 * ```
 *
 * @since 1.0.0
 * @category constructors
 */
export const make = (params: {
  readonly policy: TokenPolicy
  readonly amount: bigint | number
  readonly name?: string
  readonly hexName?: string
  readonly metadata?: unknown
}): Effect.Effect<Token, TokenError | Metadata.MetadataError> =>
  Effect.gen(function* () {
    const amount = yield* wholeAmount(params.amount)
    const { hexName, name } = yield* names(params.name, params.hexName)
    const metadata = params.metadata === undefined ? undefined : yield* Metadata.validate(params.metadata)
    return { _tag: "Token", policy: params.policy, amount, name, hexName, metadata } satisfies Token
  })

/**
 * Synchronous {@link make}; throws the tagged error on invalid input.
 *
 * @since 1.0.0
 * @category constructors
 */
export const makeUnsafe = (params: Parameters<typeof make>[0]): Token => runSyncEffect(make(params))

/**
 * The same token with another amount (e.g. negated for a burn).
 *
 * @since 1.0.0
 * @category combinators
 */
export const withAmount = (token: Token, amount: bigint): Token => ({ ...token, amount })

export const isMint = (token: Token): boolean => token.amount > 0n

export const isToken = (value: unknown): value is Token =>
  typeof value === "object" && value !== null && "_tag" in value && value._tag === "Token"
