/**
 * Native (timelock / multisig) scripts in the JSON layout used by cardano-cli policy files.
 *
 * Hashing a script into a policy id needs its CBOR form and is left to a
 * {@link NativeScriptHasher} supplied by the caller.
 *
 * @since 1.0.0
 */

import { Data, Effect, Schema } from "effect"

export interface Sig {
  readonly type: "sig"
  readonly keyHash: string
}

export interface All {
  readonly type: "all"
  readonly scripts: ReadonlyArray<NativeScript>
}

export interface Any {
  readonly type: "any"
  readonly scripts: ReadonlyArray<NativeScript>
}

export interface AtLeast {
  readonly type: "atLeast"
  readonly required: number
  readonly scripts: ReadonlyArray<NativeScript>
}

/** Valid only before the slot (invalid-hereafter). */
export interface Before {
  readonly type: "before"
  readonly slot: number
}

/** Valid only from the slot on (invalid-before). */
export interface After {
  readonly type: "after"
  readonly slot: number
}

export type NativeScript = Sig | All | Any | AtLeast | Before | After

/**
 * Computes the policy id (blake2b-224 of the tagged CBOR script) of a native script.
 *
 * @since 1.0.0
 * @category model
 */
export type NativeScriptHasher = (script: NativeScript) => string

/**
 * @since 1.0.0
 * @category errors
 */
export class NativeScriptError extends Data.TaggedError("NativeScriptError")<{
  readonly message: string
  readonly cause?: unknown
}> {}

// ============================================================================
// Schema
// ============================================================================

const KeyHash = Schema.String.pipe(Schema.pattern(/^[0-9a-fA-F]{56}$/))

const Scripts = Schema.Array(Schema.suspend((): Schema.Schema<NativeScript> => NativeScriptSchema))

/**
 * @since 1.0.0
 * @category schemas
 */
export const NativeScriptSchema: Schema.Schema<NativeScript> = Schema.Union(
  Schema.Struct({ type: Schema.Literal("sig"), keyHash: KeyHash }),
  Schema.Struct({ type: Schema.Literal("all"), scripts: Scripts }),
  Schema.Struct({ type: Schema.Literal("any"), scripts: Scripts }),
  Schema.Struct({ type: Schema.Literal("atLeast"), required: Schema.NonNegativeInt, scripts: Scripts }),
  Schema.Struct({ type: Schema.Literal("before"), slot: Schema.NonNegativeInt }),
  Schema.Struct({ type: Schema.Literal("after"), slot: Schema.NonNegativeInt })
)

/**
 * Parse a policy script from its JSON form.
 *
 * @since 1.0.0
 * @category decoding
 */
export const fromJson = (json: unknown): Effect.Effect<NativeScript, NativeScriptError> =>
  Schema.decodeUnknown(NativeScriptSchema)(json).pipe(
    Effect.mapError((cause) => new NativeScriptError({ message: "Invalid native script", cause }))
  )

// ============================================================================
// Constructors
// ============================================================================

export const sig = (keyHash: string): Sig => ({ type: "sig", keyHash })

export const all = (scripts: ReadonlyArray<NativeScript>): All => ({ type: "all", scripts })

export const any = (scripts: ReadonlyArray<NativeScript>): Any => ({ type: "any", scripts })

export const atLeast = (required: number, scripts: ReadonlyArray<NativeScript>): AtLeast => ({
  type: "atLeast",
  required,
  scripts
})

export const before = (slot: number): Before => ({ type: "before", slot })

export const after = (slot: number): After => ({ type: "after", slot })

// ============================================================================
// Inspection
// ============================================================================

const sameScripts = (a: ReadonlyArray<NativeScript>, b: ReadonlyArray<NativeScript>): boolean =>
  a.length === b.length && a.every((script, i) => equals(script, b[i]))

/**
 * Structural equality.
 *
 * @since 1.0.0
 * @category equality
 */
export const equals = (a: NativeScript, b: NativeScript): boolean => {
  if (a === b) return true
  switch (a.type) {
    case "sig":
      return b.type === "sig" && a.keyHash.toLowerCase() === b.keyHash.toLowerCase()
    case "all":
    case "any":
      return b.type === a.type && sameScripts(a.scripts, b.scripts)
    case "atLeast":
      return b.type === "atLeast" && a.required === b.required && sameScripts(a.scripts, b.scripts)
    case "before":
    case "after":
      return b.type === a.type && a.slot === b.slot
  }
}

/**
 * Slot after which the script can no longer validate: a top-level `before`, or the
 * earliest `before` among the conjuncts of an `all`.
 *
 * @since 1.0.0
 * @category getters
 */
export const invalidHereafter = (script: NativeScript): number | undefined => {
  if (script.type === "before") return script.slot
  if (script.type !== "all") return undefined
  let slot: number | undefined
  for (const child of script.scripts) {
    const childSlot = invalidHereafter(child)
    if (childSlot !== undefined && (slot === undefined || childSlot < slot)) {
      slot = childSlot
    }
  }
  return slot
}

/**
 * Key hashes every validating transaction must be signed with (`sig` leaves reached
 * through `all` nodes).
 *
 * @since 1.0.0
 * @category getters
 */
export const requiredSignatures = (script: NativeScript): Array<string> => {
  if (script.type === "sig") return [script.keyHash]
  if (script.type !== "all") return []
  return script.scripts.flatMap(requiredSignatures)
}
