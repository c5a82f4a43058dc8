/**
 * Transaction metadata: validation and CIP-20 message formatting.
 *
 * Metadata is a tree of maps, lists and scalar leaves. The ledger caps every
 * text or byte field at 64 bytes, so each map key and each scalar leaf is checked
 * against that limit in its string form. Anything that is not a plain tree of
 * strings, numbers and bigints cannot be encoded and is rejected.
 *
 * @since 1.0.0
 */

import { Data, Effect, Either } from "effect"

// ============================================================================
// Errors
// ============================================================================

/**
 * @since 1.0.0
 * @category errors
 */
export class MetadataFieldTooLongError extends Data.TaggedError("MetadataFieldTooLong")<{
  readonly message: string
  readonly path: ReadonlyArray<string>
  readonly field: string
}> {}

/**
 * @since 1.0.0
 * @category errors
 */
export class MetadataNotSerializableError extends Data.TaggedError("MetadataNotSerializable")<{
  readonly message: string
  readonly path: ReadonlyArray<string>
}> {}

export type MetadataError = MetadataFieldTooLongError | MetadataNotSerializableError

// ============================================================================
// Model
// ============================================================================

export type MetadataKey = string | number | bigint

export type MetadataValue =
  | string
  | number
  | bigint
  | ReadonlyArray<MetadataValue>
  | ReadonlyMap<MetadataKey, MetadataValue>
  | { readonly [key: string]: MetadataValue }

/**
 * Auxiliary data document: top-level integer labels to metadata trees.
 *
 * @since 1.0.0
 * @category model
 */
export type AuxiliaryData = ReadonlyMap<number, MetadataValue>

export const MAX_FIELD_BYTES = 64

/** CIP-25 token metadata label. */
export const MINT_METADATA_LABEL = 721

/** CIP-20 transaction message label. */
export const MESSAGE_LABEL = 674

const encoder = new TextEncoder()

export const byteLength = (text: string): number => encoder.encode(text).length

// ============================================================================
// Validation
// ============================================================================

const isPlainObject = (value: object): value is { readonly [key: string]: unknown } => {
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

const describe = (value: unknown): string => {
  if (value === null) return "null"
  if (typeof value === "object") return value.constructor?.name ?? "object"
  return typeof value
}

type Check<A> = Either.Either<A, MetadataError>

const checkField = (field: string, path: ReadonlyArray<string>, what: string): MetadataFieldTooLongError | undefined =>
  byteLength(field) > MAX_FIELD_BYTES
    ? new MetadataFieldTooLongError({
        message: `Metadata ${what} is too long (> ${MAX_FIELD_BYTES} bytes) at ${path.join(".") || "<root>"}: ${field}`,
        path,
        field
      })
    : undefined

const notSerializable = (path: ReadonlyArray<string>, value: unknown, reason?: string) =>
  new MetadataNotSerializableError({
    message: `Metadata at ${path.join(".") || "<root>"} is not serializable: ${reason ?? describe(value)}`,
    path
  })

const checkKey = (key: unknown, path: ReadonlyArray<string>): Check<MetadataKey> => {
  if (typeof key === "string" || typeof key === "bigint" || (typeof key === "number" && Number.isFinite(key))) {
    const tooLong = checkField(String(key), path, "key")
    return tooLong ? Either.left(tooLong) : Either.right(key)
  }
  return Either.left(notSerializable(path, key, `key of type ${describe(key)}`))
}

const check = (value: unknown, path: ReadonlyArray<string>, ancestors: Set<object>): Check<MetadataValue> => {
  if (typeof value === "string" || typeof value === "bigint") {
    const tooLong = checkField(String(value), path, "field")
    return tooLong ? Either.left(tooLong) : Either.right(value)
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return Either.left(notSerializable(path, value, String(value)))
    const tooLong = checkField(String(value), path, "field")
    return tooLong ? Either.left(tooLong) : Either.right(value)
  }
  if (typeof value !== "object" || value === null) {
    return Either.left(notSerializable(path, value))
  }
  if (ancestors.has(value)) {
    return Either.left(notSerializable(path, value, "circular reference"))
  }

  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      const items: Array<MetadataValue> = []
      for (let i = 0; i < value.length; i++) {
        const item = check(value[i], [...path, String(i)], ancestors)
        if (Either.isLeft(item)) return item
        items.push(item.right)
      }
      return Either.right(items)
    }
    if (value instanceof Map) {
      const entries = new Map<MetadataKey, MetadataValue>()
      for (const [k, v] of value) {
        const childPath = [...path, String(k)]
        const key = checkKey(k, childPath)
        if (Either.isLeft(key)) return key
        const item = check(v, childPath, ancestors)
        if (Either.isLeft(item)) return item
        entries.set(key.right, item.right)
      }
      return Either.right(entries)
    }
    if (isPlainObject(value)) {
      const record: Record<string, MetadataValue> = {}
      for (const [k, v] of Object.entries(value)) {
        const childPath = [...path, k]
        const key = checkKey(k, childPath)
        if (Either.isLeft(key)) return key
        const item = check(v, childPath, ancestors)
        if (Either.isLeft(item)) return item
        record[k] = item.right
      }
      return Either.right(record)
    }
    return Either.left(notSerializable(path, value))
  } finally {
    ancestors.delete(value)
  }
}

/**
 * Validate a metadata tree, returning a typed copy of it.
 *
 * Fails on the first violation in depth-first order:
 * - `MetadataFieldTooLong` when a map key or scalar leaf exceeds 64 bytes as a string;
 * - `MetadataNotSerializable` on `null`, booleans, `undefined`, functions, symbols,
 *   non-finite numbers, class instances or circular references.
 *
 * @example
 * ```typescript
 * import { Metadata } from "easy-wallet"
 *
 * const program = Metadata.validate({ name: "Pixel #1", tags: ["art", "pixel"] })
 * ```
 *
 * @since 1.0.0
 * @category validation
 */
export const validate = (value: unknown): Effect.Effect<MetadataValue, MetadataError> =>
  Effect.suspend(() =>
    Either.match(check(value, [], new Set()), {
      onLeft: (error) => Effect.fail(error),
      onRight: (validated) => Effect.succeed(validated)
    })
  )

/**
 * Whether a validated value carries anything (non-empty container or any scalar).
 *
 * @since 1.0.0
 * @category predicates
 */
export const isNonEmpty = (value: MetadataValue): boolean => {
  if (Array.isArray(value)) return value.length > 0
  if (value instanceof Map) return value.size > 0
  if (typeof value === "object") return Object.keys(value).length > 0
  return true
}

// ============================================================================
// CIP-20 messages
// ============================================================================

/**
 * Split a string into segments of at most 64 UTF-8 bytes, never splitting a code point.
 *
 * @since 1.0.0
 * @category messages
 */
export const chunk = (text: string, maxBytes: number = MAX_FIELD_BYTES): Array<string> => {
  const chunks: Array<string> = []
  let current = ""
  let currentBytes = 0
  for (const codePoint of text) {
    const size = byteLength(codePoint)
    if (currentBytes + size > maxBytes && current !== "") {
      chunks.push(current)
      current = ""
      currentBytes = 0
    }
    current += codePoint
    currentBytes += size
  }
  if (current !== "") chunks.push(current)
  return chunks
}

/**
 * Format a message for label 674. A single string is chunked; a list is taken
 * as-is and every line must fit in 64 bytes.
 *
 * @since 1.0.0
 * @category messages
 */
export const formatMessage = (
  message: string | ReadonlyArray<string>
): Effect.Effect<{ readonly msg: ReadonlyArray<string> }, MetadataError> =>
  Effect.suspend<{ readonly msg: ReadonlyArray<string> }, MetadataError, never>(() => {
    const lines: ReadonlyArray<unknown> = typeof message === "string" ? chunk(message) : message
    const msg: Array<string> = []
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]
      const path = ["msg", String(i)]
      if (typeof line !== "string") {
        return Effect.fail(notSerializable(path, line, `message line must be a string, got ${describe(line)}`))
      }
      const tooLong = checkField(line, path, "message line")
      if (tooLong) return Effect.fail(tooLong)
      msg.push(line)
    }
    return Effect.succeed({ msg })
  })
