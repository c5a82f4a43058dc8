import { ed25519 } from "@noble/curves/ed25519.js"
import { blake2b } from "@noble/hashes/blake2b"
import { bytesToHex, hexToBytes } from "@noble/hashes/utils"
import { Data, Effect } from "effect"

/**
 * Error class for SigningKey related operations.
 *
 * @since 1.0.0
 * @category errors
 */
export class SigningKeyError extends Data.TaggedError("SigningKeyError")<{
  message?: string
  cause?: unknown
}> {}

const SECRET_BYTES = 32
// CBOR bytes header for a 32 byte string, as found in `cborHex` of text envelopes
const CBOR_BYTES_32 = "5820"

/**
 * An ed25519 signing key together with its verification key and key hash.
 *
 * The key hash (blake2b-224 of the verification key) is the payment or stake
 * credential the key controls.
 *
 * @since 1.0.0
 * @category model
 */
export class SigningKey {
  readonly _tag = "SigningKey" as const
  readonly verificationKey: Uint8Array
  readonly keyHash: string

  private constructor(private readonly secret: Uint8Array) {
    this.verificationKey = ed25519.getPublicKey(secret)
    this.keyHash = bytesToHex(blake2b(this.verificationKey, { dkLen: 28 }))
  }

  /**
   * Sign a message, returning the 64 byte signature.
   */
  sign(message: Uint8Array): Uint8Array {
    return ed25519.sign(message, this.secret)
  }

  verify(signature: Uint8Array, message: Uint8Array): boolean {
    return ed25519.verify(signature, message, this.verificationKey)
  }

  equals(other: SigningKey): boolean {
    return this.keyHash === other.keyHash
  }

  toString(): string {
    return `SigningKey(${this.keyHash})`
  }

  /**
   * @since 1.0.0
   * @category constructors
   */
  static fromBytes(secret: Uint8Array): Effect.Effect<SigningKey, SigningKeyError> {
    return secret.length === SECRET_BYTES
      ? Effect.sync(() => new SigningKey(Uint8Array.from(secret)))
      : Effect.fail(new SigningKeyError({ message: `Signing key must be ${SECRET_BYTES} bytes, got ${secret.length}` }))
  }

  /**
   * Accepts the raw 32 byte secret in hex, or the `cborHex` field of a
   * `PaymentSigningKeyShelley_ed25519` / `StakeSigningKeyShelley_ed25519` envelope.
   *
   * @since 1.0.0
   * @category constructors
   */
  static fromHex(hex: string): Effect.Effect<SigningKey, SigningKeyError> {
    const raw = hex.length === 2 * SECRET_BYTES + CBOR_BYTES_32.length && hex.startsWith(CBOR_BYTES_32)
      ? hex.slice(CBOR_BYTES_32.length)
      : hex
    return Effect.try({
      try: () => hexToBytes(raw),
      catch: (cause) => new SigningKeyError({ message: "Signing key is not valid hex", cause })
    }).pipe(Effect.flatMap(SigningKey.fromBytes))
  }
}

/**
 * @since 1.0.0
 * @category predicates
 */
export const isSigningKey = (value: unknown): value is SigningKey => value instanceof SigningKey
