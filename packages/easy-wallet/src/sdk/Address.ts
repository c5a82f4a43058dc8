/**
 * Shelley addresses in their bech32 form.
 *
 * An address is decoded once into its header kind, network, payment credential and
 * staking reference. Only the parts needed for composing transactions are modelled:
 * which credential pays, which credential (if any) stakes, and how to derive the
 * matching reward address.
 *
 * @since 1.0.0
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils"
import { bech32 } from "bech32"
import { Data, Effect } from "effect"

// ============================================================================
// Errors
// ============================================================================

/**
 * @since 1.0.0
 * @category errors
 */
export class AddressError extends Data.TaggedError("AddressError")<{
  readonly message: string
  readonly cause?: unknown
}> {}

// ============================================================================
// Model
// ============================================================================

export type Network = "mainnet" | "testnet"

export type AddressKind = "base" | "pointer" | "enterprise" | "byron" | "reward"

/**
 * A 28 byte key or script hash, hex encoded.
 *
 * @since 1.0.0
 * @category model
 */
export interface Credential {
  readonly type: "key" | "script"
  readonly hash: string
}

/**
 * The staking part of an address: a credential, or a pointer to a stake
 * registration certificate.
 *
 * @since 1.0.0
 * @category model
 */
export type StakeReference =
  | { readonly _tag: "StakeCredential"; readonly credential: Credential }
  | { readonly _tag: "Pointer"; readonly pointer: string }

/**
 * @since 1.0.0
 * @category model
 */
export interface Address {
  readonly _tag: "Address"
  readonly kind: AddressKind
  readonly network: Network
  readonly payment: Credential | undefined
  readonly stake: StakeReference | undefined
  readonly bech32: string
  readonly byteLength: number
}

const BECH32_LIMIT = 1023
const HASH_BYTES = 28

const NETWORK_ID: Record<Network, number> = { mainnet: 1, testnet: 0 }

const addressPrefix = (network: Network) => (network === "mainnet" ? "addr" : "addr_test")
const rewardPrefix = (network: Network) => (network === "mainnet" ? "stake" : "stake_test")

const encode = (prefix: string, bytes: Uint8Array): string =>
  bech32.encode(prefix, bech32.toWords(bytes), BECH32_LIMIT)

/**
 * @since 1.0.0
 * @category predicates
 */
export const isAddress = (value: unknown): value is Address =>
  typeof value === "object" && value !== null && "_tag" in value && value._tag === "Address"

// ============================================================================
// Decoding
// ============================================================================

const credentialAt = (bytes: Uint8Array, offset: number, isScript: boolean): Credential => ({
  type: isScript ? "script" : "key",
  hash: bytesToHex(bytes.subarray(offset, offset + HASH_BYTES))
})

const fromBytes = (bytes: Uint8Array, prefix: string, text: string): Effect.Effect<Address, AddressError> => {
  if (bytes.length === 0) {
    return Effect.fail(new AddressError({ message: `Empty address payload: ${text}` }))
  }
  const header = bytes[0]
  const type = header >> 4
  const network: Network = (header & 0x0f) === NETWORK_ID.mainnet ? "mainnet" : "testnet"
  const expectedPrefix = type === 14 || type === 15 ? rewardPrefix(network) : addressPrefix(network)

  if (type !== 8 && prefix !== expectedPrefix) {
    return Effect.fail(
      new AddressError({ message: `Address prefix "${prefix}" does not match its header, expected "${expectedPrefix}"` })
    )
  }

  const base = { _tag: "Address" as const, network, bech32: text, byteLength: bytes.length }
  const requireLength = (length: number, exact: boolean) =>
    exact ? bytes.length === length : bytes.length >= length

  if (type <= 3) {
    if (!requireLength(1 + 2 * HASH_BYTES, true)) {
      return Effect.fail(new AddressError({ message: `Base address must be 57 bytes, got ${bytes.length}` }))
    }
    return Effect.succeed<Address>({
      ...base,
      kind: "base",
      payment: credentialAt(bytes, 1, (type & 1) === 1),
      stake: { _tag: "StakeCredential", credential: credentialAt(bytes, 1 + HASH_BYTES, (type & 2) === 2) }
    })
  }
  if (type === 4 || type === 5) {
    if (!requireLength(2 + HASH_BYTES, false)) {
      return Effect.fail(new AddressError({ message: `Pointer address too short: ${bytes.length} bytes` }))
    }
    return Effect.succeed<Address>({
      ...base,
      kind: "pointer",
      payment: credentialAt(bytes, 1, type === 5),
      stake: { _tag: "Pointer", pointer: bytesToHex(bytes.subarray(1 + HASH_BYTES)) }
    })
  }
  if (type === 6 || type === 7) {
    if (!requireLength(1 + HASH_BYTES, true)) {
      return Effect.fail(new AddressError({ message: `Enterprise address must be 29 bytes, got ${bytes.length}` }))
    }
    return Effect.succeed<Address>({ ...base, kind: "enterprise", payment: credentialAt(bytes, 1, type === 7), stake: undefined })
  }
  if (type === 8) {
    return Effect.succeed<Address>({ ...base, kind: "byron", payment: undefined, stake: undefined })
  }
  if (type === 14 || type === 15) {
    if (!requireLength(1 + HASH_BYTES, true)) {
      return Effect.fail(new AddressError({ message: `Reward address must be 29 bytes, got ${bytes.length}` }))
    }
    return Effect.succeed<Address>({
      ...base,
      kind: "reward",
      payment: undefined,
      stake: { _tag: "StakeCredential", credential: credentialAt(bytes, 1, type === 15) }
    })
  }
  return Effect.fail(new AddressError({ message: `Unknown address header type ${type}` }))
}

/**
 * Decode a bech32 address (`addr…`, `addr_test…`, `stake…`, `stake_test…`).
 *
 * @since 1.0.0
 * @category decoding
 */
export const fromBech32 = (text: string): Effect.Effect<Address, AddressError> =>
  Effect.try({
    try: () => bech32.decode(text, BECH32_LIMIT),
    catch: (cause) => new AddressError({ message: `Invalid bech32 address: ${text}`, cause })
  }).pipe(Effect.flatMap(({ prefix, words }) => fromBytes(Uint8Array.from(bech32.fromWords(words)), prefix, text)))

/**
 * Accept either a parsed address or its bech32 text.
 *
 * @since 1.0.0
 * @category decoding
 */
export const resolve = (address: Address | string): Effect.Effect<Address, AddressError> =>
  typeof address === "string" ? fromBech32(address) : Effect.succeed(address)

// ============================================================================
// Encoding
// ============================================================================

const credentialBytes = (credential: Credential): Uint8Array => {
  const bytes = hexToBytes(credential.hash)
  if (bytes.length !== HASH_BYTES) {
    throw new AddressError({ message: `Credential hash must be ${HASH_BYTES} bytes, got ${bytes.length}` })
  }
  return bytes
}

const assemble = (header: number, parts: ReadonlyArray<Uint8Array>): Uint8Array => {
  const total = parts.reduce((n, part) => n + part.length, 1)
  const bytes = new Uint8Array(total)
  bytes[0] = header
  let offset = 1
  for (const part of parts) {
    bytes.set(part, offset)
    offset += part.length
  }
  return bytes
}

/**
 * Build a base address (payment + stake) or, without a stake credential, an
 * enterprise address. Throws `AddressError` on malformed hashes.
 *
 * @since 1.0.0
 * @category constructors
 */
export const make = (params: {
  readonly network: Network
  readonly payment: Credential
  readonly stake?: Credential
}): Address => {
  const { network, payment, stake } = params
  const paymentBit = payment.type === "script" ? 1 : 0
  const networkId = NETWORK_ID[network]
  if (stake === undefined) {
    const bytes = assemble(((6 | paymentBit) << 4) | networkId, [credentialBytes(payment)])
    return {
      _tag: "Address",
      kind: "enterprise",
      network,
      payment,
      stake: undefined,
      bech32: encode(addressPrefix(network), bytes),
      byteLength: bytes.length
    }
  }
  const stakeBit = stake.type === "script" ? 2 : 0
  const bytes = assemble(((paymentBit | stakeBit) << 4) | networkId, [credentialBytes(payment), credentialBytes(stake)])
  return {
    _tag: "Address",
    kind: "base",
    network,
    payment,
    stake: { _tag: "StakeCredential", credential: stake },
    bech32: encode(addressPrefix(network), bytes),
    byteLength: bytes.length
  }
}

/**
 * Reward (stake) address for a staking credential.
 *
 * @since 1.0.0
 * @category constructors
 */
export const reward = (stake: Credential, network: Network): Address => {
  const header = ((stake.type === "script" ? 15 : 14) << 4) | NETWORK_ID[network]
  const bytes = assemble(header, [credentialBytes(stake)])
  return {
    _tag: "Address",
    kind: "reward",
    network,
    payment: undefined,
    stake: { _tag: "StakeCredential", credential: stake },
    bech32: encode(rewardPrefix(network), bytes),
    byteLength: bytes.length
  }
}

// ============================================================================
// Getters
// ============================================================================

/**
 * The staking credential, when the address carries one (base and reward addresses).
 *
 * @since 1.0.0
 * @category getters
 */
export const stakeCredential = (address: Address): Credential | undefined =>
  address.stake?._tag === "StakeCredential" ? address.stake.credential : undefined

/**
 * The reward address sharing this address's staking credential.
 *
 * @since 1.0.0
 * @category getters
 */
export const toRewardAddress = (address: Address): Address | undefined => {
  if (address.kind === "reward") return address
  const credential = stakeCredential(address)
  return credential === undefined ? undefined : reward(credential, address.network)
}

/**
 * The enterprise (payment only) form of an address.
 *
 * @since 1.0.0
 * @category getters
 */
export const toPaymentAddress = (address: Address): Address | undefined =>
  address.payment === undefined ? undefined : make({ network: address.network, payment: address.payment })

export const equals = (a: Address, b: Address): boolean => a.bech32 === b.bech32
