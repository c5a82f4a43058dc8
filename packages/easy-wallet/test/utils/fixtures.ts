import { blake2b } from "@noble/hashes/blake2b"
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils"
import { Effect } from "effect"

import * as Address from "../../src/sdk/Address.js"
import type * as NativeScript from "../../src/sdk/NativeScript.js"
import * as Token from "../../src/sdk/Token.js"
import * as TokenPolicy from "../../src/sdk/TokenPolicy.js"
import { SigningKey } from "../../src/sdk/wallet/SigningKey.js"

/**
 * Stand-in for the CBOR script hash: blake2b-224 of the script's JSON.
 */
export const testHasher: NativeScript.NativeScriptHasher = (script) =>
  bytesToHex(blake2b(utf8ToBytes(JSON.stringify(script)), { dkLen: 28 }))

export const key = (byte: string): SigningKey => Effect.runSync(SigningKey.fromHex(byte.repeat(32)))

export const alicePaymentKey = key("11")
export const aliceStakeKey = key("12")
export const bobPaymentKey = key("21")
export const bobStakeKey = key("22")

export const hash = (byte: string): string => byte.repeat(28)

export const baseAddress = (payment: string, stake: string): Address.Address =>
  Address.make({
    network: "testnet",
    payment: { type: "key", hash: hash(payment) },
    stake: { type: "key", hash: hash(stake) }
  })

export const enterpriseAddress = (payment: string): Address.Address =>
  Address.make({ network: "testnet", payment: { type: "key", hash: hash(payment) } })

export const POOL_HASH = "c0".repeat(28)

/**
 * A policy signed by `keyHash`, valid before `slot`.
 */
export const testPolicy = (name: string, keyHash: string, slot = 90_000): TokenPolicy.TokenPolicy =>
  TokenPolicy.fromScript(
    name,
    { type: "all", scripts: [{ type: "sig", keyHash }, { type: "before", slot }] },
    testHasher
  )

export const token = (params: Parameters<typeof Token.make>[0]): Token.Token => Token.makeUnsafe(params)
