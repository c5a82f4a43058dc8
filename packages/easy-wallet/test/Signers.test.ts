import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import * as Signers from "../src/sdk/composer/phases/Signers.js"
import { makeWallet, makeWalletFromAddress } from "../src/sdk/wallet/Wallet.js"
import { alicePaymentKey, aliceStakeKey, bobPaymentKey, enterpriseAddress } from "./utils/fixtures.js"

const alice = makeWallet({ name: "alice", signingKey: alicePaymentKey, stakeSigningKey: aliceStakeKey, network: "preprod" })
const bob = makeWallet({ name: "bob", signingKey: bobPaymentKey, network: "preprod" })

const hashes = (keys: ReadonlyArray<{ readonly keyHash: string }>) => keys.map((key) => key.keyHash)

describe("Signers", () => {
  it.effect("puts the caller's key first", () =>
    Effect.gen(function* () {
      const keys = yield* Signers.resolve({ caller: alice, signers: [bob], requiresCallerStakeKey: false })
      expect(hashes(keys)).toEqual([alicePaymentKey.keyHash, bobPaymentKey.keyHash])
    })
  )

  it.effect("keeps explicit order when the caller's key is already listed", () =>
    Effect.gen(function* () {
      const keys = yield* Signers.resolve({
        caller: alice,
        signers: [bob, alicePaymentKey, bobPaymentKey],
        requiresCallerStakeKey: false
      })
      expect(hashes(keys)).toEqual([bobPaymentKey.keyHash, alicePaymentKey.keyHash])
    })
  )

  it.effect("adds the caller's stake key exactly once", () =>
    Effect.gen(function* () {
      const implicit = yield* Signers.resolve({ caller: alice, requiresCallerStakeKey: true })
      expect(hashes(implicit)).toEqual([alicePaymentKey.keyHash, aliceStakeKey.keyHash])

      const explicit = yield* Signers.resolve({
        caller: alice,
        signers: [aliceStakeKey],
        requiresCallerStakeKey: true
      })
      expect(hashes(explicit)).toEqual([alicePaymentKey.keyHash, aliceStakeKey.keyHash])
    })
  )

  it.effect("fails when a stake path needs a stake key the caller lacks", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Signers.resolve({ caller: bob, requiresCallerStakeKey: true }))
      expect(error._tag).toBe("InvalidStakeTarget")
    })
  )

  it.effect("signs for a watch-only caller with the given signers only", () =>
    Effect.gen(function* () {
      const watcher = yield* makeWalletFromAddress({ name: "watcher", address: enterpriseAddress("cc"), network: "preprod" })
      const keys = yield* Signers.resolve({ caller: watcher, signers: [bob], requiresCallerStakeKey: false })
      expect(hashes(keys)).toEqual([bobPaymentKey.keyHash])

      const error = yield* Effect.flip(Signers.resolve({ caller: watcher, requiresCallerStakeKey: false }))
      expect(error).toBeInstanceOf(Signers.NoSigningKeyError)
    })
  )

  it.effect("rejects signer wallets without keys", () =>
    Effect.gen(function* () {
      const watcher = yield* makeWalletFromAddress({ name: "watcher", address: enterpriseAddress("cc"), network: "preprod" })
      const error = yield* Effect.flip(
        Signers.resolve({ caller: alice, signers: [watcher], requiresCallerStakeKey: false })
      )
      expect(error.message).toBe("Signing wallet watcher does not have associated keys")
    })
  )
})
