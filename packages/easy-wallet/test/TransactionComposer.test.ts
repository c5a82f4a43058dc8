import { describe, expect, it } from "@effect/vitest"
import { ConfigProvider, Effect, Fiber, TestClock } from "effect"

import * as Address from "../src/sdk/Address.js"
import { Certificate } from "../src/sdk/Certificate.js"
import * as TransactionComposer from "../src/sdk/composer/TransactionComposer.js"
import { makeWallet, makeWalletFromAddress } from "../src/sdk/wallet/Wallet.js"
import { BUILT_HASH, makeFakeBuilder } from "./utils/builder.js"
import type { FakeChainOptions } from "./utils/chain-context.js"
import { makeFakeChain, SUBMITTED_HASH } from "./utils/chain-context.js"
import {
  alicePaymentKey,
  aliceStakeKey,
  baseAddress,
  bobPaymentKey,
  enterpriseAddress,
  POOL_HASH,
  testPolicy,
  token
} from "./utils/fixtures.js"
import { createTestUtxo } from "./utils/utxo-helpers.js"

const ALICE_ADDRESS = makeWallet({
  name: "alice",
  signingKey: alicePaymentKey,
  stakeSigningKey: aliceStakeKey,
  network: "preprod"
}).address
const aliceCredential: Address.Credential = { type: "key", hash: aliceStakeKey.keyHash }
const ALICE_REWARD = Address.reward(aliceCredential, "testnet").bech32
const receiver = baseAddress("b1", "b2")

const holdings = [
  createTestUtxo({ address: ALICE_ADDRESS.bech32, lovelace: 5_000_000n, txHash: "tx1" }),
  createTestUtxo({ address: ALICE_ADDRESS.bech32, lovelace: 3_000_000n, txHash: "tx2" })
]

const setup = (
  options: FakeChainOptions = { utxos: { [ALICE_ADDRESS.bech32]: holdings } },
  builderOptions: { readonly fail?: boolean } = {}
) => {
  const chain = makeFakeChain(options)
  const builder = makeFakeBuilder(builderOptions)
  const alice = makeWallet({
    name: "alice",
    signingKey: alicePaymentKey,
    stakeSigningKey: aliceStakeKey,
    network: "preprod",
    context: chain.context,
    builder: builder.builder
  })
  return { chain, builder, alice }
}

describe("TransactionComposer", () => {
  it.effect("registers, delegates and withdraws, signing with the stake key once", () =>
    Effect.gen(function* () {
      const { alice, builder, chain } = setup({
        utxos: { [ALICE_ADDRESS.bech32]: holdings },
        stake: {
          [ALICE_REWARD]: {
            stakeAddress: ALICE_REWARD,
            active: false,
            poolId: null,
            withdrawable: 4_000_000n,
            controlled: 0n
          }
        }
      })
      const result = yield* TransactionComposer.transact(alice, {
        outputs: [{ address: receiver, amount: 1_000_000n }],
        stakeRegistration: true,
        delegations: POOL_HASH,
        withdrawals: "all",
        signers: [aliceStakeKey]
      })
      expect(result).toEqual(TransactionComposer.TransactResult.Submitted({ txHash: SUBMITTED_HASH }))

      const request = builder.requests[0]
      expect(request?.certificates).toEqual([
        Certificate.StakeRegistration({ credential: aliceCredential }),
        Certificate.StakeDelegation({ credential: aliceCredential, poolKeyHash: POOL_HASH })
      ])
      expect(request?.withdrawals).toEqual(new Map([[aliceStakeKey.keyHash, 4_000_000n]]))
      expect(builder.signatures).toEqual([[alicePaymentKey.keyHash, aliceStakeKey.keyHash]])
      expect(chain.submitted).toEqual([`84a0${BUILT_HASH}`])
    })
  )

  it.effect("builds without signing for a watch-only wallet", () =>
    Effect.gen(function* () {
      const watched = enterpriseAddress("cc")
      const { chain, builder } = setup({
        utxos: { [watched.bech32]: [createTestUtxo({ address: watched.bech32, lovelace: 9_000_000n })] }
      })
      const watcher = yield* makeWalletFromAddress({
        name: "watcher",
        address: watched,
        network: "preprod",
        context: chain.context,
        builder: builder.builder
      })
      const result = yield* TransactionComposer.transact(watcher, {
        outputs: [{ address: receiver, amount: 2_000_000n }],
        buildOnly: true
      })
      expect(result._tag).toBe("Built")
      if (result._tag === "Built") {
        expect(result.transaction).toEqual({ txHash: BUILT_HASH, bodyCborHex: "a0", fee: 170_000n })
        expect(result.request.changeAddress).toEqual(watched)
      }
      expect(builder.signatures).toEqual([])
      expect(chain.submitted).toEqual([])
    })
  )

  it.effect("never reaches the builder when composition fails", () =>
    Effect.gen(function* () {
      const { alice, builder, chain } = setup()
      const error = yield* Effect.flip(
        TransactionComposer.transact(alice, {
          outputs: [{ address: receiver, amount: 1_000_000n }],
          metadata: { "1337": { note: "x".repeat(65) } }
        })
      )
      expect(error._tag).toBe("MetadataFieldTooLong")
      expect(builder.requests).toEqual([])
      expect(chain.submitted).toEqual([])
    })
  )

  it.effect("stops before submitting when the builder fails", () =>
    Effect.gen(function* () {
      const { alice, chain } = setup(undefined, { fail: true })
      const error = yield* Effect.flip(
        TransactionComposer.transact(alice, { outputs: [{ address: receiver, amount: 1_000_000n }] })
      )
      expect(error.message).toBe("Insufficient funds")
      expect(chain.submitted).toEqual([])
    })
  )

  it.effect("returns the signed transaction without submitting", () =>
    Effect.gen(function* () {
      const { alice, chain } = setup()
      const result = yield* TransactionComposer.transact(alice, {
        outputs: [{ address: receiver, amount: 1_000_000n }],
        submit: false
      })
      expect(result).toEqual(
        TransactionComposer.TransactResult.Signed({ transaction: { txHash: BUILT_HASH, cborHex: `84a0${BUILT_HASH}` } })
      )
      expect(chain.submitted).toEqual([])
    })
  )

  it.effect("waits for confirmation, then refreshes the snapshot", () =>
    Effect.gen(function* () {
      const { alice, chain } = setup({ utxos: { [ALICE_ADDRESS.bech32]: holdings }, confirmAfter: 1 })
      const change = createTestUtxo({ address: ALICE_ADDRESS.bech32, lovelace: 6_830_000n, txHash: "tx3" })
      const fiber = yield* Effect.fork(
        TransactionComposer.transact(alice, {
          outputs: [{ address: receiver, amount: 1_000_000n }],
          awaitConfirmation: true,
          confirmationPollInterval: "1 second"
        })
      )
      chain.setUtxos(ALICE_ADDRESS.bech32, [change])
      yield* TestClock.adjust("5 seconds")
      const result = yield* Fiber.join(fiber)
      expect(result._tag).toBe("Submitted")
      expect(chain.confirmationChecks()).toBe(2)
      expect((yield* alice.Effect.snapshot()).utxos).toEqual([change])
    })
  )

  it.effect("needs a builder", () =>
    Effect.gen(function* () {
      const { chain } = setup()
      const alice = makeWallet({ name: "alice", signingKey: alicePaymentKey, network: "preprod", context: chain.context })
      const error = yield* Effect.flip(TransactionComposer.transact(alice))
      expect(error._tag).toBe("TransactionBuilderError")
      expect(error.message).toBe("No transaction builder for wallet alice")
    })
  )

  it.effect("needs a chain context", () =>
    Effect.gen(function* () {
      const { builder } = setup()
      const alice = makeWallet({ name: "alice", signingKey: alicePaymentKey, network: "preprod", builder: builder.builder })
      const error = yield* Effect.flip(TransactionComposer.transact(alice)).pipe(
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map()))
      )
      expect(error._tag).toBe("ChainContextMissing")
      expect(error.message).toBe("No chain context for wallet alice: pass one, or set BLOCKFROST_ID_PREPROD")
    })
  )

  describe("compose", () => {
    it.effect("deduplicates inputs and defaults the change to the caller", () =>
      Effect.gen(function* () {
        const { alice, chain } = setup()
        const { request, requiresCallerStakeKey } = yield* TransactionComposer.compose(
          alice,
          { inputs: [holdings[1], alice], outputs: [{ address: receiver, amount: 1_000_000n }] },
          chain.context
        )
        expect(request.inputs).toEqual([holdings[1], holdings[0]])
        expect(request.changeAddress).toEqual(ALICE_ADDRESS)
        expect(request.mergeChange).toBe(true)
        expect(request.mint).toBeUndefined()
        expect(request.mintOnly).toBeUndefined()
        expect(request.auxiliaryData).toBeUndefined()
        expect(request.ttl).toBeUndefined()
        expect(requiresCallerStakeKey).toBe(false)
      })
    )

    it.effect("resolves an explicit change address", () =>
      Effect.gen(function* () {
        const { alice, chain } = setup()
        const bob = makeWallet({ name: "bob", signingKey: bobPaymentKey, network: "preprod" })
        const toWallet = yield* TransactionComposer.compose(alice, { changeAddress: bob, mergeChange: false }, chain.context)
        expect(toWallet.request.changeAddress).toEqual(bob.address)
        expect(toWallet.request.mergeChange).toBe(false)

        const toText = yield* TransactionComposer.compose(alice, { changeAddress: receiver.bech32 }, chain.context)
        expect(toText.request.changeAddress).toEqual(receiver)
      })
    )

    it.effect("combines the message and caller metadata", () =>
      Effect.gen(function* () {
        const { alice, chain } = setup()
        const { request } = yield* TransactionComposer.compose(
          alice,
          { message: "hello", metadata: { "1337": { app: "demo" } } },
          chain.context
        )
        expect(request.auxiliaryData).toEqual(
          new Map<number, unknown>([
            [674, { msg: ["hello"] }],
            [1337, { app: "demo" }]
          ])
        )
      })
    )

    it.effect("takes the ttl from the minting policies", () =>
      Effect.gen(function* () {
        const { alice, chain } = setup()
        const policy = testPolicy("pixels", alicePaymentKey.keyHash, 75_000)
        const { request } = yield* TransactionComposer.compose(
          alice,
          { mints: [token({ policy, amount: 1, name: "abc" })] },
          chain.context
        )
        expect(request.ttl).toBe(75_000)
        expect(request.mint).toEqual(new Map([[policy.policyId, new Map([["616263", 1n]])]]))
      })
    )

    it.effect("keeps only positive quantities in the minimum-ADA mint value", () =>
      Effect.gen(function* () {
        const { alice, chain } = setup()
        const policy = testPolicy("pixels", alicePaymentKey.keyHash)
        const { request } = yield* TransactionComposer.compose(
          alice,
          { mints: [token({ policy, amount: 3, name: "abc" }), token({ policy, amount: -2, name: "def" })] },
          chain.context
        )
        expect(request.mint).toEqual(new Map([[policy.policyId, new Map([["616263", 3n], ["646566", -2n]])]]))
        expect(request.mintOnly).toEqual(new Map([[policy.policyId, new Map([["616263", 3n]])]]))
      })
    )
  })
})
