import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import * as Address from "../src/sdk/Address.js"
import * as Amount from "../src/sdk/Amount.js"
import { Certificate } from "../src/sdk/Certificate.js"
import type { StakeInfo } from "../src/sdk/provider/ChainContext.js"
import { makeWallet, makeWalletFromAddress } from "../src/sdk/wallet/Wallet.js"
import { BUILT_HASH, makeFakeBuilder } from "./utils/builder.js"
import type { FakeChainOptions } from "./utils/chain-context.js"
import { makeFakeChain, SUBMITTED_HASH } from "./utils/chain-context.js"
import {
  alicePaymentKey,
  aliceStakeKey,
  baseAddress,
  bobPaymentKey,
  hash,
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

const policy = testPolicy("pixels", alicePaymentKey.keyHash)
const P = policy.policyId

const holdings = [
  createTestUtxo({
    address: ALICE_ADDRESS.bech32,
    lovelace: 5_000_000n,
    nativeAssets: { [`${P}616263`]: 5n },
    txHash: "tx1"
  }),
  createTestUtxo({ address: ALICE_ADDRESS.bech32, lovelace: 3_000_000n, txHash: "tx2" })
]

const account = (overrides: Partial<StakeInfo> = {}): StakeInfo => ({
  stakeAddress: ALICE_REWARD,
  active: true,
  poolId: POOL_HASH,
  withdrawable: 0n,
  controlled: 8_000_000n,
  ...overrides
})

const setup = (options: FakeChainOptions = { utxos: { [ALICE_ADDRESS.bech32]: holdings } }) => {
  const chain = makeFakeChain(options)
  const builder = makeFakeBuilder()
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

describe("Wallet", () => {
  describe("construction", () => {
    it("derives its addresses from the keys", () => {
      const { alice } = setup()
      expect(alice.address.bech32.startsWith("addr_test1")).toBe(true)
      expect(alice.address.byteLength).toBe(57)
      expect(alice.paymentAddress?.byteLength).toBe(29)
      expect(alice.stakeAddress?.bech32).toBe(ALICE_REWARD)
    })

    it("has no stake address without a stake key", () => {
      const bob = makeWallet({ name: "bob", signingKey: bobPaymentKey })
      expect(bob.network).toBe("mainnet")
      expect(bob.address.bech32.startsWith("addr1")).toBe(true)
      expect(bob.stakeAddress).toBeUndefined()
    })

    it.effect("watches an address of its own network", () =>
      Effect.gen(function* () {
        const watcher = yield* makeWalletFromAddress({ name: "watcher", address: receiver.bech32, network: "preview" })
        expect(watcher.signingKey).toBeUndefined()
        expect(watcher.address).toEqual(receiver)
      })
    )

    it.effect("refuses an address of another network", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          makeWalletFromAddress({ name: "watcher", address: receiver, network: "mainnet" })
        )
        expect(error.message).toBe("mainnet does not match the network of the provided address (testnet)")
      })
    )
  })

  describe("sync", () => {
    it.effect("snapshots lovelace and tokens", () =>
      Effect.gen(function* () {
        const { alice } = setup()
        yield* alice.Effect.sync()
        const snapshot = yield* alice.Effect.snapshot()
        expect(snapshot.utxos).toEqual(holdings)
        expect(snapshot.lovelace.lovelace).toBe(8_000_000n)
        expect(snapshot.ada.amount).toBe(8)
        expect(snapshot.tokens).toEqual([{ policyId: P, hexName: "616263", name: "abc", amount: 5n }])
      })
    )

    it.effect("treats a failed query as an empty wallet", () =>
      Effect.gen(function* () {
        const { alice } = setup({ failingAddresses: [ALICE_ADDRESS.bech32] })
        yield* alice.Effect.sync()
        const snapshot = yield* alice.Effect.snapshot()
        expect(snapshot.utxos).toEqual([])
        expect(snapshot.lovelace.isZero()).toBe(true)
      })
    )
  })

  describe("payments", () => {
    it.effect("sends ADA and submits the signed transaction", () =>
      Effect.gen(function* () {
        const { alice, builder, chain } = setup()
        const result = yield* alice.Effect.sendAda(receiver, Amount.ada(1.5))
        expect(result).toEqual({ _tag: "Submitted", txHash: SUBMITTED_HASH })
        expect(builder.requests[0]?.inputs).toEqual(holdings)
        expect(builder.requests[0]?.outputs).toEqual([
          { address: receiver, lovelace: 1_500_000n, assets: new Map() }
        ])
        expect(builder.signatures).toEqual([[alicePaymentKey.keyHash]])
        expect(chain.submitted).toEqual([`84a0${BUILT_HASH}`])
      })
    )

    it.effect("spends only the given UTxOs", () =>
      Effect.gen(function* () {
        const { alice, builder, chain } = setup()
        const [first] = holdings
        yield* alice.Effect.sendAda(receiver.bech32, 2_000_000n, { utxos: first })
        expect(builder.requests[0]?.inputs).toEqual([first])
        expect(chain.utxoQueries).toEqual([])
      })
    )

    it.effect("sends whole UTxOs through the change output", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup()
        yield* alice.Effect.sendUtxo(receiver, holdings)
        const request = builder.requests[0]
        expect(request?.outputs).toEqual([])
        expect(request?.inputs).toEqual(holdings)
        expect(request?.changeAddress).toEqual(receiver)
      })
    )

    it.effect("empties the last snapshot", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup()
        const error = yield* Effect.flip(alice.Effect.emptyWallet(receiver))
        expect(error._tag).toBe("EmptyInputSet")

        yield* alice.Effect.sync()
        yield* alice.Effect.emptyWallet(receiver)
        expect(builder.requests).toHaveLength(1)
        expect(builder.requests[0]?.inputs).toEqual(holdings)
        expect(builder.requests[0]?.changeAddress).toEqual(receiver)
      })
    )
  })

  describe("staking", () => {
    it.effect("registers and delegates in one transaction", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup()
        yield* alice.Effect.delegate(POOL_HASH)
        const request = builder.requests[0]
        expect(request?.certificates).toEqual([
          Certificate.StakeRegistration({ credential: aliceCredential }),
          Certificate.StakeDelegation({ credential: aliceCredential, poolKeyHash: POOL_HASH })
        ])
        expect(request?.outputs).toEqual([{ address: ALICE_ADDRESS, lovelace: 2_000_000n, assets: new Map() }])
        expect(builder.signatures).toEqual([[alicePaymentKey.keyHash, aliceStakeKey.keyHash]])
      })
    )

    it.effect("refuses to delegate an unregistered stake key without registering", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup()
        const error = yield* Effect.flip(alice.Effect.delegate(POOL_HASH, { register: false }))
        expect(error.message).toBe(
          "Cannot delegate to a pool. This wallet is not yet registered. Try again with register: true"
        )
        expect(builder.requests).toEqual([])
      })
    )

    it.effect("delegates without registering when the context cannot tell", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup({ utxos: { [ALICE_ADDRESS.bech32]: holdings }, stake: false })
        yield* alice.Effect.delegate(POOL_HASH, { register: false, amount: 3_000_000n })
        const request = builder.requests[0]
        expect(request?.certificates).toEqual([
          Certificate.StakeDelegation({ credential: aliceCredential, poolKeyHash: POOL_HASH })
        ])
        expect(request?.outputs[0]?.lovelace).toBe(3_000_000n)
      })
    )

    it.effect("needs staking keys", () =>
      Effect.gen(function* () {
        const bob = makeWallet({ name: "bob", signingKey: bobPaymentKey, network: "preprod" })
        const error = yield* Effect.flip(bob.Effect.delegate(POOL_HASH))
        expect(error.message).toBe("Wallet bob does not have staking keys")
      })
    )

    it.effect("withdraws the whole reward balance", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup({
          utxos: { [ALICE_ADDRESS.bech32]: holdings },
          stake: { [ALICE_REWARD]: account({ withdrawable: 5_000_000n }) }
        })
        yield* alice.Effect.withdrawRewards()
        const request = builder.requests[0]
        expect(request?.withdrawals).toEqual(new Map([[aliceStakeKey.keyHash, 5_000_000n]]))
        expect(request?.outputs).toEqual([{ address: ALICE_ADDRESS, lovelace: 1_000_000n, assets: new Map() }])
        expect(builder.signatures).toEqual([[alicePaymentKey.keyHash, aliceStakeKey.keyHash]])
      })
    )

    it.effect("withdraws an explicit amount", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup({ utxos: { [ALICE_ADDRESS.bech32]: holdings }, stake: false })
        yield* alice.Effect.withdrawRewards({ amount: Amount.ada(2) })
        expect(builder.requests[0]?.withdrawals).toEqual(new Map([[aliceStakeKey.keyHash, 2_000_000n]]))
      })
    )

    it.effect("has nothing to withdraw without rewards", () =>
      Effect.gen(function* () {
        const { alice } = setup({ stake: { [ALICE_REWARD]: account() } })
        const error = yield* Effect.flip(alice.Effect.withdrawRewards())
        expect(error.message).toBe("No rewards to withdraw")
      })
    )

    it.effect("reports the stake account", () =>
      Effect.gen(function* () {
        const { alice } = setup({ stake: { [ALICE_REWARD]: account({ withdrawable: 7_000_000n }) } })
        expect(yield* alice.Effect.stakeInfo()).toEqual(account({ withdrawable: 7_000_000n }))
        expect(yield* alice.Effect.poolId()).toBe(POOL_HASH)
        expect((yield* alice.Effect.withdrawableAmount()).lovelace).toBe(7_000_000n)
      })
    )

    it.effect("reports an unregistered stake address as empty", () =>
      Effect.gen(function* () {
        const { alice } = setup({})
        expect(yield* alice.Effect.stakeInfo()).toBeUndefined()
        expect(yield* alice.Effect.poolId()).toBeNull()
        expect((yield* alice.Effect.withdrawableAmount()).isZero()).toBe(true)
      })
    )

    it.effect("needs a context that reports stake accounts", () =>
      Effect.gen(function* () {
        const { alice } = setup({ stake: false })
        const error = yield* Effect.flip(alice.Effect.stakeInfo())
        expect(error.message).toBe("The chain context cannot report stake accounts")
      })
    )
  })

  describe("tokens", () => {
    it.effect("mints to a receiver with the minimum ADA", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup()
        const pixel = token({ policy, amount: 1, name: "abc", metadata: { name: "Pixel" } })
        const result = yield* alice.Effect.mintTokens(receiver, pixel, { buildOnly: true })
        expect(result._tag).toBe("Built")
        const request = builder.requests[0]
        expect(request?.outputs).toEqual([
          { address: receiver, lovelace: 1_150_000n, assets: new Map([[P, new Map([["616263", 1n]])]]) }
        ])
        expect(request?.mint).toEqual(new Map([[P, new Map([["616263", 1n]])]]))
        expect(request?.nativeScripts).toEqual([policy.script])
        expect(request?.auxiliaryData?.get(721)).toEqual(new Map([[P, new Map([["abc", { name: "Pixel" }]])]]))
        expect(request?.ttl).toBe(90_000)
        expect(builder.signatures).toEqual([])
      })
    )

    it.effect("burns tokens with a 1 ADA output", () =>
      Effect.gen(function* () {
        const { alice, builder } = setup()
        yield* alice.Effect.burnTokens(token({ policy, amount: 2, name: "abc" }), alice)
        const request = builder.requests[0]
        expect(request?.mint).toEqual(new Map([[P, new Map([["616263", -2n]])]]))
        expect(request?.outputs).toEqual([{ address: ALICE_ADDRESS, lovelace: 1_000_000n, assets: new Map() }])
      })
    )
  })

  describe("Promise API", () => {
    it("mirrors the Effect API", async () => {
      const { alice } = setup()
      await alice.sync()
      const snapshot = await alice.snapshot()
      expect(snapshot.lovelace.lovelace).toBe(8_000_000n)
      await expect(alice.sendAda(hash("00"), 1n)).rejects.toThrow()
    })
  })
})
