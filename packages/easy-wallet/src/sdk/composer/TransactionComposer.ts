/**
 * Transaction composer: turns one set of wallet intents into one transaction.
 *
 * ## Pipeline
 *
 * 1. resolve the chain context, the builder and the input sources
 * 2. mint ledger, auxiliary data and stake certificates, each on its own slice of the params
 * 3. format outputs (minimum values are queried here)
 * 4. resolve the change address and, unless building only, the signers
 * 5. hand the request to the builder, then optionally submit and wait for confirmation
 *
 * Any failure aborts the whole composition before the builder is called, so nothing
 * is ever submitted from a half-composed request.
 *
 * @since 1.0.0
 */

import type { ConfigError, Duration } from "effect"
import { Data, Effect } from "effect"

import * as Address from "../Address.js"
import type * as Amount from "../Amount.js"
import type {
  SignedTransaction,
  TransactionBuilder,
  TransactionRequest,
  UnsignedTransaction
} from "../builders/TransactionBuilder.js"
import { TransactionBuilderError } from "../builders/TransactionBuilder.js"
import * as Environment from "../config/Environment.js"
import type * as Metadata from "../Metadata.js"
import * as MultiAsset from "../MultiAsset.js"
import type { ChainContext, ChainContextMissingError, ProviderError } from "../provider/ChainContext.js"
import type { Token } from "../Token.js"
import { awaitConfirmation } from "./Confirmation.js"
import * as AuxiliaryData from "./phases/AuxiliaryData.js"
import type { EmptyInputSetError } from "./phases/Inputs.js"
import { resolveInputs } from "./phases/Inputs.js"
import * as MintLedger from "./phases/MintLedger.js"
import * as Outputs from "./phases/Outputs.js"
import * as Signers from "./phases/Signers.js"
import * as StakeCertificates from "./phases/StakeCertificates.js"
import type { SourceInput, WalletHandle } from "./Source.js"
import { isWallet, normalize, resolveContext } from "./Source.js"
import * as StakeInput from "./StakeInput.js"

// ============================================================================
// Params & results
// ============================================================================

/**
 * Everything one `transact` call can do.
 *
 * @since 1.0.0
 * @category model
 */
export interface TransactParams {
  readonly outputs?: ReadonlyArray<Outputs.Output>
  /** Spend sources. Defaults to the caller's own wallet. */
  readonly inputs?: ReadonlyArray<SourceInput>
  /** Tokens to mint (positive) or burn (negative). */
  readonly mints?: ReadonlyArray<Token>
  readonly stakeRegistration?: StakeInput.RegistrationInput
  readonly delegations?: StakeInput.DelegationInput
  readonly withdrawals?: StakeInput.WithdrawalInput
  /** CIP-20 message (label 674). */
  readonly message?: string | ReadonlyArray<string>
  readonly metadata?: AuxiliaryData.CallerMetadata
  readonly signers?: ReadonlyArray<Signers.Signer>
  /** Defaults to the caller's full address. */
  readonly changeAddress?: WalletHandle | Address.Address | string
  /** Defaults to `true`. */
  readonly mergeChange?: boolean
  readonly buildOnly?: boolean
  /** Defaults to `true`; with `false` the signed transaction is returned instead. */
  readonly submit?: boolean
  readonly awaitConfirmation?: boolean
  /** Overrides `CONFIRMATION_POLL_INTERVAL`. */
  readonly confirmationPollInterval?: Duration.DurationInput
  readonly context?: ChainContext
  readonly builder?: TransactionBuilder
}

/**
 * @since 1.0.0
 * @category model
 */
export type TransactResult = Data.TaggedEnum<{
  Built: { readonly transaction: UnsignedTransaction; readonly request: TransactionRequest }
  Signed: { readonly transaction: SignedTransaction }
  Submitted: { readonly txHash: string }
}>

/**
 * @since 1.0.0
 * @category constructors
 */
export const TransactResult = Data.taggedEnum<TransactResult>()

/**
 * @since 1.0.0
 * @category errors
 */
export type TransactError =
  | ChainContextMissingError
  | ConfigError.ConfigError
  | ProviderError
  | Address.AddressError
  | Amount.TypeMismatchError
  | EmptyInputSetError
  | MintLedger.PolicyScriptMissingError
  | MintLedger.PolicyScriptConflictError
  | Metadata.MetadataError
  | StakeCertificates.StakeCertificatesError
  | Signers.NoSigningKeyError
  | TransactionBuilderError

// ============================================================================
// Composition
// ============================================================================

const resolveBuilder = (
  caller: WalletHandle,
  explicit?: TransactionBuilder
): Effect.Effect<TransactionBuilder, TransactionBuilderError> => {
  const builder = explicit ?? caller.builder
  return builder
    ? Effect.succeed(builder)
    : Effect.fail(new TransactionBuilderError({ message: `No transaction builder for wallet ${caller.name}` }))
}

const resolveChangeAddress = (
  caller: WalletHandle,
  changeAddress: TransactParams["changeAddress"]
): Effect.Effect<Address.Address, Address.AddressError> => {
  if (changeAddress === undefined) return Effect.succeed(caller.address)
  if (isWallet(changeAddress)) return Effect.succeed(changeAddress.address)
  return Address.resolve(changeAddress)
}

/**
 * Assemble the request without touching the builder.
 *
 * @since 1.0.0
 * @category composition
 */
export const compose = (
  caller: WalletHandle,
  params: TransactParams,
  context: ChainContext
): Effect.Effect<
  { readonly request: TransactionRequest; readonly requiresCallerStakeKey: boolean },
  TransactError
> =>
  Effect.gen(function* () {
    const sources = yield* Effect.forEach(params.inputs ?? [caller], normalize)
    const inputs = yield* resolveInputs(sources, context)

    const ledger = yield* MintLedger.collect(params.mints ?? [])
    const auxiliaryData = yield* AuxiliaryData.assemble({
      mintMetadata: ledger.mintMetadata,
      message: params.message,
      metadata: params.metadata
    })
    const stake = yield* StakeCertificates.resolve(
      {
        registration: StakeInput.normalizeRegistration(params.stakeRegistration),
        delegation: StakeInput.normalizeDelegation(params.delegations),
        withdrawal: StakeInput.normalizeWithdrawal(params.withdrawals)
      },
      caller,
      context
    )

    const outputs = yield* Outputs.format(params.outputs ?? [], context)
    const changeAddress = yield* resolveChangeAddress(caller, params.changeAddress)

    const request: TransactionRequest = {
      inputs,
      outputs,
      mint: MultiAsset.isEmpty(ledger.assets) ? undefined : ledger.assets,
      mintOnly: MultiAsset.isEmpty(ledger.mintOnly) ? undefined : ledger.mintOnly,
      nativeScripts: ledger.nativeScripts,
      certificates: stake.certificates,
      withdrawals: stake.withdrawals,
      auxiliaryData,
      changeAddress,
      mergeChange: params.mergeChange ?? true,
      ttl: ledger.ttl
    }

    yield* Effect.logDebug(
      `Composed request: ${inputs.length} inputs, ${outputs.length} outputs, ` +
        `${request.certificates.length} certificates, ${request.withdrawals.size} withdrawals`
    )
    return { request, requiresCallerStakeKey: stake.requiresCallerStakeKey }
  })

/**
 * Compose and, per the flags, build, sign, submit and await confirmation.
 *
 * @since 1.0.0
 * @category composition
 */
export const transact = (
  caller: WalletHandle,
  params: TransactParams = {}
): Effect.Effect<TransactResult, TransactError> =>
  Effect.gen(function* () {
    const context = yield* resolveContext(caller, params.context)
    const builder = yield* resolveBuilder(caller, params.builder)
    const { request, requiresCallerStakeKey } = yield* compose(caller, params, context)

    if (params.buildOnly) {
      const transaction = yield* builder.Effect.build(request)
      return TransactResult.Built({ transaction, request })
    }

    const keys = yield* Signers.resolve({ caller, signers: params.signers, requiresCallerStakeKey })
    const transaction = yield* builder.Effect.buildAndSign(request, keys)

    if (params.submit === false) {
      return TransactResult.Signed({ transaction })
    }

    const txHash = yield* context.Effect.submitTx(transaction.cborHex)
    yield* Effect.logInfo(`Submitted transaction ${txHash}`)

    if (params.awaitConfirmation) {
      const interval = params.confirmationPollInterval ?? (yield* Environment.confirmationPollInterval)
      yield* awaitConfirmation(context, txHash, interval)
      yield* caller.Effect.sync(context)
    }

    return TransactResult.Submitted({ txHash })
  })
