export * as Address from "./sdk/Address.js"
export * as Amount from "./sdk/Amount.js"
export * as Assets from "./sdk/Assets.js"
export * as TransactionBuilder from "./sdk/builders/TransactionBuilder.js"
export * as Certificate from "./sdk/Certificate.js"
export * as Confirmation from "./sdk/composer/Confirmation.js"
export * as AuxiliaryData from "./sdk/composer/phases/AuxiliaryData.js"
export * as Inputs from "./sdk/composer/phases/Inputs.js"
export * as MintLedger from "./sdk/composer/phases/MintLedger.js"
export * as Outputs from "./sdk/composer/phases/Outputs.js"
export * as Signers from "./sdk/composer/phases/Signers.js"
export * as StakeCertificates from "./sdk/composer/phases/StakeCertificates.js"
export * as Source from "./sdk/composer/Source.js"
export * as StakeInput from "./sdk/composer/StakeInput.js"
export * as TransactionComposer from "./sdk/composer/TransactionComposer.js"
export * as Environment from "./sdk/config/Environment.js"
export * as Metadata from "./sdk/Metadata.js"
export * as MultiAsset from "./sdk/MultiAsset.js"
export * as NativeScript from "./sdk/NativeScript.js"
export * as ProtocolParameters from "./sdk/ProtocolParameters.js"
export * as Blockfrost from "./sdk/provider/Blockfrost.js"
export * as ChainContext from "./sdk/provider/ChainContext.js"
export * as Token from "./sdk/Token.js"
export * as TokenPolicy from "./sdk/TokenPolicy.js"
export * as UTxO from "./sdk/UTxO.js"
export * as SigningKey from "./sdk/wallet/SigningKey.js"
export * as Wallet from "./sdk/wallet/Wallet.js"
export { makeWallet, makeWalletFromAddress } from "./sdk/wallet/Wallet.js"
export { runEffect, runSyncEffect } from "./utils/effect-runtime.js"
