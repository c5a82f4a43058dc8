import { Data } from "effect"

import type * as Address from "./Address.js"

/**
 * Stake certificates the composer can place in a transaction.
 *
 * @since 1.0.0
 * @category model
 */
export type Certificate = Data.TaggedEnum<{
  StakeRegistration: { readonly credential: Address.Credential }
  StakeDelegation: { readonly credential: Address.Credential; readonly poolKeyHash: string }
}>

/**
 * @since 1.0.0
 * @category constructors
 */
export const Certificate = Data.taggedEnum<Certificate>()
