/**
 * Auxiliary Data Phase - one metadata document from every source
 *
 * Label 721 carries the metadata of minted tokens, 674 the CIP-20 message, and
 * the caller's own labels are merged at the top level, winning over both.
 *
 * @since 1.0.0
 */

import { Effect } from "effect"

import * as Metadata from "../../Metadata.js"
import type { MintMetadata } from "./MintLedger.js"

/**
 * Caller metadata: top-level integer labels to metadata trees.
 *
 * @since 1.0.0
 * @category model
 */
export type CallerMetadata = { readonly [label: string]: unknown }

const parseLabel = (label: string): Effect.Effect<number, Metadata.MetadataNotSerializableError> => {
  const value = Number(label)
  return /^\d+$/.test(label) && Number.isSafeInteger(value)
    ? Effect.succeed(value)
    : Effect.fail(
        new Metadata.MetadataNotSerializableError({
          message: `Metadata label must be a non-negative integer, got ${label}`,
          path: [label]
        })
      )
}

/**
 * Assemble and validate the document. `undefined` when no source contributes.
 *
 * @since 1.0.0
 * @category phases
 */
export const assemble = (params: {
  readonly mintMetadata: MintMetadata
  readonly message?: string | ReadonlyArray<string>
  readonly metadata?: CallerMetadata
}): Effect.Effect<Metadata.AuxiliaryData | undefined, Metadata.MetadataError> =>
  Effect.gen(function* () {
    const document = new Map<number, Metadata.MetadataValue>()

    if (params.mintMetadata.size > 0) {
      document.set(Metadata.MINT_METADATA_LABEL, yield* Metadata.validate(params.mintMetadata))
    }

    if (params.message !== undefined && params.message.length > 0) {
      document.set(Metadata.MESSAGE_LABEL, yield* Metadata.formatMessage(params.message))
    }

    for (const [key, value] of Object.entries(params.metadata ?? {})) {
      const label = yield* parseLabel(key)
      document.set(label, yield* Metadata.validate(value))
    }

    if (document.size === 0) return undefined
    yield* Effect.logDebug(`Auxiliary data labels: ${[...document.keys()].join(", ")}`)
    return document
  })
