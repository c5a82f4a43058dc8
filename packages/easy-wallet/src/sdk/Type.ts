import type { Effect } from "effect"

/**
 * Promise form of one member of an Effect API: an Effect becomes a Promise of its
 * success value, a function returning an Effect keeps its parameters and returns
 * that Promise instead. Failures surface as rejections.
 *
 * @since 1.0.0
 * @category type-level
 */
export type PromiseOf<T> =
  T extends Effect.Effect<infer A, infer _E, infer _R>
    ? Promise<A>
    : T extends (...args: infer Args) => Effect.Effect<infer A, infer _E, infer _R>
      ? (...args: Args) => Promise<A>
      : never

/**
 * The Promise mirror of an Effect API. Chain contexts, builders and wallets carry
 * both: the Effect API under `Effect`, this mirror at the top level.
 *
 * @since 1.0.0
 * @category type-level
 */
export type EffectToPromiseAPI<T> = {
  readonly [K in keyof T]: PromiseOf<T[K]>
}
