/**
 * ADA amounts in either of its two units.
 *
 * `Lovelace` is the indivisible minor unit and is stored as a `bigint`; `Ada` is the
 * displayed major unit and is stored as a `number`. Both views are computed once at
 * construction. Arithmetic and comparisons accept a bare number (read in the receiver's
 * own unit) or another amount (read through its unit-keyed lookup), and always return a
 * new instance of the receiver's class.
 *
 * @since 1.0.0
 */

import { Data } from "effect"

/**
 * An operand of an unsupported kind reached amount arithmetic or a comparison.
 *
 * @since 1.0.0
 * @category errors
 */
export class TypeMismatchError extends Data.TaggedError("TypeMismatch")<{
  readonly message: string
  readonly operand?: unknown
}> {}

export type Unit = "lovelace" | "ada"

/**
 * Anything an amount can be combined with.
 *
 * @since 1.0.0
 * @category model
 */
export type AmountLike = Lovelace | Ada | number | bigint

export const LOVELACE_PER_ADA = 1_000_000

const describe = (value: unknown): string =>
  value === null ? "null" : Array.isArray(value) ? "array" : typeof value

const mismatch = (operand: unknown, action: string): TypeMismatchError =>
  new TypeMismatchError({
    message: `Must ${action} with a number or another Cardano amount, got ${describe(operand)}`,
    operand
  })

// Scaling by 10^6 can leave float noise (3.555432 * 1e6 = 3555431.9999999995).
// Rounding to 15 significant digits removes it before truncation.
const adaToLovelace = (ada: number): bigint => {
  if (!Number.isFinite(ada)) {
    throw mismatch(ada, "build an amount")
  }
  return BigInt(Math.trunc(Number((ada * LOVELACE_PER_ADA).toPrecision(15))))
}

const compareValues = (left: bigint | number, right: bigint | number): number => {
  if (typeof left === "bigint" && typeof right === "bigint") {
    return left < right ? -1 : left > right ? 1 : 0
  }
  if (typeof left === "bigint" && Number.isInteger(right)) {
    return compareValues(left, BigInt(right))
  }
  if (typeof right === "bigint" && Number.isInteger(left)) {
    return compareValues(BigInt(left), right)
  }
  const l = Number(left)
  const r = Number(right)
  return l < r ? -1 : l > r ? 1 : 0
}

const floorDivBig = (a: bigint, b: bigint): bigint => {
  const q = a / b
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q
}

/**
 * Common behaviour of {@link Lovelace} and {@link Ada}.
 *
 * @since 1.0.0
 * @category model
 */
export abstract class Amount<Self extends Amount<Self>> {
  abstract readonly unit: Unit

  protected constructor(
    readonly lovelace: bigint,
    readonly ada: number
  ) {}

  /**
   * The contained value in the instance's own unit.
   */
  abstract get amount(): bigint | number

  protected abstract of(value: bigint | number): Self

  protected abstract combine(
    other: AmountLike,
    action: string,
    onBigint: (a: bigint, b: bigint) => bigint,
    onNumber: (a: number, b: number) => number
  ): Self

  /**
   * Unit-keyed lookup: `amount.get("lovelace")` is the minor value, `amount.get("ada")` the major one.
   */
  get(unit: "lovelace"): bigint
  get(unit: "ada"): number
  get(unit: Unit): bigint | number
  get(unit: Unit): bigint | number {
    return unit === "lovelace" ? this.lovelace : this.ada
  }

  toLovelace(): Lovelace {
    return new Lovelace(this.lovelace)
  }

  toAda(): Ada {
    return new Ada(this.ada)
  }

  isZero(): boolean {
    return this.lovelace === 0n && this.ada === 0
  }

  toString(): string {
    return String(this.amount)
  }

  // --------------------------------------------------------------------------
  // Comparison
  // --------------------------------------------------------------------------

  protected compare(other: AmountLike, action = "compare"): number {
    if (other instanceof Amount) {
      return compareValues(this.lovelace, other.lovelace)
    }
    if (typeof other === "number" || typeof other === "bigint") {
      if (typeof other === "number" && Number.isNaN(other)) {
        throw new TypeMismatchError({ message: `Cannot ${action} with NaN`, operand: other })
      }
      return compareValues(this.amount, other)
    }
    throw mismatch(other, action)
  }

  eq(other: AmountLike): boolean {
    return this.compare(other) === 0
  }

  ne(other: AmountLike): boolean {
    return this.compare(other) !== 0
  }

  gt(other: AmountLike): boolean {
    return this.compare(other) > 0
  }

  lt(other: AmountLike): boolean {
    return this.compare(other) < 0
  }

  ge(other: AmountLike): boolean {
    return this.compare(other) >= 0
  }

  le(other: AmountLike): boolean {
    return this.compare(other) <= 0
  }

  // --------------------------------------------------------------------------
  // Arithmetic
  // --------------------------------------------------------------------------

  add(other: AmountLike): Self {
    return this.combine(other, "add", (a, b) => a + b, (a, b) => a + b)
  }

  sub(other: AmountLike): Self {
    return this.combine(other, "subtract", (a, b) => a - b, (a, b) => a - b)
  }

  mul(other: AmountLike): Self {
    return this.combine(other, "multiply", (a, b) => a * b, (a, b) => a * b)
  }

  div(other: AmountLike): Self {
    return this.combine(other, "divide", (a, b) => a / b, (a, b) => a / b)
  }

  floorDiv(other: AmountLike): Self {
    return this.combine(other, "divide", floorDivBig, (a, b) => Math.floor(a / b))
  }

  neg(): Self {
    return this.of(-this.amount)
  }

  abs(): Self {
    const value = this.amount
    return this.of(value < 0 ? -value : value)
  }

  round(): Self {
    const value = this.amount
    return this.of(typeof value === "bigint" ? value : Math.round(value))
  }
}

/**
 * Minor unit amount (1 ADA = 1,000,000 lovelace).
 *
 * @since 1.0.0
 * @category model
 */
export class Lovelace extends Amount<Lovelace> {
  readonly unit = "lovelace" as const

  constructor(value: bigint | number = 0n) {
    if (typeof value === "number" && !Number.isInteger(value)) {
      throw new TypeMismatchError({ message: `Lovelace must be an integer, got ${value}`, operand: value })
    }
    const lovelace = BigInt(value)
    super(lovelace, Number(lovelace) / LOVELACE_PER_ADA)
  }

  get amount(): bigint {
    return this.lovelace
  }

  protected of(value: bigint | number): Lovelace {
    return new Lovelace(typeof value === "number" ? Math.trunc(value) : value)
  }

  protected combine(
    other: AmountLike,
    action: string,
    onBigint: (a: bigint, b: bigint) => bigint,
    onNumber: (a: number, b: number) => number
  ): Lovelace {
    const rhs = operand(other, "lovelace", action)
    if (typeof rhs === "bigint") {
      return new Lovelace(onBigint(this.lovelace, rhs))
    }
    if (Number.isInteger(rhs)) {
      return new Lovelace(onBigint(this.lovelace, BigInt(rhs)))
    }
    return this.of(onNumber(Number(this.lovelace), rhs))
  }

  toString(): string {
    return this.lovelace.toString()
  }
}

/**
 * Major unit amount. Converting to lovelace truncates anything below one lovelace.
 *
 * @since 1.0.0
 * @category model
 */
export class Ada extends Amount<Ada> {
  readonly unit = "ada" as const

  constructor(value: number | bigint = 0) {
    const ada = Number(value)
    super(adaToLovelace(ada), ada)
  }

  get amount(): number {
    return this.ada
  }

  protected of(value: bigint | number): Ada {
    return new Ada(value)
  }

  protected combine(
    other: AmountLike,
    action: string,
    _onBigint: (a: bigint, b: bigint) => bigint,
    onNumber: (a: number, b: number) => number
  ): Ada {
    const rhs = operand(other, "ada", action)
    return new Ada(onNumber(this.ada, Number(rhs)))
  }
}

function operand(other: AmountLike, unit: Unit, action: string): bigint | number {
  let value: bigint | number
  if (other instanceof Amount) {
    value = other.get(unit)
  } else if (typeof other === "number" || typeof other === "bigint") {
    value = other
  } else {
    throw mismatch(other, action)
  }
  // bigint division by zero throws a RangeError
  if (action === "divide" && (value === 0n || value === 0)) {
    throw new TypeMismatchError({ message: "Cannot divide by zero", operand: other })
  }
  return value
}

/**
 * @since 1.0.0
 * @category constructors
 */
export const lovelace = (value: bigint | number): Lovelace => new Lovelace(value)

/**
 * @since 1.0.0
 * @category constructors
 */
export const ada = (value: number): Ada => new Ada(value)

/**
 * Interpret a bare number as lovelace, pass amounts through.
 *
 * @since 1.0.0
 * @category constructors
 */
export const fromAmountLike = (value: AmountLike): Lovelace | Ada => {
  if (value instanceof Lovelace || value instanceof Ada) return value
  if (typeof value === "number" || typeof value === "bigint") return new Lovelace(value)
  throw mismatch(value, "build an amount")
}

/**
 * Wrap a raw on-chain quantity.
 *
 * @since 1.0.0
 * @category constructors
 */
export const fromMinor = (value: bigint): Lovelace => new Lovelace(value)
