/**
 * Scalar types and the tagged values stored in tuples
 */

/**
 * The scalar kinds an attribute can declare
 */
export enum ValueType {
  INTEGER = "integer",
  STRING = "string",
}

/**
 * Order of the type discriminant when comparing values of different types
 */
const TYPE_ORDER: Record<ValueType, number> = {
  [ValueType.STRING]: 0,
  [ValueType.INTEGER]: 1,
}

/** Bounds of a signed 64 bit integer */
export const INTEGER_MIN = -(2n ** 63n)
export const INTEGER_MAX = 2n ** 63n - 1n

export interface IntegerValue {
  readonly type: ValueType.INTEGER
  readonly value: bigint
}

export interface StringValue {
  readonly type: ValueType.STRING
  readonly value: string
}

/**
 * A single typed scalar
 */
export type Value = IntegerValue | StringValue

/**
 * An ordered list of values, one per schema attribute
 */
export type Tuple = readonly Value[]

/**
 * Raw values that {@link valueOf} knows how to tag
 */
export type RawValue = bigint | number | string

/**
 * Create an integer value
 *
 * @param value The integer, numbers must be safe integers
 * @returns A new {@link IntegerValue}
 * @throws RangeError if the value is fractional or outside the signed 64 bit range
 */
export function integer(value: bigint | number): IntegerValue {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RangeError(`${value} is not a safe integer`)
  }

  const v = BigInt(value)
  if (v < INTEGER_MIN || v > INTEGER_MAX) {
    throw new RangeError(`${v} is outside the 64 bit integer range`)
  }

  const result: IntegerValue = { type: ValueType.INTEGER, value: v }
  return Object.freeze(result)
}

/**
 * Create a string value
 */
export function string(value: string): StringValue {
  const result: StringValue = { type: ValueType.STRING, value }
  return Object.freeze(result)
}

/**
 * Tag a raw value by its runtime type
 *
 * @param raw The value to tag
 * @returns The {@link Value} for the raw value
 */
export function valueOf(raw: RawValue): Value {
  return typeof raw === "string" ? string(raw) : integer(raw)
}

/**
 * Build a tuple from raw values
 */
export function tupleOf(...raw: RawValue[]): Tuple {
  return Object.freeze(raw.map(valueOf))
}

export function isIntegerValue(value: Value): value is IntegerValue {
  return value.type === ValueType.INTEGER
}

export function isStringValue(value: Value): value is StringValue {
  return value.type === ValueType.STRING
}

/**
 * Check the value against a declared type
 *
 * @param value The {@link Value} to check
 * @param type The {@link ValueType} it should have
 * @returns True if the tags match
 */
export function matchesType(value: Value, type: ValueType): boolean {
  return value.type === type
}

/**
 * Total order over values: type first (strings before integers), then the
 * natural order of the scalar
 *
 * @param left The left {@link Value}
 * @param right The right {@link Value}
 * @returns Negative, zero or positive like a sort comparator
 */
export function compareValues(left: Value, right: Value): number {
  if (isIntegerValue(left) && isIntegerValue(right)) {
    return left.value === right.value ? 0 : left.value < right.value ? -1 : 1
  } else if (isStringValue(left) && isStringValue(right)) {
    return compareCodePoints(left.value, right.value)
  }

  return TYPE_ORDER[left.type] - TYPE_ORDER[right.type]
}

/**
 * Order strings by Unicode code point, the same order as their UTF-8 bytes
 */
export function compareCodePoints(left: string, right: string): number {
  if (left === right) {
    return 0
  }

  let i = 0
  let j = 0
  while (i < left.length && j < right.length) {
    const l = left.codePointAt(i) ?? 0
    const r = right.codePointAt(j) ?? 0
    if (l !== r) {
      return l < r ? -1 : 1
    }

    i += l > 0xffff ? 2 : 1
    j += r > 0xffff ? 2 : 1
  }

  return i < left.length ? 1 : j < right.length ? -1 : 0
}

export function valuesEqual(left: Value, right: Value): boolean {
  return compareValues(left, right) === 0
}

/**
 * Lexicographic order over tuples, a shorter tuple sorts before a longer one
 * that it prefixes
 */
export function compareTuples(left: Tuple, right: Tuple): number {
  const n = Math.min(left.length, right.length)
  for (let i = 0; i < n; ++i) {
    const cmp = compareValues(left[i], right[i])
    if (cmp !== 0) {
      return cmp
    }
  }

  return left.length - right.length
}

export function tuplesEqual(left: Tuple, right: Tuple): boolean {
  return compareTuples(left, right) === 0
}

/**
 * Encode the tuple as a string that is equal for two tuples exactly when
 * {@link tuplesEqual} holds, for hashing in a `Set` or `Map`
 */
export function encodeTuple(tuple: Tuple): string {
  return JSON.stringify(tuple.map((v) => [v.type, v.value.toString()]))
}

export function cloneValue(value: Value): Value {
  return isIntegerValue(value) ? integer(value.value) : string(value.value)
}

/**
 * Deep copy of the tuple, frozen
 */
export function cloneTuple(tuple: Tuple): Tuple {
  return Object.freeze(tuple.map(cloneValue))
}

/**
 * Readable form of a value, strings are quoted
 */
export function formatValue(value: Value): string {
  return isIntegerValue(value)
    ? value.value.toString()
    : JSON.stringify(value.value)
}

export function formatTuple(tuple: Tuple): string {
  return `(${tuple.map(formatValue).join(", ")})`
}
