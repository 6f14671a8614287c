/**
 * This package contains some useful type manipulations used throughout the project
 */

/**
 * A value that may not be present
 */
export type Optional<T> = T | undefined

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyArgs = any[]

/**
 * Type the represents a typed function that takes specific parameters during invocation
 */
export type Func<Args extends AnyArgs, Result> = (...args: Args) => Result

/**
 * Total ordering between two values, negative when left sorts first, zero
 * when they are equal and positive when right sorts first
 */
export type Comparator<T> = (left: T, right: T) => number

/**
 * Type guard for narrowing unknown values
 */
export type TypeGuard<T> = (value: unknown) => value is T

/**
 * Guard for plain (non-null, non-array) objects
 *
 * @param value The value to inspect
 * @returns True if the value is an object that can be indexed by string keys
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
