/**
 * Defines error handling for relations and their evaluation
 */

/**
 * The recoverable conditions a caller can receive
 */
export enum RelationalErrorCode {
  /** A tuple does not have the arity of the schema */
  SCHEMA_VIOLATION = "schema_violation",
  /** A value does not have the type of the attribute it is placed against */
  TYPE_MISMATCH = "type_mismatch",
  /** A primary key value is already stored or repeated within a batch */
  DUPLICATE_PRIMARY_KEY = "duplicate_primary_key",
  /** Two attributes in a schema share a name */
  DUPLICATE_ATTRIBUTE_NAME = "duplicate_attribute_name",
  /** An operator references an attribute the input does not have */
  UNKNOWN_ATTRIBUTE = "unknown_attribute",
  /** The primary key does not identify an attribute of the schema */
  INVALID_PRIMARY_KEY = "invalid_primary_key",
  /** The inputs of a binary operator do not share a schema */
  INCOMPATIBLE_SCHEMA = "incompatible_schema",
  /** The operator is reserved but cannot be evaluated */
  UNSUPPORTED_OPERATOR = "unsupported_operator",
}

/**
 * Extension of {@link ErrorOptions} with the location of the failure
 */
export interface RelationalErrorOptions extends ErrorOptions {
  /** The relation being modified or read */
  relation?: string
  /** The attribute involved */
  attribute?: string
  /** The index of the row in an insertion batch */
  row?: number
}

/**
 * Represents a failure while building schemas, inserting rows or evaluating
 * operators
 */
export class RelationalError extends Error {
  readonly code: RelationalErrorCode
  readonly relation?: string
  readonly attribute?: string
  readonly row?: number

  constructor(
    code: RelationalErrorCode,
    message: string,
    options?: RelationalErrorOptions,
  ) {
    super(message, options)
    this.name = "RelationalError"
    this.code = code
    this.relation = options?.relation
    this.attribute = options?.attribute
    this.row = options?.row
  }
}

/**
 * Type guard for {@link RelationalError}
 *
 * @param error The error to inspect
 * @returns True if the error is a {@link RelationalError}
 */
export function isRelationalError(error: unknown): error is RelationalError {
  return error instanceof RelationalError
}

/**
 * The outcome of an operation that can fail with {@link RelationalError}s
 */
export type RelationalResult<T> =
  | { success: true; value: T }
  | { success: false; errors: RelationalError[] }

/**
 * Wrap a successful value
 */
export function ok<T>(value: T): RelationalResult<T> {
  return { success: true, value }
}

/**
 * Wrap one or more failures
 */
export function fail<T>(
  error: RelationalError,
  ...errors: RelationalError[]
): RelationalResult<T> {
  return { success: false, errors: [error, ...errors] }
}
