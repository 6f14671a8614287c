/**
 * Attributes and the ordered schemas that describe relation shapes
 */

import type { Optional } from "@ralg/core/type/utils.js"
import {
  RelationalError,
  RelationalErrorCode,
  ok,
  type RelationalErrorOptions,
  type RelationalResult,
} from "./errors.js"
import { formatValue, type Tuple, type ValueType } from "./values.js"

/**
 * A named, typed column
 */
export interface Attribute {
  readonly name: string
  readonly type: ValueType
}

/**
 * Create a frozen {@link Attribute}
 */
export function attribute(name: string, type: ValueType): Attribute {
  const attr: Attribute = { name, type }
  return Object.freeze(attr)
}

/**
 * An immutable, ordered list of uniquely named attributes
 */
export class Schema {
  readonly attributes: readonly Attribute[]
  private readonly _positions: Map<string, number>

  private constructor(attributes: Attribute[], positions: Map<string, number>) {
    this.attributes = Object.freeze(attributes)
    this._positions = positions
  }

  /**
   * Create a schema from the ordered attributes
   *
   * @param attributes The attributes in column order
   * @returns The {@link Schema} or a {@link RelationalErrorCode.DUPLICATE_ATTRIBUTE_NAME} failure
   */
  static create(attributes: readonly Attribute[]): RelationalResult<Schema> {
    const positions = new Map<string, number>()
    const errors: RelationalError[] = []

    attributes.forEach((attr, idx) => {
      if (positions.has(attr.name)) {
        errors.push(
          new RelationalError(
            RelationalErrorCode.DUPLICATE_ATTRIBUTE_NAME,
            `Attribute ${attr.name} is declared more than once`,
            { attribute: attr.name },
          ),
        )
      } else {
        positions.set(attr.name, idx)
      }
    })

    if (errors.length > 0) {
      return { success: false, errors }
    }

    return ok(
      new Schema(
        attributes.map((a) => attribute(a.name, a.type)),
        positions,
      ),
    )
  }

  /**
   * @returns The number of attributes
   */
  arity(): number {
    return this.attributes.length
  }

  /**
   * Find the position of the attribute
   *
   * @param name The attribute name
   * @returns The index or undefined when the schema has no such attribute
   */
  indexOf(name: string): Optional<number> {
    return this._positions.get(name)
  }

  attribute(name: string): Optional<Attribute> {
    const idx = this._positions.get(name)
    return idx !== undefined ? this.attributes[idx] : undefined
  }

  /**
   * Check the tuple has the arity and per-position types of this schema
   *
   * @param tuple The {@link Tuple} to validate
   * @param context The location to attach to each error
   * @returns Every violation found, empty when the tuple is valid
   */
  validate(tuple: Tuple, context?: RelationalErrorOptions): RelationalError[] {
    if (tuple.length !== this.attributes.length) {
      return [
        new RelationalError(
          RelationalErrorCode.SCHEMA_VIOLATION,
          `Expected ${this.attributes.length} values but found ${tuple.length}`,
          context,
        ),
      ]
    }

    const errors: RelationalError[] = []
    this.attributes.forEach((attr, idx) => {
      const value = tuple[idx]
      if (value.type !== attr.type) {
        errors.push(
          new RelationalError(
            RelationalErrorCode.TYPE_MISMATCH,
            `Attribute ${attr.name} expects ${attr.type} but found ${value.type} ${formatValue(value)}`,
            { ...context, attribute: attr.name },
          ),
        )
      }
    })

    return errors
  }

  /**
   * Schemas are equal when they have the same names and types in the same order
   */
  equals(other: Schema): boolean {
    return (
      this.attributes.length === other.attributes.length &&
      this.attributes.every(
        (a, idx) =>
          a.name === other.attributes[idx].name &&
          a.type === other.attributes[idx].type,
      )
    )
  }

  toString(): string {
    return `(${this.attributes.map((a) => `${a.name}: ${a.type}`).join(", ")})`
  }
}
