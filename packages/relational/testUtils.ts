/**
 * Shared helpers for the relational tests
 */

import type { RelationalErrorCode, RelationalResult } from "./errors.js"
import { Relation } from "./relation.js"
import { Schema, attribute } from "./schema.js"
import { ValueType, tupleOf, type RawValue, type Tuple } from "./values.js"

/**
 * Get the value of a successful result or fail the test
 */
export function unwrap<T>(result: RelationalResult<T>): T {
  if (!result.success) {
    throw new Error(
      `Expected success: ${result.errors.map((e) => e.message).join("; ")}`,
    )
  }

  return result.value
}

/**
 * Get the error codes of a failed result or fail the test
 */
export function errorCodes<T>(
  result: RelationalResult<T>,
): RelationalErrorCode[] {
  if (result.success) {
    throw new Error("Expected failure")
  }

  return result.errors.map((e) => e.code)
}

/**
 * The `(key: integer, value: string)` relation keyed on `key`
 */
export function createTestRelation(...rows: RawValue[][]): Relation {
  const schema = unwrap(
    Schema.create([
      attribute("key", ValueType.INTEGER),
      attribute("value", ValueType.STRING),
    ]),
  )
  const relation = unwrap(Relation.create("test", schema, 0))
  unwrap(relation.insertRows(rows.map((r) => tupleOf(...r))))

  return relation
}

/**
 * The `users(id: integer, name: string, phone: integer)` relation keyed on `id`
 */
export function createUsers(): Relation {
  const schema = unwrap(
    Schema.create([
      attribute("id", ValueType.INTEGER),
      attribute("name", ValueType.STRING),
      attribute("phone", ValueType.INTEGER),
    ]),
  )
  const users = unwrap(Relation.create("users", schema, "id"))
  unwrap(
    users.insertRows([
      tupleOf(100, "bob", 9999999999),
      tupleOf(101, "alice", 6666666666),
    ]),
  )

  return users
}

/**
 * Strip the tags to compare tuples as plain arrays
 */
export function raw(tuples: Tuple[]): RawValue[][] {
  return tuples.map((t) => t.map((v) => v.value))
}
