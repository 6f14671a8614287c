/**
 * Named, schema bound tuple stores ordered by their primary key
 */

import {
  DefaultLogger,
  type LogLevel,
  type LogWriter,
  type Logger,
} from "@ralg/core/logging.js"
import { BTreeMap, type OrderedMap } from "@ralg/core/structures/orderedMap.js"
import type { Optional } from "@ralg/core/type/utils.js"
import {
  RelationalError,
  RelationalErrorCode,
  fail,
  ok,
  type RelationalResult,
} from "./errors.js"
import type { Schema } from "./schema.js"
import {
  cloneTuple,
  compareValues,
  formatTuple,
  formatValue,
  integer,
  type Tuple,
  type Value,
} from "./values.js"

/**
 * Options for relation logging
 */
export interface RelationOptions {
  /** The {@link LogWriter} for insertion failures, default is the process default */
  logWriter?: LogWriter
  /** The {@link LogLevel} for the relation logger, default is the process default */
  logLevel?: LogLevel
}

/**
 * A relation owns an ordered map from key values to frozen tuples.
 *
 * Keyed relations use the value at {@link Relation.primaryKey} as the storage
 * key. Keyless relations (the shape of every derived relation) key their
 * tuples by a dense row number assigned in insertion order that is not part
 * of the schema.
 */
export class Relation {
  readonly name: string
  readonly schema: Schema
  readonly primaryKey: Optional<number>

  private readonly _storage: OrderedMap<Value, Tuple>
  private readonly _logger: Logger

  private constructor(
    name: string,
    schema: Schema,
    primaryKey: Optional<number>,
    options?: RelationOptions,
  ) {
    this.name = name
    this.schema = schema
    this.primaryKey = primaryKey
    this._storage = new BTreeMap(compareValues)
    this._logger = new DefaultLogger({
      name: `Relation(${name})`,
      writer: options?.logWriter,
      level: options?.logLevel,
    })
  }

  /**
   * Create an empty relation
   *
   * @param name The relation name
   * @param schema The {@link Schema} every tuple must satisfy
   * @param primaryKey The index or name of the key attribute, omitted for a
   * keyless relation
   * @param options The {@link RelationOptions}
   * @returns The {@link Relation} or an
   * {@link RelationalErrorCode.INVALID_PRIMARY_KEY} failure
   */
  static create(
    name: string,
    schema: Schema,
    primaryKey?: number | string,
    options?: RelationOptions,
  ): RelationalResult<Relation> {
    if (primaryKey === undefined) {
      return ok(new Relation(name, schema, undefined, options))
    }

    const idx =
      typeof primaryKey === "string" ? schema.indexOf(primaryKey) : primaryKey

    if (
      idx === undefined ||
      !Number.isInteger(idx) ||
      idx < 0 ||
      idx >= schema.arity()
    ) {
      return fail(
        new RelationalError(
          RelationalErrorCode.INVALID_PRIMARY_KEY,
          `Primary key ${primaryKey} is not an attribute of ${name}${schema.toString()}`,
          { relation: name },
        ),
      )
    }

    return ok(new Relation(name, schema, idx, options))
  }

  /** The number of stored tuples */
  get size(): number {
    return this._storage.size
  }

  get isKeyed(): boolean {
    return this.primaryKey !== undefined
  }

  /**
   * Insert a single row
   *
   * @param row The {@link Tuple} to insert
   * @returns The number of rows inserted or the reasons it was rejected
   */
  insertRow(row: Tuple): RelationalResult<number> {
    return this.insertRows([row])
  }

  /**
   * Insert a batch of rows. The batch is all-or-nothing: every row is
   * validated and if any fails nothing is stored and every failure is
   * reported with its row index.
   *
   * @param rows The tuples to insert
   * @returns The number of rows inserted or the reasons the batch was rejected
   */
  insertRows(rows: readonly Tuple[]): RelationalResult<number> {
    const errors: RelationalError[] = []
    const batchKeys = new BTreeMap<Value, number>(compareValues)

    rows.forEach((row, idx) => {
      const violations = this.schema.validate(row, {
        relation: this.name,
        row: idx,
      })
      if (violations.length > 0) {
        errors.push(...violations)
        return
      }

      if (this.primaryKey === undefined) {
        return
      }

      const key = row[this.primaryKey]
      const previous = batchKeys.get(key)
      if (this._storage.has(key)) {
        errors.push(
          this._duplicateKey(
            `Primary key ${formatValue(key)} already exists`,
            idx,
          ),
        )
      } else if (previous !== undefined) {
        errors.push(
          this._duplicateKey(
            `Primary key ${formatValue(key)} is repeated by rows ${previous} and ${idx}`,
            idx,
          ),
        )
      } else {
        batchKeys.set(key, idx)
      }
    })

    if (errors.length > 0) {
      this._logger.error(
        `Rejected ${rows.length} row(s) with ${errors.length} error(s), nothing inserted`,
        errors,
      )
      return { success: false, errors }
    }

    for (const row of rows) {
      const stored = cloneTuple(row)
      this._storage.set(this._nextKey(stored), stored)
    }

    this._logger.debug(`Inserted ${rows.length} row(s)`)
    return ok(rows.length)
  }

  /**
   * Materialize the contents in storage key order
   *
   * @returns A new array of the stored tuples
   */
  tuples(): Tuple[] {
    return Array.from(this._storage.values())
  }

  /**
   * Iterate the stored tuples in key order without copying
   */
  scan(): IterableIterator<Tuple> {
    return this._storage.values()
  }

  /**
   * Point lookup by key, the row number for keyless relations
   *
   * @param key The key {@link Value}
   * @returns The stored {@link Tuple} if it exists
   */
  lookup(key: Value): Optional<Tuple> {
    return this._storage.get(key)
  }

  has(key: Value): boolean {
    return this._storage.has(key)
  }

  /**
   * @returns The primary key value of the tuple, undefined when the relation
   * is keyless
   */
  keyOf(tuple: Tuple): Optional<Value> {
    return this.primaryKey !== undefined ? tuple[this.primaryKey] : undefined
  }

  toString(): string {
    const rows = this.tuples().map(formatTuple)
    return `${this.name}${this.schema.toString()} [${rows.join(", ")}]`
  }

  private _nextKey(row: Tuple): Value {
    return this.keyOf(row) ?? integer(this._storage.size)
  }

  private _duplicateKey(message: string, row: number): RelationalError {
    const attr =
      this.primaryKey !== undefined
        ? this.schema.attributes[this.primaryKey].name
        : undefined

    return new RelationalError(
      RelationalErrorCode.DUPLICATE_PRIMARY_KEY,
      message,
      { relation: this.name, attribute: attr, row },
    )
  }
}
