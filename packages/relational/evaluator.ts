/**
 * Contains the logic for evaluating an {@link OperatorNode} tree into a new
 * in memory {@link Relation}
 */

import type { ConfigurationManager } from "@ralg/core/configuration.js"
import {
  DefaultLogger,
  parseLogLevel,
  type LogLevel,
  type LogWriter,
  type Logger,
} from "@ralg/core/logging.js"
import { trace, withSpan } from "@ralg/core/observability/tracing.js"
import { Timer } from "@ralg/core/time.js"
import { isRecord } from "@ralg/core/type/utils.js"
import {
  BooleanOperation,
  ColumnFilteringOperation,
  RelationalNodeType,
  describeNode,
  isFilterGroup,
  type FilterTypes,
  type OperatorNode,
  type ProjectionNode,
  type SelectionNode,
  type UnionNode,
} from "./ast.js"
import {
  RelationalError,
  RelationalErrorCode,
  fail,
  type RelationalResult,
} from "./errors.js"
import { Relation, type RelationOptions } from "./relation.js"
import { Schema, type Attribute } from "./schema.js"
import {
  compareValues,
  encodeTuple,
  formatValue,
  type Tuple,
} from "./values.js"

/** The name given to every relation produced by evaluation */
export const DERIVED_RELATION_NAME = "derived"

/**
 * Options for the {@link Evaluator}
 */
export interface EvaluatorOptions {
  /** The name for derived relations, default is {@link DERIVED_RELATION_NAME} */
  derivedName?: string
  /** The {@link LogWriter} for the evaluator and the relations it creates */
  logWriter?: LogWriter
  /** The {@link LogLevel} for the evaluator and the relations it creates */
  logLevel?: LogLevel
}

/**
 * Read the `evaluator` item from the configuration
 *
 * @param config The {@link ConfigurationManager} to read from
 * @returns The {@link EvaluatorOptions} found, empty if the item is missing
 */
export function evaluatorOptionsFrom(
  config: ConfigurationManager,
): EvaluatorOptions {
  const item = config.getConfiguration("evaluator", isRecord)
  if (item === undefined) {
    return {}
  }

  return {
    derivedName:
      typeof item.derivedName === "string" ? item.derivedName : undefined,
    logLevel: parseLogLevel(item.logLevel),
  }
}

type Predicate = (tuple: Tuple) => boolean

/**
 * Evaluates operator trees bottom up: every node evaluates its inputs first
 * and then produces exactly one new relation. Inputs are only read.
 */
export class Evaluator {
  private readonly _logger: Logger
  private readonly _derivedName: string
  private readonly _relationOptions: RelationOptions

  constructor(options?: EvaluatorOptions) {
    this._derivedName = options?.derivedName ?? DERIVED_RELATION_NAME
    this._relationOptions = {
      logWriter: options?.logWriter,
      logLevel: options?.logLevel,
    }
    this._logger = new DefaultLogger({
      name: "Evaluator",
      writer: options?.logWriter,
      level: options?.logLevel,
    })
  }

  /**
   * Evaluate the tree
   *
   * @param node The root {@link OperatorNode}
   * @returns The derived {@link Relation} or the errors that stopped evaluation
   */
  @trace("relational.evaluate")
  evaluate(node: OperatorNode): RelationalResult<Relation> {
    const timer = Timer.startNew()
    const result =
      node.nodeType === RelationalNodeType.RELATION
        ? this._copy(node.relation)
        : this._evaluate(node)

    if (result.success) {
      this._logger.debug(
        `${describeNode(node)} produced ${result.value.size} tuple(s) in ${timer.stop().toString()}`,
      )
    } else {
      this._logger.warn(
        `${describeNode(node)} failed: ${result.errors.map((e) => e.message).join("; ")}`,
        result.errors,
      )
    }

    return result
  }

  private _evaluate(node: OperatorNode): RelationalResult<Relation> {
    switch (node.nodeType) {
      case RelationalNodeType.RELATION:
        // Leaves are borrowed, the parent produces the new relation
        return { success: true, value: node.relation }
      case RelationalNodeType.PROJECTION:
        return withSpan("relational.projection", () => this._project(node))
      case RelationalNodeType.SELECTION:
        return withSpan("relational.selection", () => this._select(node))
      case RelationalNodeType.UNION:
        return withSpan("relational.union", () => this._union(node))
      case RelationalNodeType.JOIN:
        return fail(
          new RelationalError(
            RelationalErrorCode.UNSUPPORTED_OPERATOR,
            `${node.joinType} join is not supported`,
          ),
        )
    }
  }

  private _project(node: ProjectionNode): RelationalResult<Relation> {
    const source = this._evaluate(node.source)
    if (!source.success) {
      return source
    }

    const input = source.value
    const indices: number[] = []
    const attributes: Attribute[] = []
    const errors: RelationalError[] = []

    if (node.columns === "*") {
      input.schema.attributes.forEach((a, idx) => {
        indices.push(idx)
        attributes.push(a)
      })
    } else {
      for (const column of node.columns) {
        const name = typeof column === "string" ? column : column.name
        const idx = input.schema.indexOf(name)
        const existing =
          idx !== undefined ? input.schema.attributes[idx] : undefined

        if (idx === undefined || existing === undefined) {
          errors.push(
            this._unknownAttribute(
              `${input.name} has no attribute ${name}`,
              input,
              name,
            ),
          )
        } else if (typeof column !== "string" && column.type !== existing.type) {
          errors.push(
            this._unknownAttribute(
              `${input.name} has no attribute ${name} of type ${column.type}`,
              input,
              name,
            ),
          )
        } else {
          indices.push(idx)
          attributes.push(existing)
        }
      }
    }

    if (errors.length > 0) {
      return { success: false, errors }
    }

    const schema = Schema.create(attributes)
    if (!schema.success) {
      return schema
    }

    // Keep the first occurrence of every projected row
    const seen = new Set<string>()
    const rows: Tuple[] = []
    for (const tuple of input.scan()) {
      const projected = indices.map((idx) => tuple[idx])
      const encoded = encodeTuple(projected)
      if (!seen.has(encoded)) {
        seen.add(encoded)
        rows.push(projected)
      }
    }

    this._logger.debug(
      `Projection kept ${rows.length} of ${input.size} tuple(s) from ${input.name}`,
    )

    return this._materialize(schema.value, undefined, rows)
  }

  private _select(node: SelectionNode): RelationalResult<Relation> {
    const source = this._evaluate(node.source)
    if (!source.success) {
      return source
    }

    const input = source.value
    const errors: RelationalError[] = []
    const predicate = this._buildFilter(node.filter, input, errors)
    if (errors.length > 0) {
      return { success: false, errors }
    }

    const rows: Tuple[] = []
    for (const tuple of input.scan()) {
      if (predicate(tuple)) {
        rows.push(tuple)
      }
    }

    return this._materialize(input.schema, input.primaryKey, rows)
  }

  private _union(node: UnionNode): RelationalResult<Relation> {
    const left = this._evaluate(node.left)
    if (!left.success) {
      return left
    }

    const right = this._evaluate(node.right)
    if (!right.success) {
      return right
    }

    if (!left.value.schema.equals(right.value.schema)) {
      return fail(
        new RelationalError(
          RelationalErrorCode.INCOMPATIBLE_SCHEMA,
          `Cannot union ${left.value.name}${left.value.schema.toString()} with ${right.value.name}${right.value.schema.toString()}`,
        ),
      )
    }

    const seen = new Set<string>()
    const rows: Tuple[] = []
    for (const input of [left.value, right.value]) {
      for (const tuple of input.scan()) {
        const encoded = encodeTuple(tuple)
        if (!seen.has(encoded)) {
          seen.add(encoded)
          rows.push(tuple)
        }
      }
    }

    return this._materialize(left.value.schema, undefined, rows)
  }

  /**
   * A new relation with the same schema, key and contents
   */
  private _copy(relation: Relation): RelationalResult<Relation> {
    return this._materialize(
      relation.schema,
      relation.primaryKey,
      relation.tuples(),
    )
  }

  /**
   * Create the derived relation and copy the rows into it
   */
  private _materialize(
    schema: Schema,
    primaryKey: number | undefined,
    rows: Tuple[],
  ): RelationalResult<Relation> {
    const created = Relation.create(
      this._derivedName,
      schema,
      primaryKey,
      this._relationOptions,
    )
    if (!created.success) {
      return created
    }

    const inserted = created.value.insertRows(rows)
    if (!inserted.success) {
      return { success: false, errors: inserted.errors }
    }

    return created
  }

  private _buildFilter(
    clause: FilterTypes,
    input: Relation,
    errors: RelationalError[],
  ): Predicate {
    if (isFilterGroup(clause)) {
      return combineFilters(
        clause.op,
        clause.filters.map((f) => this._buildFilter(f, input, errors)),
      )
    }

    const idx = input.schema.indexOf(clause.column)
    const attr = input.schema.attribute(clause.column)
    if (idx === undefined || attr === undefined) {
      errors.push(
        this._unknownAttribute(
          `${input.name} has no attribute ${clause.column}`,
          input,
          clause.column,
        ),
      )
      return (_) => false
    }

    if (attr.type !== clause.value.type) {
      errors.push(
        new RelationalError(
          RelationalErrorCode.TYPE_MISMATCH,
          `Attribute ${attr.name} expects ${attr.type} but the filter compares ${formatValue(clause.value)}`,
          { relation: input.name, attribute: attr.name },
        ),
      )
      return (_) => false
    }

    const { op, value } = clause
    const matches = (cmp: number): boolean => {
      switch (op) {
        case ColumnFilteringOperation.EQ:
          return cmp === 0
        case ColumnFilteringOperation.NE:
          return cmp !== 0
        case ColumnFilteringOperation.LT:
          return cmp < 0
        case ColumnFilteringOperation.LTE:
          return cmp <= 0
        case ColumnFilteringOperation.GT:
          return cmp > 0
        case ColumnFilteringOperation.GTE:
          return cmp >= 0
      }
    }

    return (tuple) => matches(compareValues(tuple[idx], value))
  }

  private _unknownAttribute(
    message: string,
    input: Relation,
    attribute: string,
  ): RelationalError {
    return new RelationalError(RelationalErrorCode.UNKNOWN_ATTRIBUTE, message, {
      relation: input.name,
      attribute,
    })
  }
}

function combineFilters(op: BooleanOperation, filters: Predicate[]): Predicate {
  switch (op) {
    case BooleanOperation.AND:
      return (tuple) => filters.every((f) => f(tuple))
    case BooleanOperation.OR:
      return (tuple) => filters.some((f) => f(tuple))
    case BooleanOperation.NOT:
      return (tuple) => !filters.some((f) => f(tuple))
  }
}

/**
 * Evaluate the tree with a new {@link Evaluator}
 *
 * @param node The root {@link OperatorNode}
 * @param options The {@link EvaluatorOptions} to use
 * @returns The derived {@link Relation} or the errors that stopped evaluation
 */
export function evaluate(
  node: OperatorNode,
  options?: EvaluatorOptions,
): RelationalResult<Relation> {
  return new Evaluator(options).evaluate(node)
}
