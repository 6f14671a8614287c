/**
 * Fluent helpers for creating operator trees
 */

import {
  BooleanOperation,
  ColumnFilteringOperation,
  JoinType,
  OperatorArity,
  RelationalNodeType,
  type ColumnFilter,
  type FilterGroup,
  type FilterTypes,
  type OperatorNode,
  type ProjectedAttribute,
  type STAR,
} from "./ast.js"
import type { RelationalResult } from "./errors.js"
import { evaluate, type EvaluatorOptions } from "./evaluator.js"
import type { Relation } from "./relation.js"
import { valueOf, type RawValue, type Value } from "./values.js"

/**
 * Function that builds a single column filter
 */
type ColumnFilterFn = (column: string, value: Value | RawValue) => ColumnFilter

/**
 * Function that groups filters
 */
type BooleanFilter = (...clauses: FilterTypes[]) => FilterGroup

function ColumnFilterBuilder(
  column: string,
  value: Value | RawValue,
  op: ColumnFilteringOperation,
): ColumnFilter {
  return {
    column,
    op,
    value: typeof value === "object" ? value : valueOf(value),
  }
}

/**
 * Filter for rows where `column=value`
 */
export const eq: ColumnFilterFn = (column, value) =>
  ColumnFilterBuilder(column, value, ColumnFilteringOperation.EQ)
/**
 * Filter for rows where `column!=value`
 */
export const ne: ColumnFilterFn = (column, value) =>
  ColumnFilterBuilder(column, value, ColumnFilteringOperation.NE)
/**
 * Filter for rows where `column>value`
 */
export const gt: ColumnFilterFn = (column, value) =>
  ColumnFilterBuilder(column, value, ColumnFilteringOperation.GT)
/**
 * Filter for rows where `column>=value`
 */
export const gte: ColumnFilterFn = (column, value) =>
  ColumnFilterBuilder(column, value, ColumnFilteringOperation.GTE)
/**
 * Filter for rows where `column<value`
 */
export const lt: ColumnFilterFn = (column, value) =>
  ColumnFilterBuilder(column, value, ColumnFilteringOperation.LT)
/**
 * Filter for rows where `column<=value`
 */
export const lte: ColumnFilterFn = (column, value) =>
  ColumnFilterBuilder(column, value, ColumnFilteringOperation.LTE)

/**
 * Groups a set of filters with `AND` clauses
 */
export const and: BooleanFilter = (...filters) => ({
  op: BooleanOperation.AND,
  filters,
})
/**
 * Groups a set of filters with `OR` clauses
 */
export const or: BooleanFilter = (...filters) => ({
  op: BooleanOperation.OR,
  filters,
})
/**
 * Matches rows that satisfy none of the filters
 */
export const not: BooleanFilter = (...filters) => ({
  op: BooleanOperation.NOT,
  filters,
})

/**
 * Something that can produce an {@link OperatorNode}
 */
export interface OperatorNodeProvider {
  asNode(): OperatorNode
}

type Source = Relation | OperatorNodeProvider

function toNode(source: Source): OperatorNode {
  return "asNode" in source
    ? source.asNode()
    : { nodeType: RelationalNodeType.RELATION, relation: source }
}

/**
 * Builds an operator tree one node at a time, each call wraps the current
 * tree as the input of a new node
 */
export class OperatorBuilder implements OperatorNodeProvider {
  private readonly _node: OperatorNode

  constructor(node: OperatorNode) {
    this._node = node
  }

  asNode(): OperatorNode {
    return this._node
  }

  /**
   * Keep the given attributes in order, or all of them with `"*"`
   */
  project(...columns: ProjectedAttribute[] | [STAR]): OperatorBuilder {
    return new OperatorBuilder({
      nodeType: RelationalNodeType.PROJECTION,
      arity: OperatorArity.UNARY,
      columns: isStar(columns) ? "*" : columns,
      source: this._node,
    })
  }

  /**
   * Keep the rows matching the filter
   */
  where(filter: FilterTypes): OperatorBuilder {
    return new OperatorBuilder({
      nodeType: RelationalNodeType.SELECTION,
      arity: OperatorArity.UNARY,
      filter,
      source: this._node,
    })
  }

  union(other: Source): OperatorBuilder {
    return new OperatorBuilder({
      nodeType: RelationalNodeType.UNION,
      arity: OperatorArity.BINARY,
      left: this._node,
      right: toNode(other),
    })
  }

  /**
   * Reserved, the evaluator reports joins as unsupported
   */
  join(
    other: Source,
    on: { left: string; right: string }[],
    joinType: JoinType = JoinType.INNER,
  ): OperatorBuilder {
    return new OperatorBuilder({
      nodeType: RelationalNodeType.JOIN,
      arity: OperatorArity.BINARY,
      joinType,
      left: this._node,
      right: toNode(other),
      on,
    })
  }

  evaluate(options?: EvaluatorOptions): RelationalResult<Relation> {
    return evaluate(this._node, options)
  }
}

function isStar(columns: ProjectedAttribute[] | [STAR]): columns is [STAR] {
  return columns.length === 1 && columns[0] === "*"
}

/**
 * Start a tree that reads the relation or an existing tree
 *
 * @param source A base or derived {@link Relation}, or another builder
 * @returns A new {@link OperatorBuilder}
 */
export function from(source: Source): OperatorBuilder {
  return new OperatorBuilder(toNode(source))
}
