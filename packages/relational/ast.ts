/**
 * The algebraic expression tree evaluated over relations
 */

import type { Relation } from "./relation.js"
import type { Attribute } from "./schema.js"
import { formatValue, type Value } from "./values.js"

/** Sentinel indicator for all columns */
export type STAR = "*"

/**
 * The supported types a {@link RelationalQueryNode} can have
 */
export enum RelationalNodeType {
  RELATION = "relation",
  PROJECTION = "projection",
  SELECTION = "selection",
  UNION = "union",
  JOIN = "join",
}

/**
 * The number of inputs an operator reads
 */
export enum OperatorArity {
  UNARY = "unary",
  BINARY = "binary",
}

/**
 * Represents different types of column filtering operations
 */
export enum ColumnFilteringOperation {
  EQ = "=",
  NE = "!=",
  LT = "<",
  GT = ">",
  LTE = "<=",
  GTE = ">=",
}

/**
 * Represents different boolean operations available
 */
export enum BooleanOperation {
  AND = "and",
  OR = "or",
  NOT = "not",
}

/**
 * The valid set of join types reserved for binary evaluation
 */
export enum JoinType {
  INNER = "inner",
  LEFT = "left",
  RIGHT = "right",
  FULL = "full",
}

/**
 * Basic information about a node in the expression tree
 */
export interface RelationalQueryNode<NodeType extends RelationalNodeType> {
  nodeType: NodeType
}

/**
 * Leaf that borrows a base or previously derived {@link Relation}
 */
export interface RelationNode
  extends RelationalQueryNode<RelationalNodeType.RELATION> {
  relation: Relation
}

/**
 * Selects a column by name, or by name and type
 */
export type ProjectedAttribute = string | Attribute

/**
 * π: keeps the listed attributes, in order, and removes duplicate rows
 */
export interface ProjectionNode
  extends RelationalQueryNode<RelationalNodeType.PROJECTION> {
  arity: OperatorArity.UNARY
  columns: ProjectedAttribute[] | STAR
  source: OperatorNode
}

/**
 * Represents a filter on a given column like:`column {op} value`
 */
export interface ColumnFilter {
  column: string
  op: ColumnFilteringOperation
  value: Value
}

/**
 * Represents a group of filters joined by a {@link BooleanOperation}
 */
export interface FilterGroup {
  op: BooleanOperation
  filters: FilterTypes[]
}

export type FilterTypes = ColumnFilter | FilterGroup

/**
 * σ: keeps the rows that satisfy the filter
 */
export interface SelectionNode
  extends RelationalQueryNode<RelationalNodeType.SELECTION> {
  arity: OperatorArity.UNARY
  filter: FilterTypes
  source: OperatorNode
}

/**
 * ∪: rows from either input, duplicates removed
 */
export interface UnionNode
  extends RelationalQueryNode<RelationalNodeType.UNION> {
  arity: OperatorArity.BINARY
  left: OperatorNode
  right: OperatorNode
}

/**
 * ⋈: reserved, evaluation reports it as unsupported
 */
export interface JoinNode extends RelationalQueryNode<RelationalNodeType.JOIN> {
  arity: OperatorArity.BINARY
  joinType: JoinType
  left: OperatorNode
  right: OperatorNode
  on: { left: string; right: string }[]
}

export type UnaryNode = ProjectionNode | SelectionNode

export type BinaryNode = UnionNode | JoinNode

/**
 * Any node of an expression tree
 */
export type OperatorNode = RelationNode | UnaryNode | BinaryNode

export function isRelationNode(node: OperatorNode): node is RelationNode {
  return node.nodeType === RelationalNodeType.RELATION
}

export function isProjectionNode(node: OperatorNode): node is ProjectionNode {
  return node.nodeType === RelationalNodeType.PROJECTION
}

export function isSelectionNode(node: OperatorNode): node is SelectionNode {
  return node.nodeType === RelationalNodeType.SELECTION
}

export function isUnionNode(node: OperatorNode): node is UnionNode {
  return node.nodeType === RelationalNodeType.UNION
}

export function isJoinNode(node: OperatorNode): node is JoinNode {
  return node.nodeType === RelationalNodeType.JOIN
}

export function isUnaryNode(node: OperatorNode): node is UnaryNode {
  return "arity" in node && node.arity === OperatorArity.UNARY
}

export function isBinaryNode(node: OperatorNode): node is BinaryNode {
  return "arity" in node && node.arity === OperatorArity.BINARY
}

export function isFilterGroup(filter: FilterTypes): filter is FilterGroup {
  return "filters" in filter
}

export function isColumnFilter(filter: FilterTypes): filter is ColumnFilter {
  return "column" in filter
}

/**
 * Get the direct inputs of the node in evaluation order
 *
 * @param node The {@link OperatorNode} to inspect
 * @returns The child nodes, empty for leaves
 */
export function getChildren(node: OperatorNode): OperatorNode[] {
  if (isRelationNode(node)) {
    return []
  } else if (isUnaryNode(node)) {
    return [node.source]
  }

  return [node.left, node.right]
}

/**
 * Readable single line description of the tree
 */
export function describeNode(node: OperatorNode): string {
  switch (node.nodeType) {
    case RelationalNodeType.RELATION:
      return node.relation.name
    case RelationalNodeType.PROJECTION:
      return `π[${
        node.columns === "*"
          ? "*"
          : node.columns
              .map((c) => (typeof c === "string" ? c : c.name))
              .join(", ")
      }](${describeNode(node.source)})`
    case RelationalNodeType.SELECTION:
      return `σ[${describeFilter(node.filter)}](${describeNode(node.source)})`
    case RelationalNodeType.UNION:
      return `(${describeNode(node.left)} ∪ ${describeNode(node.right)})`
    case RelationalNodeType.JOIN:
      return `(${describeNode(node.left)} ⋈ ${describeNode(node.right)})`
  }
}

function describeFilter(filter: FilterTypes): string {
  if (isFilterGroup(filter)) {
    const inner = filter.filters.map(describeFilter)
    return filter.op === BooleanOperation.NOT
      ? `not(${inner.join(" or ")})`
      : `(${inner.join(` ${filter.op} `)})`
  }

  return `${filter.column} ${filter.op} ${formatValue(filter.value)}`
}
