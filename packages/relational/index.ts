/**
 * Typed relations and the relational algebra evaluated over them
 */

export * from "./ast.js"
export * from "./builder.js"
export * from "./errors.js"
export * from "./evaluator.js"
export * from "./relation.js"
export * from "./schema.js"
export * from "./values.js"
