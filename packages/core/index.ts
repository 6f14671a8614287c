export * from "./configuration.js"
export * from "./errors.js"
export * from "./logging.js"
export * from "./observability/tracing.js"
export * from "./structures/orderedMap.js"
export * from "./time.js"
export type * from "./type/utils.js"
export { isRecord } from "./type/utils.js"
export { RALG_VERSION } from "./version.js"
