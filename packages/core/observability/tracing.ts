import {
  SpanStatusCode,
  trace as Tracing,
  context as TracingContext,
  type Span,
  type Tracer,
} from "@opentelemetry/api"
import { getErrorMessage } from "../errors.js"
import type { AnyArgs, Func, Optional } from "../type/utils.js"
import { RALG_VERSION } from "../version.js"

let PROJECT_TRACER: Optional<Tracer>

/**
 * Return the project {@link Tracer}, a no-op until the host registers an
 * OpenTelemetry provider
 */
export function getTracer(): Tracer {
  return (
    PROJECT_TRACER ?? (PROJECT_TRACER = Tracing.getTracer("ralg", RALG_VERSION))
  )
}

/**
 * Run the function inside a new active span that ends when it returns
 *
 * @param name The span name
 * @param fn The function to run
 * @returns The function result
 */
export function withSpan<T>(name: string, fn: (span: Span) => T): T {
  const span = getTracer().startSpan(name)
  try {
    return TracingContext.with(
      Tracing.setSpan(TracingContext.active(), span),
      () => fn(span),
    )
  } catch (err) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: getErrorMessage(err),
    })
    throw err
  } finally {
    span.end()
  }
}

/**
 * Wrap a synchronous method in a span
 *
 * @param nameExtractor The span name or a function of the call arguments
 * that produces it, default is the method name
 * @returns A method decorator
 */
export function trace(nameExtractor?: string | Func<AnyArgs, string>) {
  return (
    _classPrototype: unknown,
    methodName: string,
    descriptor: PropertyDescriptor,
  ): void => {
    const original: unknown = descriptor.value
    if (typeof original !== "function") {
      throw new Error("Invalid target for decorator!")
    }

    const getName: Func<AnyArgs, string> =
      typeof nameExtractor === "function"
        ? nameExtractor
        : (..._: AnyArgs) => nameExtractor ?? methodName

    descriptor.value = function (this: unknown, ...args: AnyArgs): unknown {
      return withSpan(getName(...args), () => original.apply(this, args))
    }
  }
}
