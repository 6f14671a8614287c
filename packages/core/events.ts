import { EventEmitter } from "events"
import type { AnyArgs } from "./type/utils.js"

/**
 * Helper for interfaces that expose typed events
 */
export type Emitter<E> = EventEmitter<EventMap<E>>

/**
 * Base class for objects that emit the events described by E
 */
export class EmitterFor<E> extends EventEmitter<EventMap<E>> {}

/**
 * Maps an interface of event handlers to the tuple shape the EventEmitter
 * expects
 */
type EventMap<E> = {
  [Key in EventKeys<E>]: EventFunc<E[Key]>
}

type EventKeys<E> = {
  [Key in keyof E]: E[Key] extends (...args: AnyArgs) => void ? Key : never
}[keyof E]

type EventFunc<E> = E extends (...args: AnyArgs) => void ? Parameters<E> : never
