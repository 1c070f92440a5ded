import type Emittery from "emittery";

/**
 * Constraint for event maps used across the emitter API.
 *
 * Interfaces qualify as well as type literals; each key is an event name and
 * its value the payload type.
 */
export type EventMap = object;

/** Event map accepting any event name with any payload. */
export type AnyEventMap = Record<string, unknown>;

/**
 * A strongly-typed notification emitter backed by Emittery.
 *
 * @typeParam T - An {@link EventMap} defining event names and their payload types
 */
export type TypedEmitter<T extends EventMap> = Emittery<T>;
