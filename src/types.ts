import type { ListenerHandle } from "./registry/handle";

/**
 * Context handed to every listener invocation alongside the payload.
 */
export interface ListenerContext {
	/** Name of the event being dispatched. */
	event: string;
	/** Index of this listener in the dispatch snapshot. */
	position: number;
	/**
	 * Aborted when the emit's cancellation signal fires.
	 * Long-running listeners should observe it to stop early.
	 */
	signal: AbortSignal;
}

/**
 * A unit of work run when its event is emitted.
 *
 * Returning a promise-like value makes the listener asynchronous; its
 * settlement is awaited according to the engine's {@link DispatchMode}.
 *
 * @typeParam P - Payload type of the event
 */
export type Listener<P = unknown> = (payload: P, context: ListenerContext) => void | PromiseLike<void>;

/**
 * How a dispatch awaits asynchronous listeners.
 *
 * - `"sequential"`: each listener settles before the next one starts
 * - `"fanout"`: every listener is started, then all are awaited together
 */
export type DispatchMode = "sequential" | "fanout";

/**
 * Options accepted when registering a listener.
 */
export interface RegisterOptions {
	/** Remove the listener when its first invocation starts. */
	once?: boolean;
	/** Higher priorities run first. Defaults to `0`. */
	priority?: number;
}

/**
 * A registration stored by the {@link EventRegistry}.
 *
 * Records are immutable; re-registration is remove and add.
 *
 * @typeParam P - Payload type of the event
 */
export interface ListenerRecord<P = unknown> {
	/** Handle returned to the registering caller. */
	readonly handle: ListenerHandle;
	/** The registered function. */
	readonly listener: Listener<P>;
	/** Whether the record is consumed by its first invocation. */
	readonly once: boolean;
	/** Dispatch priority, higher first. */
	readonly priority: number;
	/** Registry-wide insertion counter, breaks priority ties. */
	readonly sequence: number;
}

/**
 * Outcome of one listener within a dispatch.
 */
export type ListenerOutcome =
	| { status: "success" }
	| { status: "failure"; error: Error }
	| { status: "cancelled"; reason: unknown };

/** Union of the {@link ListenerOutcome} status tags. */
export type OutcomeStatus = ListenerOutcome["status"];

/**
 * One listener's line in a {@link DispatchResult}.
 */
export interface DispatchEntry {
	/** Handle of the registration that was dispatched to. */
	readonly handle: ListenerHandle;
	/** The listener function. */
	readonly listener: Listener<never>;
	/** How the invocation ended. */
	readonly outcome: ListenerOutcome;
	/** Index of the listener in the dispatch snapshot. */
	readonly position: number;
}

/**
 * Result of a single emit, produced once every invocation has settled.
 */
export interface DispatchResult {
	/** Every accounted listener, ordered by snapshot position. */
	readonly entries: readonly DispatchEntry[];
	/** Name of the emitted event. */
	readonly event: string;
	/** Entries whose outcome is a failure, in position order. */
	readonly failures: readonly DispatchEntry[];
	/** true when no listener failed. Cancelled listeners do not count as failures. */
	readonly ok: boolean;
}

/**
 * Options accepted by a single emit.
 */
export interface EmitOptions {
	/** Cancels listeners that have not started yet when aborted. */
	signal?: AbortSignal;
}
