import type { DispatchFrame } from "../lib/context";
import type { AnyEventMap, EventMap } from "../lib/emitter";
import type { Logger } from "../lib/logger";
import type { ListenerHandle } from "../registry/handle";
import type { EventRegistry } from "../registry/registry";
import type { DispatchMode, DispatchResult, EmitOptions, ListenerContext, ListenerRecord } from "../types";

import { EmitterDefaults } from "../constants";
import { activeFrames, runInDispatch } from "../lib/context";
import { formatError, toError } from "../lib/errors";
import { noopLogger } from "../lib/logger";
import { ErrorCollector } from "./collector";
import { isPromiseLike, raceTimeout } from "./utils";

/**
 * A failure recorded during dispatch, as reported to {@link DispatchEngineOptions.onFailure}.
 */
export interface ListenerFailure {
	/** The error thrown or rejected by the listener. */
	error: Error;
	/** Name of the event being dispatched. */
	event: string;
	/** Handle of the failing registration. */
	handle: ListenerHandle;
	/** Index of the listener in the dispatch snapshot. */
	position: number;
}

/**
 * Configuration for creating a {@link DispatchEngine}.
 */
export interface DispatchEngineOptions {
	/** How asynchronous listeners are awaited. Defaults to `"sequential"`. */
	dispatchMode?: DispatchMode;
	/** Per-listener deadline in milliseconds. `0` disables it. */
	listenerTimeout?: number;
	/** Logger for dispatch diagnostics. Defaults to no-op. */
	logger?: Logger;
	/** Invoked for every recorded listener failure. */
	onFailure?: (failure: ListenerFailure) => void;
	/** Queue emits of the same event behind each other. Defaults to `false`. */
	serializeEmits?: boolean;
}

/**
 * How a listener call ended when it returned.
 *
 * Synchronous listeners are complete on return; asynchronous ones hand back
 * a completion that still has to be awaited.
 */
type Invocation =
	| { kind: "returned" }
	| { kind: "threw"; error: Error }
	| { kind: "pending"; completion: PromiseLike<unknown> };

/** Signal for emits that were not given one. It is never aborted. */
const idleSignal = new AbortController().signal;

/**
 * Dispatches emitted events to the listeners of an {@link EventRegistry}.
 *
 * Each emit works on a registry snapshot, isolates listener failures into the
 * {@link DispatchResult} and never rejects because of a listener.
 *
 * @typeParam Events - Event names and their payload types
 */
export class DispatchEngine<Events extends EventMap = AnyEventMap> {
	readonly #registry: EventRegistry<Events>;
	readonly #mode: DispatchMode;
	readonly #serializeEmits: boolean;
	readonly #listenerTimeout: number;
	readonly #logger: Logger;
	readonly #onFailure?: (failure: ListenerFailure) => void;
	/** Tail of the emit queue per event, only used when emits are serialized. */
	readonly #queues = new Map<string, Promise<void>>();
	/** Frames of this engine's dispatches that have not finished yet. */
	readonly #live = new Set<DispatchFrame>();

	/**
	 * @param registry - Source of listener snapshots and one-shot claims
	 * @param options - Dispatch mode, serialization, timeout and failure hook
	 */
	constructor(registry: EventRegistry<Events>, options: DispatchEngineOptions = {}) {
		this.#registry = registry;
		this.#mode = options.dispatchMode ?? EmitterDefaults.DISPATCH_MODE;
		this.#serializeEmits = options.serializeEmits ?? EmitterDefaults.SERIALIZE_EMITS;
		this.#listenerTimeout = options.listenerTimeout ?? EmitterDefaults.LISTENER_TIMEOUT;
		this.#logger = (options.logger ?? noopLogger).child("dispatch");
		this.#onFailure = options.onFailure;
	}

	/** The dispatch mode chosen at construction. */
	get mode(): DispatchMode {
		return this.#mode;
	}

	/**
	 * Invokes every listener registered for `event` at the time of the call.
	 *
	 * Listener failures and cancellations are returned as data; the promise only
	 * rejects on an internal fault.
	 *
	 * @param event - Case-sensitive event name
	 * @param payload - Value passed to each listener
	 * @param options - Optional cancellation signal
	 * @returns The outcome of every dispatched listener, in snapshot order
	 */
	emit<K extends keyof Events & string>(
		event: K,
		payload: Events[K],
		options: EmitOptions = {}
	): Promise<DispatchResult> {
		// A re-entrant emit from one of this event's own listeners would wait on itself in the queue.
		if (!this.#serializeEmits || this.#isReentrant(event)) {
			return this.#dispatch(event, payload, options.signal ?? idleSignal);
		}

		const previous = this.#queues.get(event) ?? Promise.resolve();
		const run = previous.then(() => this.#dispatch(event, payload, options.signal ?? idleSignal));
		const release = (): void => {
			if (this.#queues.get(event) === tail) {
				this.#queues.delete(event);
			}
		};
		const tail: Promise<void> = run.then(release, release);
		this.#queues.set(event, tail);
		return run;
	}

	/** Whether the caller runs inside a still-running dispatch of `event` by this engine. */
	#isReentrant(event: string): boolean {
		return activeFrames().some((frame) => frame.event === event && this.#live.has(frame));
	}

	async #dispatch<K extends keyof Events & string>(
		event: K,
		payload: Events[K],
		signal: AbortSignal
	): Promise<DispatchResult> {
		const snapshot = this.#registry.snapshot(event);
		const collector = new ErrorCollector(event);
		if (snapshot.length === 0) {
			return collector.result();
		}

		this.#logger.debug(`Dispatching "${event}" to ${snapshot.length} listener(s) (${this.#mode})`);
		const frame: DispatchFrame = { event };
		this.#live.add(frame);
		try {
			await runInDispatch(frame, () =>
				this.#mode === "fanout"
					? this.#runFanout(event, payload, snapshot, signal, collector)
					: this.#runSequential(event, payload, snapshot, signal, collector)
			);
		} finally {
			this.#live.delete(frame);
		}

		const result = collector.result();
		if (!result.ok) {
			this.#logger.debug(`Dispatch of "${event}" finished with ${result.failures.length} failure(s)`);
		}
		return result;
	}

	/** Starts each listener only after the previous one has settled. */
	async #runSequential<K extends keyof Events & string>(
		event: K,
		payload: Events[K],
		snapshot: readonly ListenerRecord<Events[K]>[],
		signal: AbortSignal,
		collector: ErrorCollector
	): Promise<void> {
		for (const [position, record] of snapshot.entries()) {
			if (signal.aborted) {
				collector.cancel(position, record, signal.reason);
				continue;
			}
			if (!this.#begin(record)) {
				continue;
			}
			const invocation = this.#invoke(record, payload, { event, position, signal });
			if (invocation.kind === "pending") {
				await this.#complete(event, position, record, invocation.completion, collector);
			} else {
				this.#settle(event, position, record, invocation, collector);
			}
		}
	}

	/** Starts every listener, then awaits all pending completions together. */
	async #runFanout<K extends keyof Events & string>(
		event: K,
		payload: Events[K],
		snapshot: readonly ListenerRecord<Events[K]>[],
		signal: AbortSignal,
		collector: ErrorCollector
	): Promise<void> {
		const pending: Promise<void>[] = [];
		for (const [position, record] of snapshot.entries()) {
			if (signal.aborted) {
				collector.cancel(position, record, signal.reason);
				continue;
			}
			if (!this.#begin(record)) {
				continue;
			}
			const invocation = this.#invoke(record, payload, { event, position, signal });
			if (invocation.kind === "pending") {
				pending.push(this.#complete(event, position, record, invocation.completion, collector));
			} else {
				this.#settle(event, position, record, invocation, collector);
			}
		}
		await Promise.all(pending);
	}

	/**
	 * Claims one-shot records before they start.
	 * A false return means a concurrent or re-entrant dispatch already consumed it.
	 */
	#begin(record: ListenerRecord<never>): boolean {
		if (!record.once) {
			return true;
		}
		const claimed = this.#registry.claim(record);
		if (!claimed) {
			this.#logger.debug(`Skipping one-shot listener #${record.handle.id}: already consumed`);
		}
		return claimed;
	}

	#invoke<P>(record: ListenerRecord<P>, payload: P, context: ListenerContext): Invocation {
		try {
			const value: unknown = record.listener(payload, context);
			return isPromiseLike(value) ? { kind: "pending", completion: value } : { kind: "returned" };
		} catch (err) {
			return { kind: "threw", error: toError(err) };
		}
	}

	#settle(
		event: string,
		position: number,
		record: ListenerRecord<never>,
		invocation: Invocation,
		collector: ErrorCollector
	): void {
		if (invocation.kind === "threw") {
			this.#fail(event, position, record, invocation.error, collector);
			return;
		}
		collector.succeed(position, record);
	}

	/** Awaits an asynchronous listener and records its outcome. Never rejects. */
	async #complete(
		event: string,
		position: number,
		record: ListenerRecord<never>,
		completion: PromiseLike<unknown>,
		collector: ErrorCollector
	): Promise<void> {
		try {
			await raceTimeout(completion, this.#listenerTimeout, `Listener #${record.handle.id} for "${event}"`);
			collector.succeed(position, record);
		} catch (err) {
			this.#fail(event, position, record, toError(err), collector);
		}
	}

	#fail(event: string, position: number, record: ListenerRecord<never>, error: Error, collector: ErrorCollector): void {
		collector.fail(position, record, error);
		this.#logger.warn(`Listener #${record.handle.id} for "${event}" failed: ${formatError(error)}`);
		if (!this.#onFailure) {
			return;
		}
		try {
			this.#onFailure({ event, error, handle: record.handle, position });
		} catch (hookErr) {
			this.#logger.error(`Failure hook threw for "${event}": ${formatError(hookErr)}`);
		}
	}
}
