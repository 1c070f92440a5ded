import type { AnyEventMap, EventMap } from "../lib/emitter";
import type { Logger } from "../lib/logger";
import type { Listener, ListenerRecord, RegisterOptions } from "../types";
import type { HandleOwner } from "./handle";

import { resolveMaxListeners, resolveRegisterOptions } from "../config";
import { EmitterDefaults } from "../constants";
import { formatError, InvalidListenerError } from "../lib/errors";
import { noopLogger } from "../lib/logger";
import { ListenerHandle, markRevoked } from "./handle";

const EMPTY: readonly ListenerRecord<never>[] = Object.freeze([]);

/**
 * Configuration for an {@link EventRegistry}.
 */
export interface EventRegistryOptions {
	/** Logger for registration diagnostics. Defaults to no-op. */
	logger?: Logger;
	/** Listeners per event before {@link onMaxListeners} fires. `0` disables the check. */
	maxListeners?: number;
	/** Invoked once per event when its listener count first exceeds `maxListeners`. */
	onMaxListeners?: (event: string, count: number) => void;
	/** Invoked immediately before a new record is added. */
	onRegister?: (event: string, listener: Listener<never>) => void;
	/** Invoked immediately after a record leaves the registry. */
	onRemove?: (record: ListenerRecord<never>) => void;
}

/**
 * Maps event names to priority-ordered listener sequences.
 *
 * Every stored sequence is frozen and replaced wholesale on mutation, so the
 * array returned by {@link EventRegistry.snapshot} is never changed by later
 * registrations or removals. All operations are synchronous.
 *
 * @typeParam Events - Event names and their payload types
 */
export class EventRegistry<Events extends EventMap = AnyEventMap> implements HandleOwner {
	/** Frozen listener sequences keyed by event name, sorted for dispatch. */
	readonly #sequences = new Map<string, readonly ListenerRecord<never>[]>();
	/** Events that have already triggered the max-listeners warning. */
	readonly #warned = new Set<string>();
	readonly #logger: Logger;
	readonly #onRegister?: (event: string, listener: Listener<never>) => void;
	readonly #onRemove?: (record: ListenerRecord<never>) => void;
	readonly #onMaxListeners?: (event: string, count: number) => void;
	#maxListeners: number;
	#nextId = 0;

	/**
	 * @param options - Optional logger, listener limit and lifecycle callbacks
	 */
	constructor(options: EventRegistryOptions = {}) {
		this.#logger = (options.logger ?? noopLogger).child("registry");
		this.#maxListeners = resolveMaxListeners(options.maxListeners ?? EmitterDefaults.MAX_LISTENERS);
		this.#onRegister = options.onRegister;
		this.#onRemove = options.onRemove;
		this.#onMaxListeners = options.onMaxListeners;
	}

	/** Listeners per event before a warning. `0` means unlimited. */
	get maxListeners(): number {
		return this.#maxListeners;
	}

	/** @throws {InvalidOptionsError} if `value` is not a non-negative integer */
	set maxListeners(value: number) {
		this.#maxListeners = resolveMaxListeners(value);
	}

	/**
	 * Adds a listener for an event.
	 *
	 * Registering the same function twice creates two independent records.
	 *
	 * @param event - Case-sensitive event name
	 * @param listener - Function run on each emit of `event`
	 * @param options - One-shot flag and priority
	 * @returns A handle that removes this registration when revoked
	 * @throws {InvalidListenerError} if `listener` is not a function
	 * @throws {InvalidOptionsError} if `options` fail validation
	 */
	register<K extends keyof Events & string>(
		event: K,
		listener: Listener<Events[K]>,
		options?: RegisterOptions
	): ListenerHandle {
		if (typeof listener !== "function") {
			throw new InvalidListenerError(event, listener);
		}
		const { once, priority } = resolveRegisterOptions(options);

		const onRegister = this.#onRegister;
		if (onRegister) {
			this.#runHook("onRegister", event, () => onRegister(event, listener));
		}

		this.#nextId += 1;
		const handle = new ListenerHandle(this, { event, id: this.#nextId, once, priority });
		const record: ListenerRecord<Events[K]> = { handle, listener, once, priority, sequence: this.#nextId };

		const current = this.#sequences.get(event) ?? EMPTY;
		const at = current.findIndex((existing) => existing.priority < priority);
		const next = at === -1 ? [...current, record] : [...current.slice(0, at), record, ...current.slice(at)];
		this.#sequences.set(event, Object.freeze(next));
		this.#logger.debug(`Registered listener #${handle.id} for "${event}" (priority ${priority}${once ? ", once" : ""})`);

		this.#checkLimit(event, next.length);
		return handle;
	}

	/**
	 * Removes the registration behind a handle.
	 *
	 * Stale handles, including ones already removed, are ignored.
	 *
	 * @param handle - Handle returned by {@link EventRegistry.register}
	 * @returns true if a record was removed by this call
	 */
	unregister(handle: ListenerHandle): boolean {
		const current = this.#sequences.get(handle.event);
		if (!current) {
			return false;
		}
		const record = current.find((r) => r.handle === handle);
		if (!record) {
			return false;
		}
		this.#remove(handle.event, [record]);
		return true;
	}

	/**
	 * Atomically consumes a one-shot record before its invocation.
	 *
	 * @param record - Record taken from a snapshot
	 * @returns true for the first caller only; false if the record was already removed
	 */
	claim(record: ListenerRecord<never>): boolean {
		if (!record.handle.active) {
			return false;
		}
		return this.unregister(record.handle);
	}

	/**
	 * Returns the immutable, dispatch-ordered listener sequence for an event.
	 *
	 * Order is priority descending, then registration order ascending.
	 *
	 * @param event - Case-sensitive event name
	 * @returns The current sequence; empty when nothing is registered
	 */
	snapshot<K extends keyof Events & string>(event: K): readonly ListenerRecord<Events[K]>[] {
		// Type assertion safe: records are only stored under the event whose payload type they were registered with
		return (this.#sequences.get(event) ?? EMPTY) as readonly ListenerRecord<Events[K]>[];
	}

	/**
	 * Finds the earliest-registered live record of a given function.
	 *
	 * @param event - Case-sensitive event name
	 * @param listener - The registered function
	 * @returns The handle of the matching registration, or undefined
	 */
	find<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): ListenerHandle | undefined {
		let match: ListenerRecord<Events[K]> | undefined;
		for (const record of this.snapshot(event)) {
			if (record.listener === listener && (!match || record.sequence < match.sequence)) {
				match = record;
			}
		}
		return match?.handle;
	}

	/**
	 * Lists registered functions for an event in dispatch order.
	 *
	 * @param event - Case-sensitive event name
	 */
	listeners<K extends keyof Events & string>(event: K): Listener<Events[K]>[] {
		return this.snapshot(event).map((record) => record.listener);
	}

	/**
	 * Counts registrations for an event.
	 *
	 * @param event - Case-sensitive event name
	 */
	listenerCount(event: keyof Events & string): number {
		return this.#sequences.get(event)?.length ?? 0;
	}

	/** Names of events with at least one registration, in first-registration order. */
	eventNames(): string[] {
		return Array.from(this.#sequences.keys());
	}

	/**
	 * Removes every registration for one event.
	 *
	 * @param event - Case-sensitive event name
	 * @returns Number of registrations removed
	 */
	clear(event: keyof Events & string): number {
		return this.#clearEvent(event);
	}

	/**
	 * Removes every registration for every event.
	 *
	 * @returns Number of registrations removed
	 */
	clearAll(): number {
		let removed = 0;
		for (const event of this.eventNames()) {
			removed += this.#clearEvent(event);
		}
		return removed;
	}

	#clearEvent(event: string): number {
		const current = this.#sequences.get(event);
		if (!current) {
			return 0;
		}
		this.#remove(event, current);
		return current.length;
	}

	/** Replaces an event's sequence without `records`, then revokes and reports them. */
	#remove(event: string, records: readonly ListenerRecord<never>[]): void {
		const current = this.#sequences.get(event) ?? EMPTY;
		const next = current.filter((r) => !records.includes(r));
		if (next.length === 0) {
			this.#sequences.delete(event);
			this.#warned.delete(event);
		} else {
			this.#sequences.set(event, Object.freeze(next));
		}

		for (const record of records) {
			markRevoked(record.handle);
		}
		for (const record of records) {
			this.#logger.debug(`Removed listener #${record.handle.id} from "${event}"`);
			const onRemove = this.#onRemove;
			if (onRemove) {
				this.#runHook("onRemove", event, () => onRemove(record));
			}
		}
	}

	#checkLimit(event: string, count: number): void {
		if (this.#maxListeners === 0 || count <= this.#maxListeners || this.#warned.has(event)) {
			return;
		}
		this.#warned.add(event);
		this.#logger.warn(
			`Possible listener leak: ${count} listeners registered for "${event}" (max ${this.#maxListeners})`
		);
		const onMaxListeners = this.#onMaxListeners;
		if (onMaxListeners) {
			this.#runHook("onMaxListeners", event, () => onMaxListeners(event, count));
		}
	}

	/** Runs a lifecycle callback; a throwing callback is logged and never reaches the registry caller. */
	#runHook(name: string, event: string, hook: () => void): void {
		try {
			hook();
		} catch (err) {
			this.#logger.error(`${name} hook threw for "${event}": ${formatError(err)}`);
		}
	}
}
