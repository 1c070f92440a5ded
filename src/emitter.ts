import type { EmitterOptions, ResolvedEmitterOptions } from "./config";
import type { AnyEventMap, EventMap, TypedEmitter } from "./lib/emitter";
import type { Logger } from "./lib/logger";
import type { DispatchMode, DispatchResult, EmitOptions, Listener, ListenerRecord, RegisterOptions } from "./types";

import Emittery from "emittery";

import { resolveEmitterOptions } from "./config";
import { DispatchEngine } from "./dispatch/engine";
import { formatError } from "./lib/errors";
import { ListenerHandle } from "./registry/handle";
import { EventRegistry } from "./registry/registry";

/**
 * Lifecycle notifications published on {@link AsyncEmitter.lifecycle}.
 *
 * Each key is a notification name and its value is the payload passed to listeners.
 * Notifications are delivered asynchronously, in the order they were published.
 */
export interface LifecycleEventMap {
	/** A listener failed during a dispatch. */
	listenerError: { error: Error; event: string; handle: ListenerHandle; position: number };
	/** An event's listener count went past `maxListeners`. */
	maxListenersExceeded: { count: number; event: string; limit: number };
	/**
	 * A listener was added. Published as the registration is made; like every
	 * lifecycle notification it is delivered asynchronously, so observers
	 * already see the registration in place.
	 */
	newListener: { event: string; listener: Listener<never> };
	/** A registration was removed, consumed by its one-shot flag, or cleared. */
	removeListener: { event: string; handle: ListenerHandle; listener: Listener<never> };
}

/**
 * Typed asynchronous event emitter.
 *
 * Owns one {@link EventRegistry} and one {@link DispatchEngine}. Listeners may be
 * synchronous or return promises; every emit resolves to a {@link DispatchResult}
 * that accounts for each listener exactly once.
 *
 * @typeParam Events - Event names and their payload types
 */
export class AsyncEmitter<Events extends EventMap = AnyEventMap> {
	readonly #registry: EventRegistry<Events>;
	readonly #engine: DispatchEngine<Events>;
	readonly #lifecycle: TypedEmitter<LifecycleEventMap> = new Emittery<LifecycleEventMap>();
	readonly #logger: Logger;
	readonly #options: ResolvedEmitterOptions;

	/**
	 * @param options - Dispatch mode, serialization, timeout, listener limit and logger
	 * @throws {InvalidOptionsError} if an option has the wrong type or range
	 */
	constructor(options: EmitterOptions = {}) {
		this.#options = resolveEmitterOptions(options);
		this.#logger = this.#options.logger.child("emitter");

		this.#registry = new EventRegistry<Events>({
			logger: this.#options.logger,
			maxListeners: this.#options.maxListeners,
			onRegister: (event, listener) => this.#notify("newListener", { event, listener }),
			onRemove: (record: ListenerRecord<never>) =>
				this.#notify("removeListener", { event: record.handle.event, handle: record.handle, listener: record.listener }),
			onMaxListeners: (event, count) =>
				this.#notify("maxListenersExceeded", { event, count, limit: this.#registry.maxListeners }),
		});
		this.#engine = new DispatchEngine(this.#registry, {
			dispatchMode: this.#options.dispatchMode,
			serializeEmits: this.#options.serializeEmits,
			listenerTimeout: this.#options.listenerTimeout,
			logger: this.#options.logger,
			onFailure: (failure) => this.#notify("listenerError", failure),
		});
	}

	/** Emitter of {@link LifecycleEventMap} notifications. */
	get lifecycle(): TypedEmitter<LifecycleEventMap> {
		return this.#lifecycle;
	}

	/** The dispatch mode chosen at construction. */
	get dispatchMode(): DispatchMode {
		return this.#engine.mode;
	}

	/** Listeners per event before a warning. `0` means unlimited. */
	get maxListeners(): number {
		return this.#registry.maxListeners;
	}

	/** @throws {InvalidOptionsError} if `value` is not a non-negative integer */
	set maxListeners(value: number) {
		this.#registry.maxListeners = value;
	}

	/**
	 * Adds a listener for an event.
	 *
	 * @param event - Case-sensitive event name
	 * @param listener - Function run on each emit of `event`
	 * @param options - One-shot flag and priority
	 * @returns A handle that removes this registration when passed to {@link AsyncEmitter.off}
	 * @throws {InvalidListenerError} if `listener` is not a function
	 */
	on<K extends keyof Events & string>(
		event: K,
		listener: Listener<Events[K]>,
		options?: RegisterOptions
	): ListenerHandle {
		return this.#registry.register(event, listener, options);
	}

	/**
	 * Adds a listener that is removed when its first invocation starts.
	 *
	 * @param event - Case-sensitive event name
	 * @param listener - Function run on the next emit of `event`
	 * @param options - Priority of the listener
	 * @returns A handle that removes this registration when passed to {@link AsyncEmitter.off}
	 */
	once<K extends keyof Events & string>(
		event: K,
		listener: Listener<Events[K]>,
		options?: Omit<RegisterOptions, "once">
	): ListenerHandle {
		return this.#registry.register(event, listener, { ...options, once: true });
	}

	/**
	 * Removes a registration by handle. Stale handles are ignored.
	 *
	 * @param handle - Handle returned by {@link AsyncEmitter.on} or {@link AsyncEmitter.once}
	 * @returns true if a registration was removed
	 */
	off(handle: ListenerHandle): boolean;
	/**
	 * Removes the earliest live registration of a function for an event.
	 *
	 * @param event - Case-sensitive event name
	 * @param listener - The registered function
	 * @returns true if a registration was removed
	 */
	off<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): boolean;
	off<K extends keyof Events & string>(target: ListenerHandle | K, listener?: Listener<Events[K]>): boolean {
		if (target instanceof ListenerHandle) {
			return this.#registry.unregister(target);
		}
		const handle = listener ? this.#registry.find(target, listener) : undefined;
		return handle ? this.#registry.unregister(handle) : false;
	}

	/**
	 * Dispatches an event to the listeners registered when the call is made.
	 *
	 * @param event - Case-sensitive event name
	 * @param payload - Value passed to each listener
	 * @param options - Optional cancellation signal
	 * @returns Per-listener outcomes; never rejects because of a listener failure
	 */
	emit<K extends keyof Events & string>(
		event: K,
		payload: Events[K],
		options?: EmitOptions
	): Promise<DispatchResult> {
		return this.#engine.emit(event, payload, options);
	}

	/**
	 * Resolves with the payload of the next emit of `event`.
	 *
	 * @param event - Case-sensitive event name
	 * @param options - Optional signal that abandons the wait
	 * @returns The next payload
	 * @throws The signal's reason when aborted before the event is emitted
	 */
	waitFor<K extends keyof Events & string>(event: K, options: EmitOptions = {}): Promise<Events[K]> {
		const { signal } = options;
		return new Promise<Events[K]>((resolve, reject) => {
			if (signal?.aborted) {
				reject(signal.reason);
				return;
			}
			const onAbort = (): void => {
				this.#registry.unregister(handle);
				reject(signal?.reason);
			};
			const handle = this.#registry.register(
				event,
				(payload) => {
					signal?.removeEventListener("abort", onAbort);
					resolve(payload);
				},
				{ once: true }
			);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	/**
	 * Lists registered functions for an event in dispatch order.
	 *
	 * @param event - Case-sensitive event name
	 */
	listeners<K extends keyof Events & string>(event: K): Listener<Events[K]>[] {
		return this.#registry.listeners(event);
	}

	/**
	 * Counts registrations for an event.
	 *
	 * @param event - Case-sensitive event name
	 */
	listenerCount(event: keyof Events & string): number {
		return this.#registry.listenerCount(event);
	}

	/** Names of events with at least one registration. */
	eventNames(): string[] {
		return this.#registry.eventNames();
	}

	/**
	 * Removes every registration for one event, or for all events when omitted.
	 *
	 * @param event - Case-sensitive event name
	 * @returns Number of registrations removed
	 */
	removeAllListeners(event?: keyof Events & string): number {
		return event === undefined ? this.#registry.clearAll() : this.#registry.clear(event);
	}

	/** Publishes a lifecycle notification without letting its listeners affect the caller. */
	#notify<N extends keyof LifecycleEventMap>(name: N, data: LifecycleEventMap[N]): void {
		this.#lifecycle.emit(name, data).catch((err: unknown) => {
			this.#logger.error(`Lifecycle listener for "${name}" failed: ${formatError(err)}`);
		});
	}
}
