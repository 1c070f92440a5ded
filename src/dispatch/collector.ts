import type { DispatchEntry, DispatchResult, ListenerOutcome, ListenerRecord } from "../types";

/**
 * Accumulates per-listener outcomes of one dispatch.
 *
 * Recording is append-only: the first outcome stored for a position wins and
 * later ones are rejected, so every listener is accounted for exactly once.
 */
export class ErrorCollector {
	readonly #event: string;
	readonly #entries = new Map<number, DispatchEntry>();
	#sealed = false;

	/**
	 * @param event - Name of the event being dispatched
	 */
	constructor(event: string) {
		this.#event = event;
	}

	/**
	 * Stores the outcome for one snapshot position.
	 *
	 * @param position - Index of the listener in the dispatch snapshot
	 * @param record - The dispatched record
	 * @param outcome - How the invocation ended
	 * @returns false if the position already has an outcome or the result was taken
	 */
	record(position: number, record: ListenerRecord<never>, outcome: ListenerOutcome): boolean {
		if (this.#sealed || this.#entries.has(position)) {
			return false;
		}
		this.#entries.set(
			position,
			Object.freeze({ position, handle: record.handle, listener: record.listener, outcome })
		);
		return true;
	}

	/** Shorthand for recording a successful invocation. */
	succeed(position: number, record: ListenerRecord<never>): boolean {
		return this.record(position, record, { status: "success" });
	}

	/** Shorthand for recording a failed invocation. */
	fail(position: number, record: ListenerRecord<never>, error: Error): boolean {
		return this.record(position, record, { status: "failure", error });
	}

	/** Shorthand for recording a listener skipped by cancellation. */
	cancel(position: number, record: ListenerRecord<never>, reason: unknown): boolean {
		return this.record(position, record, { status: "cancelled", reason });
	}

	/** Number of positions recorded so far. */
	get size(): number {
		return this.#entries.size;
	}

	/**
	 * Finalizes the collected outcomes.
	 *
	 * Call once every invocation has settled; further records are rejected.
	 *
	 * @returns An immutable result ordered by snapshot position
	 */
	result(): DispatchResult {
		this.#sealed = true;
		const entries = Object.freeze([...this.#entries.values()].sort((a, b) => a.position - b.position));
		const failures = Object.freeze(entries.filter((entry) => entry.outcome.status === "failure"));
		return Object.freeze({
			event: this.#event,
			entries,
			failures,
			ok: failures.length === 0,
		});
	}
}
