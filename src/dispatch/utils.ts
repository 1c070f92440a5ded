import { TimeoutError } from "../lib/errors";

/**
 * Checks whether a listener's return value is a thenable to be awaited.
 *
 * @param value - Whatever the listener returned
 * @returns true for promises and other objects with a callable `then`
 */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
	return (
		(typeof value === "object" || typeof value === "function") &&
		value !== null &&
		"then" in value &&
		typeof value.then === "function"
	);
}

/**
 * Races a thenable against a timeout, rejecting if the timeout expires first.
 *
 * The timer is cleared as soon as the race settles.
 *
 * @typeParam T - The resolved value type of the thenable
 * @param promise - The thenable to race
 * @param ms - Timeout duration in milliseconds; `0` disables the deadline
 * @param operation - Label used in the {@link TimeoutError} message
 * @returns The resolved value of the original thenable
 * @throws {TimeoutError} if the deadline is exceeded
 */
export function raceTimeout<T>(promise: PromiseLike<T>, ms: number, operation: string): Promise<T> {
	if (ms <= 0) {
		return Promise.resolve(promise);
	}
	let timer: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
	});
	return Promise.race([Promise.resolve(promise), deadline]).finally(() => clearTimeout(timer));
}
