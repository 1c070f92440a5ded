/** Base error class for all emitter failures. */
export class EmitterError extends Error {
	override readonly name: string = "EmitterError";

	/**
	 * @param message - Human-readable error description
	 * @param cause - The underlying value that caused this failure
	 */
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
	}
}

/** Error thrown when a registration is given a value that cannot be invoked. */
export class InvalidListenerError extends EmitterError {
	override readonly name: string = "InvalidListenerError";

	/** Event the rejected listener was meant for. */
	readonly event: string;

	/**
	 * @param event - Event the rejected listener was meant for
	 * @param received - The value passed in place of a listener
	 */
	constructor(event: string, received: unknown) {
		super(`Listener for "${event}" must be a function, got ${describeValue(received)}`);
		this.event = event;
	}
}

/** Error thrown when emitter or registration options fail validation. */
export class InvalidOptionsError extends EmitterError {
	override readonly name: string = "InvalidOptionsError";

	/** One line per validation issue, formatted as `path: message`. */
	readonly issues: readonly string[];

	/**
	 * @param subject - What was being configured (e.g. "emitter options")
	 * @param issues - Validation issues, one per line
	 */
	constructor(subject: string, issues: readonly string[]) {
		super(`Invalid ${subject}: ${issues.join("; ")}`);
		this.issues = issues;
	}
}

/** Error recorded when a listener does not settle within its allowed duration. */
export class TimeoutError extends EmitterError {
	override readonly name: string = "TimeoutError";

	/** Name of the operation that timed out. */
	readonly operation: string;

	/** Duration in milliseconds before the timeout triggered. */
	readonly timeoutMs: number;

	/**
	 * @param operation - Name of the operation that timed out
	 * @param timeoutMs - Duration in milliseconds before the timeout triggered
	 * @param cause - The underlying error that caused this failure
	 */
	constructor(operation: string, timeoutMs: number, cause?: Error) {
		super(`${operation} timed out after ${timeoutMs}ms`, cause);
		this.operation = operation;
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Normalizes an unknown thrown value into a human-readable message.
 *
 * @param err - The caught value to format
 * @returns Error message for Error instances, stringified value otherwise
 */
export function formatError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 *
 * Non-Error values are wrapped and kept as the `cause`.
 */
export function toError(err: unknown): Error {
	if (err instanceof Error) {
		return err;
	}
	return new EmitterError(`Non-error value thrown: ${String(err)}`, err);
}

function describeValue(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (Array.isArray(value)) {
		return "array";
	}
	return typeof value;
}
