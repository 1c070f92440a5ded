/**
 * Structured logging interface for emitter components.
 *
 * Supports hierarchical prefixes via {@link Logger.child} for scoped logging.
 */
export interface Logger {
	/**
	 * Creates a child logger with a nested prefix.
	 *
	 * @param prefix - Label appended to the parent prefix, separated by ':'
	 * @returns A new {@link Logger} with the combined prefix
	 */
	child(prefix: string): Logger;
	debug(message: string): void;
	error(message: string): void;
	info(message: string): void;
	warn(message: string): void;
}

/** Lowest severity a console logger writes. `"silent"` writes nothing. */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type WrittenLevel = Exclude<LogLevel, "silent">;

const severity: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: Number.POSITIVE_INFINITY,
};

const discard = (_message: string): void => undefined;

/**
 * A logger that silently discards all messages.
 * Used as the default when no logging is configured.
 */
export const noopLogger: Logger = {
	debug: discard,
	info: discard,
	warn: discard,
	error: discard,
	child(): Logger {
		return noopLogger;
	},
};

/**
 * Options for {@link createConsoleLogger}.
 */
export interface ConsoleLoggerOptions {
	/** Messages below this level are dropped. Defaults to `"debug"`. Children inherit it. */
	level?: LogLevel;
}

/**
 * Creates a {@link Logger} that writes `[prefix] message` lines to the console.
 *
 * @param prefix - Label prepended to all log messages
 * @param options - Level filter shared with every child
 * @returns A new console-backed logger
 */
export function createConsoleLogger(prefix: string, options: ConsoleLoggerOptions = {}): Logger {
	const level = options.level ?? "debug";
	const writer = (target: WrittenLevel): ((message: string) => void) =>
		severity[target] < severity[level] ? discard : (message) => console[target](`[${prefix}] ${message}`);

	return {
		debug: writer("debug"),
		info: writer("info"),
		warn: writer("warn"),
		error: writer("error"),
		child: (childPrefix) => createConsoleLogger(`${prefix}:${childPrefix}`, { level }),
	};
}

/** Console logger prefixed with "asyncdef" that skips debug chatter. */
export const consoleLogger: Logger = createConsoleLogger("asyncdef", { level: "info" });
