import type { ZodError } from "zod";
import type { Logger } from "./lib/logger";
import type { DispatchMode, RegisterOptions } from "./types";

import { z } from "zod";

import { EmitterDefaults } from "./constants";
import { InvalidOptionsError } from "./lib/errors";
import { noopLogger } from "./lib/logger";

export const DispatchModeSchema = z.enum(["sequential", "fanout"]);

/**
 * Schema for the plain-data part of {@link EmitterOptions}.
 */
export const EmitterSettingsSchema = z.object({
	dispatchMode: DispatchModeSchema.default(EmitterDefaults.DISPATCH_MODE),
	serializeEmits: z.boolean().default(EmitterDefaults.SERIALIZE_EMITS),
	listenerTimeout: z.number().int().nonnegative().default(EmitterDefaults.LISTENER_TIMEOUT),
	maxListeners: z.number().int().nonnegative().default(EmitterDefaults.MAX_LISTENERS),
});

/** Schema for {@link RegisterOptions}. */
export const RegisterOptionsSchema = z.object({
	once: z.boolean().default(false),
	priority: z.number().finite().default(EmitterDefaults.PRIORITY),
});

/**
 * Configuration options for {@link AsyncEmitter} and {@link DispatchEngine}.
 */
export interface EmitterOptions {
	/** How asynchronous listeners are awaited. Defaults to `"sequential"`. */
	dispatchMode?: DispatchMode;
	/** Per-listener deadline in milliseconds. `0` (the default) disables it. */
	listenerTimeout?: number;
	/** Logger instance for emitter diagnostics. */
	logger?: Logger;
	/** Listeners per event before a warning is logged. `0` disables the check. Defaults to 10. */
	maxListeners?: number;
	/** Queue emits of the same event behind each other. Defaults to `false`. */
	serializeEmits?: boolean;
}

/** {@link EmitterOptions} with every default applied. */
export interface ResolvedEmitterOptions {
	dispatchMode: DispatchMode;
	listenerTimeout: number;
	logger: Logger;
	maxListeners: number;
	serializeEmits: boolean;
}

/** {@link RegisterOptions} with every default applied. */
export type ResolvedRegisterOptions = Required<RegisterOptions>;

/**
 * Validates emitter options and applies defaults.
 *
 * @param options - Caller-supplied options
 * @returns Options with every field resolved
 * @throws {InvalidOptionsError} if a field has the wrong type or range
 */
export function resolveEmitterOptions(options: EmitterOptions = {}): ResolvedEmitterOptions {
	const { logger, ...settings } = options;
	const result = EmitterSettingsSchema.safeParse(settings);
	if (!result.success) {
		throw new InvalidOptionsError("emitter options", formatIssues(result.error));
	}
	return { ...result.data, logger: logger ?? noopLogger };
}

/**
 * Validates listener registration options and applies defaults.
 *
 * @param options - Caller-supplied options
 * @returns Options with every field resolved
 * @throws {InvalidOptionsError} if `once` is not boolean or `priority` is not a finite number
 */
export function resolveRegisterOptions(options: RegisterOptions = {}): ResolvedRegisterOptions {
	const result = RegisterOptionsSchema.safeParse(options);
	if (!result.success) {
		throw new InvalidOptionsError("listener options", formatIssues(result.error));
	}
	return result.data;
}

/**
 * Validates a listener limit.
 *
 * @param value - Listeners per event before a warning; `0` disables the check
 * @returns The validated limit
 * @throws {InvalidOptionsError} if `value` is not a non-negative integer
 */
export function resolveMaxListeners(value: number): number {
	const result = EmitterSettingsSchema.shape.maxListeners.safeParse(value);
	if (!result.success) {
		throw new InvalidOptionsError("maxListeners", formatIssues(result.error));
	}
	return result.data;
}

function formatIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
		return `${path}: ${issue.message}`;
	});
}
