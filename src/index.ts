/**
 * @packageDocumentation
 *
 * Asynchronous event emission for Node.js.
 *
 * This package provides:
 * - {@link AsyncEmitter} - Typed emitter facade with lifecycle notifications and `waitFor`
 * - {@link EventRegistry} - Priority-ordered listener storage with immutable snapshots
 * - {@link DispatchEngine} - Sequential or fan-out dispatch with failure isolation and cancellation
 * - {@link ErrorCollector} - Per-listener outcome accounting for a single dispatch
 */

// Main classes
export { AsyncEmitter } from "./emitter";
export { DispatchEngine } from "./dispatch/engine";
export { ErrorCollector } from "./dispatch/collector";
export { EventRegistry } from "./registry/registry";
export { ListenerHandle } from "./registry/handle";

// Types
export type { LifecycleEventMap } from "./emitter";
export type { DispatchEngineOptions, ListenerFailure } from "./dispatch/engine";
export type { EventRegistryOptions } from "./registry/registry";
export type {
	DispatchEntry,
	DispatchMode,
	DispatchResult,
	EmitOptions,
	Listener,
	ListenerContext,
	ListenerOutcome,
	ListenerRecord,
	OutcomeStatus,
	RegisterOptions,
} from "./types";

// Configuration
export type { EmitterOptions, ResolvedEmitterOptions, ResolvedRegisterOptions } from "./config";
export {
	DispatchModeSchema,
	EmitterSettingsSchema,
	RegisterOptionsSchema,
	resolveEmitterOptions,
	resolveMaxListeners,
	resolveRegisterOptions,
} from "./config";
export { EmitterDefaults } from "./constants";

// Re-exports from lib/
export type { AnyEventMap, EventMap, TypedEmitter } from "./lib/emitter";
export type { ConsoleLoggerOptions, Logger, LogLevel } from "./lib/logger";
export {
	EmitterError,
	formatError,
	InvalidListenerError,
	InvalidOptionsError,
	TimeoutError,
	toError,
} from "./lib/errors";
export { consoleLogger, createConsoleLogger, noopLogger } from "./lib/logger";
