/**
 * Default values for {@link AsyncEmitter} and {@link DispatchEngine} configuration.
 *
 * - `DISPATCH_MODE`: How asynchronous listener completions are awaited
 * - `SERIALIZE_EMITS`: Whether emits of the same event queue behind each other
 * - `LISTENER_TIMEOUT`: Per-listener deadline in ms; 0 disables it
 * - `MAX_LISTENERS`: Listeners per event before a warning; 0 disables it
 * - `PRIORITY`: Priority given to listeners registered without one
 */
export const EmitterDefaults = {
	DISPATCH_MODE: "sequential",
	SERIALIZE_EMITS: false,
	LISTENER_TIMEOUT: 0,
	MAX_LISTENERS: 10,
	PRIORITY: 0,
} as const;
