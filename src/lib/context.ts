import { AsyncLocalStorage } from "node:async_hooks";

/**
 * One dispatch of one event. The object's identity is the token: whoever
 * started the dispatch decides how long it counts as live.
 */
export interface DispatchFrame {
	readonly event: string;
}

/**
 * Frames entered by the current async call chain, innermost last.
 *
 * Work scheduled from inside a listener (timers, callbacks) inherits the frames
 * for good, so a frame here only says the chain started inside that dispatch,
 * not that the dispatch is still running.
 */
const dispatchStack = new AsyncLocalStorage<readonly DispatchFrame[]>();

/**
 * Returns the dispatch frames entered up the current async call chain.
 *
 * @returns Frames from outermost to innermost; empty outside any dispatch
 */
export function activeFrames(): readonly DispatchFrame[] {
	return dispatchStack.getStore() ?? [];
}

/**
 * Executes a function with `frame` pushed onto the dispatch stack for the
 * duration of its synchronous and asynchronous execution.
 *
 * @param frame - The dispatch whose listeners `fn` invokes
 * @param fn - The function to execute within the scoped context
 * @returns The return value of `fn`
 */
export function runInDispatch<T>(frame: DispatchFrame, fn: () => T): T {
	return dispatchStack.run([...activeFrames(), frame], fn);
}
