import { describe, expect, it } from "vitest";

import { EmitterError, formatError, InvalidListenerError, TimeoutError, toError } from "./errors";

describe("errors", () => {
	it("InvalidListenerError names the event and the received type", () => {
		const error = new InvalidListenerError("ready", null);
		expect(error).toBeInstanceOf(EmitterError);
		expect(error.name).toBe("InvalidListenerError");
		expect(error.event).toBe("ready");
		expect(error.message).toBe('Listener for "ready" must be a function, got null');
	});

	it("TimeoutError carries the operation and duration", () => {
		const error = new TimeoutError("Listener #3", 50);
		expect(error.message).toBe("Listener #3 timed out after 50ms");
		expect(error.operation).toBe("Listener #3");
		expect(error.timeoutMs).toBe(50);
	});

	it("formatError handles errors and other values", () => {
		expect(formatError(new Error("boom"))).toBe("boom");
		expect(formatError(42)).toBe("42");
	});

	it("toError returns errors unchanged and wraps anything else", () => {
		const original = new Error("boom");
		expect(toError(original)).toBe(original);
		const wrapped = toError({ code: 7 });
		expect(wrapped).toBeInstanceOf(EmitterError);
		expect(wrapped.message).toBe("Non-error value thrown: [object Object]");
		expect(wrapped.cause).toEqual({ code: 7 });
	});
});
