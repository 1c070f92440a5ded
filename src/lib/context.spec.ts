import { describe, expect, it } from "vitest";

import { activeFrames, runInDispatch } from "./context";

describe("dispatch context", () => {
	it("is empty outside any dispatch", () => {
		expect(activeFrames()).toEqual([]);
	});

	it("tracks nested frames across awaits", async () => {
		const outer = { event: "outer" };
		const inner = { event: "inner" };
		const seen = await runInDispatch(outer, async () => {
			await Promise.resolve();
			return runInDispatch(inner, () => activeFrames());
		});
		expect(seen).toEqual([outer, inner]);
		expect(seen[0]).toBe(outer);
		expect(activeFrames()).toEqual([]);
	});

	it("hands its frames to timers scheduled inside the dispatch", async () => {
		const frame = { event: "tick" };
		const later = await new Promise<readonly unknown[]>((resolve) => {
			runInDispatch(frame, () => {
				setTimeout(() => resolve(activeFrames()), 0);
			});
		});
		expect(later).toEqual([frame]);
	});
});
