import type { ListenerRecord } from "../types";

import { describe, expect, it } from "vitest";

import { EventRegistry } from "../registry/registry";
import { ErrorCollector } from "./collector";

function records(count: number): readonly ListenerRecord[] {
	const registry = new EventRegistry();
	for (let i = 0; i < count; i++) {
		registry.register("tick", () => undefined);
	}
	return registry.snapshot("tick");
}

describe("ErrorCollector", () => {
	it("orders entries by position, not by recording order", () => {
		const [a, b, c] = records(3);
		const collector = new ErrorCollector("tick");
		collector.succeed(2, c);
		collector.fail(0, a, new Error("boom"));
		collector.cancel(1, b, "stopped");

		const result = collector.result();
		expect(result.event).toBe("tick");
		expect(result.entries.map((entry) => entry.position)).toEqual([0, 1, 2]);
		expect(result.entries.map((entry) => entry.outcome.status)).toEqual(["failure", "cancelled", "success"]);
		expect(result.entries[1].handle).toBe(b.handle);
	});

	it("never overwrites a recorded position", () => {
		const [a] = records(1);
		const collector = new ErrorCollector("tick");
		expect(collector.fail(0, a, new Error("first"))).toBe(true);
		expect(collector.succeed(0, a)).toBe(false);

		const result = collector.result();
		expect(result.entries).toHaveLength(1);
		expect(result.entries[0].outcome).toEqual({ status: "failure", error: new Error("first") });
	});

	it("derives failures and ok; cancellations are not failures", () => {
		const [a, b] = records(2);
		const collector = new ErrorCollector("tick");
		collector.succeed(0, a);
		collector.cancel(1, b, undefined);
		const result = collector.result();
		expect(result.ok).toBe(true);
		expect(result.failures).toEqual([]);
	});

	it("rejects records once the result has been taken", () => {
		const [a] = records(1);
		const collector = new ErrorCollector("tick");
		const result = collector.result();
		expect(collector.succeed(0, a)).toBe(false);
		expect(result.entries).toHaveLength(0);
		expect(Object.isFrozen(result)).toBe(true);
		expect(Object.isFrozen(result.entries)).toBe(true);
	});

	it("reports how many positions are recorded", () => {
		const [a, b] = records(2);
		const collector = new ErrorCollector("tick");
		collector.succeed(0, a);
		collector.succeed(1, b);
		expect(collector.size).toBe(2);
	});
});
