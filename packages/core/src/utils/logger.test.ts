import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, sanitize } from "./logger";

describe("sanitize", () => {
	it("flattens errors, dates, maps and toJSON values", () => {
		const result = sanitize({
			level: "info",
			event: "allocation_produced",
			module: "test",
			at: new Date(Date.UTC(2024, 0, 1)),
			weights: new Map([["SPY", { toJSON: () => "0.5" }]]),
			failure: new Error("boom"),
		});
		expect(result.at).toBe("2024-01-01T00:00:00.000Z");
		expect(result.weights).toEqual({ SPY: "0.5" });
		expect(result.failure).toMatchObject({ name: "Error", message: "boom" });
	});

	it("marks circular references", () => {
		const node: Record<string, unknown> = { id: 1 };
		node.self = node;
		const result = sanitize({
			level: "debug",
			event: "loop",
			module: "test",
			node,
		});
		expect(result.node).toEqual({ id: 1, self: "[circular]" });
	});
});

describe("createLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes one JSON line per event with the module name", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		createLogger("dsl").warn("indicator_fallback_used", { symbol: "SPY" });
		expect(spy).toHaveBeenCalledTimes(1);
		const line = JSON.parse(String(spy.mock.calls[0][0]));
		expect(line).toMatchObject({
			level: "warn",
			event: "indicator_fallback_used",
			module: "dsl",
			symbol: "SPY",
		});
		expect(typeof line.ts).toBe("string");
	});
});
