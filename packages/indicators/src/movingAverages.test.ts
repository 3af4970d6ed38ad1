import { describe, expect, it } from "vitest";
import { ema } from "./ema";
import { sma } from "./sma";

describe("sma", () => {
	it("averages the trailing window", () => {
		expect(sma([1, 2, 3, 4, 5], 3)).toBe(4);
	});

	it("returns null when data is short", () => {
		expect(sma([1, 2], 3)).toBeNull();
	});
});

describe("ema", () => {
	it("seeds with the first value", () => {
		expect(ema([1, 2, 3], 3)).toBe(2.25);
	});

	it("returns null when data is short", () => {
		expect(ema([1, 2], 3)).toBeNull();
	});
});
