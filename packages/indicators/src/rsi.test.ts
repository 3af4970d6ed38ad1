import { describe, expect, it } from "vitest";
import { rsi } from "./rsi";

describe("rsi", () => {
	it("reads 100 when prices only rise", () => {
		expect(rsi([1, 2, 3, 4], 3)).toBe(100);
	});

	it("reads 0 when prices only fall", () => {
		expect(rsi([4, 3, 2, 1], 3)).toBe(0);
	});

	it("balances equal gains and losses at 50", () => {
		expect(rsi([10, 11, 10], 2)).toBe(50);
	});

	it("returns null for a flat series", () => {
		expect(rsi([5, 5, 5, 5], 3)).toBeNull();
	});

	it("returns null when the series is shorter than the period", () => {
		expect(rsi([1, 2], 3)).toBeNull();
	});

	it("rejects non-positive periods", () => {
		expect(() => rsi([1, 2, 3], 0)).toThrow("RSI period must be positive");
	});
});
