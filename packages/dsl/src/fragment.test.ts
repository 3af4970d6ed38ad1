import { describe, expect, it } from "vitest";
import { dec } from "./decimal";
import { createFragment, normalizeWeights, totalWeight } from "./fragment";
import {
	collectSymbols,
	fragmentValue,
	isTruthy,
	listValue,
	mapValue,
	numberValue,
	stringValue,
} from "./values";

describe("createFragment", () => {
	it("sums duplicate symbols", () => {
		const fragment = createFragment("test", [
			["A", dec("0.25")],
			["B", dec("0.5")],
			["A", dec("0.25")],
		]);
		expect(fragment.weights.get("A")?.toString()).toBe("0.5");
		expect(fragment.weights.size).toBe(2);
	});

	it("rejects negative weights", () => {
		expect(() => createFragment("test", [["A", dec(-1)]])).toThrow(
			"test: weight for A must be a non-negative number, got -1"
		);
	});

	it("gives every fragment its own id", () => {
		expect(createFragment("a").fragmentId).not.toBe(createFragment("a").fragmentId);
	});
});

describe("normalizeWeights", () => {
	it("scales weights to one", () => {
		const normalized = normalizeWeights(
			new Map([
				["A", dec(3)],
				["B", dec(1)],
			])
		);
		expect(normalized.get("A")?.toString()).toBe("0.75");
		expect(normalized.get("B")?.toString()).toBe("0.25");
		expect(totalWeight(normalized).toString()).toBe("1");
	});

	it("returns nothing for a zero total", () => {
		expect(normalizeWeights(new Map([["A", dec(0)]])).size).toBe(0);
	});
});

describe("collectSymbols", () => {
	it("flattens strings, fragment keys and nested lists in first-seen order", () => {
		const values = [
			stringValue("SPY"),
			fragmentValue(createFragment("x", [["QQQ", dec(1)], ["SPY", dec(1)]])),
			listValue([listValue([stringValue("TLT")]), numberValue(dec(1))]),
		];
		expect(collectSymbols(values)).toEqual(["SPY", "QQQ", "TLT"]);
	});
});

describe("isTruthy", () => {
	it("treats empty and zero values as false", () => {
		expect(isTruthy(numberValue(dec(0)))).toBe(false);
		expect(isTruthy(stringValue(""))).toBe(false);
		expect(isTruthy(listValue([]))).toBe(false);
		expect(isTruthy(mapValue(new Map()))).toBe(false);
		expect(isTruthy(fragmentValue(createFragment("x")))).toBe(false);
		expect(isTruthy(numberValue(dec("0.1")))).toBe(true);
	});
});
