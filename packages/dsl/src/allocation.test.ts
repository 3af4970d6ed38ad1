import { describe, expect, it } from "vitest";
import {
	CASH_SYMBOL,
	allocationToJSON,
	createAllocation,
	weightsFromValue,
} from "./allocation";
import { dec } from "./decimal";
import { createFragment } from "./fragment";
import { booleanValue, fragmentValue, listValue, numberValue, stringValue } from "./values";

const plain = (weights: Map<string, { toString(): string }>) =>
	Object.fromEntries(Array.from(weights, ([symbol, weight]) => [symbol, weight.toString()]));

describe("weightsFromValue", () => {
	it("drops zero weights from fragments", () => {
		const fragment = createFragment("test", [
			["A", dec(3)],
			["B", dec(0)],
			["C", dec(1)],
		]);
		expect(plain(weightsFromValue(fragmentValue(fragment)))).toEqual({ A: "0.75", C: "0.25" });
	});

	it("falls back to cash for values that are not portfolios", () => {
		expect(plain(weightsFromValue(numberValue(dec(1))))).toEqual({ [CASH_SYMBOL]: "1" });
		expect(plain(weightsFromValue(booleanValue(true)))).toEqual({ CASH: "1" });
		expect(
			plain(weightsFromValue(listValue([stringValue("A"), numberValue(dec(2))])))
		).toEqual({ CASH: "1" });
	});

	it("splits lists of tickers evenly", () => {
		expect(
			plain(weightsFromValue(listValue([stringValue("A"), stringValue("B"), stringValue("A")])))
		).toEqual({ A: "0.5", B: "0.5" });
	});
});

describe("createAllocation", () => {
	const asOf = new Date(Date.UTC(2024, 0, 2));

	it("accepts totals within the tolerance", () => {
		const allocation = createAllocation({
			targetWeights: new Map([
				["A", dec("0.5")],
				["B", dec("0.495")],
			]),
			correlationId: "c-1",
			asOf,
		});
		expect(allocationToJSON(allocation)).toEqual({
			targetWeights: { A: "0.5", B: "0.495" },
			correlationId: "c-1",
			asOf: "2024-01-02T00:00:00.000Z",
		});
		expect(Object.isFrozen(allocation.targetWeights)).toBe(true);
	});

	it("rejects totals away from one", () => {
		expect(() =>
			createAllocation({
				targetWeights: new Map([["A", dec("0.9")]]),
				correlationId: "c-1",
			})
		).toThrow("allocation: weights must sum to 1, got 0.9");
	});

	it("rejects negative and empty weights", () => {
		expect(() =>
			createAllocation({
				targetWeights: new Map([
					["A", dec("1.5")],
					["B", dec("-0.5")],
				]),
				correlationId: "c-1",
			})
		).toThrow("allocation: weight for B is negative: -0.5");
		expect(() => createAllocation({ targetWeights: new Map(), correlationId: "c-1" })).toThrow(
			"allocation: allocation has no target weights"
		);
	});
});
