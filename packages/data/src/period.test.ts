import { describe, expect, it } from "vitest";
import { YEAR_MS } from "@symphony/core";
import { parsePeriodYears, periodForBars, periodStart } from "./period";

describe("periodForBars", () => {
	it("rounds up to whole years with a ten percent buffer", () => {
		expect(periodForBars(1)).toBe("1Y");
		expect(periodForBars(200)).toBe("1Y");
		expect(periodForBars(252)).toBe("2Y");
		expect(periodForBars(500)).toBe("3Y");
	});

	it("passes MAX through", () => {
		expect(periodForBars("MAX")).toBe("MAX");
	});

	it("rejects non-positive counts", () => {
		expect(() => periodForBars(0)).toThrow("Bar count must be positive, got 0");
	});
});

describe("periodStart", () => {
	const end = Date.UTC(2024, 5, 1);

	it("measures whole years back from the end", () => {
		expect(periodStart("2Y", end)).toBe(end - 2 * YEAR_MS);
	});

	it("maps MAX to the configured ceiling", () => {
		expect(periodStart("MAX", end, 5)).toBe(end - 5 * YEAR_MS);
	});

	it("never goes before the epoch", () => {
		expect(periodStart("90Y", 1_000)).toBe(0);
	});

	it("parses year counts", () => {
		expect(parsePeriodYears("3Y")).toBe(3);
		expect(parsePeriodYears("MAX")).toBeNull();
	});
});
