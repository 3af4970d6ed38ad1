import { describe, expect, it } from "vitest";
import { canonicalize, stableStringify } from "./fingerprint";

describe("stableStringify", () => {
	it("sorts object keys at every depth", () => {
		expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe(
			'{"a":{"c":3,"d":2},"b":1}'
		);
	});

	it("drops undefined entries", () => {
		expect(stableStringify({ a: undefined, b: [1, undefined] })).toBe('{"b":[1]}');
	});
});

describe("canonicalize", () => {
	it("normalizes negative zero and non-finite numbers", () => {
		expect(canonicalize([-0, Number.POSITIVE_INFINITY])).toEqual([0, "Infinity"]);
	});
});
