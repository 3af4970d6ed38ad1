import type { Decimal } from "./decimal";
import { DslEvaluationError } from "./errors";
import type { PortfolioFragment } from "./fragment";

export type DslValue =
	| { readonly kind: "number"; readonly value: Decimal }
	| { readonly kind: "boolean"; readonly value: boolean }
	| { readonly kind: "string"; readonly value: string }
	| { readonly kind: "fragment"; readonly value: PortfolioFragment }
	| { readonly kind: "list"; readonly items: readonly DslValue[] }
	| { readonly kind: "map"; readonly entries: ReadonlyMap<string, DslValue> };

export type DslValueKind = DslValue["kind"];

export const numberValue = (value: Decimal): DslValue => ({ kind: "number", value });
export const booleanValue = (value: boolean): DslValue => ({ kind: "boolean", value });
export const stringValue = (value: string): DslValue => ({ kind: "string", value });
export const fragmentValue = (value: PortfolioFragment): DslValue => ({
	kind: "fragment",
	value,
});
export const listValue = (items: readonly DslValue[]): DslValue => ({
	kind: "list",
	items,
});
export const mapValue = (entries: ReadonlyMap<string, DslValue>): DslValue => ({
	kind: "map",
	entries,
});

export const EMPTY_LIST: DslValue = listValue([]);

export const assertNever = (value: never): never => {
	throw new Error(`Unhandled DSL value: ${JSON.stringify(value)}`);
};

export const isTruthy = (value: DslValue): boolean => {
	switch (value.kind) {
		case "boolean":
			return value.value;
		case "number":
			return !value.value.isZero();
		case "string":
			return value.value.length > 0;
		case "fragment":
			return value.value.weights.size > 0;
		case "list":
			return value.items.length > 0;
		case "map":
			return value.entries.size > 0;
		default:
			return assertNever(value);
	}
};

/**
 * Leaf ticker symbols reachable from `values`, deduplicated in first-seen
 * order: strings directly, fragment keys, nested lists recursively.
 */
export const collectSymbols = (values: readonly DslValue[]): string[] => {
	const seen = new Set<string>();
	const visit = (value: DslValue): void => {
		switch (value.kind) {
			case "string":
				seen.add(value.value);
				return;
			case "fragment":
				for (const symbol of value.value.weights.keys()) {
					seen.add(symbol);
				}
				return;
			case "list":
				value.items.forEach(visit);
				return;
			case "number":
			case "boolean":
			case "map":
				return;
			default:
				assertNever(value);
		}
	};
	values.forEach(visit);
	return Array.from(seen);
};

export const requireNumber = (value: DslValue, operator: string): Decimal => {
	if (value.kind !== "number") {
		throw new DslEvaluationError(`expected a number, got ${value.kind}`, operator);
	}
	return value.value;
};

export const requireString = (value: DslValue, operator: string): string => {
	if (value.kind !== "string") {
		throw new DslEvaluationError(`expected a string, got ${value.kind}`, operator);
	}
	return value.value;
};

/** JSON-friendly rendering for traces and logs. */
export const valueToJSON = (value: DslValue): unknown => {
	switch (value.kind) {
		case "number":
			return value.value.toString();
		case "boolean":
		case "string":
			return value.value;
		case "fragment":
			return {
				fragmentId: value.value.fragmentId,
				sourceStep: value.value.sourceStep,
				weights: Object.fromEntries(
					Array.from(value.value.weights, ([symbol, weight]) => [
						symbol,
						weight.toString(),
					])
				),
			};
		case "list":
			return value.items.map(valueToJSON);
		case "map":
			return Object.fromEntries(
				Array.from(value.entries, ([key, entry]) => [key, valueToJSON(entry)])
			);
		default:
			return assertNever(value);
	}
};
