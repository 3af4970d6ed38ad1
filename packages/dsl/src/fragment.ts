import { randomUUID } from "node:crypto";
import { ZERO, type Decimal } from "./decimal";
import { DslEvaluationError } from "./errors";

/**
 * Intermediate symbol → weight distribution produced by one operator. Weights
 * are non-negative and are not required to sum to one.
 */
export interface PortfolioFragment {
	readonly fragmentId: string;
	readonly sourceStep: string;
	readonly weights: ReadonlyMap<string, Decimal>;
}

export type WeightEntries =
	| ReadonlyMap<string, Decimal>
	| Iterable<readonly [string, Decimal]>;

export const createFragment = (
	sourceStep: string,
	weights: WeightEntries = []
): PortfolioFragment => {
	const copy = new Map<string, Decimal>();
	for (const [symbol, weight] of weights) {
		if (weight.isNegative() || !weight.isFinite()) {
			throw new DslEvaluationError(
				`weight for ${symbol} must be a non-negative number, got ${weight.toString()}`,
				sourceStep
			);
		}
		addWeight(copy, symbol, weight);
	}
	return Object.freeze({
		fragmentId: randomUUID(),
		sourceStep,
		weights: copy,
	});
};

/** Adds `weight` to the running total for `symbol`. */
export const addWeight = (
	target: Map<string, Decimal>,
	symbol: string,
	weight: Decimal
): void => {
	const current = target.get(symbol);
	target.set(symbol, current ? current.plus(weight) : weight);
};

export const totalWeight = (weights: ReadonlyMap<string, Decimal>): Decimal => {
	let total = ZERO;
	for (const weight of weights.values()) {
		total = total.plus(weight);
	}
	return total;
};

/**
 * Scales weights to sum to one. An all-zero or empty input yields an empty
 * map.
 */
export const normalizeWeights = (
	weights: ReadonlyMap<string, Decimal>
): Map<string, Decimal> => {
	const total = totalWeight(weights);
	const normalized = new Map<string, Decimal>();
	if (total.isZero()) {
		return normalized;
	}
	for (const [symbol, weight] of weights) {
		normalized.set(symbol, weight.div(total));
	}
	return normalized;
};
