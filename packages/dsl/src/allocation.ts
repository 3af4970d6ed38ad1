import { ONE, ZERO, type Decimal } from "./decimal";
import { DslEvaluationError } from "./errors";
import { normalizeWeights } from "./fragment";
import type { DslValue } from "./values";

export const CASH_SYMBOL = "CASH";

/** Allowed distance of the weight total from one. */
export const WEIGHT_SUM_TOLERANCE = "0.01";

export type AllocationConstraints = Readonly<Record<string, unknown>>;

export interface StrategyAllocation {
	readonly targetWeights: Readonly<Record<string, Decimal>>;
	readonly correlationId: string;
	readonly asOf: Date;
	readonly portfolioValue?: Decimal;
	readonly constraints?: AllocationConstraints;
}

export interface AllocationInput {
	targetWeights: ReadonlyMap<string, Decimal>;
	correlationId: string;
	asOf?: Date;
	portfolioValue?: Decimal;
	constraints?: AllocationConstraints;
}

const cashOnly = (): Map<string, Decimal> => new Map([[CASH_SYMBOL, ONE]]);

/**
 * Final weights for a top-level result. Fragments are renormalized with zero
 * weights dropped, a lone ticker takes everything, a list of tickers is split
 * evenly, and anything else sits in cash.
 */
export const weightsFromValue = (value: DslValue): Map<string, Decimal> => {
	if (value.kind === "fragment") {
		const normalized = normalizeWeights(value.value.weights);
		for (const [symbol, weight] of normalized) {
			if (weight.isZero()) {
				normalized.delete(symbol);
			}
		}
		return normalized.size ? normalized : cashOnly();
	}
	if (value.kind === "string") {
		return new Map([[value.value, ONE]]);
	}
	if (
		value.kind === "list" &&
		value.items.length > 0 &&
		value.items.every((item) => item.kind === "string")
	) {
		const symbols = Array.from(
			new Set(value.items.flatMap((item) => (item.kind === "string" ? [item.value] : [])))
		);
		const weight = ONE.div(symbols.length);
		return new Map(symbols.map((symbol): [string, Decimal] => [symbol, weight]));
	}
	return cashOnly();
};

export const createAllocation = (input: AllocationInput): StrategyAllocation => {
	const entries = Array.from(input.targetWeights);
	if (!entries.length) {
		throw new DslEvaluationError("allocation has no target weights", "allocation");
	}
	let total = ZERO;
	const targetWeights: Record<string, Decimal> = {};
	for (const [symbol, weight] of entries) {
		if (weight.isNegative()) {
			throw new DslEvaluationError(
				`weight for ${symbol} is negative: ${weight.toString()}`,
				"allocation"
			);
		}
		targetWeights[symbol] = weight;
		total = total.plus(weight);
	}
	if (total.minus(ONE).abs().gt(WEIGHT_SUM_TOLERANCE)) {
		throw new DslEvaluationError(
			`weights must sum to 1, got ${total.toString()}`,
			"allocation"
		);
	}
	const allocation: StrategyAllocation = {
		targetWeights: Object.freeze(targetWeights),
		correlationId: input.correlationId,
		asOf: input.asOf ?? new Date(),
		portfolioValue: input.portfolioValue,
		constraints: input.constraints,
	};
	return Object.freeze(allocation);
};

export interface AllocationJSON {
	targetWeights: Record<string, string>;
	correlationId: string;
	asOf: string;
	portfolioValue?: string;
	constraints?: AllocationConstraints;
}

export const allocationToJSON = (allocation: StrategyAllocation): AllocationJSON => ({
	targetWeights: Object.fromEntries(
		Object.entries(allocation.targetWeights).map(([symbol, weight]) => [
			symbol,
			weight.toString(),
		])
	),
	correlationId: allocation.correlationId,
	asOf: allocation.asOf.toISOString(),
	...(allocation.portfolioValue
		? { portfolioValue: allocation.portfolioValue.toString() }
		: {}),
	...(allocation.constraints ? { constraints: allocation.constraints } : {}),
});
