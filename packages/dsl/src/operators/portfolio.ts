import { createLogger } from "@symphony/core";
import {
	atomNode,
	headSymbol,
	listNode,
	mapNode,
	symbolNode,
	type AstNode,
} from "../ast";
import type { EvaluationContext, OperatorFn } from "../context";
import { ONE, dec, type Decimal } from "../decimal";
import { DslEvaluationError, errorMessage } from "../errors";
import {
	addWeight,
	createFragment,
	normalizeWeights,
} from "../fragment";
import { DEFAULT_WINDOWS } from "../indicatorGateway";
import {
	assertNever,
	collectSymbols,
	fragmentValue,
	numberValue,
	requireNumber,
	requireString,
	stringValue,
	type DslValue,
} from "../values";
import { expectArgs } from "./arity";
import { INDICATOR_OPERATORS, isIndicatorOperator } from "./indicators";

const logger = createLogger("dsl");

const evaluateAll = async (
	args: readonly AstNode[],
	context: EvaluationContext
): Promise<DslValue[]> => {
	const values: DslValue[] = [];
	for (const arg of args) {
		values.push(await context.evaluate(arg));
	}
	return values;
};

const equalWeights = (sourceStep: string, symbols: string[]): DslValue => {
	if (!symbols.length) {
		return fragmentValue(createFragment(sourceStep));
	}
	const weight = ONE.div(symbols.length);
	return fragmentValue(
		createFragment(
			sourceStep,
			symbols.map((symbol): [string, Decimal] => [symbol, weight])
		)
	);
};

const asset: OperatorFn = async (args, context) => {
	expectArgs("asset", args, 1, 2);
	return stringValue(requireString(await context.evaluate(args[0]), "asset"));
};

const weightEqual: OperatorFn = async (args, context) => {
	const values = await evaluateAll(args, context);
	return equalWeights("weight-equal", collectSymbols(values));
};

/**
 * Weight distribution an asset expression stands for: a ticker is 100% of
 * itself, a fragment is renormalized, a list merges its items then
 * renormalizes.
 */
export const assetWeights = (value: DslValue): Map<string, Decimal> => {
	switch (value.kind) {
		case "string":
			return new Map([[value.value, ONE]]);
		case "fragment":
			return normalizeWeights(value.value.weights);
		case "list": {
			const merged = new Map<string, Decimal>();
			for (const item of value.items) {
				for (const [symbol, weight] of assetWeights(item)) {
					addWeight(merged, symbol, weight);
				}
			}
			return normalizeWeights(merged);
		}
		case "number":
		case "boolean":
		case "map":
			return new Map();
		default:
			return assertNever(value);
	}
};

const weightSpecified: OperatorFn = async (args, context) => {
	if (args.length === 0 || args.length % 2 !== 0) {
		throw new DslEvaluationError(
			`expects weight/asset pairs, got ${args.length} argument${args.length === 1 ? "" : "s"}`,
			"weight-specified"
		);
	}
	const combined = new Map<string, Decimal>();
	for (let i = 0; i < args.length; i += 2) {
		const weight = requireNumber(
			await context.evaluate(args[i]),
			"weight-specified"
		);
		if (weight.isNegative()) {
			throw new DslEvaluationError(
				`weight must be non-negative, got ${weight.toString()}`,
				"weight-specified"
			);
		}
		const target = await context.evaluate(args[i + 1]);
		const weights = assetWeights(target);
		if (!weights.size) {
			throw new DslEvaluationError(
				`expected an asset symbol or fragment, got ${target.kind}`,
				"weight-specified"
			);
		}
		for (const [symbol, base] of weights) {
			addWeight(combined, symbol, base.times(weight));
		}
	}
	return fragmentValue(createFragment("weight-specified", combined));
};

const positiveInteger = (value: Decimal, operator: string, label: string): number => {
	if (!value.isInteger() || value.lte(0)) {
		throw new DslEvaluationError(
			`${label} must be a positive integer, got ${value.toString()}`,
			operator
		);
	}
	return value.toNumber();
};

const weightInverseVolatility: OperatorFn = async (args, context) => {
	expectArgs("weight-inverse-volatility", args, 2, Number.POSITIVE_INFINITY);
	const window = positiveInteger(
		requireNumber(await context.evaluate(args[0]), "weight-inverse-volatility"),
		"weight-inverse-volatility",
		"window"
	);
	const symbols = collectSymbols(await evaluateAll(args.slice(1), context));
	const inverse = new Map<string, Decimal>();
	for (const symbol of symbols) {
		const outcome = await context.indicators.compute({
			symbol,
			indicatorType: "stdev_return",
			parameters: { window },
		});
		if (!outcome.ok || outcome.result.value <= 0) {
			logger.warn("volatility_unavailable", {
				correlationId: context.correlationId,
				symbol,
				window,
				reason: outcome.ok ? "non_positive" : outcome.error.reason,
			});
			continue;
		}
		inverse.set(symbol, ONE.div(dec(outcome.result.value)));
	}
	return fragmentValue(
		createFragment("weight-inverse-volatility", normalizeWeights(inverse))
	);
};

/** Fragments reachable from a value, in order, looking through lists. */
const fragmentsIn = (value: DslValue): Array<ReadonlyMap<string, Decimal>> => {
	if (value.kind === "fragment") {
		return [value.value.weights];
	}
	if (value.kind === "list") {
		return value.items.flatMap(fragmentsIn);
	}
	return [];
};

const group: OperatorFn = async (args, context) => {
	expectArgs("group", args, 2, Number.POSITIVE_INFINITY);
	const combined = new Map<string, Decimal>();
	let last: DslValue | undefined;
	for (const expr of args.slice(1)) {
		last = await context.evaluate(expr);
		for (const weights of fragmentsIn(last)) {
			for (const [symbol, weight] of weights) {
				addWeight(combined, symbol, weight);
			}
		}
	}
	if (combined.size) {
		return fragmentValue(createFragment("group", combined));
	}
	return last ?? fragmentValue(createFragment("group"));
};

const selectCount =
	(operator: string): OperatorFn =>
	async (args, context) => {
		expectArgs(operator, args, 1);
		const count = requireNumber(await context.evaluate(args[0]), operator);
		positiveInteger(count, operator, "count");
		return numberValue(count);
	};

interface Selector {
	direction: "top" | "bottom";
	count: number;
}

const readSelector = async (
	node: AstNode,
	context: EvaluationContext
): Promise<Selector> => {
	const head = headSymbol(node);
	if (node.type !== "list" || (head !== "select-top" && head !== "select-bottom")) {
		throw new DslEvaluationError(
			"selector must be (select-top N) or (select-bottom N)",
			"filter"
		);
	}
	const value = await context.evaluate(node);
	const count = positiveInteger(requireNumber(value, head), head, "count");
	return { direction: head === "select-top" ? "top" : "bottom", count };
};

/**
 * Prepares an indicator call for per-candidate scoring: `(rsi {:window 10})`
 * becomes `(rsi "SPY" {:window 10})` for each symbol. A missing parameter map
 * gets the indicator's default window. Anything other than an indicator call
 * is rejected up front.
 */
export const indicatorBinder = (indicator: AstNode): ((symbol: string) => AstNode) => {
	const head = headSymbol(indicator);
	if (indicator.type !== "list" || head === null || !isIndicatorOperator(head)) {
		throw new DslEvaluationError(
			`expected an indicator call, got ${indicator.type === "list" ? String(head) : indicator.type}`,
			"filter"
		);
	}
	const params =
		indicator.children.slice(1).find((child) => child.type === "map") ??
		defaultParams(head);
	const operator = indicator.children[0];
	return (symbol) => listNode([operator, atomNode(symbol), ...(params ? [params] : [])]);
};

const defaultParams = (operator: keyof typeof INDICATOR_OPERATORS): AstNode | null => {
	const window = DEFAULT_WINDOWS[INDICATOR_OPERATORS[operator]];
	return window === undefined
		? null
		: mapNode([symbolNode(":window"), atomNode(dec(window))]);
};

interface ScoredCandidate {
	symbol: string;
	score: Decimal;
}

const scoreCandidate = async (
	scorer: AstNode,
	symbol: string,
	context: EvaluationContext
): Promise<ScoredCandidate | null> => {
	try {
		const value = await context.evaluate(scorer);
		if (value.kind !== "number") {
			logger.warn("filter_candidate_excluded", {
				correlationId: context.correlationId,
				symbol,
				reason: `score is ${value.kind}`,
			});
			return null;
		}
		return { symbol, score: value.value };
	} catch (error) {
		if (!(error instanceof DslEvaluationError)) {
			throw error;
		}
		logger.warn("filter_candidate_excluded", {
			correlationId: context.correlationId,
			symbol,
			reason: errorMessage(error),
		});
		return null;
	}
};

const filter: OperatorFn = async (args, context) => {
	expectArgs("filter", args, 2, 3);
	const bind = indicatorBinder(args[0]);
	const selector =
		args.length === 3 ? await readSelector(args[1], context) : null;
	const candidates = collectSymbols([
		await context.evaluate(args[args.length - 1]),
	]);

	const scored: ScoredCandidate[] = [];
	for (const symbol of candidates) {
		const candidate = await scoreCandidate(bind(symbol), symbol, context);
		if (candidate) {
			scored.push(candidate);
		}
	}

	const ascending = selector?.direction === "bottom";
	const ranked = [...scored].sort((a, b) =>
		ascending ? a.score.comparedTo(b.score) : b.score.comparedTo(a.score)
	);
	const selected = selector ? ranked.slice(0, selector.count) : ranked;

	context.trace.addStep({
		stepType: "filter",
		description: `filter kept ${selected.length} of ${candidates.length} candidates`,
		inputs: {
			candidates,
			selector: selector ? `${selector.direction} ${selector.count}` : "all",
		},
		outputs: {
			scores: Object.fromEntries(
				scored.map((entry) => [entry.symbol, entry.score.toString()])
			),
			selected: selected.map((entry) => entry.symbol),
		},
	});

	return equalWeights(
		"filter",
		selected.map((entry) => entry.symbol)
	);
};

export const portfolioOperators: Readonly<Record<string, OperatorFn>> = {
	asset,
	"weight-equal": weightEqual,
	"weight-specified": weightSpecified,
	"weight-inverse-volatility": weightInverseVolatility,
	group,
	filter,
	"select-top": selectCount("select-top"),
	"select-bottom": selectCount("select-bottom"),
};
