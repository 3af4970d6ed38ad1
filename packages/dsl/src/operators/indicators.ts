import type { AstNode } from "../ast";
import type { EvaluationContext, OperatorFn } from "../context";
import { dec } from "../decimal";
import { DslEvaluationError } from "../errors";
import type { IndicatorParameters, IndicatorType } from "../indicatorGateway";
import { numberValue, requireString, type DslValue } from "../values";
import { expectArgs } from "./arity";

/** DSL operator name → gateway indicator type. */
export const INDICATOR_OPERATORS = {
	rsi: "rsi",
	"current-price": "current_price",
	"moving-average-price": "moving_average",
	"moving-average-return": "moving_average_return",
	"cumulative-return": "cumulative_return",
	"exponential-moving-average-price": "exponential_moving_average",
	"stdev-return": "stdev_return",
	"stdev-price": "stdev_price",
	"max-drawdown": "max_drawdown",
	"percentage-price-oscillator": "percentage_price_oscillator",
	"percentage-price-oscillator-signal": "percentage_price_oscillator_signal",
	volatility: "stdev_return",
} as const satisfies Record<string, IndicatorType>;

export type IndicatorOperatorName = keyof typeof INDICATOR_OPERATORS;

export const isIndicatorOperator = (name: string): name is IndicatorOperatorName =>
	Object.prototype.hasOwnProperty.call(INDICATOR_OPERATORS, name);

/** `short-window` and `short_window` both become `shortWindow`. */
export const parameterName = (key: string): string =>
	key.replace(/[-_]([a-z])/g, (_, letter: string) => letter.toUpperCase());

/**
 * Turns an evaluated `{:window 10}` map into numeric gateway parameters.
 */
export const toIndicatorParameters = (
	value: DslValue,
	operator: string
): IndicatorParameters => {
	if (value.kind !== "map") {
		throw new DslEvaluationError(
			`expected a parameter map, got ${value.kind}`,
			operator
		);
	}
	const parameters: Record<string, number> = {};
	for (const [key, entry] of value.entries) {
		if (entry.kind !== "number") {
			throw new DslEvaluationError(
				`parameter ${key} must be a number, got ${entry.kind}`,
				operator
			);
		}
		parameters[parameterName(key)] = entry.value.toNumber();
	}
	return parameters;
};

const evaluateParameters = async (
	name: string,
	node: AstNode | undefined,
	context: EvaluationContext
): Promise<IndicatorParameters> => {
	if (!node) {
		return {};
	}
	return toIndicatorParameters(await context.evaluate(node), name);
};

const indicatorOperator =
	(name: IndicatorOperatorName): OperatorFn =>
	async (args, context) => {
		expectArgs(name, args, 1, 2);
		const symbol = requireString(await context.evaluate(args[0]), name);
		const parameters = await evaluateParameters(
			name,
			args.length === 2 ? args[1] : undefined,
			context
		);
		const result = await context.indicators.getIndicator({
			symbol,
			indicatorType: INDICATOR_OPERATORS[name],
			parameters,
		});
		return numberValue(dec(result.value));
	};

export const indicatorOperators: Readonly<Record<string, OperatorFn>> =
	Object.fromEntries(
		Object.keys(INDICATOR_OPERATORS)
			.filter(isIndicatorOperator)
			.map((name) => [name, indicatorOperator(name)])
	);
