import type { OperatorFn } from "../context";
import { dec, type Decimal } from "../decimal";
import { DslEvaluationError } from "../errors";
import { booleanValue, numberValue, requireNumber, type DslValue } from "../values";
import { expectArgs } from "./arity";

export type ComparisonOperator = ">" | "<" | ">=" | "<=" | "=";

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = [
	">",
	"<",
	">=",
	"<=",
	"=",
];

export const isComparisonOperator = (name: string): name is ComparisonOperator =>
	COMPARISON_OPERATORS.some((op) => op === name);

/**
 * Exact decimal comparison. `=` also accepts two strings or two booleans and
 * is false for values of different kinds.
 */
export const compareValues = (
	op: ComparisonOperator,
	left: DslValue,
	right: DslValue
): boolean => {
	if (op === "=") {
		if (left.kind === "number" && right.kind === "number") {
			return left.value.eq(right.value);
		}
		if (left.kind === "string" && right.kind === "string") {
			return left.value === right.value;
		}
		if (left.kind === "boolean" && right.kind === "boolean") {
			return left.value === right.value;
		}
		return false;
	}
	const a = requireNumber(left, op);
	const b = requireNumber(right, op);
	switch (op) {
		case ">":
			return a.gt(b);
		case "<":
			return a.lt(b);
		case ">=":
			return a.gte(b);
		case "<=":
			return a.lte(b);
	}
};

const comparison =
	(op: ComparisonOperator): OperatorFn =>
	async (args, context) => {
		expectArgs(op, args, 2);
		const left = await context.evaluate(args[0]);
		const right = await context.evaluate(args[1]);
		return booleanValue(compareValues(op, left, right));
	};

const numericArgs = async (
	op: string,
	args: Parameters<OperatorFn>[0],
	context: Parameters<OperatorFn>[1]
): Promise<Decimal[]> => {
	const values: Decimal[] = [];
	for (const arg of args) {
		values.push(requireNumber(await context.evaluate(arg), op));
	}
	return values;
};

const add: OperatorFn = async (args, context) => {
	expectArgs("+", args, 1, Number.POSITIVE_INFINITY);
	const values = await numericArgs("+", args, context);
	return numberValue(values.reduce((acc, value) => acc.plus(value), dec(0)));
};

const multiply: OperatorFn = async (args, context) => {
	expectArgs("*", args, 1, Number.POSITIVE_INFINITY);
	const values = await numericArgs("*", args, context);
	return numberValue(values.reduce((acc, value) => acc.times(value), dec(1)));
};

const subtract: OperatorFn = async (args, context) => {
	expectArgs("-", args, 1, Number.POSITIVE_INFINITY);
	const [first, ...rest] = await numericArgs("-", args, context);
	if (!rest.length) {
		return numberValue(first.negated());
	}
	return numberValue(rest.reduce((acc, value) => acc.minus(value), first));
};

const divide: OperatorFn = async (args, context) => {
	expectArgs("/", args, 2, Number.POSITIVE_INFINITY);
	const [first, ...rest] = await numericArgs("/", args, context);
	let result = first;
	for (const value of rest) {
		if (value.isZero()) {
			throw new DslEvaluationError("division by zero", "/");
		}
		result = result.div(value);
	}
	return numberValue(result);
};

export const comparisonOperators: Readonly<Record<string, OperatorFn>> = {
	">": comparison(">"),
	"<": comparison("<"),
	">=": comparison(">="),
	"<=": comparison("<="),
	"=": comparison("="),
	"+": add,
	"-": subtract,
	"*": multiply,
	"/": divide,
};
