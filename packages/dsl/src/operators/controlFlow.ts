import { createLogger } from "@symphony/core";
import { headSymbol, isStringAtom, type AstNode } from "../ast";
import type { DecisionNode, EvaluationContext, OperatorFn } from "../context";
import { formatNode } from "../format";
import {
	EMPTY_LIST,
	booleanValue,
	isTruthy,
	valueToJSON,
} from "../values";
import { expectArgs } from "./arity";
import {
	compareValues,
	isComparisonOperator,
	type ComparisonOperator,
} from "./comparison";
import { isIndicatorOperator } from "./indicators";

const logger = createLogger("dsl");

const LOGICAL_OPERATORS = new Set(["and", "or", "not"]);

const DISPLAY_OPERATOR: Record<ComparisonOperator, string> = {
	">": ">",
	"<": "<",
	">=": ">=",
	"<=": "<=",
	"=": "==",
};

const defsymphony: OperatorFn = async (args, context) => {
	expectArgs("defsymphony", args, 3, Number.POSITIVE_INFINITY);
	const name = args[0];
	if (isStringAtom(name)) {
		context.trace.setMetadata("symphonyName", name.value);
	}
	return context.evaluate(args[2]);
};

interface ConditionOutcome {
	result: boolean;
	values: Record<string, unknown>;
}

const comparisonParts = (
	node: AstNode
): { op: ComparisonOperator; left: AstNode; right: AstNode } | null => {
	const head = headSymbol(node);
	if (
		node.type !== "list" ||
		head === null ||
		!isComparisonOperator(head) ||
		node.children.length !== 3
	) {
		return null;
	}
	return { op: head, left: node.children[1], right: node.children[2] };
};

const evaluateCondition = async (
	node: AstNode,
	context: EvaluationContext
): Promise<ConditionOutcome> => {
	const parts = comparisonParts(node);
	if (parts && context.isOperator(parts.op)) {
		const left = await context.evaluate(parts.left);
		const right = await context.evaluate(parts.right);
		return {
			result: compareValues(parts.op, left, right),
			values: { left: valueToJSON(left), right: valueToJSON(right) },
		};
	}
	const value = await context.evaluate(node);
	return { result: isTruthy(value), values: { condition: valueToJSON(value) } };
};

const collectStringAtoms = (node: AstNode, into: Set<string>): void => {
	if (isStringAtom(node)) {
		into.add(node.value);
	} else if (node.type === "list" || node.type === "map") {
		for (const child of node.children) {
			collectStringAtoms(child, into);
		}
	}
};

const indicatorParams = (node: AstNode): Record<string, string> | undefined => {
	if (node.type !== "list") {
		return undefined;
	}
	const params = node.children.find((child) => child.type === "map");
	if (!params || params.type !== "map") {
		return undefined;
	}
	const result: Record<string, string> = {};
	for (let i = 0; i < params.children.length; i += 2) {
		const key = params.children[i];
		const label = key.type === "symbol" ? key.name : formatNode(key);
		result[label.replace(/^:/, "")] = formatNode(params.children[i + 1]);
	}
	return result;
};

export const describeDecision = (
	node: AstNode,
	outcome: ConditionOutcome
): DecisionNode => {
	const symbols = new Set<string>();
	collectStringAtoms(node, symbols);
	const head = headSymbol(node);
	const parts = comparisonParts(node);
	const decision: DecisionNode = {
		condition: parts
			? `${formatNode(parts.left)} ${DISPLAY_OPERATOR[parts.op]} ${formatNode(parts.right)}`
			: formatNode(node),
		result: outcome.result,
		branch: outcome.result ? "then" : "else",
		conditionType: parts
			? "comparison"
			: head !== null && LOGICAL_OPERATORS.has(head)
				? "logical"
				: head !== null && isIndicatorOperator(head)
					? "indicator"
					: "other",
		symbolsInvolved: Array.from(symbols),
		values: outcome.values,
	};
	if (parts) {
		decision.operatorType = parts.op;
		const operands = [parts.left, parts.right];
		const threshold = operands.find((operand) => operand.type === "atom");
		if (threshold && threshold.type === "atom") {
			decision.threshold =
				typeof threshold.value === "string"
					? threshold.value
					: threshold.value.toFixed();
		}
		const indicator = operands.find((operand) => {
			const name = headSymbol(operand);
			return name !== null && isIndicatorOperator(name);
		});
		if (indicator) {
			decision.indicatorName = headSymbol(indicator) ?? undefined;
			decision.indicatorParams = indicatorParams(indicator);
		}
	}
	return decision;
};

const ifOperator: OperatorFn = async (args, context) => {
	expectArgs("if", args, 2, 3);
	const outcome = await evaluateCondition(args[0], context);
	const decision = describeDecision(args[0], outcome);
	context.decisionPath.push(decision);
	context.trace.addStep({
		stepType: "decision",
		description: `${decision.condition} is ${decision.result}, taking ${decision.branch} branch`,
		inputs: { condition: decision.condition, values: decision.values },
		outputs: { result: decision.result, branch: decision.branch },
		metadata: {
			decisionIndex: context.decisionPath.length - 1,
			conditionType: decision.conditionType,
		},
	});
	logger.debug("strategy_decision", {
		correlationId: context.correlationId,
		strategyId: context.strategyId,
		...decision,
	});

	if (outcome.result) {
		return context.evaluate(args[1]);
	}
	return args.length === 3 ? context.evaluate(args[2]) : EMPTY_LIST;
};

const and: OperatorFn = async (args, context) => {
	for (const arg of args) {
		if (!isTruthy(await context.evaluate(arg))) {
			return booleanValue(false);
		}
	}
	return booleanValue(true);
};

const or: OperatorFn = async (args, context) => {
	for (const arg of args) {
		if (isTruthy(await context.evaluate(arg))) {
			return booleanValue(true);
		}
	}
	return booleanValue(false);
};

const not: OperatorFn = async (args, context) => {
	expectArgs("not", args, 1);
	return booleanValue(!isTruthy(await context.evaluate(args[0])));
};

export const controlFlowOperators: Readonly<Record<string, OperatorFn>> = {
	defsymphony,
	if: ifOperator,
	and,
	or,
	not,
};
