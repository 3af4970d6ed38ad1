import type { AstNode } from "./ast";
import type { IndicatorGateway } from "./indicatorGateway";
import type { Trace } from "./trace";
import type { DslValue } from "./values";

/** One `if` outcome, recorded in evaluation order. */
export interface DecisionNode {
	condition: string;
	result: boolean;
	branch: "then" | "else";
	conditionType: "comparison" | "logical" | "indicator" | "other";
	symbolsInvolved: string[];
	values: Record<string, unknown>;
	operatorType?: string;
	threshold?: string;
	indicatorName?: string;
	indicatorParams?: Record<string, string>;
}

/** What an operator can see and do while it runs. */
export interface EvaluationContext {
	readonly correlationId: string;
	readonly strategyId: string;
	readonly trace: Trace;
	readonly indicators: IndicatorGateway;
	readonly decisionPath: DecisionNode[];
	evaluate(node: AstNode): Promise<DslValue>;
	isOperator(name: string): boolean;
}

export type OperatorFn = (
	args: readonly AstNode[],
	context: EvaluationContext
) => Promise<DslValue>;
