import {
	createLogger,
	type MarketDataPort,
	type ModuleLogger,
} from "@symphony/core";
import type { AstNode, ListNode, MapNode } from "./ast";
import { headSymbol } from "./ast";
import {
	allocationToJSON,
	createAllocation,
	weightsFromValue,
	type AllocationConstraints,
	type StrategyAllocation,
} from "./allocation";
import type { DecisionNode, EvaluationContext } from "./context";
import type { Decimal } from "./decimal";
import type { Dispatcher } from "./dispatcher";
import {
	DslEngineError,
	DslEvaluationError,
	classifyError,
	errorMessage,
} from "./errors";
import { IndicatorGateway } from "./indicatorGateway";
import { createDefaultDispatcher } from "./operators";
import { parse, type ParseOptions } from "./parser";
import { Trace } from "./trace";
import {
	EMPTY_LIST,
	listValue,
	mapValue,
	numberValue,
	stringValue,
	valueToJSON,
	type DslValue,
} from "./values";

export interface DslEvaluatorOptions {
	marketData: MarketDataPort;
	dispatcher?: Dispatcher;
	timeframe?: string;
	/** Evaluate as of this instant; later bars are ignored. */
	asOf?: Date;
	logger?: ModuleLogger;
	parseOptions?: ParseOptions;
}

export interface EvaluateOptions {
	correlationId: string;
	strategyId: string;
	trace?: Trace;
	portfolioValue?: Decimal;
	constraints?: AllocationConstraints;
}

export interface EvaluationOutcome {
	allocation: StrategyAllocation;
	trace: Trace;
	result: DslValue;
}

class EvaluationSession implements EvaluationContext {
	readonly decisionPath: DecisionNode[] = [];

	constructor(
		readonly correlationId: string,
		readonly strategyId: string,
		readonly trace: Trace,
		readonly indicators: IndicatorGateway,
		private readonly dispatcher: Dispatcher
	) {}

	isOperator(name: string): boolean {
		return this.dispatcher.has(name);
	}

	evaluate(node: AstNode): Promise<DslValue> {
		switch (node.type) {
			case "atom":
				return Promise.resolve(
					typeof node.value === "string"
						? stringValue(node.value)
						: numberValue(node.value)
				);
			case "symbol":
				return Promise.resolve(stringValue(node.name));
			case "map":
				return this.evaluateMap(node);
			case "list":
				return this.evaluateList(node);
		}
	}

	private async evaluateMap(node: MapNode): Promise<DslValue> {
		const entries = new Map<string, DslValue>();
		for (let i = 0; i < node.children.length; i += 2) {
			const key = node.children[i];
			let name: string;
			if (key.type === "symbol") {
				name = key.name.replace(/^:/, "");
			} else if (key.type === "atom" && typeof key.value === "string") {
				name = key.value;
			} else {
				throw new DslEvaluationError(
					`malformed map: key must be a keyword or string, got ${key.type}`
				);
			}
			entries.set(name, await this.evaluate(node.children[i + 1]));
		}
		return mapValue(entries);
	}

	private async evaluateList(node: ListNode): Promise<DslValue> {
		if (!node.children.length) {
			return EMPTY_LIST;
		}
		const head = headSymbol(node);
		const operator = head === null ? undefined : this.dispatcher.get(head);
		if (operator) {
			return operator(node.children.slice(1), this);
		}
		const items: DslValue[] = [];
		for (const child of node.children) {
			items.push(await this.evaluate(child));
		}
		return listValue(items);
	}
}

/**
 * Walks a parsed strategy and turns its result into an allocation. The
 * dispatcher is shared; every call gets its own trace and indicator cache.
 */
export class DslEvaluator {
	private readonly dispatcher: Dispatcher;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: DslEvaluatorOptions) {
		this.dispatcher = options.dispatcher ?? createDefaultDispatcher();
		this.logger = options.logger ?? createLogger("dsl-evaluator");
	}

	evaluate(ast: AstNode, options: EvaluateOptions): Promise<EvaluationOutcome> {
		return this.run(() => ast, options);
	}

	evaluateSource(source: string, options: EvaluateOptions): Promise<EvaluationOutcome> {
		return this.run(() => parse(source, this.options.parseOptions), options);
	}

	private async run(
		load: () => AstNode,
		options: EvaluateOptions
	): Promise<EvaluationOutcome> {
		const { correlationId, strategyId } = options;
		const trace = options.trace ?? new Trace({ correlationId, strategyId });
		const session = new EvaluationSession(
			correlationId,
			strategyId,
			trace,
			this.createGateway(trace),
			this.dispatcher
		);

		try {
			trace.addStep({
				stepType: "evaluation_start",
				description: `Evaluating strategy ${strategyId}`,
				inputs: { correlationId },
			});
			const ast = load();
			const result = await session.evaluate(ast);
			const allocation = createAllocation({
				targetWeights: weightsFromValue(result),
				correlationId,
				asOf: this.options.asOf ?? new Date(),
				portfolioValue: options.portfolioValue,
				constraints: options.constraints,
			});
			const summary = allocationToJSON(allocation);
			trace.setMetadata("decisionPath", session.decisionPath);
			trace.addStep({
				stepType: "allocation",
				description: `Produced allocation over ${Object.keys(summary.targetWeights).length} symbols`,
				inputs: { result: valueToJSON(result) },
				outputs: { targetWeights: summary.targetWeights },
			});
			trace.markCompleted(true);
			this.logger.info("allocation_produced", {
				correlationId,
				strategyId,
				targetWeights: allocation.targetWeights,
				decisions: session.decisionPath.length,
			});
			return { allocation, trace, result };
		} catch (error) {
			const message = errorMessage(error);
			if (!trace.isCompleted) {
				trace.addStep({
					stepType: "error",
					description: message,
					metadata: { kind: classifyError(error) },
				});
				trace.setMetadata("decisionPath", session.decisionPath);
				trace.markCompleted(false, message);
			}
			this.logger.error("strategy_evaluation_failed", {
				correlationId,
				strategyId,
				error: message,
			});
			if (error instanceof DslEngineError) {
				throw error;
			}
			throw new DslEngineError(message, {
				kind: classifyError(error),
				correlationId,
				trace,
				cause: error,
			});
		}
	}

	private createGateway(trace: Trace): IndicatorGateway {
		return new IndicatorGateway({
			marketData: this.options.marketData,
			timeframe: this.options.timeframe,
			asOf: this.options.asOf?.getTime(),
			onFallback: (request, failure) => {
				trace.addStep({
					stepType: "indicator_fallback",
					description: `${request.indicatorType} for ${request.symbol} fell back to a neutral value`,
					inputs: {
						symbol: request.symbol,
						indicatorType: request.indicatorType,
						parameters: request.parameters,
					},
					metadata: { reason: failure.reason, message: failure.message },
				});
			},
		});
	}
}
