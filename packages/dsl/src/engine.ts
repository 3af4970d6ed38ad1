import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import {
	createLogger,
	type MarketDataPort,
	type ModuleLogger,
} from "@symphony/core";
import { allocationToJSON } from "./allocation";
import type { Dispatcher } from "./dispatcher";
import { DslEngineError, classifyError, errorMessage } from "./errors";
import { DslEvaluator, type EvaluationOutcome } from "./evaluator";
import { Trace } from "./trace";
import {
	createEnvelope,
	type EventBus,
	type StrategyEvaluated,
	type StrategyEvaluationRequested,
} from "./events";

export const STRATEGY_EXTENSION = ".clj";

export const DEFAULT_MAX_TRACKED_EVENTS = 10_000;

export interface DslEngineOptions {
	strategiesDir: string;
	marketData: MarketDataPort;
	timeframe?: string;
	asOf?: Date;
	eventBus?: EventBus;
	dispatcher?: Dispatcher;
	logger?: ModuleLogger;
	/** Handled event ids remembered for de-duplication; oldest are evicted first. */
	maxTrackedEvents?: number;
}

export const strategyIdFromPath = (filePath: string): string =>
	path.basename(filePath, STRATEGY_EXTENSION);

/**
 * Evaluates strategy files from disk, directly or in response to
 * `StrategyEvaluationRequested` events.
 */
export class DslEngine {
	static readonly SOURCE_MODULE = "dsl-engine";

	private readonly evaluator: DslEvaluator;
	private readonly logger: ModuleLogger;
	private readonly handledEvents = new Set<string>();
	private readonly pendingEvents = new Set<string>();

	constructor(private readonly options: DslEngineOptions) {
		this.logger = options.logger ?? createLogger("dsl-engine");
		this.evaluator = new DslEvaluator({
			marketData: options.marketData,
			dispatcher: options.dispatcher,
			timeframe: options.timeframe,
			asOf: options.asOf,
		});
	}

	resolveStrategyPath(configPath: string | undefined, strategyId: string): string {
		if (configPath) {
			return path.resolve(this.options.strategiesDir, configPath);
		}
		const candidates = [
			path.join(this.options.strategiesDir, `${strategyId}${STRATEGY_EXTENSION}`),
			path.join(this.options.strategiesDir, strategyId),
		];
		return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0];
	}

	async evaluateStrategy(
		strategyPath: string,
		correlationId: string = randomUUID()
	): Promise<EvaluationOutcome> {
		const filePath = path.resolve(this.options.strategiesDir, strategyPath);
		const strategyId = strategyIdFromPath(filePath);
		const trace = new Trace({ correlationId, strategyId });
		const source = await this.readStrategy(filePath, trace);
		this.logger.debug("strategy_evaluation_started", {
			correlationId,
			strategyId,
			filePath,
		});
		try {
			return await this.evaluator.evaluateSource(source, {
				correlationId,
				strategyId,
				trace,
			});
		} catch (error) {
			throw new DslEngineError(errorMessage(error), {
				kind: classifyError(error),
				correlationId,
				filePath,
				trace,
				cause: error,
			});
		}
	}

	canHandle(eventType: string): boolean {
		return eventType === "StrategyEvaluationRequested";
	}

	/**
	 * Evaluates the requested strategy and publishes the outcome. Redelivered
	 * events (same `eventId`) are ignored and yield `null`. An id counts as
	 * handled once its outcome has been published.
	 */
	async handleEvent(event: StrategyEvaluationRequested): Promise<StrategyEvaluated | null> {
		if (this.handledEvents.has(event.eventId) || this.pendingEvents.has(event.eventId)) {
			this.logger.info("duplicate_event_ignored", {
				eventId: event.eventId,
				correlationId: event.correlationId,
			});
			return null;
		}
		this.pendingEvents.add(event.eventId);
		try {
			const evaluated = await this.processEvent(event);
			this.rememberEvent(event.eventId);
			return evaluated;
		} finally {
			this.pendingEvents.delete(event.eventId);
		}
	}

	private async processEvent(event: StrategyEvaluationRequested): Promise<StrategyEvaluated> {
		const envelope = () =>
			createEnvelope(event.correlationId, event.eventId, DslEngine.SOURCE_MODULE);
		const strategyPath = this.resolveStrategyPath(
			event.strategyConfigPath,
			event.strategyId
		);
		let outcome: EvaluationOutcome;
		try {
			outcome = await this.evaluateStrategy(strategyPath, event.correlationId);
		} catch (error) {
			this.logger.error("strategy_event_failed", {
				eventId: event.eventId,
				correlationId: event.correlationId,
				strategyId: event.strategyId,
				error: errorMessage(error),
			});
			const failed: StrategyEvaluated = {
				...envelope(),
				type: "StrategyEvaluated",
				strategyId: event.strategyId,
				success: false,
				errorMessage: errorMessage(error),
				trace: error instanceof DslEngineError ? error.trace?.toJSON() : undefined,
			};
			await this.options.eventBus?.publish(failed);
			return failed;
		}

		const allocation = allocationToJSON(outcome.allocation);
		const evaluated: StrategyEvaluated = {
			...envelope(),
			type: "StrategyEvaluated",
			strategyId: event.strategyId,
			success: true,
			allocation,
			trace: outcome.trace.toJSON(),
		};
		await this.options.eventBus?.publish(evaluated);
		await this.options.eventBus?.publish({
			...envelope(),
			type: "PortfolioAllocationProduced",
			strategyId: event.strategyId,
			allocation,
		});
		return evaluated;
	}

	private rememberEvent(eventId: string): void {
		this.handledEvents.add(eventId);
		const limit = this.options.maxTrackedEvents ?? DEFAULT_MAX_TRACKED_EVENTS;
		for (const oldest of this.handledEvents) {
			if (this.handledEvents.size <= limit) {
				break;
			}
			this.handledEvents.delete(oldest);
		}
	}

	private async readStrategy(filePath: string, trace: Trace): Promise<string> {
		try {
			return await fs.promises.readFile(filePath, "utf8");
		} catch (error) {
			const missing =
				error instanceof Error && "code" in error && error.code === "ENOENT";
			const message = missing
				? `Strategy file not found: ${filePath}`
				: `Failed to read strategy file ${filePath}: ${errorMessage(error)}`;
			trace.addStep({
				stepType: "error",
				description: message,
				inputs: { filePath },
				metadata: { kind: "io" },
			});
			trace.markCompleted(false, message);
			throw new DslEngineError(message, {
				kind: "io",
				correlationId: trace.correlationId,
				filePath,
				trace,
				cause: error,
			});
		}
	}
}
