import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import {
	createLogger,
	type EngineConfig,
	type MarketDataPort,
	type ModuleLogger,
} from "@symphony/core";
import {
	CASH_SYMBOL,
	DslEngine,
	ONE,
	ZERO,
	addWeight,
	createAllocation,
	dec,
	errorMessage,
	type Decimal,
	type Dispatcher,
	type EvaluationOutcome,
	type StrategyAllocation,
} from "@symphony/dsl";
import { ConfigurationError, StrategyExecutionError, type FileFailure } from "./errors";

export interface StrategyEngineOptions {
	strategiesDir: string;
	/** Strategy files in merge order, relative to `strategiesDir`. */
	files: string[];
	/** Raw file weights; files without one get weight 1. */
	allocations?: Record<string, number>;
	marketData: MarketDataPort;
	timeframe?: string;
	asOf?: Date;
	dispatcher?: Dispatcher;
	logger?: ModuleLogger;
}

export type FileEvaluation =
	| {
			file: string;
			fileWeight: Decimal;
			success: true;
			outcome: EvaluationOutcome;
	  }
	| {
			file: string;
			fileWeight: Decimal;
			success: false;
			error: unknown;
	  };

export interface ConsolidatedAllocation {
	allocation: StrategyAllocation;
	files: FileEvaluation[];
}

/**
 * Scales raw weights to sum to one. A zero total means every file counts
 * equally.
 */
export const normalizeFileWeights = (
	files: readonly string[],
	allocations: Readonly<Record<string, number>>
): Map<string, Decimal> => {
	const raw = new Map<string, Decimal>();
	for (const file of files) {
		const weight = allocations[file] ?? 1;
		if (!Number.isFinite(weight) || weight < 0) {
			throw new ConfigurationError(
				`Weight for ${file} must be a non-negative number, got ${weight}`
			);
		}
		raw.set(file, dec(weight));
	}
	let total = ZERO;
	for (const weight of raw.values()) {
		total = total.plus(weight);
	}
	const normalized = new Map<string, Decimal>();
	for (const [file, weight] of raw) {
		normalized.set(file, total.isZero() ? ONE.div(raw.size) : weight.div(total));
	}
	return normalized;
};

/**
 * Runs every configured strategy file concurrently and merges their
 * allocations, scaled by file weight, in declared order. Failed files hand
 * their share to cash.
 */
export class StrategyEngine {
	private readonly dslEngine: DslEngine;
	private readonly fileWeights: Map<string, Decimal>;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: StrategyEngineOptions) {
		this.logger = options.logger ?? createLogger("strategy-engine");
		if (!options.files.length) {
			throw new ConfigurationError("No strategy files configured");
		}
		const files = Array.from(new Set(options.files));
		for (const file of files) {
			const filePath = path.resolve(options.strategiesDir, file);
			if (!fs.existsSync(filePath)) {
				throw new ConfigurationError(`Strategy file not found: ${filePath}`);
			}
		}
		this.fileWeights = normalizeFileWeights(files, options.allocations ?? {});
		this.dslEngine = new DslEngine({
			strategiesDir: options.strategiesDir,
			marketData: options.marketData,
			timeframe: options.timeframe,
			asOf: options.asOf,
			dispatcher: options.dispatcher,
		});
	}

	static fromConfig(
		config: EngineConfig,
		marketData: MarketDataPort,
		overrides: Pick<StrategyEngineOptions, "asOf" | "dispatcher" | "logger"> = {}
	): StrategyEngine {
		return new StrategyEngine({
			strategiesDir: config.strategiesDir,
			files: config.files,
			allocations: config.allocations,
			marketData,
			timeframe: config.marketData.timeframe,
			...overrides,
		});
	}

	get weights(): ReadonlyMap<string, Decimal> {
		return this.fileWeights;
	}

	async generateAllocation(
		correlationId: string = randomUUID()
	): Promise<ConsolidatedAllocation> {
		const entries = Array.from(this.fileWeights);
		const settled = await Promise.allSettled(
			entries.map(([file]) => this.dslEngine.evaluateStrategy(file, correlationId))
		);

		const merged = new Map<string, Decimal>();
		const failures: FileFailure[] = [];
		let cash = ZERO;
		const files = entries.map(([file, fileWeight], index): FileEvaluation => {
			const result = settled[index];
			if (result.status === "rejected") {
				cash = cash.plus(fileWeight);
				failures.push({ file, message: errorMessage(result.reason) });
				this.logger.error("strategy_file_failed", {
					correlationId,
					file,
					fileWeight,
					error: errorMessage(result.reason),
				});
				return { file, fileWeight, success: false, error: result.reason };
			}
			const { targetWeights } = result.value.allocation;
			for (const [symbol, weight] of Object.entries(targetWeights)) {
				addWeight(merged, symbol, weight.times(fileWeight));
			}
			this.logger.info("strategy_file_evaluated", {
				correlationId,
				file,
				fileWeight,
				symbols: Object.keys(targetWeights).join(","),
				success: true,
			});
			return { file, fileWeight, success: true, outcome: result.value };
		});

		if (failures.length === entries.length) {
			throw new StrategyExecutionError(
				`All ${entries.length} strategy files failed`,
				correlationId,
				failures
			);
		}
		if (!cash.isZero()) {
			addWeight(merged, CASH_SYMBOL, cash);
		}

		const allocation = createAllocation({
			targetWeights: merged,
			correlationId,
			asOf: this.options.asOf ?? new Date(),
		});
		this.logger.info("allocation_produced", {
			correlationId,
			scope: "consolidated",
			files: entries.length,
			failed: failures.length,
			targetWeights: allocation.targetWeights,
		});
		return { allocation, files };
	}
}
