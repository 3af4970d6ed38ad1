#!/usr/bin/env node

import path from "node:path";
import process from "node:process";
import {
	getConfigMetadata,
	getWorkspaceRoot,
	loadEngineConfig,
	loadEnvFiles,
	parseTimestamp,
} from "@symphony/core";
import { createMarketDataPort } from "@symphony/data";
import { allocationToJSON, errorMessage } from "@symphony/dsl";
import {
	StrategyEngine,
	type ConsolidatedAllocation,
	type FileEvaluation,
} from "@symphony/strategy-engine";
import { parseCliArgs, readFlag, readList, readString } from "./cliArgs";

const USAGE = `Usage:
  npm run evaluate -- [options] [file.clj ...]

Options (all optional):
  --file <path>            Strategy file to evaluate; repeatable. Defaults to the engine config
  --configDir <path>       Custom config directory
  --profile <name>         Engine profile under <configDir>/engine (default: default)
  --envPath <path>         Custom .env path
  --asOf <date|ms>         Ignore bars after this instant
  --correlationId <id>     Correlation id for logs and traces
  --trace                  Print each file's evaluation trace
  --json                   Print the full JSON result
  --help                   Show this message
`;

const summarizeFile = (file: FileEvaluation) =>
	file.success
		? {
				file: file.file,
				fileWeight: file.fileWeight.toString(),
				success: true,
				allocation: allocationToJSON(file.outcome.allocation),
				trace: file.outcome.trace.toJSON(),
			}
		: {
				file: file.file,
				fileWeight: file.fileWeight.toString(),
				success: false,
				error: errorMessage(file.error),
			};

const printSummary = (result: ConsolidatedAllocation, withTrace: boolean): void => {
	console.log("---- Files ----");
	for (const file of result.files) {
		const weight = `${file.fileWeight.times(100).toFixed(2)}%`;
		if (!file.success) {
			console.log(`✗ ${file.file} (${weight}): ${errorMessage(file.error)}`);
			continue;
		}
		console.log(`✓ ${file.file} (${weight})`);
		if (withTrace) {
			for (const step of file.outcome.trace.steps) {
				console.log(`    ${step.stepId} [${step.stepType}] ${step.description}`);
			}
		}
	}
	console.log("---- Allocation ----");
	console.table(
		Object.entries(result.allocation.targetWeights).map(([symbol, weight]) => ({
			symbol,
			weight: `${weight.times(100).toFixed(2)}%`,
		}))
	);
};

const main = async (): Promise<void> => {
	const argMap = parseCliArgs(process.argv.slice(2));
	if (readFlag(argMap, "help")) {
		console.log(USAGE);
		return;
	}

	loadEnvFiles(getWorkspaceRoot());
	const config = loadEngineConfig({
		envPath: readString(argMap, "envPath"),
		configDir: readString(argMap, "configDir"),
		profile: readString(argMap, "profile"),
	});
	const asOfArg = readString(argMap, "asOf");
	const asOf = asOfArg ? new Date(parseTimestamp(asOfArg)) : undefined;
	const files = readList(argMap, "file").map((file) => path.resolve(process.cwd(), file));

	const engine = StrategyEngine.fromConfig(
		files.length ? { ...config, files, allocations: {} } : config,
		createMarketDataPort(config.marketData),
		{ asOf }
	);

	const metadata = getConfigMetadata(config);
	console.log(
		`Evaluating ${engine.weights.size} strategy file(s) from ${
			metadata?.path ?? config.strategiesDir
		}...`
	);
	const result = await engine.generateAllocation(readString(argMap, "correlationId"));

	if (readFlag(argMap, "json")) {
		console.log(
			JSON.stringify(
				{
					allocation: allocationToJSON(result.allocation),
					files: result.files.map(summarizeFile),
				},
				null,
				2
			)
		);
		return;
	}
	printSummary(result, readFlag(argMap, "trace"));
};

main().catch((error: unknown) => {
	console.error("Evaluation failed:", errorMessage(error));
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
