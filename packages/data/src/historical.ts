import { timeframeToMs, type Bar, type MarketDataClient } from "@symphony/core";
import type { DataProviderLogger, HistoryWindow } from "./types";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

export interface HistoricalFetchOptions extends HistoryWindow {
	client: MarketDataClient;
	batchSize?: number;
	maxIterations?: number;
	logger?: DataProviderLogger;
}

/**
 * Pages through `client.fetchOHLCV` from `startTimestamp` to `endTimestamp`
 * inclusive. Duplicate timestamps across pages are dropped and the cursor
 * always advances by at least one timeframe.
 */
export const fetchHistoricalBars = async (
	options: HistoricalFetchOptions
): Promise<Bar[]> => {
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);
	const timeframeMs = timeframeToMs(options.timeframe);

	const result: Bar[] = [];
	const seenTimestamps = new Set<number>();
	let since = Math.max(0, options.startTimestamp);
	let iterations = 0;

	while (since <= options.endTimestamp && iterations < maxIterations) {
		const batch = await options.client.fetchOHLCV(
			options.symbol,
			options.timeframe,
			batchSize,
			since
		);
		iterations += 1;

		if (!batch.length) {
			break;
		}

		for (const bar of batch) {
			if (bar.timestamp > options.endTimestamp) {
				return result;
			}
			if (bar.timestamp < options.startTimestamp) {
				continue;
			}
			if (!seenTimestamps.has(bar.timestamp)) {
				result.push(bar);
				seenTimestamps.add(bar.timestamp);
			}
		}

		const last = batch[batch.length - 1];
		since = Math.max(last.timestamp + timeframeMs, since + timeframeMs);
	}

	if (iterations >= maxIterations && since <= options.endTimestamp) {
		options.logger?.warn?.("historical_fetch_iterations_exceeded", {
			symbol: options.symbol,
			timeframe: options.timeframe,
			startTimestamp: options.startTimestamp,
			endTimestamp: options.endTimestamp,
			iterations,
			maxIterations,
		});
	}

	return result;
};
