import fs from "node:fs/promises";
import path from "node:path";
import {
	createLogger,
	isRecord,
	type Bar,
	type HistoryPeriod,
	type MarketDataClient,
	type MarketDataConfig,
	type MarketDataPort,
} from "@symphony/core";
import { CcxtMarketDataClient } from "./ccxtClient";
import { fetchHistoricalBars } from "./historical";
import { periodStart } from "./period";

const logger = createLogger("market-data");

export interface ExchangeMarketDataPortOptions {
	now?: () => number;
	batchSize?: number;
	maxYears?: number;
}

/**
 * Serves bar history from an exchange client, paging back from "now".
 */
export class ExchangeMarketDataPort implements MarketDataPort {
	private readonly now: () => number;

	constructor(
		private readonly client: MarketDataClient,
		private readonly options: ExchangeMarketDataPortOptions = {}
	) {
		this.now = options.now ?? Date.now;
	}

	async getBars(
		symbol: string,
		period: HistoryPeriod,
		timeframe: string
	): Promise<Bar[]> {
		const endTimestamp = this.now();
		const bars = await fetchHistoricalBars({
			client: this.client,
			symbol,
			timeframe,
			startTimestamp: periodStart(period, endTimestamp, this.options.maxYears),
			endTimestamp,
			batchSize: this.options.batchSize,
			logger,
		});
		logger.debug("bars_loaded", {
			source: "exchange",
			symbol,
			period,
			timeframe,
			bars: bars.length,
		});
		return bars;
	}
}

const BAR_FIELDS = ["open", "high", "low", "close", "volume"] as const;

const readTimestamp = (row: Record<string, unknown>): number | null => {
	if (typeof row.timestamp === "number") {
		return row.timestamp;
	}
	if (typeof row.date === "string") {
		const parsed = Date.parse(row.date);
		return Number.isNaN(parsed) ? null : parsed;
	}
	return null;
};

/**
 * Validates one stored row. Rows carry either an epoch `timestamp` or an ISO
 * `date`; `volume` may be omitted.
 */
export const parseStoredBar = (
	row: unknown,
	symbol: string,
	timeframe: string
): Bar => {
	if (!isRecord(row)) {
		throw new Error(`Stored bar for ${symbol} is not an object`);
	}
	const timestamp = readTimestamp(row);
	if (timestamp === null) {
		throw new Error(`Stored bar for ${symbol} has no valid timestamp or date`);
	}
	const values: Record<(typeof BAR_FIELDS)[number], number> = {
		open: 0,
		high: 0,
		low: 0,
		close: 0,
		volume: 0,
	};
	for (const field of BAR_FIELDS) {
		const value = row[field] ?? (field === "volume" ? 0 : undefined);
		if (typeof value !== "number" || !Number.isFinite(value)) {
			throw new Error(
				`Stored bar for ${symbol} at ${timestamp} has invalid ${field}`
			);
		}
		values[field] = value;
	}
	return { symbol, timeframe, timestamp, ...values };
};

export const symbolFileName = (symbol: string, timeframe: string): string =>
	`${symbol.replace(/[^A-Za-z0-9._-]/g, "-")}.${timeframe}.json`;

/**
 * Serves bar history from JSON files under `dataDir`, one file per symbol and
 * timeframe (`SPY.1d.json`, `BTC-USDT.1h.json`). The requested period is
 * measured back from the newest stored bar so that fixtures stay usable over
 * time. Unknown symbols yield an empty series.
 */
export class FileMarketDataPort implements MarketDataPort {
	private readonly cache = new Map<string, Promise<Bar[]>>();

	constructor(private readonly dataDir: string) {}

	async getBars(
		symbol: string,
		period: HistoryPeriod,
		timeframe: string
	): Promise<Bar[]> {
		const bars = await this.load(symbol, timeframe);
		if (!bars.length) {
			return bars;
		}
		const start = periodStart(period, bars[bars.length - 1].timestamp);
		return bars.filter((bar) => bar.timestamp >= start);
	}

	private load(symbol: string, timeframe: string): Promise<Bar[]> {
		const filePath = path.join(this.dataDir, symbolFileName(symbol, timeframe));
		const cached = this.cache.get(filePath);
		if (cached) {
			return cached;
		}
		const pending = this.readFile(filePath, symbol, timeframe);
		this.cache.set(filePath, pending);
		void pending.catch(() => {
			this.cache.delete(filePath);
		});
		return pending;
	}

	private async readFile(
		filePath: string,
		symbol: string,
		timeframe: string
	): Promise<Bar[]> {
		let contents: string;
		try {
			contents = await fs.readFile(filePath, "utf-8");
		} catch (error) {
			if (isMissingFile(error)) {
				logger.warn("bars_file_missing", { symbol, timeframe, filePath });
				return [];
			}
			throw error;
		}
		const parsed: unknown = JSON.parse(contents);
		if (!Array.isArray(parsed)) {
			throw new Error(`Bar file ${filePath} must contain a JSON array`);
		}
		const bars = parsed
			.map((row) => parseStoredBar(row, symbol, timeframe))
			.sort((a, b) => a.timestamp - b.timestamp);
		logger.debug("bars_loaded", {
			source: "file",
			symbol,
			timeframe,
			bars: bars.length,
		});
		return bars;
	}
}

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

export const createMarketDataPort = (
	config: MarketDataConfig
): MarketDataPort => {
	switch (config.source) {
		case "file":
			return new FileMarketDataPort(config.dataDir);
		case "ccxt":
			return new ExchangeMarketDataPort(
				CcxtMarketDataClient.create(config.exchangeId)
			);
	}
};
