import path from "node:path";
import { describe, expect, it } from "vitest";
import type { OHLCV } from "ccxt";
import { CcxtMarketDataClient, type OhlcvSource } from "./ccxtClient";
import {
	ExchangeMarketDataPort,
	FileMarketDataPort,
	parseStoredBar,
	symbolFileName,
} from "./ports";

const BARS_DIR = path.join(__dirname, "__tests__", "fixtures", "bars");

describe("FileMarketDataPort", () => {
	const port = new FileMarketDataPort(BARS_DIR);

	it("returns bars sorted by time", async () => {
		const bars = await port.getBars("SPY", "MAX", "1d");
		expect(bars.map((bar) => bar.close)).toEqual([321, 383, 475, 531]);
		expect(bars[1].volume).toBe(0);
	});

	it("limits history to the period before the newest bar", async () => {
		const bars = await port.getBars("SPY", "1Y", "1d");
		expect(bars.map((bar) => bar.close)).toEqual([475, 531]);
	});

	it("maps pair symbols to file names", async () => {
		const bars = await port.getBars("BTC/USDT", "1Y", "1h");
		expect(bars).toHaveLength(1);
		expect(bars[0]).toMatchObject({ symbol: "BTC/USDT", timeframe: "1h", close: 42050 });
	});

	it("returns an empty series for unknown symbols", async () => {
		await expect(port.getBars("NOPE", "1Y", "1d")).resolves.toEqual([]);
	});

	it("rejects malformed rows", async () => {
		await expect(port.getBars("BROKEN", "1Y", "1d")).rejects.toThrow(
			`Stored bar for BROKEN at ${Date.UTC(2024, 0, 1)} has invalid close`
		);
	});
});

describe("parseStoredBar", () => {
	it("requires a timestamp or date", () => {
		expect(() => parseStoredBar({ close: 1 }, "SPY", "1d")).toThrow(
			"Stored bar for SPY has no valid timestamp or date"
		);
	});

	it("builds file names from symbols", () => {
		expect(symbolFileName("BTC/USDT", "1h")).toBe("BTC-USDT.1h.json");
	});
});

class StubOhlcvSource implements OhlcvSource {
	public requests: Array<{ since?: number; limit?: number }> = [];

	constructor(private readonly rows: OHLCV[]) {}

	async fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]> {
		void symbol;
		void timeframe;
		this.requests.push({ since, limit });
		return this.rows.filter((row) => Number(row[0]) >= (since ?? 0));
	}
}

describe("CcxtMarketDataClient", () => {
	it("maps and sorts exchange rows", async () => {
		const source = new StubOhlcvSource([
			[2_000, 2, 3, 1, 2.5, 10],
			[1_000, 1, 2, 0.5, 1.5, 5],
		]);
		const client = new CcxtMarketDataClient(source, 50);
		const bars = await client.fetchOHLCV("ETH/USDT", "1m");
		expect(bars.map((bar) => bar.timestamp)).toEqual([1_000, 2_000]);
		expect(bars[0]).toEqual({
			symbol: "ETH/USDT",
			timeframe: "1m",
			timestamp: 1_000,
			open: 1,
			high: 2,
			low: 0.5,
			close: 1.5,
			volume: 5,
		});
		expect(source.requests).toEqual([{ since: undefined, limit: 50 }]);
	});

	it("rejects exchanges it does not know", () => {
		expect(() => CcxtMarketDataClient.create("mtgox")).toThrow(
			'Unsupported exchange "mtgox"'
		);
	});
});

describe("ExchangeMarketDataPort", () => {
	it("pages history back from the clock", async () => {
		const minute = 60_000;
		const now = 10 * minute;
		const source = new StubOhlcvSource(
			Array.from({ length: 11 }, (_, idx): OHLCV => [idx * minute, 1, 1, 1, idx, 1])
		);
		const port = new ExchangeMarketDataPort(new CcxtMarketDataClient(source), {
			now: () => now,
			batchSize: 4,
		});
		const bars = await port.getBars("ETH/USDT", "1Y", "1m");
		expect(bars.map((bar) => bar.close)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
	});
});
