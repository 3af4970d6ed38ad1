import type { Bar, HistoryPeriod } from "../types";

/**
 * Exchange-level access to OHLCV rows, one page at a time.
 */
export interface MarketDataClient {
	/**
	 * @param symbol - Instrument symbol (e.g. "BTC/USDT", "SPY")
	 * @param timeframe - Timeframe string (e.g. "1h", "1d")
	 * @param limit - Maximum rows per page
	 * @param since - Optional timestamp of the first row
	 * @returns Bars in chronological order
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Bar[]>;
}

/**
 * What the strategy evaluator sees of market data: a chronological bar series
 * covering at least the requested period, or an empty array when the symbol is
 * unknown.
 */
export interface MarketDataPort {
	getBars(
		symbol: string,
		period: HistoryPeriod,
		timeframe: string
	): Promise<Bar[]>;
}
