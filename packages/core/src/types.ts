/** One OHLCV observation, timestamps in UTC epoch milliseconds. */
export interface Bar {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Calendar span of history requested from a market-data port: `"MAX"` or a
 * whole number of years such as `"2Y"`.
 */
export type HistoryPeriod = "MAX" | `${number}Y`;
