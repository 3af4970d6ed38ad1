import type { OHLCV } from "ccxt";
import type { Bar } from "@symphony/core";

/**
 * Maps one CCXT OHLCV row to a `Bar`. Missing cells become 0.
 */
export const mapCcxtRowToBar = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Bar => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};
