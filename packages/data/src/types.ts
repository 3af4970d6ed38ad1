import type { Bar, HistoryPeriod, MarketDataPort } from "@symphony/core";

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface HistoryWindow {
	symbol: string;
	timeframe: string;
	startTimestamp: number;
	endTimestamp: number;
}

export type { Bar, HistoryPeriod, MarketDataPort };
