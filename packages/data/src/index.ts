export * from "./types";
export { fetchHistoricalBars } from "./historical";
export type { HistoricalFetchOptions } from "./historical";
export { periodForBars, parsePeriodYears, periodStart } from "./period";
export { mapCcxtRowToBar } from "./utils/ccxtMapper";
export {
	CcxtMarketDataClient,
	isSupportedExchange,
	type OhlcvSource,
	type SupportedExchangeId,
} from "./ccxtClient";
export {
	ExchangeMarketDataPort,
	FileMarketDataPort,
	createMarketDataPort,
	parseStoredBar,
	symbolFileName,
	type ExchangeMarketDataPortOptions,
} from "./ports";
