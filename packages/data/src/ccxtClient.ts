import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import type { Bar, MarketDataClient } from "@symphony/core";
import { mapCcxtRowToBar } from "./utils/ccxtMapper";

/** The slice of a ccxt exchange this client needs. */
export interface OhlcvSource {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

const EXCHANGES = {
	binance: (): OhlcvSource => new ccxt.binance({ enableRateLimit: true }),
	kraken: (): OhlcvSource => new ccxt.kraken({ enableRateLimit: true }),
	coinbase: (): OhlcvSource => new ccxt.coinbase({ enableRateLimit: true }),
} satisfies Record<string, () => OhlcvSource>;

export type SupportedExchangeId = keyof typeof EXCHANGES;

export const isSupportedExchange = (id: string): id is SupportedExchangeId =>
	Object.prototype.hasOwnProperty.call(EXCHANGES, id);

export class CcxtMarketDataClient implements MarketDataClient {
	constructor(
		private readonly source: OhlcvSource,
		private readonly defaultLimit = 500
	) {}

	static create(exchangeId: string): CcxtMarketDataClient {
		const id = exchangeId.toLowerCase();
		if (!isSupportedExchange(id)) {
			throw new Error(
				`Unsupported exchange "${exchangeId}". Expected one of: ${Object.keys(
					EXCHANGES
				).join(", ")}`
			);
		}
		return new CcxtMarketDataClient(EXCHANGES[id]());
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = this.defaultLimit,
		since?: number
	): Promise<Bar[]> {
		const rows = await this.source.fetchOHLCV(symbol, timeframe, since, limit);
		return rows
			.map((row) => mapCcxtRowToBar(row, symbol, timeframe))
			.sort((a, b) => a.timestamp - b.timestamp);
	}
}
