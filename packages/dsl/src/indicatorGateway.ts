import {
	createLogger,
	stableStringify,
	type Bar,
	type HistoryPeriod,
	type MarketDataPort,
	type ModuleLogger,
} from "@symphony/core";
import { periodForBars } from "@symphony/data";
import {
	cumulativeReturn,
	ema,
	maxDrawdown,
	movingAverageReturn,
	PPO_DEFAULT_LONG,
	PPO_DEFAULT_SHORT,
	PPO_DEFAULT_SMOOTH,
	percentagePriceOscillator,
	percentagePriceOscillatorSignal,
	rsi,
	sma,
	stdevPrice,
	stdevReturn,
} from "@symphony/indicators";
import { DslEvaluationError, errorMessage } from "./errors";

export type IndicatorType =
	| "rsi"
	| "current_price"
	| "moving_average"
	| "moving_average_return"
	| "cumulative_return"
	| "exponential_moving_average"
	| "stdev_return"
	| "stdev_price"
	| "max_drawdown"
	| "percentage_price_oscillator"
	| "percentage_price_oscillator_signal";

export type IndicatorParameters = Readonly<Record<string, number>>;

export interface IndicatorRequest {
	symbol: string;
	indicatorType: IndicatorType;
	parameters: IndicatorParameters;
}

export interface IndicatorResult extends IndicatorRequest {
	value: number;
	dataSource: "market_data" | "fallback";
	barsUsed: number;
}

export type IndicatorFailureReason =
	| "no_data"
	| "insufficient_data"
	| "invalid_parameters"
	| "source_error";

export interface IndicatorFailure {
	reason: IndicatorFailureReason;
	message: string;
}

export type IndicatorOutcome =
	| { ok: true; result: IndicatorResult }
	| { ok: false; error: IndicatorFailure };

/** Readings used when history is missing or too short. */
export const NEUTRAL_FALLBACKS: Partial<Record<IndicatorType, number>> = {
	rsi: 50,
	moving_average_return: 0,
	cumulative_return: 0,
	max_drawdown: 0,
	percentage_price_oscillator: 0,
	percentage_price_oscillator_signal: 0,
};

export const DEFAULT_WINDOWS: Partial<Record<IndicatorType, number>> = {
	rsi: 14,
	moving_average: 200,
	moving_average_return: 21,
	cumulative_return: 60,
	exponential_moving_average: 12,
	stdev_return: 6,
	stdev_price: 6,
	max_drawdown: 60,
};

const DEFAULT_REQUIRED_BARS = 252;

/** Validated look-back settings for one request. */
export type IndicatorWindows =
	| { kind: "price" }
	| { kind: "window"; window: number }
	| { kind: "oscillator"; shortWindow: number; longWindow: number; smoothWindow: number };

const isOscillator = (indicatorType: IndicatorType): boolean =>
	indicatorType === "percentage_price_oscillator" ||
	indicatorType === "percentage_price_oscillator_signal";

const invalidWindow = (name: string, value: number | undefined): string | null =>
	value !== undefined && Number.isInteger(value) && value > 0
		? null
		: `${name} must be a positive integer, got ${String(value)}`;

/**
 * Applies defaults to the request's parameters. Returns a message when they
 * are unusable.
 */
export const resolveWindows = (request: IndicatorRequest): IndicatorWindows | string => {
	const { indicatorType, parameters } = request;
	if (indicatorType === "current_price") {
		return { kind: "price" };
	}
	if (isOscillator(indicatorType)) {
		const shortWindow = parameters.shortWindow ?? PPO_DEFAULT_SHORT;
		const longWindow = parameters.longWindow ?? PPO_DEFAULT_LONG;
		const smoothWindow = parameters.smoothWindow ?? PPO_DEFAULT_SMOOTH;
		const invalid =
			invalidWindow("shortWindow", shortWindow) ??
			invalidWindow("longWindow", longWindow) ??
			invalidWindow("smoothWindow", smoothWindow);
		if (invalid) {
			return invalid;
		}
		if (shortWindow >= longWindow) {
			return `shortWindow (${shortWindow}) must be less than longWindow (${longWindow})`;
		}
		return { kind: "oscillator", shortWindow, longWindow, smoothWindow };
	}
	const window = parameters.window ?? DEFAULT_WINDOWS[indicatorType];
	return invalidWindow("window", window) ?? { kind: "window", window: window ?? 0 };
};

/**
 * History needed for a reading. Recursive smoothers (RSI, EMA) take all
 * available bars so that the seed washes out.
 */
export const requiredBars = (
	indicatorType: IndicatorType,
	windows: IndicatorWindows
): number | "MAX" => {
	const size = windows.kind === "window" ? windows.window : 0;
	switch (indicatorType) {
		case "current_price":
			return 1;
		case "rsi":
		case "exponential_moving_average":
			return "MAX";
		case "moving_average":
		case "max_drawdown":
			return Math.max(size, 200);
		case "moving_average_return":
		case "cumulative_return":
		case "stdev_return":
		case "stdev_price":
			return Math.max(size + 10, 120);
		case "percentage_price_oscillator":
		case "percentage_price_oscillator_signal":
			return windows.kind === "oscillator"
				? Math.max(windows.longWindow + windows.smoothWindow + 20, 100)
				: DEFAULT_REQUIRED_BARS;
	}
};

const computeValue = (
	indicatorType: IndicatorType,
	closes: number[],
	windows: IndicatorWindows
): number | null => {
	if (windows.kind === "price") {
		return closes.length ? closes[closes.length - 1] : null;
	}
	if (windows.kind === "oscillator") {
		const { shortWindow, longWindow, smoothWindow } = windows;
		return indicatorType === "percentage_price_oscillator_signal"
			? percentagePriceOscillatorSignal(closes, shortWindow, longWindow, smoothWindow)
			: percentagePriceOscillator(closes, shortWindow, longWindow);
	}
	const { window } = windows;
	switch (indicatorType) {
		case "rsi":
			return rsi(closes, window);
		case "moving_average":
			return sma(closes, window);
		case "moving_average_return":
			return movingAverageReturn(closes, window);
		case "cumulative_return":
			return cumulativeReturn(closes, window);
		case "exponential_moving_average":
			return ema(closes, window);
		case "stdev_return":
			return stdevReturn(closes, window);
		case "stdev_price":
			return stdevPrice(closes, window);
		case "max_drawdown":
			return maxDrawdown(closes, window);
		default:
			return null;
	}
};

export const fallbackFor = (request: IndicatorRequest): IndicatorResult | null => {
	const value = NEUTRAL_FALLBACKS[request.indicatorType];
	if (value === undefined) {
		return null;
	}
	return { ...request, value, dataSource: "fallback", barsUsed: 0 };
};

export interface IndicatorGatewayOptions {
	marketData: MarketDataPort;
	timeframe?: string;
	/** Ignore bars after this timestamp. */
	asOf?: number;
	logger?: ModuleLogger;
	/** Called whenever a neutral reading replaces a failed one. */
	onFallback?: (request: IndicatorRequest, failure: IndicatorFailure) => void;
}

/**
 * Resolves indicator readings for one evaluation. Outcomes and bar series are
 * memoized for the lifetime of the instance, so every evaluation gets its own
 * gateway.
 */
export class IndicatorGateway {
	private readonly outcomes = new Map<string, Promise<IndicatorOutcome>>();
	private readonly bars = new Map<string, Promise<Bar[]>>();
	private readonly timeframe: string;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: IndicatorGatewayOptions) {
		this.timeframe = options.timeframe ?? "1d";
		this.logger = options.logger ?? createLogger("indicator-gateway");
	}

	static cacheKey(request: IndicatorRequest): string {
		return stableStringify({
			symbol: request.symbol,
			indicatorType: request.indicatorType,
			parameters: request.parameters,
		});
	}

	compute(request: IndicatorRequest): Promise<IndicatorOutcome> {
		const key = IndicatorGateway.cacheKey(request);
		const cached = this.outcomes.get(key);
		if (cached) {
			return cached;
		}
		const pending = this.resolve(request);
		this.outcomes.set(key, pending);
		return pending;
	}

	/**
	 * Like `compute`, but substitutes the neutral reading on failure. Failures
	 * without a neutral reading, and invalid parameters, raise
	 * `DslEvaluationError`.
	 */
	async getIndicator(request: IndicatorRequest): Promise<IndicatorResult> {
		const outcome = await this.compute(request);
		if (outcome.ok) {
			return outcome.result;
		}
		const fallback =
			outcome.error.reason === "invalid_parameters" ? null : fallbackFor(request);
		if (!fallback) {
			throw new DslEvaluationError(
				`${request.indicatorType} unavailable for ${request.symbol}: ${outcome.error.message}`,
				"indicator"
			);
		}
		this.logger.warn("indicator_fallback_used", {
			symbol: request.symbol,
			indicatorType: request.indicatorType,
			parameters: request.parameters,
			reason: outcome.error.reason,
			value: fallback.value,
		});
		this.options.onFallback?.(request, outcome.error);
		return fallback;
	}

	private async resolve(request: IndicatorRequest): Promise<IndicatorOutcome> {
		const windows = resolveWindows(request);
		if (typeof windows === "string") {
			return failure("invalid_parameters", windows);
		}

		const period = periodForBars(requiredBars(request.indicatorType, windows));
		let bars: Bar[];
		try {
			bars = await this.loadBars(request.symbol, period);
		} catch (error) {
			return failure("source_error", errorMessage(error));
		}
		if (!bars.length) {
			return failure("no_data", `no bars for ${request.symbol}`);
		}

		const closes = bars.map((bar) => bar.close);
		let value: number | null;
		try {
			value = computeValue(request.indicatorType, closes, windows);
		} catch (error) {
			return failure("source_error", errorMessage(error));
		}
		if (value === null || !Number.isFinite(value)) {
			return failure(
				"insufficient_data",
				`${closes.length} bars are not enough for ${request.indicatorType}`
			);
		}
		this.logger.debug("indicator_computed", {
			symbol: request.symbol,
			indicatorType: request.indicatorType,
			parameters: request.parameters,
			value,
			bars: closes.length,
		});
		return {
			ok: true,
			result: { ...request, value, dataSource: "market_data", barsUsed: closes.length },
		};
	}

	private loadBars(symbol: string, period: HistoryPeriod): Promise<Bar[]> {
		const key = `${symbol}|${period}|${this.timeframe}`;
		const cached = this.bars.get(key);
		if (cached) {
			return cached;
		}
		const pending = this.options.marketData
			.getBars(symbol, period, this.timeframe)
			.then((bars) => {
				const asOf = this.options.asOf;
				return asOf === undefined
					? bars
					: bars.filter((bar) => bar.timestamp <= asOf);
			});
		this.bars.set(key, pending);
		return pending;
	}
}

const failure = (
	reason: IndicatorFailureReason,
	message: string
): IndicatorOutcome => ({ ok: false, error: { reason, message } });
