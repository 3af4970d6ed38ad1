import { emaSeries } from "./ema";

export const PPO_DEFAULT_SHORT = 12;
export const PPO_DEFAULT_LONG = 26;
export const PPO_DEFAULT_SMOOTH = 9;

const validWindows = (shortLength: number, longLength: number): boolean =>
	shortLength > 0 && longLength > shortLength;

/** `(EMA(short) - EMA(long)) / EMA(long) * 100` at every bar. */
export function ppoSeries(values: number[], shortLength: number, longLength: number): number[] {
	const short = emaSeries(values, shortLength);
	const long = emaSeries(values, longLength);
	return values.map((_, index) => ((short[index] - long[index]) / long[index]) * 100);
}

/** Percentage price oscillator. Needs at least `longLength` values. */
export function percentagePriceOscillator(
	values: number[],
	shortLength = PPO_DEFAULT_SHORT,
	longLength = PPO_DEFAULT_LONG
): number | null {
	if (!validWindows(shortLength, longLength) || values.length < longLength) {
		return null;
	}
	return ppoSeries(values, shortLength, longLength)[values.length - 1];
}

/**
 * Signal line: an EMA of the oscillator, seeded at the first bar where the
 * oscillator is defined (`longLength - 1`).
 */
export function percentagePriceOscillatorSignal(
	values: number[],
	shortLength = PPO_DEFAULT_SHORT,
	longLength = PPO_DEFAULT_LONG,
	smoothLength = PPO_DEFAULT_SMOOTH
): number | null {
	if (
		!validWindows(shortLength, longLength) ||
		smoothLength <= 0 ||
		values.length < longLength + smoothLength
	) {
		return null;
	}
	const defined = ppoSeries(values, shortLength, longLength).slice(longLength - 1);
	const signal = emaSeries(defined, smoothLength);
	return signal[signal.length - 1];
}
