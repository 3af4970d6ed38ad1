import { pctReturns } from "./returns";

const sampleStdev = (values: number[]): number => {
	const mean = values.reduce((acc, value) => acc + value, 0) / values.length;
	const squared = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
	return Math.sqrt(squared / (values.length - 1));
};

/**
 * Sample standard deviation of the last `window` percent returns, in percent
 * units (a daily move of 1% contributes 1, not 0.01).
 */
export function stdevReturn(values: number[], window: number): number | null {
	if (window < 2 || values.length < window + 1) {
		return null;
	}
	const recent = pctReturns(values.slice(values.length - window - 1)).map(
		(value) => value * 100
	);
	return sampleStdev(recent);
}

/** Sample standard deviation of the last `window` prices. */
export function stdevPrice(values: number[], window: number): number | null {
	if (window < 2 || values.length < window) {
		return null;
	}
	return sampleStdev(values.slice(values.length - window));
}
