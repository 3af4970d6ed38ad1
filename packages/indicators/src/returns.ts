/** Simple period-over-period returns, one shorter than the input. */
export const pctReturns = (values: number[]): number[] => {
	const result: number[] = [];
	for (let i = 1; i < values.length; i += 1) {
		const previous = values[i - 1];
		if (previous === 0) {
			throw new Error(`Cannot compute return from a zero price at index ${i - 1}`);
		}
		result.push(values[i] / previous - 1);
	}
	return result;
};

/** Mean of the last `window` returns, in percent. */
export function movingAverageReturn(
	values: number[],
	window: number
): number | null {
	if (window <= 0 || values.length < window + 1) {
		return null;
	}
	const recent = pctReturns(values.slice(values.length - window - 1));
	const sum = recent.reduce((acc, value) => acc + value, 0);
	return (sum / window) * 100;
}

/** Percent change between the latest value and the one `window` steps back. */
export function cumulativeReturn(
	values: number[],
	window: number
): number | null {
	if (window <= 0 || values.length <= window) {
		return null;
	}
	const last = values[values.length - 1];
	const base = values[values.length - 1 - window];
	if (base === 0) {
		return null;
	}
	return (last / base - 1) * 100;
}
