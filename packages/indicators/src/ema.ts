/**
 * Exponential moving average series with `alpha = 2 / (length + 1)`, seeded
 * with the first value. One output per input.
 */
export function emaSeries(values: number[], length: number): number[] {
	const multiplier = 2 / (length + 1);
	const series: number[] = [];
	values.forEach((value, index) => {
		series.push(index === 0 ? value : (value - series[index - 1]) * multiplier + series[index - 1]);
	});
	return series;
}

/** Latest value of `emaSeries`. */
export function ema(values: number[], length: number): number | null {
	if (length <= 0 || values.length < length) {
		return null;
	}
	return emaSeries(values, length)[values.length - 1];
}
