/**
 * Wilder-smoothed relative strength index of the latest value.
 *
 * Gains and losses are smoothed with an exponential average of
 * `alpha = 1 / period`, seeded with the first price change. Returns `null`
 * when there are fewer than `period` values or when the series never moves
 * (both averages zero), leaving the neutral reading to the caller.
 */
export function rsi(values: number[], period = 14): number | null {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}

	if (values.length < Math.max(period, 2)) {
		return null;
	}

	const alpha = 1 / period;
	let avgGain = 0;
	let avgLoss = 0;

	for (let i = 1; i < values.length; i += 1) {
		const change = values[i] - values[i - 1];
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);
		if (i === 1) {
			avgGain = gain;
			avgLoss = loss;
		} else {
			avgGain = alpha * gain + (1 - alpha) * avgGain;
			avgLoss = alpha * loss + (1 - alpha) * avgLoss;
		}
	}

	if (avgGain === 0 && avgLoss === 0) {
		return null;
	}
	if (avgLoss === 0) {
		return 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
}
