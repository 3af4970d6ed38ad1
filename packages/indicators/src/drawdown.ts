/**
 * Largest peak-to-trough decline inside the last `window` values, as a
 * positive percentage.
 */
export function maxDrawdown(values: number[], window: number): number | null {
	if (window <= 0 || values.length < window) {
		return null;
	}
	let peak = Number.NEGATIVE_INFINITY;
	let worst = 0;
	for (const value of values.slice(values.length - window)) {
		peak = Math.max(peak, value);
		if (peak > 0) {
			worst = Math.max(worst, (peak - value) / peak);
		}
	}
	return worst * 100;
}
