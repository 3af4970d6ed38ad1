import {
	TRADING_DAYS_PER_YEAR,
	YEAR_MS,
	type HistoryPeriod,
} from "@symphony/core";

const PERIOD_BUFFER = 1.1;

/**
 * Converts a bar count into the calendar period that covers it, leaving a 10%
 * margin for holidays and gaps. `"MAX"` passes through.
 */
export const periodForBars = (bars: number | "MAX"): HistoryPeriod => {
	if (bars === "MAX") {
		return "MAX";
	}
	if (!Number.isFinite(bars) || bars <= 0) {
		throw new Error(`Bar count must be positive, got ${bars}`);
	}
	const years = Math.max(
		1,
		Math.ceil((bars * PERIOD_BUFFER) / TRADING_DAYS_PER_YEAR)
	);
	return `${years}Y`;
};

export const parsePeriodYears = (period: HistoryPeriod): number | null => {
	if (period === "MAX") {
		return null;
	}
	const match = period.match(/^(\d+)Y$/);
	if (!match) {
		throw new Error(`Invalid history period: ${period}`);
	}
	return Number(match[1]);
};

/**
 * First timestamp covered by `period` when history ends at `endTimestamp`.
 * `"MAX"` maps to `maxYears` back.
 */
export const periodStart = (
	period: HistoryPeriod,
	endTimestamp: number,
	maxYears = 20
): number => {
	const years = parsePeriodYears(period) ?? maxYears;
	return Math.max(0, endTimestamp - years * YEAR_MS);
};
