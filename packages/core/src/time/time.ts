/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */
import { DAY_MS, HOUR_MS, MINUTE_MS, WEEK_MS } from "./constants";

export type TimeframeUnit = "m" | "h" | "d" | "w";

export interface ParsedTimeframe {
	unit: TimeframeUnit;
	n: number;
	ms: number;
}

const UNIT_MS: Record<TimeframeUnit, number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
	w: WEEK_MS,
};

const isTimeframeUnit = (value: string): value is TimeframeUnit =>
	value in UNIT_MS;

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "1m", "15m", "1h", "4h", "1d", "1w"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(/^(\d+)([a-z])$/);

	if (!match || !isTimeframeUnit(match[2])) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "1h", "1d", "1w"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Parse a point in time given either as epoch milliseconds or as an ISO-8601
 * string. A bare date ("2024-03-01") is read as the end of that UTC day so
 * that the day's own bar is included.
 */
export const parseTimestamp = (value: string): number => {
	const trimmed = value.trim();
	if (/^\d+$/.test(trimmed)) {
		return Number(trimmed);
	}
	if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
		const start = Date.parse(`${trimmed}T00:00:00Z`);
		if (Number.isNaN(start)) {
			throw new Error(`Invalid timestamp: "${value}"`);
		}
		return start + DAY_MS - 1;
	}
	const parsed = Date.parse(trimmed);
	if (Number.isNaN(parsed)) {
		throw new Error(`Invalid timestamp: "${value}"`);
	}
	return parsed;
};
