/**
 * Time constants in milliseconds.
 */
export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;
export const YEAR_MS = 365 * DAY_MS;

/** Trading sessions in a calendar year, used to size history requests. */
export const TRADING_DAYS_PER_YEAR = 252;
