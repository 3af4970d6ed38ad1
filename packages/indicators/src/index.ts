/**
 * Pure indicator math over chronological close-price arrays. Every function
 * reports the value at the end of the series and returns `null` when the
 * series is too short for the requested window.
 */
export * from "./rsi";
export * from "./sma";
export * from "./ema";
export * from "./ppo";
export * from "./returns";
export * from "./volatility";
export * from "./drawdown";
