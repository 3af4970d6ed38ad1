/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the workspace should depend on these primitives.
 */
export * from "./types";
export * from "./config";
export * from "./env";
export * from "./exchange/MarketDataClient";
export * from "./time/constants";
export * from "./time/time";
export * from "./utils/fingerprint";
export * from "./utils/logger";
