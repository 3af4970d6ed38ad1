export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

/**
 * Produces a JSON-safe copy of a log payload. Errors, dates, bigints and
 * objects exposing `toJSON` (decimals among them) are flattened; cycles are
 * replaced with a marker.
 */
export const sanitize = (payload: BaseLogPayload): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clone: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(payload)) {
		clone[key] = sanitizeValue(value, seen);
	}
	return clone;
};

const hasToJson = (value: object): value is { toJSON: () => unknown } =>
	"toJSON" in value && typeof value.toJSON === "function";

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Map) {
		return sanitizeValue(Object.fromEntries(value), seen);
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (hasToJson(value)) {
			return value.toJSON();
		}
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const asRecord = (value: unknown): Record<string, unknown> => {
	const result: Record<string, unknown> = {};
	if (value && typeof value === "object") {
		for (const [key, nested] of Object.entries(value)) {
			result[key] = nested;
		}
	}
	return result;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "allocation_produced": {
				printAllocation(rest);
				break;
			}
			case "strategy_decision": {
				printStrategyDecision(rest);
				break;
			}
			case "strategy_file_evaluated": {
				printFileEvaluated(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const printAllocation = (rest: Record<string, unknown>): void => {
	const weights = sanitizeValue(rest.targetWeights, new WeakSet());
	const rows = Object.entries(asRecord(weights))
		.map(([symbol, weight]) => ({ symbol, weight: Number(weight) }))
		.sort((a, b) => b.weight - a.weight)
		.map(({ symbol, weight }) => ({
			symbol,
			weight: `${(weight * 100).toFixed(2)}%`,
		}));
	if (rows.length === 0) {
		console.log("(empty allocation)");
		return;
	}
	console.table(rows);
};

const printStrategyDecision = (rest: Record<string, unknown>): void => {
	const { condition, result, branch, operatorType, threshold } = rest;
	console.table([{ condition, result, branch, operatorType, threshold }]);
};

const printFileEvaluated = (rest: Record<string, unknown>): void => {
	const { file, fileWeight, symbols, success } = rest;
	console.table([{ file, fileWeight, symbols, success }]);
};
