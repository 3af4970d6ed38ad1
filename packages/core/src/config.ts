import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("symphony.config.meta");

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	isRecord(value) && typeof value.source === "string";

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

export type MarketDataSource = "file" | "ccxt";

export interface EnvConfig {
	strategiesDir?: string;
	dslFiles?: string[];
	dslAllocations?: Record<string, number>;
	marketDataSource?: MarketDataSource;
	marketDataDir?: string;
	exchangeId?: string;
	barTimeframe?: string;
}

export interface MarketDataConfig {
	source: MarketDataSource;
	dataDir: string;
	exchangeId: string;
	timeframe: string;
}

export interface EngineConfig {
	strategiesDir: string;
	files: string[];
	/** Raw per-file weights; normalized by the strategy engine. */
	allocations: Record<string, number>;
	marketData: MarketDataConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", "package-lock.json"];

const DEFAULT_MARKET_DATA: MarketDataConfig = {
	source: "file",
	dataDir: "data/bars",
	exchangeId: "binance",
	timeframe: "1d",
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");
export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

export const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseList = (value?: string): string[] | undefined => {
	if (!value) {
		return undefined;
	}
	const entries = value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return entries.length ? entries : undefined;
};

/**
 * Parses `file:weight` pairs such as `a.clj:0.6,b.clj:0.4`. The weight is
 * taken after the last colon so that Windows drive letters survive.
 */
export const parseAllocationList = (
	value?: string
): Record<string, number> | undefined => {
	const entries = parseList(value);
	if (!entries) {
		return undefined;
	}
	const allocations: Record<string, number> = {};
	for (const entry of entries) {
		const idx = entry.lastIndexOf(":");
		if (idx <= 0) {
			throw new Error(`Invalid allocation entry "${entry}", expected file:weight`);
		}
		const file = entry.slice(0, idx).trim();
		const weight = Number(entry.slice(idx + 1));
		allocations[file] = ensureNumber(weight, `allocation for ${file}`);
	}
	return allocations;
};

const normalizeMarketDataSource = (
	value: string | undefined
): MarketDataSource | undefined => {
	if (value === undefined) {
		return undefined;
	}
	const normalized = value.toLowerCase();
	if (normalized === "file" || normalized === "ccxt") {
		return normalized;
	}
	throw new Error(`Unsupported market data source: ${value}`);
};

export const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensureString = (value: unknown, field: string): string => {
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new Error(`Required string field missing in ${field}`);
	}
	return value;
};

export const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	const parsed: unknown = JSON.parse(contents);
	return parsed;
};

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}

	return {
		strategiesDir: readOptionalEnvVar("SYMPHONY_STRATEGIES_DIR"),
		dslFiles: parseList(readOptionalEnvVar("SYMPHONY_DSL_FILES")),
		dslAllocations: parseAllocationList(
			readOptionalEnvVar("SYMPHONY_DSL_ALLOCATIONS")
		),
		marketDataSource: normalizeMarketDataSource(
			readOptionalEnvVar("MARKET_DATA_SOURCE")
		),
		marketDataDir: readOptionalEnvVar("MARKET_DATA_DIR"),
		exchangeId: readOptionalEnvVar("EXCHANGE_ID"),
		barTimeframe: readOptionalEnvVar("BAR_TIMEFRAME"),
	};
};

const readAllocations = (
	value: unknown,
	field: string
): Record<string, number> => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new Error(`${field} must be an object of file weights`);
	}
	const allocations: Record<string, number> = {};
	for (const [file, weight] of Object.entries(value)) {
		allocations[file] = ensureNumber(weight, `${field}.${file}`);
	}
	return allocations;
};

const readFiles = (value: unknown, field: string): string[] => {
	if (value === undefined) {
		return [];
	}
	if (!Array.isArray(value)) {
		throw new Error(`${field} must be an array of file names`);
	}
	return value.map((entry, idx) => ensureString(entry, `${field}[${idx}]`));
};

const readMarketData = (value: unknown): Partial<MarketDataConfig> => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new Error("engine.marketData must be an object");
	}
	const source =
		typeof value.source === "string"
			? normalizeMarketDataSource(value.source)
			: undefined;
	return {
		source,
		dataDir:
			value.dataDir === undefined
				? undefined
				: ensureString(value.dataDir, "engine.marketData.dataDir"),
		exchangeId:
			value.exchangeId === undefined
				? undefined
				: ensureString(value.exchangeId, "engine.marketData.exchangeId"),
		timeframe:
			value.timeframe === undefined
				? undefined
				: ensureString(value.timeframe, "engine.marketData.timeframe"),
	};
};

const resolveFrom = (baseDir: string, target: string): string =>
	path.isAbsolute(target) ? target : path.join(baseDir, target);

/**
 * Loads `<configDir>/engine/<profile>.json` and layers environment overrides
 * on top. Relative directories are resolved against the parent of the config
 * directory. Files listed without an explicit weight get weight 1.
 */
export const loadEngineConfig = (
	options: ConfigLoadOptions = {}
): EngineConfig => {
	const configDir = options.configDir ?? getDefaultConfigDir();
	const profile = options.profile ?? "default";
	const baseDir = path.dirname(configDir);
	const enginePath = path.join(configDir, "engine", `${profile}.json`);
	if (!fs.existsSync(enginePath)) {
		throw new Error(`Engine config not found at ${enginePath}`);
	}
	const file = readJsonFile(enginePath);
	if (!isRecord(file)) {
		throw new Error(`Engine config at ${enginePath} must be a JSON object`);
	}

	const env = loadEnvConfig(options.envPath ?? path.join(baseDir, ".env"));
	const fileMarketData = readMarketData(file.marketData);

	const allocations = env.dslAllocations ??
		readAllocations(file.allocations, "engine.allocations");
	const files =
		env.dslFiles ??
		(env.dslAllocations ? Object.keys(env.dslAllocations) : undefined) ??
		readFiles(file.files, "engine.files");
	for (const entry of Object.keys(allocations)) {
		if (!files.includes(entry)) {
			files.push(entry);
		}
	}
	if (files.length === 0) {
		throw new Error(`Engine config at ${enginePath} lists no strategy files`);
	}
	const weighted: Record<string, number> = {};
	for (const entry of files) {
		weighted[entry] = allocations[entry] ?? 1;
	}

	const strategiesDir =
		env.strategiesDir ??
		(file.strategiesDir === undefined
			? "strategies"
			: ensureString(file.strategiesDir, "engine.strategiesDir"));

	return withConfigMetadata(
		{
			strategiesDir: resolveFrom(baseDir, strategiesDir),
			files,
			allocations: weighted,
			marketData: {
				source:
					env.marketDataSource ??
					fileMarketData.source ??
					DEFAULT_MARKET_DATA.source,
				dataDir: resolveFrom(
					baseDir,
					env.marketDataDir ??
						fileMarketData.dataDir ??
						DEFAULT_MARKET_DATA.dataDir
				),
				exchangeId:
					env.exchangeId ??
					fileMarketData.exchangeId ??
					DEFAULT_MARKET_DATA.exchangeId,
				timeframe:
					env.barTimeframe ??
					fileMarketData.timeframe ??
					DEFAULT_MARKET_DATA.timeframe,
			},
		},
		{
			source: "file",
			path: enginePath,
			profile,
		}
	);
};
