import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	getConfigMetadata,
	loadEngineConfig,
	parseAllocationList,
	withConfigMetadata,
} from "./config";

const FIXTURE_ROOT = path.join(__dirname, "__tests__", "fixtures");
const CONFIG_DIR = path.join(FIXTURE_ROOT, "config");
const ENV_PATH = path.join(FIXTURE_ROOT, "missing.env");

const ENV_KEYS = [
	"SYMPHONY_STRATEGIES_DIR",
	"SYMPHONY_DSL_FILES",
	"SYMPHONY_DSL_ALLOCATIONS",
	"MARKET_DATA_SOURCE",
	"MARKET_DATA_DIR",
	"EXCHANGE_ID",
	"BAR_TIMEFRAME",
];

describe("loadEngineConfig", () => {
	beforeEach(() => {
		for (const key of ENV_KEYS) {
			vi.stubEnv(key, "");
		}
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it("reads files, weights and market data from the profile", () => {
		const config = loadEngineConfig({
			configDir: CONFIG_DIR,
			envPath: ENV_PATH,
		});
		expect(config.files).toEqual(["alpha.clj", "beta.clj"]);
		expect(config.allocations).toEqual({ "alpha.clj": 3, "beta.clj": 1 });
		expect(config.strategiesDir).toBe(path.join(FIXTURE_ROOT, "strategies"));
		expect(config.marketData).toEqual({
			source: "file",
			dataDir: path.join(FIXTURE_ROOT, "bars"),
			exchangeId: "binance",
			timeframe: "1d",
		});
	});

	it("tags the result with file metadata", () => {
		const config = loadEngineConfig({
			configDir: CONFIG_DIR,
			envPath: ENV_PATH,
		});
		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			path: path.join(CONFIG_DIR, "engine", "default.json"),
			profile: "default",
		});
	});

	it("gives unweighted files a weight of one", () => {
		const config = loadEngineConfig({
			configDir: CONFIG_DIR,
			envPath: ENV_PATH,
			profile: "unweighted",
		});
		expect(config.allocations).toEqual({ "gamma.clj": 1 });
	});

	it("lets the environment override the profile", () => {
		vi.stubEnv("SYMPHONY_DSL_ALLOCATIONS", "x.clj:0.7,y.clj:0.3");
		vi.stubEnv("MARKET_DATA_SOURCE", "CCXT");
		vi.stubEnv("EXCHANGE_ID", "kraken");
		const config = loadEngineConfig({
			configDir: CONFIG_DIR,
			envPath: ENV_PATH,
		});
		expect(config.files).toEqual(["x.clj", "y.clj"]);
		expect(config.allocations).toEqual({ "x.clj": 0.7, "y.clj": 0.3 });
		expect(config.marketData.source).toBe("ccxt");
		expect(config.marketData.exchangeId).toBe("kraken");
	});

	it("throws when a weight is not numeric", () => {
		expect(() =>
			loadEngineConfig({
				configDir: CONFIG_DIR,
				envPath: ENV_PATH,
				profile: "bad-weight",
			})
		).toThrowError("Required numeric field missing in engine.allocations.alpha.clj");
	});

	it("throws when no strategy files are configured", () => {
		expect(() =>
			loadEngineConfig({
				configDir: CONFIG_DIR,
				envPath: ENV_PATH,
				profile: "empty",
			})
		).toThrowError(/lists no strategy files/);
	});

	it("throws on an unsupported market data source", () => {
		expect(() =>
			loadEngineConfig({
				configDir: CONFIG_DIR,
				envPath: ENV_PATH,
				profile: "bad-source",
			})
		).toThrowError("Unsupported market data source: carrier-pigeon");
	});

	it("throws when the profile does not exist", () => {
		expect(() =>
			loadEngineConfig({
				configDir: CONFIG_DIR,
				envPath: ENV_PATH,
				profile: "nope",
			})
		).toThrowError(/Engine config not found/);
	});
});

describe("parseAllocationList", () => {
	it("splits on the last colon", () => {
		expect(parseAllocationList("C:/s/a.clj:2, b.clj:1")).toEqual({
			"C:/s/a.clj": 2,
			"b.clj": 1,
		});
	});

	it("rejects entries without a weight", () => {
		expect(() => parseAllocationList("a.clj")).toThrowError(
			'Invalid allocation entry "a.clj", expected file:weight'
		);
	});
});

describe("withConfigMetadata", () => {
	it("merges metadata without making it enumerable", () => {
		const config = withConfigMetadata({ a: 1 }, { source: "embedded" });
		withConfigMetadata(config, { source: "merged", profile: "x" });
		expect(getConfigMetadata(config)).toEqual({ source: "merged", profile: "x" });
		expect(Object.keys(config)).toEqual(["a"]);
	});
});
