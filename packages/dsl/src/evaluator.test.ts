import { describe, expect, it } from "vitest";
import { stdevReturn } from "@symphony/indicators";
import { SERIES_START, StubMarketDataPort } from "./__tests__/stubMarketData";
import { ZERO, dec } from "./decimal";
import { DslEngineError } from "./errors";
import { DslEvaluator, type EvaluationOutcome } from "./evaluator";
import { parse } from "./parser";

const run = (source: string, series: Record<string, number[]> = {}) =>
	new DslEvaluator({ marketData: new StubMarketDataPort(series) }).evaluateSource(source, {
		correlationId: "corr-1",
		strategyId: "test",
	});

const weights = (outcome: EvaluationOutcome): Record<string, string> =>
	Object.fromEntries(
		Object.entries(outcome.allocation.targetWeights).map(([symbol, weight]) => [
			symbol,
			weight.toString(),
		])
	);

const failure = async (promise: Promise<unknown>): Promise<DslEngineError> => {
	try {
		await promise;
	} catch (error) {
		if (error instanceof DslEngineError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected evaluation to fail");
};

describe("DslEvaluator allocations", () => {
	it("applies specified weights", async () => {
		const outcome = await run('(weight-specified 0.6 "AAPL" 0.4 "MSFT")');
		expect(weights(outcome)).toEqual({ AAPL: "0.6", MSFT: "0.4" });
	});

	it("scales nested fragments", async () => {
		const outcome = await run('(weight-specified 0.5 (weight-equal "A" "B") 0.5 "C")');
		expect(weights(outcome)).toEqual({ A: "0.25", B: "0.25", C: "0.5" });
	});

	it("renormalizes weights that do not sum to one", async () => {
		const outcome = await run('(weight-specified 1 "A" 1 "B")');
		expect(weights(outcome)).toEqual({ A: "0.5", B: "0.5" });
	});

	it("deduplicates equal-weight symbols", async () => {
		const outcome = await run('(weight-equal "A" ["B" "A"])');
		expect(weights(outcome)).toEqual({ A: "0.5", B: "0.5" });
	});

	it("gives a lone asset the whole portfolio", async () => {
		const outcome = await run('(defsymphony "Demo" {:rebalance "daily"} (asset "SPY" "S&P 500"))');
		expect(weights(outcome)).toEqual({ SPY: "1" });
		expect(outcome.trace.metadata.symphonyName).toBe("Demo");
	});

	it("splits a plain list of tickers evenly", async () => {
		const outcome = await run('["A" "B"]');
		expect(weights(outcome)).toEqual({ A: "0.5", B: "0.5" });
	});

	it("splits three assets into weights summing to one", async () => {
		const outcome = await run('(weight-equal "A" "B" "C")');
		const total = Object.values(outcome.allocation.targetWeights).reduce(
			(sum, weight) => sum.plus(weight),
			ZERO
		);
		expect(Object.keys(outcome.allocation.targetWeights)).toEqual(["A", "B", "C"]);
		expect(total.minus(1).abs().lessThan(1e-9)).toBe(true);
	});

	it("produces the same result for the same source", async () => {
		const source = '(if (> (current-price "SPY") 100) (weight-equal "SPY" "QQQ") (asset "BIL"))';
		const series = { SPY: [99, 101] };
		const first = await run(source, series);
		const second = await run(source, series);
		expect(weights(second)).toEqual(weights(first));
		expect(second.trace.steps.map((step) => step.stepType)).toEqual(
			first.trace.steps.map((step) => step.stepType)
		);
		expect(second.trace.metadata.decisionPath).toEqual(first.trace.metadata.decisionPath);
	});

	it("holds cash when nothing is selected", async () => {
		expect(weights(await run('(if (> 1 2) (asset "SPY"))'))).toEqual({ CASH: "1" });
		expect(weights(await run("(weight-equal)"))).toEqual({ CASH: "1" });
		expect(weights(await run("[]"))).toEqual({ CASH: "1" });
	});

	it("passes portfolio value and constraints through", async () => {
		const asOf = new Date(Date.UTC(2024, 5, 30));
		const evaluator = new DslEvaluator({ marketData: new StubMarketDataPort({}), asOf });
		const outcome = await evaluator.evaluate(parse('(asset "SPY")'), {
			correlationId: "corr-2",
			strategyId: "test",
			portfolioValue: dec(10000),
			constraints: { maxPositions: 5 },
		});
		expect(outcome.allocation.asOf).toEqual(asOf);
		expect(outcome.allocation.correlationId).toBe("corr-2");
		expect(outcome.allocation.portfolioValue?.toString()).toBe("10000");
		expect(outcome.allocation.constraints).toEqual({ maxPositions: 5 });
		expect(Object.isFrozen(outcome.allocation)).toBe(true);
	});
});

describe("DslEvaluator decisions", () => {
	it("records each branch taken", async () => {
		const outcome = await run(
			'(if (> (current-price "SPY") 100) (asset "SPY") (asset "BIL"))',
			{ SPY: [99, 101] }
		);
		expect(weights(outcome)).toEqual({ SPY: "1" });
		expect(outcome.trace.metadata.decisionPath).toEqual([
			{
				condition: '(current-price "SPY") > 100',
				result: true,
				branch: "then",
				conditionType: "comparison",
				symbolsInvolved: ["SPY"],
				values: { left: "101", right: "100" },
				operatorType: ">",
				threshold: "100",
				indicatorName: "current-price",
				indicatorParams: undefined,
			},
		]);
		expect(outcome.trace.steps.map((step) => step.stepType)).toEqual([
			"evaluation_start",
			"decision",
			"allocation",
		]);
		expect(outcome.trace.steps[1].description).toBe(
			'(current-price "SPY") > 100 is true, taking then branch'
		);
		expect(outcome.trace.success).toBe(true);
	});

	it("compares decimals exactly", async () => {
		const outcome = await run('(if (= (+ 0.1 0.2) 0.3) "EXACT" "FLOAT")');
		expect(weights(outcome)).toEqual({ EXACT: "1" });
	});

	it("never evaluates the branch it does not take", async () => {
		const marketData = new StubMarketDataPort({ B: [1, 2, 3] });
		const outcome = await new DslEvaluator({ marketData }).evaluateSource(
			'(if (> 2 1) "A" (rsi "B" {:window 10}))',
			{ correlationId: "corr-1", strategyId: "test" }
		);
		expect(weights(outcome)).toEqual({ A: "1" });
		expect(marketData.calls).toEqual([]);
	});

	it("compares the price oscillator against a threshold", async () => {
		const source =
			'(if (> (percentage-price-oscillator "A" {:short-window 1 :long-window 2}) 0) "UP" "DOWN")';
		const outcome = await run(source, { A: [1, 2] });
		expect(weights(outcome)).toEqual({ UP: "1" });
	});

	it("evaluates logical conditions", async () => {
		const outcome = await run('(if (and (> 3 2) (not (= "a" "b"))) "X" "Y")');
		expect(weights(outcome)).toEqual({ X: "1" });
		expect(outcome.trace.metadata.decisionPath).toMatchObject([
			{ conditionType: "logical", branch: "then" },
		]);
	});

	it("notes neutral indicator readings in the trace", async () => {
		const outcome = await run('(if (> (rsi "NOPE") 50) "A" "B")');
		expect(weights(outcome)).toEqual({ B: "1" });
		expect(outcome.trace.steps.map((step) => step.stepType)).toEqual([
			"evaluation_start",
			"indicator_fallback",
			"decision",
			"allocation",
		]);
		expect(outcome.trace.steps[1].metadata).toEqual({
			reason: "no_data",
			message: "no bars for NOPE",
		});
	});
});

describe("DslEvaluator filter", () => {
	const series = { A: [70], B: [30] };

	it("keeps the top-ranked candidates", async () => {
		const outcome = await run('(filter (current-price) (select-top 1) ["A" "B"])', series);
		expect(weights(outcome)).toEqual({ A: "1" });
	});

	it("keeps the bottom-ranked candidates", async () => {
		const outcome = await run('(filter (current-price) (select-bottom 1) ["A" "B"])', series);
		expect(weights(outcome)).toEqual({ B: "1" });
	});

	it("keeps every candidate without a selector", async () => {
		const outcome = await run('(filter (current-price) ["A" "B"])', series);
		expect(weights(outcome)).toEqual({ A: "0.5", B: "0.5" });
	});

	it("drops candidates that cannot be scored", async () => {
		const outcome = await run('(filter (current-price) (select-top 2) ["A" "NOPE"])', series);
		expect(weights(outcome)).toEqual({ A: "1" });
		const step = outcome.trace.steps.find((entry) => entry.stepType === "filter");
		expect(step?.description).toBe("filter kept 1 of 2 candidates");
		expect(step?.outputs).toEqual({ scores: { A: "70" }, selected: ["A"] });
	});

	it("rejects a scorer that is not an indicator call", async () => {
		const error = await failure(
			run('(filter (weight-equal "X") (select-top 1) ["A" "B"])', series)
		);
		expect(error.kind).toBe("evaluation");
		expect(error.message).toBe("filter: expected an indicator call, got weight-equal");
	});

	it("rejects a bare symbol as scorer", async () => {
		await expect(run('(filter rsi ["A" "B"])', series)).rejects.toThrow(
			"filter: expected an indicator call, got symbol"
		);
	});

	it("rejects a malformed selector", async () => {
		const error = await failure(run('(filter (current-price) (top 1) ["A"])', series));
		expect(error.message).toBe(
			"filter: selector must be (select-top N) or (select-bottom N)"
		);
	});
});

describe("DslEvaluator group", () => {
	it("merges fragments from its body", async () => {
		const outcome = await run(
			'(group "Both" (weight-specified 1 "A") [(weight-specified 1 "B")])'
		);
		expect(weights(outcome)).toEqual({ A: "0.5", B: "0.5" });
	});

	it("returns a plain body value unchanged", async () => {
		const outcome = await run('(group "Single" (asset "SPY"))');
		expect(weights(outcome)).toEqual({ SPY: "1" });
	});

	it("requires a body", async () => {
		const error = await failure(run('(group "Empty")'));
		expect(error.message).toBe("group: expects at least 2 arguments, got 1");
		expect(error.kind).toBe("evaluation");
	});
});

describe("DslEvaluator inverse volatility", () => {
	it("weights by inverse return volatility and skips unknown symbols", async () => {
		const a = [100, 102, 100, 102];
		const b = [100, 104, 100, 104];
		const outcome = await run('(weight-inverse-volatility 3 ["A" "B" "NOPE"])', { A: a, B: b });
		const inverseA = 1 / (stdevReturn(a, 3) ?? Number.NaN);
		const inverseB = 1 / (stdevReturn(b, 3) ?? Number.NaN);
		const allocation = weights(outcome);
		expect(Object.keys(allocation)).toEqual(["A", "B"]);
		expect(Number(allocation.A)).toBeCloseTo(inverseA / (inverseA + inverseB), 10);
		expect(Number(allocation.B)).toBeCloseTo(inverseB / (inverseA + inverseB), 10);
	});
});

describe("DslEvaluator failures", () => {
	it("reports parse errors", async () => {
		const error = await failure(run('(asset "SPY"'));
		expect(error.kind).toBe("parse");
		expect(error.message).toBe("unclosed list '(' at line 1, column 1");
		expect(error.trace?.success).toBe(false);
	});

	it("completes the trace on evaluation errors", async () => {
		const error = await failure(run("(/ 1 0)"));
		expect(error.kind).toBe("evaluation");
		expect(error.correlationId).toBe("corr-1");
		expect(error.trace?.errorMessage).toBe("/: division by zero");
		expect(error.trace?.steps.map((step) => step.stepType)).toEqual([
			"evaluation_start",
			"error",
		]);
	});

	it("rejects malformed weight pairs", async () => {
		await expect(run('(weight-specified 0.5 "A" 0.5)')).rejects.toThrow(
			"weight-specified: expects weight/asset pairs, got 3 arguments"
		);
		await expect(run('(weight-specified -0.5 "A")')).rejects.toThrow(
			"weight-specified: weight must be non-negative, got -0.5"
		);
	});

	it("rejects maps with non-keyword keys", async () => {
		await expect(run("{1 2}")).rejects.toThrow(
			"malformed map: key must be a keyword or string, got atom"
		);
	});

	it("ignores bars after asOf", async () => {
		const evaluator = new DslEvaluator({
			marketData: new StubMarketDataPort({ SPY: [90, 110] }),
			asOf: new Date(SERIES_START),
		});
		const outcome = await evaluator.evaluateSource(
			'(if (> (current-price "SPY") 100) "SPY" "BIL")',
			{ correlationId: "corr-3", strategyId: "test" }
		);
		expect(weights(outcome)).toEqual({ BIL: "1" });
	});
});
