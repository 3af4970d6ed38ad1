import { describe, expect, it } from "vitest";
import { Trace } from "./trace";

const clock = () => {
	let tick = 0;
	return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
};

describe("Trace", () => {
	it("numbers steps in insertion order", () => {
		const trace = new Trace({ correlationId: "c-1", strategyId: "s", traceId: "t-1", now: clock() });
		trace.addStep({ stepType: "evaluation_start", description: "start" });
		trace.addStep({ stepType: "decision", description: "if" });
		expect(trace.steps.map((step) => step.stepId)).toEqual(["step-1", "step-2"]);
	});

	it("serializes timestamps and state", () => {
		const trace = new Trace({ correlationId: "c-1", strategyId: "s", traceId: "t-1", now: clock() });
		trace.addStep({ stepType: "evaluation_start", description: "start" });
		trace.setMetadata("symphonyName", "Main");
		trace.markCompleted(false, "boom");
		expect(trace.toJSON()).toEqual({
			traceId: "t-1",
			correlationId: "c-1",
			strategyId: "s",
			startedAt: "2024-01-01T00:00:00.000Z",
			completedAt: "2024-01-01T00:00:02.000Z",
			success: false,
			errorMessage: "boom",
			steps: [
				{
					stepId: "step-1",
					stepType: "evaluation_start",
					description: "start",
					timestamp: "2024-01-01T00:00:01.000Z",
				},
			],
			metadata: { symphonyName: "Main" },
		});
	});

	it("refuses changes once completed", () => {
		const trace = new Trace({ correlationId: "c-1", strategyId: "s", traceId: "t-1" });
		trace.markCompleted(true);
		expect(() => trace.addStep({ stepType: "decision", description: "late" })).toThrow(
			"Cannot add a step to trace t-1: already completed"
		);
		expect(() => trace.markCompleted(true)).toThrow(
			"Cannot complete trace t-1: already completed"
		);
		expect(trace.success).toBe(true);
	});
});
