import { randomUUID } from "node:crypto";

export type TraceStepType =
	| "evaluation_start"
	| "decision"
	| "filter"
	| "indicator_fallback"
	| "allocation"
	| "error";

export interface TraceEntry {
	stepId: string;
	stepType: TraceStepType;
	description: string;
	timestamp: Date;
	inputs?: Record<string, unknown>;
	outputs?: Record<string, unknown>;
	metadata?: Record<string, unknown>;
}

export type TraceStepInput = Omit<TraceEntry, "stepId" | "timestamp">;

export interface TraceOptions {
	correlationId: string;
	strategyId: string;
	traceId?: string;
	now?: () => Date;
}

export interface TraceSnapshot {
	traceId: string;
	correlationId: string;
	strategyId: string;
	startedAt: string;
	completedAt: string | null;
	success: boolean | null;
	errorMessage: string | null;
	steps: Array<Omit<TraceEntry, "timestamp"> & { timestamp: string }>;
	metadata: Record<string, unknown>;
}

type TraceState =
	| { completed: false }
	| {
			completed: true;
			success: boolean;
			errorMessage?: string;
			completedAt: Date;
	  };

/**
 * Ordered provenance log for one evaluation. Entries can only be appended
 * until `markCompleted` runs, which happens exactly once.
 */
export class Trace {
	readonly traceId: string;
	readonly correlationId: string;
	readonly strategyId: string;
	readonly startedAt: Date;

	private readonly entries: TraceEntry[] = [];
	private readonly meta: Record<string, unknown> = {};
	private readonly now: () => Date;
	private state: TraceState = { completed: false };

	constructor(options: TraceOptions) {
		this.now = options.now ?? (() => new Date());
		this.traceId = options.traceId ?? randomUUID();
		this.correlationId = options.correlationId;
		this.strategyId = options.strategyId;
		this.startedAt = this.now();
	}

	get steps(): readonly TraceEntry[] {
		return this.entries;
	}

	get metadata(): Readonly<Record<string, unknown>> {
		return this.meta;
	}

	get isCompleted(): boolean {
		return this.state.completed;
	}

	get success(): boolean | undefined {
		return this.state.completed ? this.state.success : undefined;
	}

	get errorMessage(): string | undefined {
		return this.state.completed ? this.state.errorMessage : undefined;
	}

	get completedAt(): Date | undefined {
		return this.state.completed ? this.state.completedAt : undefined;
	}

	addStep(step: TraceStepInput): TraceEntry {
		this.assertOpen("add a step to");
		const entry: TraceEntry = {
			...step,
			stepId: `step-${this.entries.length + 1}`,
			timestamp: this.now(),
		};
		this.entries.push(entry);
		return entry;
	}

	setMetadata(key: string, value: unknown): void {
		this.assertOpen("update metadata of");
		this.meta[key] = value;
	}

	markCompleted(success: boolean, errorMessage?: string): void {
		this.assertOpen("complete");
		this.state = {
			completed: true,
			success,
			errorMessage,
			completedAt: this.now(),
		};
	}

	toJSON(): TraceSnapshot {
		return {
			traceId: this.traceId,
			correlationId: this.correlationId,
			strategyId: this.strategyId,
			startedAt: this.startedAt.toISOString(),
			completedAt: this.completedAt?.toISOString() ?? null,
			success: this.success ?? null,
			errorMessage: this.errorMessage ?? null,
			steps: this.entries.map((entry) => ({
				...entry,
				timestamp: entry.timestamp.toISOString(),
			})),
			metadata: { ...this.meta },
		};
	}

	private assertOpen(action: string): void {
		if (this.state.completed) {
			throw new Error(`Cannot ${action} trace ${this.traceId}: already completed`);
		}
	}
}
