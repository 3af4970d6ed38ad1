import { randomUUID } from "node:crypto";
import { createLogger } from "@symphony/core";
import type { AllocationJSON } from "./allocation";
import { errorMessage } from "./errors";
import type { TraceSnapshot } from "./trace";

const logger = createLogger("dsl-events");

export interface EventEnvelope {
	eventId: string;
	correlationId: string;
	/** `eventId` of the event that caused this one. */
	causationId: string;
	timestamp: Date;
	sourceModule: string;
}

export interface StrategyEvaluationRequested extends EventEnvelope {
	type: "StrategyEvaluationRequested";
	strategyId: string;
	strategyConfigPath?: string;
}

export interface StrategyEvaluated extends EventEnvelope {
	type: "StrategyEvaluated";
	strategyId: string;
	success: boolean;
	allocation?: AllocationJSON;
	trace?: TraceSnapshot;
	errorMessage?: string;
}

export interface PortfolioAllocationProduced extends EventEnvelope {
	type: "PortfolioAllocationProduced";
	strategyId: string;
	allocation: AllocationJSON;
}

export type DslEvent =
	| StrategyEvaluationRequested
	| StrategyEvaluated
	| PortfolioAllocationProduced;

export type DslEventType = DslEvent["type"];

export type DslEventOf<T extends DslEventType> = Extract<DslEvent, { type: T }>;

export type DslEventHandler<T extends DslEventType> = (
	event: DslEventOf<T>
) => void | Promise<void>;

export interface EventBus {
	publish(event: DslEvent): Promise<void>;
	subscribe<T extends DslEventType>(type: T, handler: DslEventHandler<T>): () => void;
}

export const createEnvelope = (
	correlationId: string,
	causationId: string,
	sourceModule: string
): EventEnvelope => ({
	eventId: randomUUID(),
	correlationId,
	causationId,
	timestamp: new Date(),
	sourceModule,
});

const isEventOf = <T extends DslEventType>(
	event: DslEvent,
	type: T
): event is DslEventOf<T> => event.type === type;

type Listener = (event: DslEvent) => void | Promise<void>;

/**
 * Process-local bus. Listener failures are logged and never reach the
 * publisher.
 */
export class InMemoryEventBus implements EventBus {
	private readonly listeners = new Set<Listener>();

	subscribe<T extends DslEventType>(type: T, handler: DslEventHandler<T>): () => void {
		const listener: Listener = (event) =>
			isEventOf(event, type) ? handler(event) : undefined;
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	async publish(event: DslEvent): Promise<void> {
		await Promise.allSettled(
			Array.from(this.listeners).map(async (listener) => {
				try {
					await listener(event);
				} catch (error) {
					logger.error("event_listener_failed", {
						eventType: event.type,
						eventId: event.eventId,
						correlationId: event.correlationId,
						error: errorMessage(error),
					});
				}
			})
		);
	}
}
