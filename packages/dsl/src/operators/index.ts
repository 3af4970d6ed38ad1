import { DispatcherBuilder, type Dispatcher } from "../dispatcher";
import { comparisonOperators } from "./comparison";
import { controlFlowOperators } from "./controlFlow";
import { indicatorOperators } from "./indicators";
import { portfolioOperators } from "./portfolio";

export * from "./arity";
export * from "./comparison";
export * from "./controlFlow";
export * from "./indicators";
export * from "./portfolio";

/** Builder preloaded with every built-in operator. */
export const defaultDispatcherBuilder = (): DispatcherBuilder =>
	new DispatcherBuilder()
		.registerAll(controlFlowOperators)
		.registerAll(comparisonOperators)
		.registerAll(indicatorOperators)
		.registerAll(portfolioOperators);

export const createDefaultDispatcher = (): Dispatcher =>
	defaultDispatcherBuilder().build();
