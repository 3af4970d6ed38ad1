/** Invalid engine setup: no files, missing files or bad weights. */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}

export interface FileFailure {
	file: string;
	message: string;
}

/** Every configured strategy file failed to evaluate. */
export class StrategyExecutionError extends Error {
	readonly correlationId: string;
	readonly failures: readonly FileFailure[];

	constructor(message: string, correlationId: string, failures: readonly FileFailure[]) {
		super(message);
		this.name = "StrategyExecutionError";
		this.correlationId = correlationId;
		this.failures = failures;
	}
}
