import type { Trace } from "./trace";

export interface SourcePosition {
	/** Zero-based character offset. */
	offset: number;
	line: number;
	column: number;
}

/** Malformed source text. Raised before any evaluation happens. */
export class DslParseError extends Error {
	readonly reason: string;
	readonly position?: SourcePosition;

	constructor(reason: string, position?: SourcePosition) {
		super(
			position
				? `${reason} at line ${position.line}, column ${position.column}`
				: reason
		);
		this.name = "DslParseError";
		this.reason = reason;
		this.position = position;
	}
}

/** An operator received arguments it cannot work with. */
export class DslEvaluationError extends Error {
	readonly operator?: string;

	constructor(message: string, operator?: string) {
		super(operator ? `${operator}: ${message}` : message);
		this.name = "DslEvaluationError";
		this.operator = operator;
	}
}

export type DslEngineErrorKind = "parse" | "evaluation" | "io" | "engine";

export interface DslEngineErrorOptions {
	kind: DslEngineErrorKind;
	correlationId: string;
	filePath?: string;
	trace?: Trace;
	cause?: unknown;
}

/**
 * Single error type surfaced by top-level evaluation. `kind` tells parse
 * failures, evaluation failures and I/O or engine failures apart.
 */
export class DslEngineError extends Error {
	readonly kind: DslEngineErrorKind;
	readonly correlationId: string;
	readonly filePath?: string;
	readonly trace?: Trace;

	constructor(message: string, options: DslEngineErrorOptions) {
		super(message, { cause: options.cause });
		this.name = "DslEngineError";
		this.kind = options.kind;
		this.correlationId = options.correlationId;
		this.filePath = options.filePath;
		this.trace = options.trace;
	}
}

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

export const classifyError = (error: unknown): DslEngineErrorKind => {
	if (error instanceof DslEngineError) {
		return error.kind;
	}
	if (error instanceof DslParseError) {
		return "parse";
	}
	if (error instanceof DslEvaluationError) {
		return "evaluation";
	}
	return "engine";
};
