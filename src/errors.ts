/**
 * Error taxonomy. Config errors are fatal at startup; everything else is
 * scoped to one source or one post and never aborts a poll cycle.
 */

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class FetchError extends Error {
	constructor(message: string, readonly status?: number) {
		super(message);
		this.name = "FetchError";
	}
}

export class TimeoutError extends Error {
	constructor(label: string, readonly timeoutMs: number) {
		super(`${label} timeout after ${timeoutMs}ms`);
		this.name = "TimeoutError";
	}
}

export class ClassifierUnavailableError extends Error {
	constructor(message: string, readonly attempts: number, readonly cause?: unknown) {
		super(message);
		this.name = "ClassifierUnavailableError";
	}
}

export class MalformedResponseError extends Error {
	constructor(message: string, readonly raw: string) {
		super(message);
		this.name = "MalformedResponseError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Short label used in log lines, e.g. "MalformedResponseError". */
export function errorKind(error: unknown): string {
	return error instanceof Error ? error.name : typeof error;
}
