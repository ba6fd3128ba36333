export type QualityGatesErrorCode =
	| "invalid_input"
	| "config_error"
	| "lock_conflict"
	| "internal_error";

/**
 * Base class for errors that stop a run before any gate executes.
 * Gate, parse and VCS failures never use these; they are reported in the result.
 */
export class QualityGatesError extends Error {
	constructor(
		readonly code: QualityGatesErrorCode,
		message: string,
	) {
		super(message);
		this.name = new.target.name;
	}
}

export class InputValidationError extends QualityGatesError {
	constructor(
		message: string,
		readonly issues: string[] = [],
	) {
		super("invalid_input", message);
	}
}

export class ConfigError extends QualityGatesError {
	constructor(
		message: string,
		readonly file?: string,
	) {
		super("config_error", message);
	}
}

export class RunInProgressError extends QualityGatesError {
	constructor(readonly lockPath: string) {
		super(
			"lock_conflict",
			`A quality gates run is already in progress (lock file: ${lockPath}). If no run is actually in progress, delete the lock file manually.`,
		);
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
