/**
 * ResultKitError hierarchy: structured errors raised outside the Result channel.
 *
 * Results carry failures as values. These classes exist for the few places
 * where an Error object is the natural shape: converting a Failure into the
 * platform's settled-outcome form, rejecting bad configuration and reporting
 * validation issues.
 */

/** Error categories: who is expected to act on the error. */
export const ErrorCategory = {
	Usage: "usage",
	Failure: "failure",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing ResultKitError subclasses with optional cause chain. */
interface ResultKitErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for the library, with a stable code and category. */
export class ResultKitError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "ResultKitError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Carries a Failure's string form once it leaves the Result channel. */
export class FailureError extends ResultKitError {
	readonly failure: unknown;

	constructor(message: string, failure: unknown) {
		super(message, "FAILURE", ErrorCategory.Failure);
		this.name = "FailureError";
		this.failure = failure;
	}
}

/** Fatal error for invalid configuration values. */
export class ConfigError extends ResultKitError {
	constructor(message: string, context: Record<string, unknown> & ResultKitErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Message extraction ───────────────────────────────────────────────

/**
 * Extract a human-readable message from anything that can be thrown.
 * Empty messages fall back to `missing`.
 */
export function messageOf(thrown: unknown, missing = "[no message]"): string {
	if (thrown instanceof Error) {
		return thrown.message.length > 0 ? thrown.message : missing;
	}
	if (typeof thrown === "string") {
		return thrown.length > 0 ? thrown : missing;
	}
	if (thrown === undefined || thrown === null) return missing;
	return String(thrown);
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for FailureError. */
export function isFailureError(e: unknown): e is FailureError {
	return e instanceof FailureError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
