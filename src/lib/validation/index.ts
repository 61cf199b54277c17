/**
 * Validation wrapper: thin abstraction over Zod that returns Results instead of throwing.
 *
 * `validate` keeps the issues on a ValidationError; `validateDetail` flattens
 * them into an ErrorDetail so schema checks compose with StringResult chains.
 * Re-exports `z` so schemas can be built through this module.
 */

import { z } from "zod";
import { type ErrorDetail, type StringResult, entry, successOf } from "../../result/error-detail.js";
import { type Result, failure, success } from "../../result/result.js";
import { ErrorCategory, ResultKitError } from "../../shared/errors.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Usage error containing one or more validation issues. */
export class ValidationError extends ResultKitError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.Usage);
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(schema: z.ZodType<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return success(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return failure(new ValidationError("Validation failed", issues));
}

/**
 * Validate into a StringResult. Each issue becomes one entry whose category
 * is the dotted field path (`"value"` for the root).
 */
export function validateDetail<T>(schema: z.ZodType<T>, data: unknown): StringResult<T> {
	const result = validate(schema, data);
	if (result.ok) return successOf(result.value);
	return failure(issuesToDetail(result.error.issues));
}

export function issuesToDetail(issues: readonly ValidationIssue[]): ErrorDetail {
	return issues.map((i) => entry(i.path.length > 0 ? i.path.join(".") : "value", i.message));
}
