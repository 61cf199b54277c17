/**
 * ErrorDetail is the conventional failure payload, an ordered list of
 * (category, message) entries. The first entry is usually the primary
 * "error"; later entries annotate it.
 */

import { resolveMissingMessage } from "../shared/config.js";
import { messageOf } from "../shared/errors.js";
import type { FailureProjection } from "./projection.js";
import { type Failure, type FailureProducer, type Result, type Success, failure, success } from "./result.js";

export interface ErrorEntry {
	readonly category: string;
	readonly message: string;
}

export type ErrorDetail = readonly ErrorEntry[];

/** Result specialised to an ErrorDetail failure payload. */
export type StringResult<S> = Result<S, ErrorDetail>;

/** Category used for primary entries and translated throws. */
export const ERROR_CATEGORY = "error";

// ── Construction ─────────────────────────────────────────────────────

export function entry(category: string, message: string): ErrorEntry {
	return { category, message };
}

export function emptyErrorDetail(): ErrorDetail {
	return [];
}

/** A single-entry detail tagged "error". */
export function errorDetailWith(message: string): ErrorDetail {
	return [entry(ERROR_CATEGORY, message)];
}

// ── Accumulation ─────────────────────────────────────────────────────

/** Append an entry, returning a new detail or a new Failure. The input is left untouched. */
export function add(detail: ErrorDetail, category: string, message: string): ErrorDetail;
export function add(target: Failure<ErrorDetail>, category: string, message: string): Failure<ErrorDetail>;
export function add(
	target: ErrorDetail | Failure<ErrorDetail>,
	category: string,
	message: string,
): ErrorDetail | Failure<ErrorDetail> {
	if (isDetailTarget(target)) return [...target, entry(category, message)];
	return failure([...target.error, entry(category, message)]);
}

function isDetailTarget(target: ErrorDetail | Failure<ErrorDetail>): target is ErrorDetail {
	return Array.isArray(target);
}

/** Type guard: an array of `{ category, message }` string entries. */
export function isErrorDetail(value: unknown): value is ErrorDetail {
	return Array.isArray(value) && value.every(isErrorEntry);
}

function isErrorEntry(value: unknown): value is ErrorEntry {
	if (typeof value !== "object" || value === null) return false;
	return (
		typeof Reflect.get(value, "category") === "string" && typeof Reflect.get(value, "message") === "string"
	);
}

// ── Producers and StringResult factories ─────────────────────────────

/**
 * Build a producer that turns a thrown value into a single "error" entry.
 * Without `missing`, the placeholder is read from the configuration each time
 * a throw is converted.
 */
export function detailProducer(missing?: string): FailureProducer<ErrorDetail> {
	return (thrown) => errorDetailWith(messageOf(thrown, missing ?? resolveMissingMessage()));
}

/** Default ErrorDetail producer. */
export const detailFromThrown: FailureProducer<ErrorDetail> = detailProducer();

/** A StringResult Success that is safe by default: it carries the ErrorDetail producer. */
export function successOf<S>(value: S, producer: FailureProducer<ErrorDetail> = detailFromThrown): Success<S, ErrorDetail> {
	return success(value, producer);
}

/** Sugar for `failure(errorDetailWith(message))`. */
export function failureOf(message: string): Failure<ErrorDetail> {
	return failure(errorDetailWith(message));
}

// ── Inspection ───────────────────────────────────────────────────────

/** True iff the projected result is a Failure whose detail holds an equal entry. */
export function containsDeep<S>(projection: FailureProjection<S, ErrorDetail>, candidate: ErrorEntry): boolean {
	return projection.exists((detail) =>
		detail.some((e) => e.category === candidate.category && e.message === candidate.message),
	);
}

/** `"error: first; warning: w"`. */
export function formatDetail(detail: ErrorDetail): string {
	return detail.map((e) => `${e.category}: ${e.message}`).join("; ");
}
