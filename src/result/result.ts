/**
 * Result<S, F>: success-biased outcome of an operation that may fail.
 *
 * A Result is exactly one of:
 * - Success: holds a produced value, optionally with a failure producer
 *   that keeps later safe combinators able to convert thrown values.
 * - Failure: holds a failure descriptor.
 *
 * Combinators here are the unsafe family: anything thrown by a caller's
 * function propagates unchanged. The safe family lives in `./safe.ts`.
 *
 * @example
 * ```ts
 * const shout = getOrElse(map(success("yay!"), (s) => s.toUpperCase()), () => "boo");
 * // "YAY!"
 * ```
 */

import { isDeepStrictEqual, inspect } from "node:util";
import { FailureError } from "../shared/errors.js";
import { formatDetail, isErrorDetail } from "./error-detail.js";

/** Converts a thrown value into a typed failure. */
export type FailureProducer<F> = (thrown: unknown) => F;

/** Success variant: carries the value and, optionally, the producer of the safety chain. */
export interface Success<S, F> {
	readonly ok: true;
	readonly value: S;
	readonly producer?: FailureProducer<F>;
}

/** Failure variant: carries the failure descriptor. */
export interface Failure<F> {
	readonly ok: false;
	readonly error: F;
}

/** Discriminated union for fallible operations. */
export type Result<S, F> = Success<S, F> | Failure<F>;

// ── Factories ────────────────────────────────────────────────────────

/** Create a Success, attaching `producer` when given. */
export function success<S, F = never>(value: S, producer?: FailureProducer<F>): Success<S, F> {
	return producer === undefined ? { ok: true, value } : { ok: true, value, producer };
}

/** Create a Failure wrapping the given error. */
export function failure<F>(error: F): Failure<F> {
	return { ok: false, error };
}

// ── Predicates ───────────────────────────────────────────────────────

/** Type guard: narrows a Result to its success variant. */
export function isSuccess<S, F>(result: Result<S, F>): result is Success<S, F> {
	return result.ok;
}

/** Type guard: narrows a Result to its failure variant. */
export function isFailure<S, F>(result: Result<S, F>): result is Failure<F> {
	return !result.ok;
}

/** The producer attached to a Success, if any. Failures never carry one. */
export function producerOf<S, F>(result: Result<S, F>): FailureProducer<F> | undefined {
	return result.ok ? result.producer : undefined;
}

// ── Combinators ──────────────────────────────────────────────────────

/** Apply the function matching the variant and return its value directly. */
export function fold<S, F, C>(
	result: Result<S, F>,
	onSuccess: (value: S) => C,
	onFailure: (error: F) => C,
): C {
	return result.ok ? onSuccess(result.value) : onFailure(result.error);
}

/**
 * Exchange the two sides. The returned Success carries no producer unless
 * one typed for the new failure side is supplied.
 */
export function swap<S, F>(result: Result<S, F>, producer?: FailureProducer<S>): Result<F, S> {
	return result.ok ? failure(result.value) : success(result.error, producer);
}

/** Run `effect` on the success value for its side effects. */
export function foreach<S, F>(result: Result<S, F>, effect: (value: S) => unknown): void {
	if (result.ok) effect(result.value);
}

/** The success value, or `fallback()` on failure. */
export function getOrElse<S, F>(result: Result<S, F>, fallback: () => S): S {
	return result.ok ? result.value : fallback();
}

/** This result on success, or `alternative()` on failure. */
export function orElse<S, F>(result: Result<S, F>, alternative: () => Result<S, F>): Result<S, F> {
	return result.ok ? result : alternative();
}

/** True iff the result is a Success holding a value structurally equal to `candidate`. */
export function contains<S, F>(result: Result<S, F>, candidate: S): boolean {
	return result.ok && isDeepStrictEqual(result.value, candidate);
}

/** Vacuously true on failure; otherwise the predicate applied to the value. */
export function forall<S, F>(result: Result<S, F>, predicate: (value: S) => boolean): boolean {
	return result.ok ? predicate(result.value) : true;
}

/** False on failure; otherwise the predicate applied to the value. */
export function exists<S, F>(result: Result<S, F>, predicate: (value: S) => boolean): boolean {
	return result.ok && predicate(result.value);
}

/** Chain a fallible operation on the success value; short-circuits on failure. */
export function flatMap<S, S1, F>(
	result: Result<S, F>,
	fn: (value: S) => Result<S1, F>,
): Result<S1, F> {
	return result.ok ? fn(result.value) : result;
}

/** Unwrap one level of nesting. Only nested results are accepted. */
export function flatten<S, F>(result: Result<Result<S, F>, F>): Result<S, F> {
	return result.ok ? result.value : result;
}

/** Transform the success value; the attached producer follows the new Success. */
export function map<S, S1, F>(result: Result<S, F>, fn: (value: S) => S1): Result<S1, F> {
	return result.ok ? success(fn(result.value), result.producer) : result;
}

// ── Conversions ──────────────────────────────────────────────────────

/** The success value, or `undefined` on failure or when the value is absent. */
export function toOptional<S, F>(result: Result<S, F>): NonNullable<S> | undefined {
	if (!result.ok) return undefined;
	const value = result.value;
	if (value === undefined || value === null) return undefined;
	return value;
}

/**
 * Convert to the platform's settled-outcome shape. A Failure becomes a
 * rejection whose reason is a FailureError built from the failure's string
 * form; an ErrorDetail reads as `"error: first; warning: w"`.
 */
export function toStandardResult<S, F>(
	result: Result<S, F>,
	describe: (error: F) => string = describeValue,
): PromiseSettledResult<S> {
	if (result.ok) return { status: "fulfilled", value: result.value };
	return { status: "rejected", reason: new FailureError(describe(result.error), result.error) };
}

// ── Structural equality and display ──────────────────────────────────

/** Variant and held value/error compared deeply; attached producers are ignored. */
export function equals<S, F>(a: Result<S, F>, b: Result<S, F>): boolean {
	if (a.ok && b.ok) return isDeepStrictEqual(a.value, b.value);
	if (!a.ok && !b.ok) return isDeepStrictEqual(a.error, b.error);
	return false;
}

/** `Success(value=…)` or `Failure(error=…)`. */
export function formatResult<S, F>(result: Result<S, F>): string {
	return result.ok
		? `Success(value=${describeValue(result.value)})`
		: `Failure(error=${describeValue(result.error)})`;
}

/** String form used in failure messages: ErrorDetail entries are joined, Errors give their message. */
export function describeValue(value: unknown): string {
	if (typeof value === "string") return value;
	if (isErrorDetail(value) && value.length > 0) return formatDetail(value);
	if (value instanceof Error) return value.message;
	return inspect(value, { depth: 4, breakLength: Number.POSITIVE_INFINITY });
}
