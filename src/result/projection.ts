/**
 * FailureProjection: a failure-biased view over a Result.
 *
 * Mirrors the success-biased combinators: operations act on the failure and
 * leave a Success untouched (retyped where the failure type changes).
 */

import { isDeepStrictEqual } from "node:util";
import { FailureError } from "../shared/errors.js";
import { type Result, describeValue, failure, success } from "./result.js";

export class FailureProjection<S, F> {
	readonly result: Result<S, F>;

	constructor(result: Result<S, F>) {
		this.result = result;
	}

	/** Run `effect` on the failure for its side effects. */
	foreach(effect: (error: F) => unknown): void {
		if (!this.result.ok) effect(this.result.error);
	}

	getOrElse(fallback: () => F): F {
		return this.result.ok ? fallback() : this.result.error;
	}

	/** The underlying Result if it is a Failure, otherwise `alternative()`. */
	orElse(alternative: () => Result<S, F>): Result<S, F> {
		return this.result.ok ? alternative() : this.result;
	}

	contains(candidate: F): boolean {
		return !this.result.ok && isDeepStrictEqual(this.result.error, candidate);
	}

	/** Vacuously true on a Success. */
	forall(predicate: (error: F) => boolean): boolean {
		return this.result.ok ? true : predicate(this.result.error);
	}

	exists(predicate: (error: F) => boolean): boolean {
		return !this.result.ok && predicate(this.result.error);
	}

	/** Feed the failure to `fn`. A Success passes through without its producer. */
	flatMap<F1>(fn: (error: F) => Result<S, F1>): Result<S, F1> {
		return this.result.ok ? success(this.result.value) : fn(this.result.error);
	}

	/** Transform the failure. A Success passes through without its producer. */
	map<F1>(fn: (error: F) => F1): Result<S, F1> {
		return this.result.ok ? success(this.result.value) : failure(fn(this.result.error));
	}

	/** The failure, or `undefined` on a Success or when the failure is absent. */
	toOptional(): NonNullable<F> | undefined {
		if (this.result.ok) return undefined;
		const error = this.result.error;
		if (error === undefined || error === null) return undefined;
		return error;
	}

	/** A Failure becomes the fulfilled side; a Success becomes a rejection. */
	toStandardResult(describe: (value: S) => string = describeValue): PromiseSettledResult<F> {
		if (this.result.ok) {
			return {
				status: "rejected",
				reason: new FailureError(describe(this.result.value), this.result.value),
			};
		}
		return { status: "fulfilled", value: this.result.error };
	}
}

/** Wrap a Result for failure-biased operations. */
export function projection<S, F>(result: Result<S, F>): FailureProjection<S, F> {
	return new FailureProjection(result);
}
