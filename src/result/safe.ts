/**
 * Safe combinators: the exception-boundary counterparts of `./result.ts`.
 *
 * Each function takes an optional failure producer. When none is passed the
 * Success's attached producer is used; with neither, no boundary is requested
 * and the call behaves like its unsafe twin, wrapped in a Success.
 *
 * `safeMap` is the exception: on a StringResult it falls back to the
 * ErrorDetail producer, so it always guards.
 *
 * With a producer in hand nothing escapes: a throw from the caller's function
 * becomes `Failure(producer(thrown))`, and a Success produced here carries the
 * producer on so the next safe call stays guarded.
 */

import { type ErrorDetail, type StringResult, detailFromThrown } from "./error-detail.js";
import {
	type FailureProducer,
	type Result,
	exists,
	failure,
	flatMap,
	fold,
	forall,
	foreach,
	producerOf,
	success,
} from "./result.js";

function guarded<T, F>(
	producer: FailureProducer<F> | undefined,
	run: () => Result<T, F>,
): Result<T, F> {
	if (producer === undefined) return run();
	try {
		return run();
	} catch (thrown) {
		return failure(producer(thrown));
	}
}

/** Fold inside an exception boundary; the folded value is returned as a Success. */
export function safeFold<S, F, C>(
	result: Result<S, F>,
	onSuccess: (value: S) => C,
	onFailure: (error: F) => C,
	producer?: FailureProducer<F>,
): Result<C, F> {
	const resolved = producer ?? producerOf(result);
	return guarded(resolved, () => success(fold(result, onSuccess, onFailure), resolved));
}

/** Run `effect` on a Success; a throw becomes a Failure. Failures pass through. */
export function safeForeach<S, F>(
	result: Result<S, F>,
	effect: (value: S) => unknown,
	producer?: FailureProducer<F>,
): Result<void, F> {
	if (!result.ok) return result;
	const resolved = producer ?? result.producer;
	return guarded(resolved, () => {
		foreach(result, effect);
		return success<void, F>(undefined, resolved);
	});
}

/** `forall` whose predicate may throw. */
export function safeForall<S, F>(
	result: Result<S, F>,
	predicate: (value: S) => boolean,
	producer?: FailureProducer<F>,
): Result<boolean, F> {
	const resolved = producer ?? producerOf(result);
	return guarded(resolved, () => success(forall(result, predicate), resolved));
}

/** `exists` whose predicate may throw. */
export function safeExists<S, F>(
	result: Result<S, F>,
	predicate: (value: S) => boolean,
	producer?: FailureProducer<F>,
): Result<boolean, F> {
	const resolved = producer ?? producerOf(result);
	return guarded(resolved, () => success(exists(result, predicate), resolved));
}

/**
 * `flatMap` inside an exception boundary. A Success returned by `fn` without
 * a producer of its own is rewrapped with the resolved one.
 */
export function safeFlatMap<S, S1, F>(
	result: Result<S, F>,
	fn: (value: S) => Result<S1, F>,
	producer?: FailureProducer<F>,
): Result<S1, F> {
	const resolved = producer ?? producerOf(result);
	return guarded(resolved, () => {
		const next = flatMap(result, fn);
		if (next.ok && next.producer === undefined && resolved !== undefined) {
			return success(next.value, resolved);
		}
		return next;
	});
}

/**
 * `map` inside an exception boundary.
 *
 * A StringResult is always guarded: without an explicit or attached producer
 * a throw becomes a single "error" entry. Other failure types need a producer.
 */
export function safeMap<S, S1>(
	result: StringResult<S>,
	fn: (value: S) => S1,
	producer?: FailureProducer<ErrorDetail>,
): StringResult<S1>;
export function safeMap<S, S1, F>(
	result: Result<S, F>,
	fn: (value: S) => S1,
	producer: FailureProducer<F>,
): Result<S1, F>;
export function safeMap<S>(
	result: Result<S, unknown>,
	fn: (value: S) => unknown,
	producer?: FailureProducer<unknown>,
): Result<unknown, unknown> {
	const resolved = producer ?? producerOf(result) ?? detailFromThrown;
	return guarded(resolved, () => (result.ok ? success(fn(result.value), resolved) : result));
}

// ── Fallible-call helpers ────────────────────────────────────────────

/** Call `fn`, capturing its value in a Success or its throw in a Failure. */
export function safeCall<S, F>(fn: () => S, producer: FailureProducer<F>): Result<S, F> {
	return guarded(producer, () => success(fn(), producer));
}

/** Call a Result-returning `fn`, converting a throw into a Failure. */
export function safeResultFn<S, F>(fn: () => Result<S, F>, producer: FailureProducer<F>): Result<S, F> {
	return guarded(producer, fn);
}
