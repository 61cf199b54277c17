import { describe, expect, it } from "vitest";
import {
	type ErrorDetail,
	detailFromThrown,
	emptyErrorDetail,
	errorDetailWith,
	failureOf,
	successOf,
} from "./error-detail.js";
import { projection } from "./projection.js";
import { type FailureProducer, equals, failure, getOrElse, producerOf, success, swap } from "./result.js";
import {
	safeCall,
	safeExists,
	safeFlatMap,
	safeFold,
	safeForall,
	safeForeach,
	safeMap,
	safeResultFn,
} from "./safe.js";

const messageProducer: FailureProducer<string> = (e) => (e instanceof Error ? e.message : "boo!");

function explode(message: string): never {
	throw new Error(message);
}

describe("safe combinators", () => {
	describe("safeFold", () => {
		it("wraps the folded value in a success", () => {
			const r = safeFold(
				successOf("yay!"),
				(s) => s.toUpperCase(),
				() => "boo!",
			);
			expect(getOrElse(r, () => "BOO!")).toBe("YAY!");
		});

		it("folds a failure into a success of the folded value", () => {
			const r = safeFold(
				failureOf("BOO"),
				(s: string) => s,
				(detail) => detail[0]?.message.toLowerCase() ?? "",
				detailFromThrown,
			);
			expect(getOrElse(r, () => "damn!")).toBe("boo");
		});

		it("converts a throw using an explicit producer", () => {
			const r = safeFold(
				successOf("yay!"),
				() => explode("oops!"),
				() => "damn!",
				(e) => errorDetailWith(e instanceof Error ? e.message : ""),
			);
			expect(r).toEqual(failure(errorDetailWith("oops!")));
		});

		it("converts a throw using the attached producer", () => {
			const r = safeFold(
				success("yay!", messageProducer),
				() => explode("oops!"),
				() => "damn!",
			);
			expect(r).toEqual(failure("oops!"));
		});

		it("keeps the producer on the folded success", () => {
			const r = safeFold(success("yay!", messageProducer), (s) => s.length, () => 0);
			expect(producerOf(r)).toBe(messageProducer);
		});

		it("degrades to an unguarded success when no producer is available", () => {
			const r = safeFold(
				success<string, string>("yay!"),
				(s) => s.toUpperCase(),
				() => "boo!",
			);
			expect(r).toEqual(success("YAY!"));
		});

		it("lets the throw propagate when no producer is available", () => {
			expect(() =>
				safeFold(
					success<string, string>("yay!"),
					() => explode("unguarded"),
					() => "boo!",
				),
			).toThrow("unguarded");
		});
	});

	describe("safeForeach", () => {
		it("behaves like foreach when the effect succeeds", () => {
			let holder = 0;
			const r = safeForeach(successOf(314), (value) => {
				holder = value * 2;
			});
			expect(holder).toBe(628);
			expect(r.ok).toBe(true);
		});

		it("returns a failure when the effect throws", () => {
			const r = safeForeach(successOf(314), () => explode("safety is our top priority"));
			expect(r).toEqual(failure(errorDetailWith("safety is our top priority")));
		});

		it("passes a failure through without running the effect", () => {
			const f = failureOf("already failed");
			let calls = 0;
			const r = safeForeach(f, () => {
				calls += 1;
			});
			expect(r).toBe(f);
			expect(calls).toBe(0);
		});
	});

	describe("safeForall / safeExists", () => {
		it("safeForall wraps the predicate's answer", () => {
			expect(getOrElse(safeForall(successOf("george"), (n) => n === "george"), () => false)).toBe(true);
			expect(getOrElse(safeForall(successOf("george"), (n) => n === "jenny"), () => true)).toBe(false);
		});

		it("safeForall returns a failure when the predicate throws", () => {
			const r = safeForall(successOf("george"), () => explode("no one"));
			expect(r).toEqual(failure(errorDetailWith("no one")));
		});

		it("safeExists wraps the predicate's answer", () => {
			expect(getOrElse(safeExists(successOf("george"), (n) => n === "george"), () => false)).toBe(true);
			expect(getOrElse(safeExists(successOf("george"), (n) => n === "jenny"), () => true)).toBe(false);
		});

		it("safeExists returns a failure when the predicate throws", () => {
			const r = safeExists(successOf("george"), () => explode("oops!"));
			expect(r).toEqual(failure(errorDetailWith("oops!")));
		});
	});

	describe("safeFlatMap", () => {
		it("returns a failure when the function throws", () => {
			const r = safeFlatMap(successOf({ name: "baby", age: 2 }), () => explode("badly"));
			expect(r).toEqual(failure(errorDetailWith("badly")));
		});

		it("rewraps an inner success with the resolved producer", () => {
			const r = safeFlatMap(success(2, messageProducer), (n) => success(n + 1));
			expect(r.ok).toBe(true);
			expect(producerOf(r)).toBe(messageProducer);
			expect(equals(r, success(3))).toBe(true);
		});

		it("returns an inner failure unchanged", () => {
			const inner = failure("inner");
			expect(safeFlatMap(success(2, messageProducer), () => inner)).toBe(inner);
		});

		it("short-circuits on a failure", () => {
			const f = failureOf("not a baby");
			expect(safeFlatMap(f, () => successOf(1))).toBe(f);
		});
	});

	describe("safeMap", () => {
		it("maps a success", () => {
			expect(getOrElse(safeMap(successOf("yay!"), (s) => s.toUpperCase()), () => "boo")).toBe("YAY!");
		});

		it("returns the error detail when the function throws", () => {
			const r = safeMap(successOf("yay!"), () => explode("boo"));
			expect(projection(r).getOrElse(emptyErrorDetail)).toEqual([{ category: "error", message: "boo" }]);
		});

		it("keeps the chain safe across several steps", () => {
			const r = safeMap(
				safeMap(successOf(10), (n) => n * 2),
				(n): number => (n > 5 ? explode(`too big: ${n}`) : n),
			);
			expect(r).toEqual(failure(errorDetailWith("too big: 20")));
		});

		it("uses the missing-message placeholder for empty messages", () => {
			const r = safeMap(successOf(1), () => explode(""));
			expect(r).toEqual(failure(errorDetailWith("[no message]")));
		});

		it("guards a StringResult that carries no producer", () => {
			const plain = success<string, ErrorDetail>("yay");
			expect(safeMap(plain, () => explode("boo"))).toEqual(failureOf("boo"));
		});

		it("guards a StringResult that lost its producer through swap", () => {
			const swapped = swap(swap(successOf("x")));
			expect(producerOf(swapped)).toBeUndefined();
			expect(safeMap(swapped, () => explode("swapped"))).toEqual(failureOf("swapped"));
		});

		it("uses an explicit producer for other failure types", () => {
			const reguarded = swap(failure<ErrorDetail>(errorDetailWith("x")), messageProducer);
			expect(safeMap(reguarded, () => explode("guarded"), messageProducer)).toEqual(failure("guarded"));
		});
	});

	describe("safety after swap", () => {
		it("safeFlatMap loses safety unless a new producer is supplied", () => {
			const swapped = swap(swap(successOf("x")));
			expect(() => safeFlatMap(swapped, () => explode("unguarded"))).toThrow("unguarded");

			const reguarded = swap(failure<ErrorDetail>(errorDetailWith("x")), messageProducer);
			expect(safeFlatMap(reguarded, () => explode("guarded"))).toEqual(failure("guarded"));
		});
	});

	describe("safeCall / safeResultFn", () => {
		it("safeCall captures the value", () => {
			const r = safeCall(() => 42, detailFromThrown);
			expect(r.ok).toBe(true);
			expect(producerOf(r)).toBe(detailFromThrown);
		});

		it("safeCall captures a throw", () => {
			expect(safeCall(() => explode("nope"), detailFromThrown)).toEqual(failure(errorDetailWith("nope")));
		});

		it("safeCall converts non-Error throws", () => {
			const r = safeCall(() => {
				throw "string thrown";
			}, detailFromThrown);
			expect(r).toEqual(failure(errorDetailWith("string thrown")));
		});

		it("safeResultFn returns the function's result unchanged", () => {
			const inner = failureOf("inner");
			expect(safeResultFn(() => inner, detailFromThrown)).toBe(inner);
		});

		it("safeResultFn captures a throw", () => {
			expect(safeResultFn(() => explode("kaput"), messageProducer)).toEqual(failure("kaput"));
		});
	});
});
