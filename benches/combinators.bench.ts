import { bench, describe } from "vitest";
import { type StringResult, add, failureOf, successOf } from "../src/result/error-detail.js";
import { type Result, flatMap, getOrElse, map, success } from "../src/result/result.js";
import { safeFlatMap, safeMap } from "../src/result/safe.js";
import { transaction } from "../src/transaction/transaction.js";

const steps = Array.from({ length: 100 }, (_, i) => i);

describe("combinator chains", () => {
	bench("unsafe map x100", () => {
		let r: Result<number, string> = success(0);
		for (const i of steps) r = map(r, (n) => n + i);
		getOrElse(r, () => -1);
	});

	bench("safe map x100", () => {
		let r: StringResult<number> = successOf(0);
		for (const i of steps) r = safeMap(r, (n) => n + i);
		getOrElse(r, () => -1);
	});

	bench("unsafe flatMap x100", () => {
		let r: Result<number, string> = success(0);
		for (const i of steps) r = flatMap(r, (n) => success(n + i));
		getOrElse(r, () => -1);
	});

	bench("safe flatMap x100", () => {
		let r: StringResult<number> = successOf(0);
		for (const i of steps) r = safeFlatMap(r, (n) => successOf(n + i));
		getOrElse(r, () => -1);
	});
});

describe("error accumulation", () => {
	bench("add 50 annotations", () => {
		let f = failureOf("root");
		for (let i = 0; i < 50; i++) f = add(f, "info", `note ${i}`);
	});
});

describe("transaction", () => {
	bench("commit path", () => {
		transaction(
			successOf("handle"),
			() => true,
			() => successOf(1),
			() => success(true),
			() => success(true),
		);
	});
});
