/**
 * Transactional sequencing over StringResults.
 *
 * Given a successful handle, run a bounded operation and then commit it when
 * the operation succeeded or roll it back when it failed. Only handles for
 * which `isTransactional` holds are committed or rolled back; others return
 * the operation's result untouched.
 *
 * Ownership is checked before the operation runs. A throw on an owned handle
 * (from the operation, commit or rollback) or from the ownership check itself
 * triggers one recovery rollback. A borrowed handle is never rolled back: its
 * throw is only translated. Either way the throw's message leads the returned
 * Failure, followed by any entries the operation's own Failure already held.
 */

import { type LogLevel, type Logger, createLogger } from "../lib/logger/index.js";
import {
	ERROR_CATEGORY,
	type ErrorDetail,
	type StringResult,
	entry,
	failureOf,
} from "../result/error-detail.js";
import { failure, flatMap } from "../result/result.js";
import { type ResultKitConfig, resolveConfig } from "../shared/config.js";
import { messageOf } from "../shared/errors.js";

export interface TransactionOptions {
	/** Receives commit, rollback and recovery events. Defaults to a logger at the configured level. */
	readonly logger?: Logger;
	/** Overrides for the environment-derived configuration. */
	readonly config?: Partial<ResultKitConfig>;
}

type Settlement = "commit" | "rollback";

const defaultLoggers = new Map<LogLevel, Logger>();

function defaultLogger(level: LogLevel): Logger {
	let logger = defaultLoggers.get(level);
	if (logger === undefined) {
		logger = createLogger({ level });
		defaultLoggers.set(level, logger);
	}
	return logger;
}

/**
 * Run `boundedOp` inside the transaction owned by the handle in `handleResult`.
 *
 * @returns the bounded operation's result when it settles cleanly, a commit or
 *   rollback Failure when settling fails, or a recovery Failure after a throw
 */
export function transaction<H, S>(
	handleResult: StringResult<H>,
	isTransactional: (handle: H) => boolean,
	boundedOp: () => StringResult<S>,
	commit: (handle: H) => StringResult<boolean>,
	rollback: (handle: H) => StringResult<boolean>,
	options: TransactionOptions = {},
): StringResult<S> {
	if (!handleResult.ok) return handleResult;

	const handle = handleResult.value;
	const config = resolveConfig(options.config);
	const logger = (options.logger ?? defaultLogger(config.logLevel)).child({
		component: "transaction",
	});

	let owner: boolean | undefined;
	let outcome: StringResult<S> | undefined;
	try {
		owner = isTransactional(handle);
		const result = boundedOp();
		outcome = result;
		if (!owner) {
			return result;
		}
		const settlement: Settlement = result.ok ? "commit" : "rollback";
		logger.debug({ settlement }, `attempting to ${settlement} the transaction`);
		const settle = result.ok ? commit : rollback;
		return flatMap(settle(handle), () => result);
	} catch (thrown) {
		const settlement: Settlement = outcome?.ok === true ? "commit" : "rollback";
		const message = messageOf(thrown, config.missingMessage);
		if (owner === false) {
			logger.warn({ cause: message }, "exception in borrowed transaction; leaving it to its owner");
			return failure(recoveryDetail(message, outcome));
		}
		logger.warn({ settlement, cause: message }, "exception during transaction; rolling back");
		try {
			return flatMap<boolean, S, ErrorDetail>(rollback(handle), () =>
				failure(recoveryDetail(message, outcome)),
			);
		} catch (again) {
			const secondMessage = messageOf(again, config.missingMessage);
			logger.error({ settlement, cause: message, rollbackCause: secondMessage }, "recovery rollback failed");
			return failureOf(
				`Exception thrown when attempting to ${settlement} the transaction, ` +
					`and then again on the final rollback: ${secondMessage}`,
			);
		}
	}
}

function recoveryDetail<S>(message: string, outcome: StringResult<S> | undefined): ErrorDetail {
	const existing = outcome !== undefined && !outcome.ok ? outcome.error : [];
	return [entry(ERROR_CATEGORY, message), ...existing];
}
