/**
 * Library configuration.
 *
 * Defaults keep the library quiet: the transaction logger is silent unless
 * RESULT_KIT_LOG_LEVEL asks for output.
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { validate } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface ResultKitConfig {
	/** Level for the logger the transaction helper creates when none is supplied */
	readonly logLevel: LogLevel;
	/** Message used when a thrown value carries no message of its own */
	readonly missingMessage: string;
}

export const DEFAULT_CONFIG: ResultKitConfig = {
	logLevel: "silent",
	missingMessage: "[no message]",
};

/** Mutable builder shape for constructing Partial<ResultKitConfig>. */
interface MutableResultKitConfig {
	logLevel?: LogLevel;
	missingMessage?: string;
}

const logLevelSchema = z.enum(LOG_LEVELS);

/**
 * Reads config values from environment variables.
 * Supported: RESULT_KIT_LOG_LEVEL, RESULT_KIT_MISSING_MESSAGE.
 * @throws ConfigError if RESULT_KIT_LOG_LEVEL is not a known level
 */
export function configFromEnv(): Partial<ResultKitConfig> {
	const result: MutableResultKitConfig = {};

	const rawLevel = process.env["RESULT_KIT_LOG_LEVEL"];
	if (rawLevel) {
		const level = validate(logLevelSchema, rawLevel.trim().toLowerCase());
		if (!level.ok) {
			throw new ConfigError(
				`Invalid RESULT_KIT_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
				{ cause: level.error },
			);
		}
		result.logLevel = level.value;
	}

	const missingMessage = process.env["RESULT_KIT_MISSING_MESSAGE"];
	if (missingMessage) {
		result.missingMessage = missingMessage;
	}

	return result;
}

/** Defaults overlaid with whatever the environment sets. */
export function resolveConfig(overrides: Partial<ResultKitConfig> = {}): ResultKitConfig {
	return { ...DEFAULT_CONFIG, ...configFromEnv(), ...overrides };
}

/**
 * The placeholder for thrown values without a message. Unlike `configFromEnv`
 * this never throws: it runs inside the safe combinators' exception boundary.
 */
export function resolveMissingMessage(): string {
	return process.env["RESULT_KIT_MISSING_MESSAGE"] || DEFAULT_CONFIG.missingMessage;
}
