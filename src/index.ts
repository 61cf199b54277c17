// ── Result ───────────────────────────────────────────────────────────
export * from "./result/index.js";

// ── Transaction ──────────────────────────────────────────────────────
export { type TransactionOptions, transaction } from "./transaction/index.js";

// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
export {
	type ValidationIssue,
	ValidationError,
	validate,
	validateDetail,
	z,
} from "./lib/validation/index.js";
