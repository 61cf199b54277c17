export {
	ErrorCategory,
	ResultKitError,
	FailureError,
	ConfigError,
	messageOf,
	isFailureError,
	isConfigError,
} from "./errors.js";

export {
	type ResultKitConfig,
	DEFAULT_CONFIG,
	configFromEnv,
	resolveConfig,
	resolveMissingMessage,
} from "./config.js";
