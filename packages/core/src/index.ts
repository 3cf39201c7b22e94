// Errors
export {
	ConfigurationError,
	type DeliveryFailureReason,
	DeliveryError,
	describeError,
	HUNTGLITCH_ERROR_CODES,
	HuntGlitchError,
	type HuntGlitchErrorCode,
	RETRYABLE_REASONS,
	type RawErrorCode,
	UsageError,
} from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
