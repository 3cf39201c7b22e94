// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every error code the SDK raises, with a default message and
// whether retrying the same call may succeed.

export type RawErrorCode = {
	message: string;
	/**
	 * Whether this error is transient (retrying may succeed).
	 *
	 * - `true`: Network hiccup or server-side failure — a later call may go through.
	 * - `false` (default): Misconfiguration or misuse — retrying will always fail.
	 */
	transient?: boolean;
};

export const HUNTGLITCH_ERROR_CODES = {
	// Deterministic — fix the caller or the configuration.
	CONFIGURATION_ERROR: { message: "HuntGlitch logger is not configured", transient: false },
	USAGE_ERROR: { message: "HuntGlitch API used incorrectly", transient: false },

	// Delivery — transient unless the endpoint rejected the payload outright.
	DELIVERY_FAILED: { message: "Failed to deliver log to HuntGlitch", transient: true },
} as const satisfies Record<string, RawErrorCode>;

export type HuntGlitchErrorCode = keyof typeof HUNTGLITCH_ERROR_CODES;

/** Why a delivery attempt failed. Recorded on `DeliveryError.details.reason`. */
export type DeliveryFailureReason =
	| "network"
	| "timeout"
	| "http_client_error"
	| "http_server_error"
	| "unexpected_status"
	| "serialization"
	| "payload_too_large";

/** Reasons that are worth another attempt. */
export const RETRYABLE_REASONS: ReadonlySet<DeliveryFailureReason> = new Set([
	"network",
	"timeout",
	"http_server_error",
]);
