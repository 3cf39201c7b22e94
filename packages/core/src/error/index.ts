import type { DeliveryOutcome } from "../types/record.js";
import {
	type DeliveryFailureReason,
	HUNTGLITCH_ERROR_CODES,
	type HuntGlitchErrorCode,
} from "./codes.js";

export {
	type DeliveryFailureReason,
	HUNTGLITCH_ERROR_CODES,
	type HuntGlitchErrorCode,
	RETRYABLE_REASONS,
	type RawErrorCode,
} from "./codes.js";

export class HuntGlitchError extends Error {
	readonly code: HuntGlitchErrorCode;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether this error is transient — the same call may succeed later.
	 *
	 * Configuration and usage errors are never transient. Delivery errors are
	 * transient unless the endpoint rejected the request (4xx) or the payload
	 * could not be built.
	 */
	readonly transient: boolean;

	constructor(
		code: HuntGlitchErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			transient?: boolean;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.transient = options?.transient ?? HUNTGLITCH_ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "HuntGlitchError";
	}
}

/** A required identifier is missing or a tuning value is invalid. Never silenced. */
export class ConfigurationError extends HuntGlitchError {
	constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
		super("CONFIGURATION_ERROR", message, { ...options, transient: false });
		this.name = "ConfigurationError";
	}

	static missingKeys(keys: string[]): ConfigurationError {
		return new ConfigurationError(
			`Missing required HuntGlitch configuration: ${keys.join(", ")}. ` +
				"Pass it explicitly or set the matching environment variable.",
			{ details: { missing: keys } },
		);
	}
}

/** The API was called in a way it cannot serve, e.g. capturing without an error. */
export class UsageError extends HuntGlitchError {
	constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
		super("USAGE_ERROR", message, { ...options, transient: false });
		this.name = "UsageError";
	}
}

/** Delivery failed after the retry budget was spent, or on a terminal failure. */
export class DeliveryError extends HuntGlitchError {
	readonly outcome: DeliveryOutcome;
	readonly reason: DeliveryFailureReason;
	readonly status?: number;

	constructor(
		message: string,
		params: {
			outcome: DeliveryOutcome;
			reason: DeliveryFailureReason;
			status?: number;
			transient: boolean;
			cause?: unknown;
		},
	) {
		super("DELIVERY_FAILED", message, {
			cause: params.cause,
			transient: params.transient,
			details: {
				reason: params.reason,
				attemptsMade: params.outcome.attemptsMade,
				...(params.status !== undefined ? { status: params.status } : {}),
			},
		});
		this.name = "DeliveryError";
		this.outcome = params.outcome;
		this.reason = params.reason;
		this.status = params.status;
	}
}

/** Normalize anything thrown into a readable one-line description. */
export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message ? `${error.name}: ${error.message}` : error.name;
	}
	return String(error);
}
