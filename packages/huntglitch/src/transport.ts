// =============================================================================
// DELIVERY TRANSPORT — POST one LogRecord to the Lighthouse API with retries
// =============================================================================
// Network failures, timeouts and 5xx responses are retried up to
// config.maxRetries more times with capped exponential backoff. 4xx responses
// and payloads that cannot be built are terminal. No buffering: every call
// finishes (or fails) within its own lifetime.

import {
	type DeliveryFailureReason,
	DeliveryError,
	type DeliveryOutcome,
	describeError,
	type HuntGlitchInternalLogger,
	type LighthousePayload,
	type LoggerConfig,
	type LogRecord,
	RETRYABLE_REASONS,
} from "@huntglitch/core";
import { createConsoleLogger } from "@huntglitch/core/logger";
import stringify from "safe-stable-stringify";

export const HUNTGLITCH_ENDPOINT = "https://lighthouse-api.huntglitch.com/api/v1/logs";

/** Largest request body the transport will send, in UTF-8 bytes. */
export const MAX_PAYLOAD_BYTES = 512 * 1024;

export const SDK_NAME = "huntglitch-node";
export const SDK_VERSION = "1.0.0";

const serialize = stringify.configure({ bigint: true, circularValue: "[Circular]" });

export interface TransportOptions {
	/** Custom fetch implementation (default: globalThis.fetch) */
	fetch?: typeof globalThis.fetch;
	/** Diagnostics sink (default: console logger at "warn") */
	logger?: HuntGlitchInternalLogger;
	/** Backoff sleep. Tests replace it to avoid real waits. */
	sleep?: (ms: number) => Promise<void>;
}

type AttemptResult =
	| { ok: true; status: number }
	| {
			ok: false;
			reason: DeliveryFailureReason;
			message: string;
			status?: number;
			cause?: unknown;
	  };

/** A failed attempt, or a record that never got as far as an attempt. */
export type DeliveryFailure = Extract<AttemptResult, { ok: false }>;

const defaultSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

export function toPayload(config: LoggerConfig, record: LogRecord): LighthousePayload {
	return {
		project_key: config.projectKey,
		deliverable_key: config.deliverableKey,
		error_name: record.errorName,
		error_value: record.errorValue,
		source_file: record.sourceFile,
		source_line: record.sourceLine,
		severity: record.severity,
		additional_data: { ...record.additionalData },
		tags: { ...record.tags },
		timestamp: record.timestamp,
		...(record.stackTrace !== undefined ? { stack_trace: record.stackTrace } : {}),
	};
}

/** Delay before retry number `retry` (1-based). Non-decreasing, capped at maxDelayMs. */
export function backoffDelay(retry: number, backoff: LoggerConfig["backoff"]): number {
	return Math.min(backoff.baseDelayMs * 2 ** Math.max(0, retry - 1), backoff.maxDelayMs);
}

function encodeBody(payload: LighthousePayload): DeliveryFailure | string {
	let body: string | undefined;
	try {
		body = serialize(payload);
	} catch (err) {
		return {
			ok: false,
			reason: "serialization",
			message: `Could not serialize log record: ${describeError(err)}`,
			cause: err,
		};
	}
	if (body === undefined) {
		return { ok: false, reason: "serialization", message: "Log record serialized to nothing" };
	}

	const size = Buffer.byteLength(body, "utf8");
	if (size > MAX_PAYLOAD_BYTES) {
		return {
			ok: false,
			reason: "payload_too_large",
			message: `Log payload is ${size} bytes; the limit is ${MAX_PAYLOAD_BYTES}`,
		};
	}
	return body;
}

async function readErrorText(response: Response): Promise<string> {
	const text = await response.text().catch(() => "");
	return text.length > 200 ? `${text.slice(0, 200)}…` : text;
}

async function attemptDelivery(
	fetchFn: typeof globalThis.fetch,
	body: string,
	timeout: number,
): Promise<AttemptResult> {
	let response: Response;
	try {
		response = await fetchFn(HUNTGLITCH_ENDPOINT, {
			method: "POST",
			headers: {
				"Content-Type": "application/json",
				Accept: "application/json",
				"User-Agent": `${SDK_NAME}/${SDK_VERSION}`,
			},
			body,
			signal: AbortSignal.timeout(timeout),
		});
	} catch (err) {
		const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
		return {
			ok: false,
			reason: timedOut ? "timeout" : "network",
			message: timedOut ? `Request timed out after ${timeout}ms` : describeError(err),
			cause: err,
		};
	}

	if (response.ok) {
		// Drain the body so the connection can be reused.
		await response.text().catch(() => "");
		return { ok: true, status: response.status };
	}

	const detail = await readErrorText(response);
	const message = detail ? `HTTP ${response.status}: ${detail}` : `HTTP ${response.status}`;
	const reason: DeliveryFailureReason =
		response.status >= 500
			? "http_server_error"
			: response.status >= 400
				? "http_client_error"
				: "unexpected_status";
	return { ok: false, reason, message, status: response.status };
}

/**
 * Finish a delivery that failed: throw when `config.silentFailures` is false,
 * otherwise log at `warn` and return the outcome.
 */
export function failDelivery(
	config: LoggerConfig,
	errorName: string,
	failure: DeliveryFailure,
	attemptsMade: number,
	logger: HuntGlitchInternalLogger,
): DeliveryOutcome {
	const outcome: DeliveryOutcome = {
		delivered: false,
		attemptsMade,
		...(failure.status !== undefined ? { status: failure.status } : {}),
		lastError: failure.message,
	};

	if (!config.silentFailures) {
		throw new DeliveryError(`Failed to deliver log to HuntGlitch: ${failure.message}`, {
			outcome,
			reason: failure.reason,
			status: failure.status,
			transient: RETRYABLE_REASONS.has(failure.reason),
			cause: failure.cause,
		});
	}

	logger.warn("Failed to deliver log to HuntGlitch", {
		errorName,
		reason: failure.reason,
		attemptsMade,
		lastError: failure.message,
	});
	return outcome;
}

/**
 * Deliver one record.
 *
 * @returns the outcome; `delivered: false` only when `config.silentFailures` is set
 * @throws {DeliveryError} on final failure when `config.silentFailures` is false
 */
export async function deliver(
	config: LoggerConfig,
	record: LogRecord,
	options: TransportOptions = {},
): Promise<DeliveryOutcome> {
	const fetchFn = options.fetch ?? globalThis.fetch;
	const logger = options.logger ?? createConsoleLogger();
	const sleep = options.sleep ?? defaultSleep;

	// A record that cannot be encoded is one failed attempt that never reached the network.
	const body = encodeBody(toPayload(config, record));
	if (typeof body !== "string") {
		return failDelivery(config, record.errorName, body, 1, logger);
	}

	const totalAttempts = config.maxRetries + 1;
	for (let attempt = 1; attempt <= totalAttempts; attempt++) {
		const result = await attemptDelivery(fetchFn, body, config.timeout);

		if (result.ok) {
			logger.debug("Log delivered to HuntGlitch", { attempt, status: result.status });
			return { delivered: true, attemptsMade: attempt, status: result.status };
		}

		if (attempt === totalAttempts || !RETRYABLE_REASONS.has(result.reason)) {
			return failDelivery(config, record.errorName, result, attempt, logger);
		}

		const delayMs = backoffDelay(attempt, config.backoff);
		logger.debug("HuntGlitch delivery failed, retrying", {
			attempt,
			maxRetries: config.maxRetries,
			reason: result.reason,
			status: result.status,
			delayMs,
		});
		await sleep(delayMs);
	}

	// Unreachable — loop always returns or throws
	throw new Error("Unexpected: retry loop exited without result");
}
