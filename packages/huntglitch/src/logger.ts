// =============================================================================
// HUNTGLITCH LOGGER — Configured entry point for sending events and errors
// =============================================================================

import {
	type CaptureOptions,
	type ConfigSource,
	type DeliveryOutcome,
	type HuntGlitchInternalLogger,
	type HuntGlitchOptions,
	type LogEvent,
	describeError,
	type LoggerConfig,
	type LogRecord,
	UsageError,
} from "@huntglitch/core";
import { createConsoleLogger } from "@huntglitch/core/logger";
import { envConfigSource, resolveConfig } from "./config.js";
import { buildRecord, buildRecordFromError, NON_ERROR_NAME } from "./record.js";
import { deliver, failDelivery, type TransportOptions } from "./transport.js";

export interface HuntGlitchLoggerOptions extends HuntGlitchOptions, TransportOptions {
	/** Where to read keys that are not passed explicitly (default: process.env) */
	configSource?: ConfigSource;
}

export interface HuntGlitchLogger {
	/** Resolved, frozen configuration */
	readonly config: LoggerConfig;

	/** Send an explicit event. Resolves to whether it was delivered. */
	sendLog(event: LogEvent): Promise<boolean>;

	/**
	 * Report a caught error. The error must be passed in; there is no implicit
	 * "current exception". Resolves to whether it was delivered.
	 */
	captureException(error: unknown, options?: CaptureOptions): Promise<boolean>;

	/** Deliver a prebuilt record and return the full outcome. */
	report(record: LogRecord): Promise<DeliveryOutcome>;

	/** The diagnostics sink this logger writes to */
	readonly diagnostics: HuntGlitchInternalLogger;
}

/**
 * Create a HuntGlitch logger. Configuration is resolved immediately, so a
 * missing project or deliverable key fails here rather than on first use.
 *
 * @example
 * ```ts
 * import { createHuntGlitchLogger } from "huntglitch";
 *
 * const huntglitch = createHuntGlitchLogger({ silentFailures: true });
 *
 * try {
 *   await chargeCard(order);
 * } catch (err) {
 *   await huntglitch.captureException(err, { additionalData: { orderId: order.id } });
 * }
 * ```
 *
 * @throws {ConfigurationError} when a required key is missing or a tuning value is invalid
 */
export function createHuntGlitchLogger(options: HuntGlitchLoggerOptions = {}): HuntGlitchLogger {
	const config = resolveConfig(options, options.configSource ?? envConfigSource());
	const diagnostics = options.logger ?? createConsoleLogger();
	const transport: TransportOptions = {
		fetch: options.fetch,
		sleep: options.sleep,
		logger: diagnostics,
	};

	async function report(record: LogRecord): Promise<DeliveryOutcome> {
		return deliver(config, record, transport);
	}

	/**
	 * Build, then deliver. Caller data that throws while being normalized (a
	 * throwing `toJSON` or getter) is a serialization failure and follows
	 * `silentFailures` like any other.
	 */
	async function buildAndReport(build: () => LogRecord, errorName: string): Promise<boolean> {
		let record: LogRecord;
		try {
			record = build();
		} catch (err) {
			if (err instanceof UsageError) throw err;
			const outcome = failDelivery(
				config,
				errorName,
				{
					ok: false,
					reason: "serialization",
					message: `Could not build log record: ${describeError(err)}`,
					cause: err,
				},
				1,
				diagnostics,
			);
			return outcome.delivered;
		}

		const outcome = await report(record);
		return outcome.delivered;
	}

	async function sendLog(event: LogEvent): Promise<boolean> {
		return buildAndReport(() => buildRecord(event), event.errorName);
	}

	async function captureException(error: unknown, captureOptions?: CaptureOptions): Promise<boolean> {
		if (error === undefined || error === null) {
			const usage = new UsageError(
				"captureException was called without an error; pass the value you caught",
			);
			if (!config.silentFailures) throw usage;
			diagnostics.warn(usage.message);
			return false;
		}

		return buildAndReport(
			() => buildRecordFromError(error, captureOptions),
			error instanceof Error ? error.name : NON_ERROR_NAME,
		);
	}

	return { config, diagnostics, sendLog, captureException, report };
}
