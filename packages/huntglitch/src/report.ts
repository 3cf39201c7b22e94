// =============================================================================
// CONVENIENCE FUNCTIONS — One-shot reporting from ambient configuration
// =============================================================================
// Each call builds its own logger. Unlike createHuntGlitchLogger, these
// default to silentFailures: true and resolve to a boolean, so they can sit in
// a catch block without their own error handling. A ConfigurationError still
// rejects.

import type { CaptureOptions, LogEvent } from "@huntglitch/core";
import { createHuntGlitchLogger, type HuntGlitchLoggerOptions } from "./logger.js";

export type ReportOptions = HuntGlitchLoggerOptions;

/** Send an explicit event using ambient configuration. */
export async function sendHuntGlitchLog(
	event: LogEvent,
	options: ReportOptions = {},
): Promise<boolean> {
	const logger = createHuntGlitchLogger({
		...options,
		silentFailures: options.silentFailures ?? true,
	});
	return logger.sendLog(event);
}

/**
 * Report a caught error using ambient configuration.
 *
 * Called without an error it resolves to `false`, makes no request, and
 * writes a diagnostic (`warn`, or `debug` in silent mode).
 *
 * @example
 * ```ts
 * try {
 *   await syncInventory();
 * } catch (err) {
 *   await captureExceptionAndReport(err, { tags: { job: "inventory" } });
 * }
 * ```
 */
export async function captureExceptionAndReport(
	error: unknown,
	options: CaptureOptions & ReportOptions = {},
): Promise<boolean> {
	const { additionalData, tags, severity, ...loggerOptions } = options;
	const logger = createHuntGlitchLogger({
		...loggerOptions,
		silentFailures: loggerOptions.silentFailures ?? true,
	});

	if (error === undefined || error === null) {
		const message = "captureExceptionAndReport was called without an error; nothing was sent";
		if (logger.config.silentFailures) {
			logger.diagnostics.debug(message);
		} else {
			logger.diagnostics.warn(message);
		}
		return false;
	}

	return logger.captureException(error, { additionalData, tags, severity });
}
