import { type CaptureOptions, describeError, type HuntGlitchInternalLogger } from "@huntglitch/core";
import { createConsoleLogger } from "@huntglitch/core/logger";
import type { HuntGlitchLogger } from "../logger.js";
import { captureExceptionAndReport } from "../report.js";

export interface ErrorReportingOptions extends CaptureOptions {
	/** Logger to report through. Without one, ambient configuration is used. */
	logger?: HuntGlitchLogger;
}

let fallbackDiagnostics: HuntGlitchInternalLogger | undefined;

/**
 * Report an error on its way out of an integration. A failure to report is
 * logged and swallowed so the caller always sees the original error.
 */
export async function reportError(error: unknown, options: ErrorReportingOptions): Promise<boolean> {
	const { logger, ...capture } = options;
	try {
		return logger
			? await logger.captureException(error, capture)
			: await captureExceptionAndReport(error, capture);
	} catch (reportFailure) {
		fallbackDiagnostics ??= createConsoleLogger();
		(logger?.diagnostics ?? fallbackDiagnostics).warn("Could not report error to HuntGlitch", {
			reason: describeError(reportFailure),
		});
		return false;
	}
}

export function mergeData(
	base: Record<string, unknown>,
	extra: Record<string, unknown> | undefined,
): Record<string, unknown> {
	return extra ? { ...base, ...extra } : base;
}
