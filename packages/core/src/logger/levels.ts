// =============================================================================
// LEVELS — Level filtering and redaction shared by every diagnostics logger
// =============================================================================

import type { HuntGlitchInternalLogger } from "../types/config.js";
import { buildRedactKeys, redactData } from "./redact.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface LevelLoggerOptions {
	/** Minimum level to emit. Default: `"warn"` */
	level?: LogLevel;
	/** Keys whose values are replaced with "[REDACTED]", at any depth. Default: credential keys */
	redactKeys?: string[];
}

/** Receives only entries at or above the minimum level, with data already redacted. */
export type LogSink = (level: LogLevel, message: string, data: Record<string, unknown> | undefined) => void;

export function createLevelLogger(
	sink: LogSink,
	options: LevelLoggerOptions = {},
): HuntGlitchInternalLogger {
	const minPriority = LEVEL_PRIORITY[options.level ?? "warn"];
	const redactKeys = buildRedactKeys(options.redactKeys);

	const at =
		(level: LogLevel) =>
		(message: string, data?: Record<string, unknown>): void => {
			if (LEVEL_PRIORITY[level] < minPriority) return;
			sink(level, message, redactData(data, redactKeys));
		};

	return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}
