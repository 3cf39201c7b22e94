// =============================================================================
// JSON LOGGER — One JSON line per diagnostic, for log aggregation
// =============================================================================

import stringify from "safe-stable-stringify";
import type { HuntGlitchInternalLogger } from "../types/config.js";
import { createLevelLogger, type LevelLoggerOptions } from "./levels.js";

export interface JsonLoggerOptions extends LevelLoggerOptions {
	/** `service` field on every entry. Default: `"huntglitch"` */
	service?: string;
}

/**
 * Entries carry `timestamp`, `level`, `service`, `message` and the data fields.
 * `warn` and `error` go to stderr, everything else to stdout.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): HuntGlitchInternalLogger {
	const { service = "huntglitch" } = options;

	return createLevelLogger((level, message, data) => {
		const entry = { timestamp: new Date().toISOString(), level, service, message, ...data };
		const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
		stream.write(`${stringify(entry)}\n`);
	}, options);
}
