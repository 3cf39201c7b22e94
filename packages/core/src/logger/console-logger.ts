// =============================================================================
// CONSOLE LOGGER — Colored, human-readable SDK diagnostics
// =============================================================================

import pc from "picocolors";
import type { HuntGlitchInternalLogger } from "../types/config.js";
import { createLevelLogger, type LevelLoggerOptions, type LogLevel } from "./levels.js";

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
	debug: pc.magenta,
	info: pc.blue,
	warn: pc.yellow,
	error: pc.red,
};

export interface ConsoleLoggerOptions extends LevelLoggerOptions {
	/** Shown in brackets before each message. Default: `"HuntGlitch"` */
	prefix?: string;
	/** Start each line with an ISO timestamp. Default: `true` */
	timestamps?: boolean;
}

/**
 * Write diagnostics through `console`: `warn` and `error` to their own
 * methods, `debug` and `info` to `console.log`.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@huntglitch/core/logger";
 *
 * const huntglitch = createHuntGlitchLogger({ logger: createConsoleLogger({ level: "debug" }) });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): HuntGlitchInternalLogger {
	const { prefix = "HuntGlitch", timestamps = true } = options;

	return createLevelLogger((level, message, data) => {
		const label = LEVEL_STYLE[level](pc.bold(level.toUpperCase().padEnd(5)));
		const head = timestamps ? `${pc.dim(new Date().toISOString())} ${label}` : label;
		const line = `${head} [${prefix}]: ${message}`;
		const write = level === "error" ? console.error : level === "warn" ? console.warn : console.log;

		if (data && Object.keys(data).length > 0) {
			write(line, data);
		} else {
			write(line);
		}
	}, options);
}

export function createNoopLogger(): HuntGlitchInternalLogger {
	return createLevelLogger(() => {}, { level: "error", redactKeys: [] });
}
