export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	createNoopLogger,
} from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export {
	createLevelLogger,
	LEVEL_PRIORITY,
	type LevelLoggerOptions,
	type LogLevel,
	type LogSink,
} from "./levels.js";
export { buildRedactKeys, REDACTED, redactData } from "./redact.js";
