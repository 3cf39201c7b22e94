// =============================================================================
// HUNTGLITCH — Error and event reporting for the HuntGlitch Lighthouse API
// =============================================================================

export {
	type CaptureOptions,
	type ConfigSource,
	ConfigurationError,
	DeliveryError,
	type DeliveryOutcome,
	type HuntGlitchInternalLogger,
	HuntGlitchError,
	type HuntGlitchOptions,
	type LogEvent,
	type LoggerConfig,
	type LogRecord,
	type Severity,
	type SeverityInput,
	UsageError,
} from "@huntglitch/core";
export {
	createConsoleLogger,
	createJsonLogger,
	createNoopLogger,
} from "@huntglitch/core/logger";
export {
	DEFAULT_BACKOFF,
	DEFAULT_MAX_RETRIES,
	DEFAULT_SILENT_FAILURES,
	DEFAULT_TIMEOUT_MS,
	ENV_KEYS,
	envConfigSource,
	resolveConfig,
} from "./config.js";
export {
	installProcessHandlers,
	type ProcessHandlerOptions,
} from "./integrations/process.js";
export { runWithErrorReporting, type ScopeOptions } from "./integrations/scope.js";
export type { ErrorReportingOptions } from "./integrations/shared.js";
export {
	withErrorReporting,
	withErrorReportingSync,
	type WrapOptions,
} from "./integrations/wrap.js";
export {
	createHuntGlitchLogger,
	type HuntGlitchLogger,
	type HuntGlitchLoggerOptions,
} from "./logger.js";
export { buildRecord, buildRecordFromError } from "./record.js";
export {
	captureExceptionAndReport,
	type ReportOptions,
	sendHuntGlitchLog,
} from "./report.js";
export {
	backoffDelay,
	type DeliveryFailure,
	deliver,
	failDelivery,
	HUNTGLITCH_ENDPOINT,
	MAX_PAYLOAD_BYTES,
	SDK_NAME,
	SDK_VERSION,
	type TransportOptions,
	toPayload,
} from "./transport.js";
