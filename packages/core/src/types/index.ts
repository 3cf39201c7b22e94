export type {
	ConfigSource,
	HuntGlitchBackoffOptions,
	HuntGlitchInternalLogger,
	HuntGlitchOptions,
	LoggerConfig,
} from "./config.js";
export type {
	CaptureOptions,
	DeliveryOutcome,
	LighthousePayload,
	LogEvent,
	LogRecord,
	Severity,
	SeverityInput,
} from "./record.js";
export { SEVERITIES } from "./record.js";
