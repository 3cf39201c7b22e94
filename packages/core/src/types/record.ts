// =============================================================================
// LOG RECORD — What a single HuntGlitch event looks like before it is sent
// =============================================================================

export const SEVERITIES = ["info", "warning", "error", "critical"] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Severity as callers may pass it: a symbolic name or a numeric code (1–4). */
export type SeverityInput = Severity | (string & {}) | number;

export interface LogRecord {
	readonly errorName: string;
	readonly errorValue: string;
	readonly sourceFile: string;
	/** Integer, never negative. */
	readonly sourceLine: number;
	readonly severity: Severity;
	readonly additionalData: Readonly<Record<string, unknown>>;
	readonly tags: Readonly<Record<string, string>>;
	/** ISO timestamp of when the record was built */
	readonly timestamp: string;
	/** Raw stack string, only for records built from an error */
	readonly stackTrace?: string;
}

/** An explicit, non-exception event. */
export interface LogEvent {
	errorName: string;
	errorValue: string;
	sourceFile: string;
	sourceLine: number;
	severity?: SeverityInput;
	additionalData?: Record<string, unknown>;
	tags?: Record<string, unknown>;
}

export interface CaptureOptions {
	additionalData?: Record<string, unknown>;
	tags?: Record<string, unknown>;
	/** Default: "error" */
	severity?: SeverityInput;
}

export interface DeliveryOutcome {
	delivered: boolean;
	/** Always at least 1 */
	attemptsMade: number;
	/** HTTP status of the last response, if one was received */
	status?: number;
	/** Description of the last failure */
	lastError?: string;
}

/** Request body as the Lighthouse API expects it. */
export interface LighthousePayload {
	project_key: string;
	deliverable_key: string;
	error_name: string;
	error_value: string;
	source_file: string;
	source_line: number;
	severity: Severity;
	additional_data: Record<string, unknown>;
	tags: Record<string, string>;
	timestamp: string;
	stack_trace?: string;
}
