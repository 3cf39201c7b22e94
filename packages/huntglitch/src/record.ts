// =============================================================================
// EVENT BUILDER — Normalize caller input into an immutable LogRecord
// =============================================================================

import {
	type CaptureOptions,
	type LogEvent,
	type LogRecord,
	normalizeSeverity,
	resolveSourceLocation,
	UsageError,
} from "@huntglitch/core";
import stringify from "safe-stable-stringify";

/** Name given to thrown values that are not Error instances. */
export const NON_ERROR_NAME = "NonError";

function toLine(value: number): number {
	if (!Number.isFinite(value)) return 0;
	return Math.max(0, Math.trunc(value));
}

function toText(value: unknown): string {
	if (typeof value === "string") return value;
	if (typeof value === "object" && value !== null) return stringify(value) ?? String(value);
	return String(value);
}

function normalizeTags(tags: Record<string, unknown> | undefined): Record<string, string> {
	const result: Record<string, string> = {};
	if (!tags) return result;
	for (const [key, value] of Object.entries(tags)) {
		if (value === undefined) continue;
		result[key] = toText(value);
	}
	return result;
}

export function buildRecord(event: LogEvent): LogRecord {
	return Object.freeze({
		errorName: event.errorName,
		errorValue: event.errorValue,
		sourceFile: event.sourceFile,
		sourceLine: toLine(event.sourceLine),
		severity: normalizeSeverity(event.severity),
		additionalData: Object.freeze({ ...event.additionalData }),
		tags: Object.freeze(normalizeTags(event.tags)),
		timestamp: new Date().toISOString(),
	});
}

/** Subclasses that never set `name` still report their class name. */
function errorNameOf(error: Error): string {
	if (error.name && error.name !== "Error") return error.name;
	return error.constructor.name || error.name || "Error";
}

/**
 * Build a record from a caught error. The source location is the innermost
 * stack frame in application code (see `selectSourceFrame`).
 *
 * @throws {UsageError} when `error` is null or undefined
 */
export function buildRecordFromError(error: unknown, options: CaptureOptions = {}): LogRecord {
	if (error === undefined || error === null) {
		throw new UsageError(`captureException requires the caught error; received ${String(error)}`);
	}

	const base = {
		severity: options.severity,
		additionalData: options.additionalData,
		tags: options.tags,
	};

	if (!(error instanceof Error)) {
		return buildRecord({
			...base,
			errorName: NON_ERROR_NAME,
			errorValue: toText(error),
			...resolveSourceLocation(undefined),
		});
	}

	const location = resolveSourceLocation(error.stack);
	const record = buildRecord({
		...base,
		errorName: errorNameOf(error),
		errorValue: error.message,
		...location,
	});

	return error.stack ? Object.freeze({ ...record, stackTrace: error.stack }) : record;
}
