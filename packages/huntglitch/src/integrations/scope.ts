// =============================================================================
// SCOPE — Run a named operation; report on failure, then rethrow
// =============================================================================

import { type ErrorReportingOptions, mergeData, reportError } from "./shared.js";

export interface ScopeOptions extends ErrorReportingOptions {
	/** Extra fields recorded next to `operation` */
	extra?: Record<string, unknown>;
}

/**
 * Run `fn` as a named operation. If it throws or rejects, the error is
 * reported with `{ operation, ...extra }` and rethrown unchanged. Nothing is
 * reported on success.
 *
 * @example
 * ```ts
 * await runWithErrorReporting("database_operation", () => db.insert(user), {
 *   extra: { table: "users", action: "insert" },
 * });
 * ```
 */
export async function runWithErrorReporting<T>(
	operation: string,
	fn: () => T | Promise<T>,
	options: ScopeOptions = {},
): Promise<T> {
	try {
		return await fn();
	} catch (error) {
		const { extra, additionalData, ...reportOptions } = options;
		await reportError(error, {
			...reportOptions,
			additionalData: mergeData({ operation, ...extra }, additionalData),
		});
		throw error;
	}
}
