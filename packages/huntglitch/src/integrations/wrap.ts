// =============================================================================
// WRAP — Higher-order function that reports, then rethrows
// =============================================================================

import stringify from "safe-stable-stringify";
import { type ErrorReportingOptions, mergeData, reportError } from "./shared.js";

/** Stringified call arguments are cut to this many characters (code points). */
export const MAX_ARGS_LENGTH = 500;

/** Recorded as `args` when the arguments cannot be stringified. */
export const UNSERIALIZABLE_ARGS = "[unserializable]";

export interface WrapOptions extends ErrorReportingOptions {
	/** Name recorded as `function_name`. Default: the wrapped function's name */
	name?: string;
	/** Record the call arguments. Default: true */
	includeArgs?: boolean;
}

function describeArgs(args: unknown[]): string {
	let text: string;
	try {
		text = stringify(args) ?? "";
	} catch {
		// A throwing toJSON or getter must not replace the caller's error.
		return UNSERIALIZABLE_ARGS;
	}
	if (text.length <= MAX_ARGS_LENGTH) return text;
	return Array.from(text).slice(0, MAX_ARGS_LENGTH).join("");
}

function contextFor(
	functionName: string,
	args: unknown[],
	options: WrapOptions,
): ErrorReportingOptions {
	const { name: _name, includeArgs = true, additionalData, ...reportOptions } = options;
	const context: Record<string, unknown> = { function_name: functionName };
	if (includeArgs) context.args = describeArgs(args);
	return { ...reportOptions, additionalData: mergeData(context, additionalData) };
}

/**
 * Wrap a function so any error it throws or rejects with is reported to
 * HuntGlitch before being rethrown unchanged. The wrapped function always
 * returns a promise, and it rejects only after the report has settled.
 *
 * @example
 * ```ts
 * const importOrders = withErrorReporting(rawImportOrders, { tags: { job: "import" } });
 * await importOrders(batch);
 * ```
 */
export function withErrorReporting<TArgs extends unknown[], TResult>(
	fn: (...args: TArgs) => TResult | Promise<TResult>,
	options: WrapOptions = {},
): (...args: TArgs) => Promise<TResult> {
	const functionName = options.name ?? (fn.name || "anonymous");

	return async function wrapped(this: unknown, ...args: TArgs): Promise<TResult> {
		try {
			return await fn.apply(this, args);
		} catch (error) {
			await reportError(error, contextFor(functionName, args, options));
			throw error;
		}
	};
}

/**
 * Synchronous variant of {@link withErrorReporting}. The error is rethrown
 * immediately; the report is sent in the background.
 */
export function withErrorReportingSync<TArgs extends unknown[], TResult>(
	fn: (...args: TArgs) => TResult,
	options: WrapOptions = {},
): (...args: TArgs) => TResult {
	const functionName = options.name ?? (fn.name || "anonymous");

	return function wrapped(this: unknown, ...args: TArgs): TResult {
		try {
			return fn.apply(this, args);
		} catch (error) {
			void reportError(error, contextFor(functionName, args, options));
			throw error;
		}
	};
}
