// =============================================================================
// PROCESS HANDLERS — Report uncaught exceptions and unhandled rejections
// =============================================================================

import type { CaptureOptions } from "@huntglitch/core";
import type { HuntGlitchLogger } from "../logger.js";
import { mergeData, reportError } from "./shared.js";

type ProcessEvent = "uncaughtException" | "unhandledRejection";
type Listener = (...args: unknown[]) => void;

export interface ProcessLike {
	on(event: ProcessEvent, listener: Listener): unknown;
	off(event: ProcessEvent, listener: Listener): unknown;
}

export interface ProcessHandlerOptions extends CaptureOptions {
	/**
	 * Exit with code 1 after reporting an uncaught exception. Registering a
	 * listener disables Node's default crash, so this defaults to true.
	 */
	exitOnUncaughtException?: boolean;
	/** Process to attach to (default: the global `process`) */
	target?: ProcessLike;
	/** Exit function (default: `process.exit`) */
	exit?: (code: number) => void;
}

/**
 * Report `uncaughtException` and `unhandledRejection` at `critical` severity.
 * Returns a function that removes both listeners.
 */
export function installProcessHandlers(
	logger: HuntGlitchLogger,
	options: ProcessHandlerOptions = {},
): () => void {
	const {
		exitOnUncaughtException = true,
		target = process,
		exit = (code: number) => process.exit(code),
		severity = "critical",
		additionalData,
		tags,
	} = options;

	const onUncaught: Listener = (error) => {
		void reportError(error, {
			logger,
			severity,
			tags,
			additionalData: mergeData({ origin: "uncaughtException" }, additionalData),
		}).finally(() => {
			if (exitOnUncaughtException) exit(1);
		});
	};

	const onRejection: Listener = (reason) => {
		void reportError(reason ?? new Error("Unhandled promise rejection without a reason"), {
			logger,
			severity,
			tags,
			additionalData: mergeData({ origin: "unhandledRejection" }, additionalData),
		});
	};

	target.on("uncaughtException", onUncaught);
	target.on("unhandledRejection", onRejection);

	return () => {
		target.off("uncaughtException", onUncaught);
		target.off("unhandledRejection", onRejection);
	};
}
