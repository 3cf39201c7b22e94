// =============================================================================
// EXPRESS INTEGRATION — Error-handling middleware that reports to HuntGlitch
// =============================================================================

import type { CaptureOptions } from "@huntglitch/core";
import type { HuntGlitchLogger } from "../logger.js";
import { mergeData, reportError } from "./shared.js";

export interface ExpressErrorHandlerOptions extends CaptureOptions {
	/**
	 * Send a plain `500 Internal Server Error` instead of passing the error on
	 * with `next(err)`. Default: false
	 */
	respond?: boolean;
}

export interface ExpressRequestLike {
	method: string;
	url: string;
	originalUrl?: string;
	ip?: string;
	headers: Record<string, string | string[] | undefined>;
	socket?: { remoteAddress?: string };
}

export interface ExpressResponseLike {
	headersSent?: boolean;
	status: (code: number) => { send: (body: string) => unknown };
}

function firstHeader(value: string | string[] | undefined): string | undefined {
	return Array.isArray(value) ? value[0] : value;
}

export function describeExpressRequest(req: ExpressRequestLike): Record<string, unknown> {
	return {
		request_url: req.originalUrl ?? req.url,
		request_method: req.method,
		user_agent: firstHeader(req.headers["user-agent"]) ?? null,
		remote_addr: req.ip ?? req.socket?.remoteAddress ?? null,
	};
}

/**
 * Create Express error-handling middleware. Register it after your routes.
 *
 * @example
 * ```ts
 * import express from "express";
 * import { createHuntGlitchLogger } from "huntglitch";
 * import { createHuntGlitchExpressErrorHandler } from "huntglitch/express";
 *
 * const app = express();
 * // ...routes
 * app.use(createHuntGlitchExpressErrorHandler(createHuntGlitchLogger()));
 * ```
 */
export function createHuntGlitchExpressErrorHandler(
	logger: HuntGlitchLogger,
	options: ExpressErrorHandlerOptions = {},
) {
	const { respond = false, additionalData, ...capture } = options;

	// Express recognizes error middleware by its four parameters.
	return async (
		err: unknown,
		req: ExpressRequestLike,
		res: ExpressResponseLike,
		next: (err?: unknown) => void,
	): Promise<void> => {
		await reportError(err, {
			...capture,
			logger,
			additionalData: mergeData(describeExpressRequest(req), additionalData),
		});

		if (respond && !res.headersSent) {
			res.status(500).send("Internal Server Error");
			return;
		}
		next(err);
	};
}
