// =============================================================================
// HONO INTEGRATION — app.onError handler that reports to HuntGlitch
// =============================================================================

import type { CaptureOptions } from "@huntglitch/core";
import type { HuntGlitchLogger } from "../logger.js";
import { mergeData, reportError } from "./shared.js";

export interface HonoContextLike {
	req: {
		method: string;
		url: string;
		header: (name: string) => string | undefined;
	};
	text: (body: string, status: 500) => Response;
}

/**
 * Create a Hono `onError` handler. The error is reported, then a plain
 * `500 Internal Server Error` response is returned.
 *
 * @example
 * ```ts
 * import { Hono } from "hono";
 * import { createHuntGlitchHonoErrorHandler } from "huntglitch/hono";
 *
 * const app = new Hono();
 * app.onError(createHuntGlitchHonoErrorHandler(createHuntGlitchLogger()));
 * ```
 */
export function createHuntGlitchHonoErrorHandler(
	logger: HuntGlitchLogger,
	options: CaptureOptions = {},
) {
	const { additionalData, ...capture } = options;

	return async (err: Error, c: HonoContextLike): Promise<Response> => {
		const request = {
			request_url: c.req.url,
			request_method: c.req.method,
			user_agent: c.req.header("user-agent") ?? null,
			remote_addr: c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ?? null,
		};

		await reportError(err, {
			...capture,
			logger,
			additionalData: mergeData(request, additionalData),
		});
		return c.text("Internal Server Error", 500);
	};
}
