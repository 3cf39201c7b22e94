import type { HuntGlitchInternalLogger } from "@huntglitch/core";
import { vi } from "vitest";
import { envConfigSource } from "../config.js";
import type { HuntGlitchLoggerOptions } from "../logger.js";

export const TEST_KEYS = { projectKey: "test-project", deliverableKey: "test-deliverable" };

/** A fetch stub that answers each call with the next status in `statuses` (last one repeats). */
export function createFetchStub(statuses: number[], body = "") {
	let call = 0;
	return vi.fn<typeof globalThis.fetch>(async () => {
		const status = statuses[Math.min(call, statuses.length - 1)] ?? 200;
		call++;
		return new Response(body || null, { status });
	});
}

export function createLoggerStub(): HuntGlitchInternalLogger & {
	debug: ReturnType<typeof vi.fn>;
	info: ReturnType<typeof vi.fn>;
	warn: ReturnType<typeof vi.fn>;
	error: ReturnType<typeof vi.fn>;
} {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Options for a logger that never touches the network, the environment, or real timers. */
export function testOptions(overrides: HuntGlitchLoggerOptions = {}): HuntGlitchLoggerOptions {
	return {
		...TEST_KEYS,
		configSource: envConfigSource({}),
		fetch: createFetchStub([200]),
		logger: createLoggerStub(),
		sleep: vi.fn(async () => {}),
		...overrides,
	};
}

export function sentPayload(fetchStub: ReturnType<typeof createFetchStub>, call = 0): unknown {
	const init = fetchStub.mock.calls[call]?.[1];
	return JSON.parse(String(init?.body));
}
