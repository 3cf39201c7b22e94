import { ConfigurationError, DeliveryError } from "@huntglitch/core";
import { describe, expect, it } from "vitest";
import { envConfigSource } from "../config.js";
import { captureExceptionAndReport, sendHuntGlitchLog } from "../report.js";
import { createFetchStub, createLoggerStub, sentPayload, testOptions } from "./helpers.js";

const event = { errorName: "Heartbeat", errorValue: "ok", sourceFile: "cron.ts", sourceLine: 3 };

describe("sendHuntGlitchLog", () => {
	it("resolves true when delivered", async () => {
		const fetch = createFetchStub([200]);
		await expect(sendHuntGlitchLog(event, testOptions({ fetch }))).resolves.toBe(true);
		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it("defaults to silent failures", async () => {
		const fetch = createFetchStub([500]);
		await expect(sendHuntGlitchLog(event, testOptions({ fetch, maxRetries: 1 }))).resolves.toBe(
			false,
		);
		expect(fetch).toHaveBeenCalledTimes(2);
	});

	it("reads keys from the environment source", async () => {
		const fetch = createFetchStub([200]);

		await sendHuntGlitchLog(event, {
			fetch,
			logger: createLoggerStub(),
			configSource: envConfigSource({ PROJECT_KEY: "env-p", DELIVERABLE_KEY: "env-d" }),
		});

		expect(sentPayload(fetch)).toMatchObject({ project_key: "env-p", deliverable_key: "env-d" });
	});
});

describe("captureExceptionAndReport", () => {
	it("resolves true and makes one attempt against a healthy endpoint", async () => {
		const fetch = createFetchStub([200]);

		const delivered = await captureExceptionAndReport(
			new RangeError("division by zero"),
			testOptions({ fetch }),
		);

		expect(delivered).toBe(true);
		expect(fetch).toHaveBeenCalledTimes(1);
		expect(sentPayload(fetch)).toMatchObject({
			error_name: "RangeError",
			error_value: "division by zero",
		});
	});

	it("passes capture options through", async () => {
		const fetch = createFetchStub([200]);

		await captureExceptionAndReport(new Error("x"), {
			...testOptions({ fetch }),
			severity: "critical",
			additionalData: { job: "sync" },
			tags: { team: "core" },
		});

		expect(sentPayload(fetch)).toMatchObject({
			severity: "critical",
			additional_data: { job: "sync" },
			tags: { team: "core" },
		});
	});

	it("resolves false without any request when no error is given", async () => {
		const fetch = createFetchStub([200]);
		const diagnostics = createLoggerStub();

		await expect(
			captureExceptionAndReport(undefined, testOptions({ fetch, logger: diagnostics })),
		).resolves.toBe(false);

		expect(fetch).not.toHaveBeenCalled();
		expect(diagnostics.debug).toHaveBeenCalledTimes(1);
		expect(diagnostics.warn).not.toHaveBeenCalled();
	});

	it("warns about misuse when failures are not silent", async () => {
		const diagnostics = createLoggerStub();

		await expect(
			captureExceptionAndReport(
				undefined,
				testOptions({ logger: diagnostics, silentFailures: false }),
			),
		).resolves.toBe(false);

		expect(diagnostics.warn).toHaveBeenCalledTimes(1);
	});

	it("swallows delivery failures by default", async () => {
		const fetch = createFetchStub([503]);
		await expect(
			captureExceptionAndReport(new Error("x"), testOptions({ fetch, maxRetries: 2 })),
		).resolves.toBe(false);
		expect(fetch).toHaveBeenCalledTimes(3);
	});

	it("raises delivery failures when silentFailures is false", async () => {
		await expect(
			captureExceptionAndReport(
				new Error("x"),
				testOptions({ fetch: createFetchStub([401]), silentFailures: false }),
			),
		).rejects.toBeInstanceOf(DeliveryError);
	});

	it("always raises configuration errors", async () => {
		await expect(
			captureExceptionAndReport(new Error("x"), { configSource: envConfigSource({}) }),
		).rejects.toBeInstanceOf(ConfigurationError);
	});
});

describe("silent default", () => {
	it("stays silent when silentFailures is passed as undefined", async () => {
		const fetch = createFetchStub([500]);

		await expect(
			sendHuntGlitchLog(event, { ...testOptions({ fetch, maxRetries: 0 }), silentFailures: undefined }),
		).resolves.toBe(false);
		await expect(
			captureExceptionAndReport(new Error("x"), {
				...testOptions({ fetch, maxRetries: 0 }),
				silentFailures: undefined,
			}),
		).resolves.toBe(false);
	});

	it("resolves false when a tag cannot be encoded", async () => {
		const fetch = createFetchStub([200]);
		const diagnostics = createLoggerStub();
		const tag = {
			toJSON() {
				throw new Error("cannot encode");
			},
		};

		await expect(
			sendHuntGlitchLog({ ...event, tags: { t: tag } }, testOptions({ fetch, logger: diagnostics })),
		).resolves.toBe(false);

		expect(fetch).not.toHaveBeenCalled();
		expect(diagnostics.warn).toHaveBeenCalledWith("Failed to deliver log to HuntGlitch", {
			errorName: "Heartbeat",
			reason: "serialization",
			attemptsMade: 1,
			lastError: "Could not build log record: Error: cannot encode",
		});
	});
});
