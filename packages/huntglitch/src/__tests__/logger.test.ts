import { ConfigurationError, DeliveryError, UsageError } from "@huntglitch/core";
import { describe, expect, it } from "vitest";
import { envConfigSource } from "../config.js";
import { createHuntGlitchLogger } from "../logger.js";
import { buildRecord } from "../record.js";
import { createFetchStub, createLoggerStub, sentPayload, testOptions } from "./helpers.js";

describe("createHuntGlitchLogger", () => {
	it("fails at construction when keys are missing", () => {
		expect(() => createHuntGlitchLogger({ configSource: envConfigSource({}) })).toThrow(
			ConfigurationError,
		);
	});

	it("resolves keys from the injected source", () => {
		const logger = createHuntGlitchLogger({
			configSource: envConfigSource({ PROJECT_KEY: "p", DELIVERABLE_KEY: "d" }),
		});
		expect(logger.config.projectKey).toBe("p");
		expect(logger.config.deliverableKey).toBe("d");
	});

	describe("sendLog", () => {
		it("resolves true after one attempt against a healthy endpoint", async () => {
			const fetch = createFetchStub([200]);
			const logger = createHuntGlitchLogger(testOptions({ fetch }));

			const delivered = await logger.sendLog({
				errorName: "CustomEvent",
				errorValue: "User login attempt failed",
				sourceFile: "/srv/app/src/auth.ts",
				sourceLine: 60,
				severity: "warning",
				additionalData: { username: "test-user", attempt_count: 3 },
			});

			expect(delivered).toBe(true);
			expect(fetch).toHaveBeenCalledTimes(1);
			expect(sentPayload(fetch)).toMatchObject({
				error_name: "CustomEvent",
				error_value: "User login attempt failed",
				source_file: "/srv/app/src/auth.ts",
				source_line: 60,
				severity: "warning",
				additional_data: { username: "test-user", attempt_count: 3 },
				tags: {},
			});
		});

		it("resolves false in silent mode when delivery fails", async () => {
			const logger = createHuntGlitchLogger(
				testOptions({ fetch: createFetchStub([400]), silentFailures: true }),
			);

			await expect(
				logger.sendLog({ errorName: "E", errorValue: "v", sourceFile: "f", sourceLine: 1 }),
			).resolves.toBe(false);
		});

		it("rejects with DeliveryError when not silent", async () => {
			const logger = createHuntGlitchLogger(testOptions({ fetch: createFetchStub([400]) }));

			await expect(
				logger.sendLog({ errorName: "E", errorValue: "v", sourceFile: "f", sourceLine: 1 }),
			).rejects.toBeInstanceOf(DeliveryError);
		});
	});

	describe("captureException", () => {
		it("sends the error's name, message and stack", async () => {
			const fetch = createFetchStub([200]);
			const logger = createHuntGlitchLogger(testOptions({ fetch }));
			const error = new Error("This is a test error");
			error.name = "ValueError";
			error.stack = "ValueError: This is a test error\n    at run (/srv/app/src/run.ts:9:3)";

			const delivered = await logger.captureException(error, {
				additionalData: { user_id: 12345 },
				tags: { environment: "production" },
			});

			expect(delivered).toBe(true);
			expect(sentPayload(fetch)).toMatchObject({
				error_name: "ValueError",
				error_value: "This is a test error",
				source_file: "/srv/app/src/run.ts",
				source_line: 9,
				severity: "error",
				additional_data: { user_id: 12345 },
				tags: { environment: "production" },
				stack_trace: error.stack,
			});
		});

		it("rejects with UsageError and sends nothing when no error is given", async () => {
			const fetch = createFetchStub([200]);
			const logger = createHuntGlitchLogger(testOptions({ fetch }));

			await expect(logger.captureException(undefined)).rejects.toBeInstanceOf(UsageError);
			expect(fetch).not.toHaveBeenCalled();
		});

		it("resolves false with a warning in silent mode when no error is given", async () => {
			const fetch = createFetchStub([200]);
			const diagnostics = createLoggerStub();
			const logger = createHuntGlitchLogger(
				testOptions({ fetch, logger: diagnostics, silentFailures: true }),
			);

			await expect(logger.captureException(null)).resolves.toBe(false);
			expect(fetch).not.toHaveBeenCalled();
			expect(diagnostics.warn).toHaveBeenCalledTimes(1);
		});
	});

	describe("report", () => {
		it("returns the full delivery outcome", async () => {
			const logger = createHuntGlitchLogger(testOptions({ fetch: createFetchStub([500, 200]) }));
			const record = buildRecord({
				errorName: "E",
				errorValue: "v",
				sourceFile: "f",
				sourceLine: 1,
			});

			await expect(logger.report(record)).resolves.toEqual({
				delivered: true,
				attemptsMade: 2,
				status: 200,
			});
		});
	});

	it("can be shared across concurrent calls", async () => {
		const fetch = createFetchStub([200]);
		const logger = createHuntGlitchLogger(testOptions({ fetch }));

		const results = await Promise.all(
			["a", "b", "c"].map((name) =>
				logger.sendLog({ errorName: name, errorValue: "v", sourceFile: "f", sourceLine: 1 }),
			),
		);

		expect(results).toEqual([true, true, true]);
		expect(fetch).toHaveBeenCalledTimes(3);
	});
});

describe("records that cannot be built", () => {
	const unreadable = {
		get secretValue(): string {
			throw new Error("getter failed");
		},
	};

	it("throws DeliveryError with a serialization reason when failures are loud", async () => {
		const fetch = createFetchStub([200]);
		const logger = createHuntGlitchLogger(testOptions({ fetch }));

		const error = await logger
			.captureException(new TypeError("bad input"), { additionalData: unreadable })
			.then(
				() => undefined,
				(err: unknown) => err,
			);

		expect(error).toBeInstanceOf(DeliveryError);
		expect(error).toMatchObject({
			reason: "serialization",
			outcome: {
				delivered: false,
				attemptsMade: 1,
				lastError: "Could not build log record: Error: getter failed",
			},
		});
		expect(fetch).not.toHaveBeenCalled();
	});

	it("resolves false when failures are silent", async () => {
		const fetch = createFetchStub([200]);
		const logger = createHuntGlitchLogger(testOptions({ fetch, silentFailures: true }));

		await expect(
			logger.sendLog({
				errorName: "Job",
				errorValue: "done",
				sourceFile: "job.ts",
				sourceLine: 1,
				additionalData: unreadable,
			}),
		).resolves.toBe(false);
		expect(fetch).not.toHaveBeenCalled();
	});
});
