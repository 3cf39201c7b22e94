import { describe, expect, it } from "vitest";
import {
	ConfigurationError,
	DeliveryError,
	describeError,
	HuntGlitchError,
	UsageError,
} from "../error/index.js";

describe("HuntGlitchError", () => {
	describe("constructor", () => {
		it("creates an error with the given code and message", () => {
			const error = new HuntGlitchError("USAGE_ERROR", "bad call");
			expect(error.code).toBe("USAGE_ERROR");
			expect(error.message).toBe("bad call");
		});

		it("is an instance of Error", () => {
			expect(new HuntGlitchError("USAGE_ERROR", "x")).toBeInstanceOf(Error);
		});

		it("has the name 'HuntGlitchError'", () => {
			expect(new HuntGlitchError("USAGE_ERROR", "x").name).toBe("HuntGlitchError");
		});

		it("takes transient from the code registry by default", () => {
			expect(new HuntGlitchError("DELIVERY_FAILED", "x").transient).toBe(true);
			expect(new HuntGlitchError("CONFIGURATION_ERROR", "x").transient).toBe(false);
		});

		it("preserves the cause", () => {
			const cause = new Error("root");
			expect(new HuntGlitchError("USAGE_ERROR", "x", { cause }).cause).toBe(cause);
		});
	});
});

describe("ConfigurationError", () => {
	it("missingKeys lists every missing key in message and details", () => {
		const error = ConfigurationError.missingKeys(["projectKey", "deliverableKey"]);

		expect(error).toBeInstanceOf(HuntGlitchError);
		expect(error.name).toBe("ConfigurationError");
		expect(error.code).toBe("CONFIGURATION_ERROR");
		expect(error.message).toContain("projectKey, deliverableKey");
		expect(error.details).toEqual({ missing: ["projectKey", "deliverableKey"] });
		expect(error.transient).toBe(false);
	});
});

describe("UsageError", () => {
	it("is never transient", () => {
		const error = new UsageError("no error given");
		expect(error.code).toBe("USAGE_ERROR");
		expect(error.name).toBe("UsageError");
		expect(error.transient).toBe(false);
	});
});

describe("DeliveryError", () => {
	it("carries the outcome, reason and status", () => {
		const outcome = { delivered: false, attemptsMade: 4, status: 503, lastError: "HTTP 503" };
		const error = new DeliveryError("gave up", {
			outcome,
			reason: "http_server_error",
			status: 503,
			transient: true,
		});

		expect(error.name).toBe("DeliveryError");
		expect(error.code).toBe("DELIVERY_FAILED");
		expect(error.outcome).toBe(outcome);
		expect(error.reason).toBe("http_server_error");
		expect(error.status).toBe(503);
		expect(error.details).toEqual({ reason: "http_server_error", attemptsMade: 4, status: 503 });
	});

	it("omits status from details when no response was received", () => {
		const error = new DeliveryError("offline", {
			outcome: { delivered: false, attemptsMade: 1 },
			reason: "network",
			transient: true,
		});
		expect(error.details).toEqual({ reason: "network", attemptsMade: 1 });
	});
});

describe("describeError", () => {
	it("formats Error instances as name: message", () => {
		expect(describeError(new TypeError("fetch failed"))).toBe("TypeError: fetch failed");
	});

	it("uses just the name when the message is empty", () => {
		expect(describeError(new RangeError())).toBe("RangeError");
	});

	it("stringifies anything else", () => {
		expect(describeError("plain")).toBe("plain");
		expect(describeError(42)).toBe("42");
	});
});
