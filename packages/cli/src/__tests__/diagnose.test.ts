import { HUNTGLITCH_ENDPOINT } from "huntglitch";
import { describe, expect, it } from "vitest";
import { type DiagnoseInput, diagnose, hasFailures } from "../utils/diagnose.js";

function baseInput(overrides: Partial<DiagnoseInput> = {}): DiagnoseInput {
	return {
		flags: { cwd: "/project" },
		env: { HUNTGLITCH_PROJECT_KEY: "test-project", HUNTGLITCH_DELIVERABLE_KEY: "test-deliverable" },
		file: {},
		configFile: null,
		nodeVersion: "v20.11.1",
		...overrides,
	};
}

describe("diagnose", () => {
	it("passes a complete environment-based setup", () => {
		const checks = diagnose(baseInput());

		expect(checks).toEqual([
			{ label: "Node.js", status: "pass", detail: "v20.11.1" },
			{ label: "Config file", status: "info", detail: "none (optional)" },
			{ label: "Project key", status: "pass", detail: "set via HUNTGLITCH_PROJECT_KEY" },
			{ label: "Deliverable key", status: "pass", detail: "set via HUNTGLITCH_DELIVERABLE_KEY" },
			{ label: "Delivery settings", status: "pass", detail: "timeout 10000ms, 3 retries" },
			{ label: "Endpoint", status: "info", detail: HUNTGLITCH_ENDPOINT },
		]);
		expect(hasFailures(checks)).toBe(false);
	});

	it("fails a missing key and skips the settings check", () => {
		const checks = diagnose(baseInput({ env: { PROJECT_KEY: "test-project" } }));

		expect(checks.find((check) => check.label === "Deliverable key")).toEqual({
			label: "Deliverable key",
			status: "fail",
			detail: "missing; pass --deliverable-key or set HUNTGLITCH_DELIVERABLE_KEY",
		});
		expect(checks.some((check) => check.label === "Delivery settings")).toBe(false);
		expect(hasFailures(checks)).toBe(true);
	});

	it("reports invalid tuning values", () => {
		const checks = diagnose(baseInput({ file: { timeout: -1 } }));

		expect(checks.find((check) => check.label === "Delivery settings")).toEqual({
			label: "Delivery settings",
			status: "fail",
			detail: 'ConfigurationError: "timeout" must be a positive number, got -1',
		});
	});

	it("fails on Node.js older than 20", () => {
		const [node] = diagnose(baseInput({ nodeVersion: "v18.19.0" }));
		expect(node).toEqual({ label: "Node.js", status: "fail", detail: "v18.19.0 (requires >= 20)" });
	});

	it("never includes key values in its output", () => {
		const checks = diagnose(baseInput({ flags: { cwd: "/project", projectKey: "test-secret" } }));
		expect(checks.map((check) => check.detail)).not.toContain("test-secret");
		expect(checks[2]).toEqual({ label: "Project key", status: "pass", detail: "set via --project-key" });
	});
});
