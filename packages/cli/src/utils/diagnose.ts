// =============================================================================
// DIAGNOSE — Configuration checks behind `huntglitch doctor`
// =============================================================================
// Nothing here sends a request or prints a key.

import { describeError } from "@huntglitch/core";
import { ENV_KEYS, HUNTGLITCH_ENDPOINT, resolveConfig } from "huntglitch";
import {
	type CliConfigInput,
	findKeySource,
	type KeyName,
	type KeySource,
	resolveCliOptions,
} from "./get-config.js";

export const MIN_NODE_MAJOR = 20;

export type CheckStatus = "pass" | "info" | "warn" | "fail";

export interface DoctorCheck {
	label: string;
	status: CheckStatus;
	detail: string;
}

export interface DiagnoseInput extends CliConfigInput {
	configFile: string | null;
	/** e.g. "v20.11.1" */
	nodeVersion: string;
}

const KEY_FLAGS: Record<KeyName, string> = {
	projectKey: "--project-key",
	deliverableKey: "--deliverable-key",
};

function describeSource(key: KeyName, source: KeySource): string {
	switch (source.kind) {
		case "flag":
			return `set via ${KEY_FLAGS[key]}`;
		case "env":
			return `set via ${source.variable}`;
		case "file":
			return "set in config file";
	}
}

function checkNode(nodeVersion: string): DoctorCheck {
	const major = Number.parseInt(nodeVersion.replace(/^v/, ""), 10);
	if (major >= MIN_NODE_MAJOR) {
		return { label: "Node.js", status: "pass", detail: nodeVersion };
	}
	return {
		label: "Node.js",
		status: "fail",
		detail: `${nodeVersion} (requires >= ${MIN_NODE_MAJOR})`,
	};
}

function checkConfigFile(configFile: string | null): DoctorCheck {
	return configFile
		? { label: "Config file", status: "pass", detail: configFile }
		: { label: "Config file", status: "info", detail: "none (optional)" };
}

function checkKey(key: KeyName, label: string, input: CliConfigInput): DoctorCheck {
	const source = findKeySource(key, input);
	if (source) return { label, status: "pass", detail: describeSource(key, source) };

	const [variable] = ENV_KEYS[key];
	return {
		label,
		status: "fail",
		detail: `missing; pass ${KEY_FLAGS[key]} or set ${variable}`,
	};
}

function checkSettings(input: CliConfigInput): DoctorCheck {
	const options = resolveCliOptions(input);
	try {
		const config = resolveConfig(options, options.configSource);
		return {
			label: "Delivery settings",
			status: "pass",
			detail: `timeout ${config.timeout}ms, ${config.maxRetries} retries`,
		};
	} catch (error) {
		return { label: "Delivery settings", status: "fail", detail: describeError(error) };
	}
}

/** Run every check. Delivery settings are only validated once both keys are present. */
export function diagnose(input: DiagnoseInput): DoctorCheck[] {
	const checks = [
		checkNode(input.nodeVersion),
		checkConfigFile(input.configFile),
		checkKey("projectKey", "Project key", input),
		checkKey("deliverableKey", "Deliverable key", input),
	];

	if (checks.every((check) => check.status !== "fail")) {
		checks.push(checkSettings(input));
	}
	checks.push({ label: "Endpoint", status: "info", detail: HUNTGLITCH_ENDPOINT });
	return checks;
}

export function hasFailures(checks: DoctorCheck[]): boolean {
	return checks.some((check) => check.status === "fail");
}
