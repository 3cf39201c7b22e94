// =============================================================================
// CONFIGURATION — Resolve explicit options + ambient source into LoggerConfig
// =============================================================================
// Precedence: explicit option → ConfigSource → default. Required keys have no
// default; a missing key fails here, at construction, never at first use.

import {
	type ConfigSource,
	ConfigurationError,
	type HuntGlitchOptions,
	type LoggerConfig,
} from "@huntglitch/core";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_SILENT_FAILURES = false;
export const DEFAULT_BACKOFF = Object.freeze({ baseDelayMs: 250, maxDelayMs: 2_000 });

/** Environment variable names per key. Earlier names win. */
export const ENV_KEYS = {
	projectKey: ["HUNTGLITCH_PROJECT_KEY", "PROJECT_KEY"],
	deliverableKey: ["HUNTGLITCH_DELIVERABLE_KEY", "DELIVERABLE_KEY"],
} as const;

/** Read configuration from an environment map (default: `process.env`). */
export function envConfigSource(
	env: Record<string, string | undefined> = process.env,
): ConfigSource {
	return { get: (name) => env[name] };
}

function nonEmpty(value: string | undefined): string | undefined {
	if (value === undefined) return undefined;
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

function lookup(
	explicit: string | undefined,
	names: readonly string[],
	source: ConfigSource,
): string | undefined {
	const direct = nonEmpty(explicit);
	if (direct) return direct;
	for (const name of names) {
		const value = nonEmpty(source.get(name));
		if (value) return value;
	}
	return undefined;
}

function assertPositive(name: string, value: number): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(`"${name}" must be a positive number, got ${value}`, {
			details: { option: name },
		});
	}
	return value;
}

function assertNonNegativeInteger(name: string, value: number): number {
	if (!Number.isInteger(value) || value < 0) {
		throw new ConfigurationError(`"${name}" must be a non-negative integer, got ${value}`, {
			details: { option: name },
		});
	}
	return value;
}

/**
 * Resolve a frozen LoggerConfig.
 *
 * @throws {ConfigurationError} when projectKey or deliverableKey is missing,
 * or a tuning value is out of range.
 */
export function resolveConfig(
	options: HuntGlitchOptions = {},
	source: ConfigSource = envConfigSource(),
): LoggerConfig {
	const projectKey = lookup(options.projectKey, ENV_KEYS.projectKey, source);
	const deliverableKey = lookup(options.deliverableKey, ENV_KEYS.deliverableKey, source);

	if (!projectKey || !deliverableKey) {
		const missing: string[] = [];
		if (!projectKey) missing.push("projectKey");
		if (!deliverableKey) missing.push("deliverableKey");
		throw ConfigurationError.missingKeys(missing);
	}

	const baseDelayMs = assertNonNegativeInteger(
		"backoff.baseDelayMs",
		options.backoff?.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
	);
	const maxDelayMs = assertNonNegativeInteger(
		"backoff.maxDelayMs",
		options.backoff?.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
	);

	return Object.freeze({
		projectKey,
		deliverableKey,
		timeout: assertPositive("timeout", options.timeout ?? DEFAULT_TIMEOUT_MS),
		maxRetries: assertNonNegativeInteger("maxRetries", options.maxRetries ?? DEFAULT_MAX_RETRIES),
		silentFailures: options.silentFailures ?? DEFAULT_SILENT_FAILURES,
		backoff: Object.freeze({ baseDelayMs, maxDelayMs: Math.max(maxDelayMs, baseDelayMs) }),
	});
}
