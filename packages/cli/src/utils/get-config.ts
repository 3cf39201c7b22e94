// =============================================================================
// Config loader — flags, then environment, then huntglitch.config via c12
// =============================================================================
// The environment is populated from .env by `dotenv/config` at startup. A
// config file is optional; c12 looks for huntglitch.config.{ts,js,mjs,json,...}
// in the working directory.

import { existsSync } from "node:fs";
import type { ConfigSource, HuntGlitchOptions } from "@huntglitch/core";
import { loadConfig } from "c12";
import { ENV_KEYS, type HuntGlitchLoggerOptions } from "huntglitch";

export type Env = Record<string, string | undefined>;

/** Options shared by every command, set on the root program. */
export interface GlobalFlags {
	cwd: string;
	config?: string;
	projectKey?: string;
	deliverableKey?: string;
	timeout?: number;
	maxRetries?: number;
	verbose?: boolean;
}

export interface LoadedFileConfig {
	config: HuntGlitchOptions;
	/** Absolute path of the file that was loaded, or null when none was found */
	configFile: string | null;
}

export interface CliConfigInput {
	flags: GlobalFlags;
	env: Env;
	file: HuntGlitchOptions;
}

export type KeyName = keyof typeof ENV_KEYS;

export type KeySource =
	| { kind: "flag" }
	| { kind: "env"; variable: string }
	| { kind: "file" };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(value: unknown): string | undefined {
	return typeof value === "string" ? value : undefined;
}

function numberField(value: unknown): number | undefined {
	return typeof value === "number" ? value : undefined;
}

function present(value: string | undefined): value is string {
	return value !== undefined && value.trim().length > 0;
}

/** Keep the recognized options from a loaded config object and drop everything else. */
export function normalizeFileConfig(raw: unknown): HuntGlitchOptions {
	if (!isRecord(raw)) return {};

	const config: HuntGlitchOptions = {
		projectKey: stringField(raw.projectKey),
		deliverableKey: stringField(raw.deliverableKey),
		timeout: numberField(raw.timeout),
		maxRetries: numberField(raw.maxRetries),
	};
	const backoff = raw.backoff;
	if (isRecord(backoff)) {
		config.backoff = {
			baseDelayMs: numberField(backoff.baseDelayMs),
			maxDelayMs: numberField(backoff.maxDelayMs),
		};
	}
	return config;
}

export async function loadFileConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<LoadedFileConfig> {
	const { config, configFile } = await loadConfig<Record<string, unknown>>({
		name: "huntglitch",
		cwd,
		...(configPath ? { configFile: configPath } : {}),
		dotenv: false,
		rcFile: false,
		packageJson: false,
		globalRc: false,
	});

	return {
		config: normalizeFileConfig(config),
		configFile: configFile && existsSync(configFile) ? configFile : null,
	};
}

/**
 * Environment first, config file second. The file's keys answer only for the
 * last variable name of each key, so every environment name outranks them.
 */
export function layeredConfigSource(env: Env, file: HuntGlitchOptions): ConfigSource {
	const fallbacks = new Map<string, string | undefined>();
	for (const key of ["projectKey", "deliverableKey"] as const) {
		const last = ENV_KEYS[key].at(-1);
		if (last) fallbacks.set(last, file[key]);
	}

	return {
		get(name) {
			const value = env[name];
			return present(value) ? value : fallbacks.get(name);
		},
	};
}

/** Logger options for a CLI run. Delivery failures are never silent here. */
export function resolveCliOptions({ flags, env, file }: CliConfigInput): HuntGlitchLoggerOptions {
	return {
		projectKey: flags.projectKey,
		deliverableKey: flags.deliverableKey,
		timeout: flags.timeout ?? file.timeout,
		maxRetries: flags.maxRetries ?? file.maxRetries,
		backoff: file.backoff,
		silentFailures: false,
		configSource: layeredConfigSource(env, file),
	};
}

/** Where a key would be read from, following the same precedence as {@link resolveCliOptions}. */
export function findKeySource(key: KeyName, { flags, env, file }: CliConfigInput): KeySource | undefined {
	if (present(flags[key])) return { kind: "flag" };
	for (const variable of ENV_KEYS[key]) {
		if (present(env[variable])) return { kind: "env", variable };
	}
	if (present(file[key])) return { kind: "file" };
	return undefined;
}
