export interface HuntGlitchBackoffOptions {
	/** Delay before the first retry in ms. Doubled on each further retry. Default: 250 */
	baseDelayMs?: number;
	/** Upper bound for any single backoff delay in ms. Default: 2000 */
	maxDelayMs?: number;
}

export interface HuntGlitchOptions {
	/** Project identifier. Falls back to `HUNTGLITCH_PROJECT_KEY` / `PROJECT_KEY`. */
	projectKey?: string;

	/** Deliverable identifier. Falls back to `HUNTGLITCH_DELIVERABLE_KEY` / `DELIVERABLE_KEY`. */
	deliverableKey?: string;

	/** Per-attempt request timeout in ms (default: 10000) */
	timeout?: number;

	/** Extra attempts after the first one on transient failures (default: 3) */
	maxRetries?: number;

	/** Return `false` instead of throwing when delivery fails (default: false) */
	silentFailures?: boolean;

	/** Backoff between retries */
	backoff?: HuntGlitchBackoffOptions;
}

/** Fully resolved, frozen configuration owned by one logger. */
export interface LoggerConfig {
	readonly projectKey: string;
	readonly deliverableKey: string;
	readonly timeout: number;
	readonly maxRetries: number;
	readonly silentFailures: boolean;
	readonly backoff: Readonly<Required<HuntGlitchBackoffOptions>>;
}

/**
 * Where configuration values come from when they are not passed explicitly.
 * The default implementation reads `process.env`.
 */
export interface ConfigSource {
	get(name: string): string | undefined;
}

/** Internal diagnostics sink. Never receives project or deliverable keys. */
export interface HuntGlitchInternalLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
