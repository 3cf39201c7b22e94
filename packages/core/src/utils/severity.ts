// =============================================================================
// SEVERITY — Normalize symbolic names and numeric codes to one closed set
// =============================================================================
// Logging must never be blocked by a malformed severity, so anything that
// does not map cleanly falls back to "error".

import { SEVERITIES, type Severity, type SeverityInput } from "../types/record.js";

export const DEFAULT_SEVERITY: Severity = "error";

/** Numeric wire codes, 1 (least severe) to 4 (most severe). */
export const SEVERITY_CODES: Readonly<Record<Severity, number>> = {
	info: 1,
	warning: 2,
	error: 3,
	critical: 4,
};

const CODE_TO_SEVERITY: ReadonlyMap<number, Severity> = new Map(
	SEVERITIES.map((name): [number, Severity] => [SEVERITY_CODES[name], name]),
);

const ALIASES: ReadonlyMap<string, Severity> = new Map<string, Severity>([
	["info", "info"],
	["debug", "info"],
	["notice", "info"],
	["warning", "warning"],
	["warn", "warning"],
	["error", "error"],
	["err", "error"],
	["critical", "critical"],
	["crit", "critical"],
	["fatal", "critical"],
]);

export function normalizeSeverity(input: SeverityInput | undefined | null): Severity {
	if (input === undefined || input === null) return DEFAULT_SEVERITY;

	if (typeof input === "number") {
		return CODE_TO_SEVERITY.get(input) ?? DEFAULT_SEVERITY;
	}

	const key = input.trim().toLowerCase();
	if (/^\d+$/.test(key)) {
		return CODE_TO_SEVERITY.get(Number(key)) ?? DEFAULT_SEVERITY;
	}
	return ALIASES.get(key) ?? DEFAULT_SEVERITY;
}

export function isSeverity(value: unknown): value is Severity {
	return SEVERITIES.some((severity) => severity === value);
}
