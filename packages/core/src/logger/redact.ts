// =============================================================================
// REDACTION — Keep keys and credentials out of diagnostic output
// =============================================================================
// Diagnostics can carry payload-shaped data (`additional_data`, request
// headers), so matching keys are redacted inside nested plain objects and
// arrays too. Matching ignores case.

export const REDACTED = "[REDACTED]";

/** Nesting depth below which values are left as they are. */
const MAX_DEPTH = 5;

const DEFAULT_REDACT_KEYS = [
	"projectKey",
	"deliverableKey",
	"project_key",
	"deliverable_key",
	"authorization",
	"cookie",
	"password",
	"token",
	"secret",
];

export function buildRedactKeys(userKeys?: string[]): ReadonlySet<string> {
	return new Set((userKeys ?? DEFAULT_REDACT_KEYS).map((key) => key.toLowerCase()));
}

function isPlainObject(value: object): value is Record<string, unknown> {
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function redactValue(value: unknown, keys: ReadonlySet<string>, depth: number): unknown {
	if (depth >= MAX_DEPTH || typeof value !== "object" || value === null) return value;

	if (Array.isArray(value)) {
		let changed = false;
		const items = value.map((item: unknown) => {
			const next = redactValue(item, keys, depth + 1);
			if (next !== item) changed = true;
			return next;
		});
		return changed ? items : value;
	}

	return isPlainObject(value) ? redactRecord(value, keys, depth) : value;
}

function redactRecord(
	record: Record<string, unknown>,
	keys: ReadonlySet<string>,
	depth: number,
): Record<string, unknown> {
	let copy: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(record)) {
		const next = keys.has(key.toLowerCase()) ? REDACTED : redactValue(value, keys, depth + 1);
		if (next === value) continue;
		copy ??= { ...record };
		copy[key] = next;
	}
	return copy ?? record;
}

/**
 * Redact matching keys anywhere in `data`. Returns `data` itself when nothing
 * matched; otherwise copies only the objects on the path to a match.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: ReadonlySet<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;
	return redactRecord(data, keys, 0);
}
