import { InvalidArgumentError } from "commander";

/** Split "key=value" at the first "=". The value may be empty; the key may not. */
export function parseKeyValue(input: string): [string, string] {
	const separator = input.indexOf("=");
	if (separator <= 0) {
		throw new InvalidArgumentError(`Expected key=value, got "${input}".`);
	}
	return [input.slice(0, separator).trim(), input.slice(separator + 1)];
}

/** Commander reducer for repeatable `key=value` options. */
export function collectKeyValue(
	input: string,
	previous: Record<string, string>,
): Record<string, string> {
	const [key, value] = parseKeyValue(input);
	return { ...previous, [key]: value };
}

export function parseNonNegativeInteger(input: string): number {
	const value = Number(input);
	if (!/^\d+$/.test(input.trim()) || !Number.isSafeInteger(value)) {
		throw new InvalidArgumentError("Expected a non-negative integer.");
	}
	return value;
}

export function parsePositiveInteger(input: string): number {
	const value = parseNonNegativeInteger(input);
	if (value === 0) throw new InvalidArgumentError("Expected a positive integer.");
	return value;
}
