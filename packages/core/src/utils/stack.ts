// =============================================================================
// STACK FRAMES — Pull a source location out of a V8 stack string
// =============================================================================

import { fileURLToPath } from "node:url";

export interface StackFrame {
	functionName?: string;
	file: string;
	line: number;
	column: number;
}

export interface SourceLocation {
	sourceFile: string;
	sourceLine: number;
}

export const UNKNOWN_LOCATION: Readonly<SourceLocation> = Object.freeze({
	sourceFile: "<unknown>",
	sourceLine: 0,
});

// "    at fn (/app/src/file.js:10:5)" or "    at /app/src/file.js:10:5"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;

function toPath(file: string): string {
	if (!file.startsWith("file://")) return file;
	try {
		return fileURLToPath(file);
	} catch {
		return file;
	}
}

/** Parse every recognizable frame, innermost first. Unparseable lines are skipped. */
export function parseStackFrames(stack: string | undefined): StackFrame[] {
	if (!stack) return [];

	const frames: StackFrame[] = [];
	for (const line of stack.split("\n")) {
		const match = FRAME_PATTERN.exec(line);
		if (!match) continue;

		const [, functionName, file, lineNo, column] = match;
		if (!file || !lineNo || !column) continue;

		frames.push({
			...(functionName ? { functionName } : {}),
			file: toPath(file),
			line: Number(lineNo),
			column: Number(column),
		});
	}
	return frames;
}

/** Whether a frame points into the caller's own code rather than Node or a dependency. */
export function isApplicationFrame(frame: StackFrame): boolean {
	const { file } = frame;
	if (file.startsWith("node:") || file.startsWith("internal/")) return false;
	if (file === "<anonymous>" || file === "native") return false;
	return !/[\\/]node_modules[\\/]/.test(file);
}

/**
 * Pick the frame a log record is attributed to: the innermost application
 * frame, falling back to the innermost frame of any kind.
 */
export function selectSourceFrame(stack: string | undefined): StackFrame | undefined {
	const frames = parseStackFrames(stack);
	return frames.find(isApplicationFrame) ?? frames[0];
}

export function resolveSourceLocation(stack: string | undefined): SourceLocation {
	const frame = selectSourceFrame(stack);
	if (!frame) return { ...UNKNOWN_LOCATION };
	return { sourceFile: frame.file, sourceLine: frame.line };
}
