export {
	DEFAULT_SEVERITY,
	isSeverity,
	normalizeSeverity,
	SEVERITY_CODES,
} from "./severity.js";
export {
	isApplicationFrame,
	parseStackFrames,
	resolveSourceLocation,
	type SourceLocation,
	type StackFrame,
	selectSourceFrame,
	UNKNOWN_LOCATION,
} from "./stack.js";
