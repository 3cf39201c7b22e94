// =============================================================================
// SEND COMMAND — Deliver a custom event from the command line
// =============================================================================

import * as p from "@clack/prompts";
import { Command } from "commander";
import { buildRecord, type LogEvent } from "huntglitch";
import pc from "picocolors";
import { loadCliContext } from "../utils/context.js";
import type { GlobalFlags } from "../utils/get-config.js";
import { collectKeyValue, parseNonNegativeInteger } from "../utils/parse.js";

interface SendFlags {
	name: string;
	message: string;
	severity: string;
	file: string;
	line: number;
	data: Record<string, string>;
	tag: Record<string, string>;
}

export function eventFromFlags(flags: SendFlags): LogEvent {
	return {
		errorName: flags.name,
		errorValue: flags.message,
		sourceFile: flags.file,
		sourceLine: flags.line,
		severity: flags.severity,
		additionalData: flags.data,
		tags: flags.tag,
	};
}

export const sendCommand = new Command("send")
	.description("Send a custom event to HuntGlitch")
	.requiredOption("-n, --name <name>", "Event name")
	.requiredOption("-m, --message <message>", "Event message")
	.option("-s, --severity <severity>", "info, warning, error, critical or 1-4", "info")
	.option("--file <file>", "Source file to attribute the event to", "cli")
	.option("--line <line>", "Source line to attribute the event to", parseNonNegativeInteger, 0)
	.option("-d, --data <key=value>", "Additional data (repeatable)", collectKeyValue, {})
	.option("-t, --tag <key=value>", "Tag (repeatable)", collectKeyValue, {})
	.action(async (flags: SendFlags) => {
		const globals = sendCommand.optsWithGlobals<GlobalFlags>();
		const context = await loadCliContext(globals);
		const logger = context.createLogger();

		p.intro(pc.bgCyan(pc.black(" huntglitch send ")));

		const s = p.spinner();
		s.start("Sending event");
		try {
			const outcome = await logger.report(buildRecord(eventFromFlags(flags)));
			s.stop(
				`${pc.green("Delivered")} ${pc.dim(`in ${outcome.attemptsMade} attempt(s), HTTP ${outcome.status ?? "?"}`)}`,
			);
		} catch (error) {
			s.stop(pc.red("Delivery failed"));
			throw error;
		}

		p.outro(pc.dim(`${flags.name}: ${flags.message}`));
	});
