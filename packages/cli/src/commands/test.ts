// =============================================================================
// TEST COMMAND — Send a synthetic error to verify the setup end to end
// =============================================================================

import { platform } from "node:os";
import * as p from "@clack/prompts";
import { Command } from "commander";
import { buildRecordFromError, type LogRecord } from "huntglitch";
import pc from "picocolors";
import { loadCliContext } from "../utils/context.js";
import type { GlobalFlags } from "../utils/get-config.js";

export class HuntGlitchTestError extends Error {
	constructor() {
		super("This is a test error sent by `huntglitch test`");
		this.name = "HuntGlitchTestError";
	}
}

export function testRecord(severity: string): LogRecord {
	return buildRecordFromError(new HuntGlitchTestError(), {
		severity,
		additionalData: { node_version: process.version, platform: platform() },
		tags: { source: "huntglitch-cli" },
	});
}

export const testCommand = new Command("test")
	.description("Send a synthetic error to verify your HuntGlitch setup")
	.option("-s, --severity <severity>", "Severity of the test event", "info")
	.action(async (options: { severity: string }) => {
		const globals = testCommand.optsWithGlobals<GlobalFlags>();
		const context = await loadCliContext(globals);
		const logger = context.createLogger();

		p.intro(pc.bgCyan(pc.black(" huntglitch test ")));

		const s = p.spinner();
		s.start("Sending test error");
		try {
			const outcome = await logger.report(testRecord(options.severity));
			s.stop(`${pc.green("Test error delivered")} ${pc.dim(`(HTTP ${outcome.status ?? "?"})`)}`);
		} catch (error) {
			s.stop(pc.red("Test error was not delivered"));
			throw error;
		}

		p.outro(`Look for ${pc.cyan("HuntGlitchTestError")} in your HuntGlitch dashboard.`);
	});
