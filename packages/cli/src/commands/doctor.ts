// =============================================================================
// DOCTOR COMMAND — Check configuration without sending anything
// =============================================================================

import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { loadCliContext } from "../utils/context.js";
import { type DoctorCheck, diagnose, hasFailures } from "../utils/diagnose.js";
import type { GlobalFlags } from "../utils/get-config.js";

const LABEL_WIDTH = 18;

function printCheck({ label, status, detail }: DoctorCheck): void {
	const line = `  ${`${label}:`.padEnd(LABEL_WIDTH)}`;
	switch (status) {
		case "pass":
			p.log.success(`${line}${pc.green(detail)}`);
			break;
		case "info":
			p.log.info(`${line}${pc.dim(detail)}`);
			break;
		case "warn":
			p.log.warning(`${line}${pc.yellow(detail)}`);
			break;
		case "fail":
			p.log.error(`${line}${pc.red(detail)}`);
			break;
	}
}

export const doctorCommand = new Command("doctor")
	.description("Check HuntGlitch configuration without sending anything")
	.action(async () => {
		const globals = doctorCommand.optsWithGlobals<GlobalFlags>();
		const context = await loadCliContext(globals);

		p.intro(pc.bgCyan(pc.black(" huntglitch doctor ")));

		const checks = diagnose({
			...context.input,
			configFile: context.configFile,
			nodeVersion: process.version,
		});
		for (const check of checks) printCheck(check);

		const failed = checks.filter((check) => check.status === "fail").length;
		if (hasFailures(checks)) {
			p.outro(`${pc.red("Issues found that need attention.")} ${pc.dim(`(${failed} failed)`)}`);
			process.exitCode = 1;
		} else {
			p.outro(pc.green("Ready to report to HuntGlitch."));
		}
	});
