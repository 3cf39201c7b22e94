import { Command } from "commander";
import pc from "picocolors";
import { doctorCommand } from "./commands/doctor.js";
import { sendCommand } from "./commands/send.js";
import { testCommand } from "./commands/test.js";
import { parseNonNegativeInteger, parsePositiveInteger } from "./utils/parse.js";

export function createProgram(version: string): Command {
	const program = new Command()
		.name("huntglitch")
		.description("Send events to HuntGlitch and check your configuration")
		.version(version, "-v, --version")
		.option("--cwd <dir>", "Working directory", process.cwd())
		.option("-c, --config <path>", "Path to a huntglitch config file")
		.option("--project-key <key>", "Project key (or set HUNTGLITCH_PROJECT_KEY)")
		.option("--deliverable-key <key>", "Deliverable key (or set HUNTGLITCH_DELIVERABLE_KEY)")
		.option("--timeout <ms>", "Per-attempt request timeout in ms", parsePositiveInteger)
		.option("--max-retries <n>", "Retries after the first attempt", parseNonNegativeInteger)
		.option("--verbose", "Print delivery diagnostics")
		.action(() => {
			console.log(`\n  ${pc.bold(pc.cyan("huntglitch"))} ${pc.dim(`v${version}`)}\n`);
			program.help();
		});

	program.addCommand(sendCommand);
	program.addCommand(testCommand);
	program.addCommand(doctorCommand);

	return program;
}
