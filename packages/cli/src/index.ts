#!/usr/bin/env node
import "dotenv/config";
import { describeError } from "@huntglitch/core";
import { CommanderError } from "commander";
import { SDK_VERSION } from "huntglitch";
import pc from "picocolors";
import { createProgram } from "./program.js";

// Graceful shutdown
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const program = createProgram(SDK_VERSION);
program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof CommanderError) {
		// Help, version and usage errors have already been printed by commander.
		process.exit(error.exitCode);
	}
	console.error(pc.red(describeError(error)));
	process.exit(1);
}
