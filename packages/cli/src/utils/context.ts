import { createConsoleLogger } from "@huntglitch/core/logger";
import { createHuntGlitchLogger, type HuntGlitchLogger } from "huntglitch";
import {
	type CliConfigInput,
	type Env,
	type GlobalFlags,
	loadFileConfig,
	resolveCliOptions,
} from "./get-config.js";

export interface CliContext {
	input: CliConfigInput;
	configFile: string | null;
	/** Build a logger from the resolved configuration. Throws ConfigurationError on missing keys. */
	createLogger(): HuntGlitchLogger;
}

export async function loadCliContext(
	flags: GlobalFlags,
	env: Env = process.env,
): Promise<CliContext> {
	const { config, configFile } = await loadFileConfig({ cwd: flags.cwd, configPath: flags.config });
	const input: CliConfigInput = { flags, env, file: config };

	return {
		input,
		configFile,
		createLogger: () =>
			createHuntGlitchLogger({
				...resolveCliOptions(input),
				logger: createConsoleLogger({ level: flags.verbose ? "debug" : "warn" }),
			}),
	};
}
