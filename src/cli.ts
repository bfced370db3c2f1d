#!/usr/bin/env tsx

import "dotenv/config";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { isDispatchMode } from "./config";
import { ConfigurationError } from "./exceptions";
import { formatResults, writeResults } from "./intake/output";
import { DEFAULT_PRACTICES, loadPractices } from "./intake/practices";
import { IntakeDispatcher } from "./intake/service";
import type { PracticeTarget } from "./intake/views";
import intakeLogger from "./logging_config";

const logger = intakeLogger.child({
	module: "cli",
});

async function main(): Promise<void> {
	const argv = await yargs(hideBin(process.argv))
		.scriptName("gp-intake-checker")
		.usage("$0 [options]\n\nCheck which GP practices are accepting new patients.")
		.option("targets", {
			alias: "t",
			type: "string",
			description: "JSON file with an array of { name, url } practices",
		})
		.option("output", {
			alias: "o",
			type: "string",
			description: "Also write the JSON results to this file",
		})
		.option("mode", {
			type: "string",
			choices: ["per-target", "batch"],
			description: "One hosted task per practice, or one task for all",
		})
		.option("max-steps", {
			type: "number",
			description: "Maximum agent steps per hosted task",
		})
		.option("debug", {
			type: "boolean",
			description: "Enable debug logging",
		})
		.strict()
		.help()
		.parse();

	if (argv.debug) {
		intakeLogger.level = "debug";
	}

	const mode = argv.mode;
	if (mode !== undefined && !isDispatchMode(mode)) {
		throw new ConfigurationError(`Unknown mode "${mode}"`);
	}
	const maxSteps = argv["max-steps"];
	if (maxSteps !== undefined && (!Number.isInteger(maxSteps) || maxSteps <= 0)) {
		throw new ConfigurationError("--max-steps must be a positive integer");
	}

	const dispatcher = IntakeDispatcher.fromConfig({ mode, maxAgentSteps: maxSteps });
	const practices: readonly PracticeTarget[] = argv.targets
		? await loadPractices(argv.targets)
		: DEFAULT_PRACTICES;

	const results = await dispatcher.check(practices);

	if (argv.output) {
		const written = await writeResults(results, argv.output);
		logger.info(`💾 Results saved to ${written}`);
	}
	console.log(formatResults(results));
}

main().catch((error: unknown) => {
	if (error instanceof Error) {
		logger.error(`${error.name}: ${error.message}`);
		logger.debug(error.stack ?? "");
	} else {
		logger.error(`Fatal error: ${String(error)}`);
	}
	process.exitCode = 1;
});
