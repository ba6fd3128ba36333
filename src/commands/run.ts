import chalk from "chalk";
import type { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import type { QualityGateRunnerOptions } from "../core/runner.js";
import { resetLogger } from "../output/app-logger.js";
import { ConsoleReporter } from "../output/console.js";
import {
	type RunQualityGatesResponse,
	runQualityGates,
	toErrorResponse,
} from "../tools/run-quality-gates.js";
import { buildToolInput, initCliLogger } from "./shared.js";

interface RunOptions {
	scope?: string;
	json?: boolean;
}

export function registerRunCommand(
	program: Command,
	context: QualityGateRunnerOptions = {},
): void {
	program
		.command("run")
		.description("Run quality gates over the resolved scope")
		.argument(
			"[paths...]",
			"Files or directories to check (implies --scope files)",
		)
		.option("-s, --scope <mode>", "Scope: auto, branch, project or files")
		.option("--json", "Print the summary and compact payload as JSON")
		.action(async (paths: string[], options: RunOptions) => {
			const reporter = options.json ? undefined : new ConsoleReporter();
			let response: RunQualityGatesResponse;

			try {
				const config = await loadConfig();
				await initCliLogger(config, { quiet: options.json });
				response = await runQualityGates(
					buildToolInput(paths, options.scope),
					{ ...context, config, reporter },
				);
			} catch (error: unknown) {
				response = toErrorResponse(error);
			} finally {
				await resetLogger();
			}

			if (options.json) {
				console.log(JSON.stringify(response.content, null, 2));
			} else if (response.isError) {
				console.error(chalk.red("Error:"), response.error.message);
			} else {
				reporter?.printSummary(response.report);
			}

			process.exitCode =
				response.isError || !response.report.overallPass ? 1 : 0;
		});
}
