import chalk from "chalk";
import type { Command } from "commander";
import { getActiveGates, loadConfig } from "../config/loader.js";
import { filesForGate } from "../core/gate-files.js";
import {
	describeScope,
	QualityGateRunner,
	type QualityGateRunnerOptions,
} from "../core/runner.js";
import { errorMessage } from "../errors.js";
import { resetLogger } from "../output/app-logger.js";
import { parseScopeRequest } from "../tools/run-quality-gates.js";
import { buildToolInput, initCliLogger } from "./shared.js";

export function registerDetectCommand(
	program: Command,
	context: QualityGateRunnerOptions = {},
): void {
	program
		.command("detect")
		.description(
			"Show the resolved scope and each gate's files (without executing them)",
		)
		.argument("[paths...]", "Files or directories (implies --scope files)")
		.option("-s, --scope <mode>", "Scope: auto, branch, project or files")
		.action(async (paths: string[], options: { scope?: string }) => {
			try {
				const request = parseScopeRequest(buildToolInput(paths, options.scope));
				const config = await loadConfig();
				await initCliLogger(config);

				const runner = new QualityGateRunner(config, context);
				const scope = await runner.scopeResolver.resolve(request);

				console.log(
					chalk.bold(
						`Scope: ${describeScope(scope)} (baseline policy: ${scope.policy})`,
					),
				);
				for (const issue of scope.issues) {
					console.log(chalk.yellow(`  ! ${issue.message}`));
				}

				if (scope.files.length === 0) {
					console.log(chalk.green("Nothing to check."));
					return;
				}

				console.log(chalk.dim(`Found ${scope.files.length} candidate file(s):`));
				for (const file of scope.files) {
					console.log(chalk.dim(`  - ${file}`));
				}
				console.log();

				for (const gate of getActiveGates(config)) {
					const files = filesForGate(gate.config, scope.files);
					if (files.length === 0) {
						console.log(`${chalk.dim("skip")} ${chalk.bold(gate.id)}`);
					} else {
						console.log(
							`${chalk.yellow("run ")} ${chalk.bold(gate.id)} (${files.length} file(s))`,
						);
					}
				}
			} catch (error: unknown) {
				console.error(chalk.red("Error:"), errorMessage(error));
				process.exitCode = 1;
			} finally {
				await resetLogger();
			}
		});
}
