import path from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import { acquireLock, releaseLock } from "../core/lock.js";
import { StateStore } from "../core/state-store.js";
import { errorMessage } from "../errors.js";
import { resetLogger } from "../output/app-logger.js";
import { initCliLogger } from "./shared.js";

export function registerBaselineCommand(program: Command): void {
	program
		.command("baseline")
		.description("Show the persisted baseline (or reset it)")
		.option("--reset", "Forget the baseline; the next auto run checks the project")
		.action(async (options: { reset?: boolean }) => {
			try {
				const config = await loadConfig();
				await initCliLogger(config);
				const store = new StateStore(config.rootDir, config.quality.state_file);

				if (options.reset) {
					const stateDir = path.dirname(store.statePath);
					await acquireLock(stateDir);
					try {
						const outcome = await store.clearBaseline();
						if (outcome === "refused") {
							console.error(
								chalk.red("Error:"),
								`${store.statePath} is not a JSON object; fix or remove it first.`,
							);
							process.exitCode = 1;
						} else {
							console.log(
								outcome === "cleared"
									? chalk.green("Baseline cleared.")
									: chalk.dim("No baseline to clear."),
							);
						}
					} finally {
						await releaseLock(stateDir);
					}
					return;
				}

				const parent = await store.readParentBranch();
				console.log(
					`Parent branch: ${parent ?? chalk.dim(`${config.quality.scope.default_parent_branch} (default)`)}`,
				);

				const baseline = await store.readBaseline();
				if (!baseline) {
					console.log(chalk.yellow("No baseline established yet."));
					return;
				}
				console.log(`Baseline: ${chalk.bold(baseline.baseline_sha)}`);
				if (baseline.failed_files.length === 0) {
					console.log(chalk.green("No failing files recorded."));
				} else {
					console.log(`Failing files (${baseline.failed_files.length}):`);
					for (const file of baseline.failed_files) {
						console.log(`  - ${file}`);
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
