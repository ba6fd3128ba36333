import chalk from "chalk";
import type { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import { errorMessage } from "../errors.js";

export function registerValidateCommand(program: Command): void {
	program
		.command("validate")
		.description("Validate .qgates/quality.yml against the schema")
		.action(async () => {
			try {
				const config = await loadConfig();
				console.log(
					chalk.green(
						`Configuration is valid (${config.quality.active_gates.length} active gate(s)).`,
					),
				);
				process.exitCode = 0;
			} catch (error: unknown) {
				console.error(chalk.red("Validation failed:"), errorMessage(error));
				process.exitCode = 1;
			}
		});
}
