import chalk from "chalk";
import type { Command } from "commander";
import { getActiveGates, loadConfig } from "../config/loader.js";
import { errorMessage } from "../errors.js";
import { formatCommand } from "../gates/command.js";

export function registerListCommand(program: Command): void {
	program
		.command("list")
		.description("List active gates")
		.action(async () => {
			try {
				const config = await loadConfig();
				console.log(chalk.bold("Active Gates:"));
				for (const { id, config: gate } of getActiveGates(config)) {
					const autofix = gate.capabilities.supports_autofix
						? chalk.green("autofix")
						: chalk.dim("no autofix");
					console.log(` - ${chalk.bold(id)}: ${gate.name}`);
					console.log(
						`   ${gate.parsing.strategy} · ${gate.capabilities.file_types.join(", ")} · ${autofix}`,
					);
					console.log(chalk.dim(`   ${formatCommand(gate.execution.command)}`));
				}
			} catch (error: unknown) {
				console.error(chalk.red("Error:"), errorMessage(error));
				process.exitCode = 1;
			}
		});
}
