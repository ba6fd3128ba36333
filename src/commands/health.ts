import chalk from "chalk";
import type { Command } from "commander";
import { getActiveGates, loadConfig } from "../config/loader.js";
import type { ActiveGate } from "../config/types.js";
import { errorMessage } from "../errors.js";
import { resetLogger } from "../output/app-logger.js";
import {
	type CommandEnvironment,
	formatCommand,
	resolveCommand,
} from "../gates/command.js";
import { type ProcessRunner, runProcess } from "../utils/process.js";
import { initCliLogger } from "./shared.js";

const PROBE_TIMEOUT_MS = 10_000;

export interface ProbeResult {
	id: string;
	argv: string[];
	available: boolean;
	detail: string; // version line, or why the probe failed
}

/**
 * The `--version` invocation for a gate: `python -m tool` commands probe the
 * module rather than the interpreter.
 */
export function probeArgv(command: readonly string[]): string[] {
	const [executable, flag, moduleName] = command;
	if (!executable) return [];
	if (flag === "-m" && moduleName) {
		return [executable, "-m", moduleName, "--version"];
	}
	return [executable, "--version"];
}

export async function probeGate(
	gate: ActiveGate,
	rootDir: string,
	runner: ProcessRunner = runProcess,
	environment?: CommandEnvironment,
): Promise<ProbeResult> {
	const { argv } = resolveCommand(
		probeArgv(gate.config.execution.command),
		rootDir,
		environment,
	);
	const outcome = await runner(argv, {
		cwd: rootDir,
		timeoutMs: PROBE_TIMEOUT_MS,
	});

	if (outcome.kind === "failed") {
		return { id: gate.id, argv, available: false, detail: outcome.error };
	}
	if (outcome.timedOut) {
		return { id: gate.id, argv, available: false, detail: "timed out" };
	}

	const firstLine =
		`${outcome.stdout}\n${outcome.stderr}`
			.split(/\r?\n/)
			.map((line) => line.trim())
			.find((line) => line.length > 0) ?? "";
	if (outcome.exitCode !== 0) {
		return {
			id: gate.id,
			argv,
			available: false,
			detail: firstLine || `exit code ${outcome.exitCode}`,
		};
	}
	return { id: gate.id, argv, available: true, detail: firstLine };
}

export function registerHealthCommand(program: Command): void {
	program
		.command("health")
		.description("Check that every active gate's tool can be launched")
		.action(async () => {
			try {
				const config = await loadConfig();
				await initCliLogger(config);
				console.log(chalk.green("  ✓ Configuration is valid"));
				console.log();
				console.log(chalk.bold("Gate tool health check:"));

				let allAvailable = true;
				for (const gate of getActiveGates(config)) {
					const probe = await probeGate(gate, config.rootDir);
					allAvailable &&= probe.available;
					const status = probe.available
						? chalk.green("Installed")
						: chalk.red("Missing");
					console.log(`${gate.id.padEnd(16)} : ${status} ${chalk.dim(probe.detail)}`);
					if (!probe.available) {
						console.log(chalk.dim(`${"".padEnd(19)}${formatCommand(probe.argv)}`));
					}
				}
				process.exitCode = allAvailable ? 0 : 1;
			} catch (error: unknown) {
				console.error(chalk.red("Error:"), errorMessage(error));
				process.exitCode = 1;
			} finally {
				await resetLogger();
			}
		});
}
