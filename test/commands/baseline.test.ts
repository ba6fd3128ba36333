import fs from "node:fs/promises";
import path from "node:path";
import chalk from "chalk";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { registerBaselineCommand } from "../../src/commands/baseline.js";
import { acquireLock, getLockPath } from "../../src/core/lock.js";
import {
	createWorkspace,
	QUALITY_YML,
	readJson,
	removeWorkspace,
	writeFiles,
} from "../helpers/workspace.js";

describe("Baseline Command", () => {
	let program: Command;
	const originalConsoleLog = console.log;
	const originalConsoleError = console.error;
	const originalCwd = process.cwd();
	const originalLevel = chalk.level;
	let root: string;
	let statePath: string;
	let logs: string[];
	let errors: string[];

	beforeEach(async () => {
		root = await createWorkspace({ ".qgates/quality.yml": QUALITY_YML });
		statePath = path.join(root, ".qgates", "state.json");
		program = new Command();
		registerBaselineCommand(program);
		chalk.level = 0;
		logs = [];
		errors = [];
		console.log = (...args: unknown[]) => {
			logs.push(args.join(" "));
		};
		console.error = (...args: unknown[]) => {
			errors.push(args.join(" "));
		};
		process.chdir(root);
	});

	afterEach(async () => {
		console.log = originalConsoleLog;
		console.error = originalConsoleError;
		chalk.level = originalLevel;
		process.chdir(originalCwd);
		process.exitCode = undefined;
		await removeWorkspace(root);
	});

	async function writeState(state: unknown) {
		await writeFiles(root, { ".qgates/state.json": JSON.stringify(state) });
	}

	it("should register the baseline command", () => {
		const baselineCmd = program.commands.find((cmd) => cmd.name() === "baseline");
		expect(baselineCmd).toBeDefined();
		expect(baselineCmd?.options.some((opt) => opt.long === "--reset")).toBe(true);
	});

	it("shows the recorded baseline", async () => {
		await writeState({
			parent_branch: "develop",
			quality_gates: { baseline_sha: "base1", failed_files: ["src/app.py"] },
		});

		await program.parseAsync(["node", "qgates", "baseline"]);

		expect(logs).toEqual([
			"Parent branch: develop",
			"Baseline: base1",
			"Failing files (1):",
			"  - src/app.py",
		]);
	});

	it("says when no baseline exists", async () => {
		await program.parseAsync(["node", "qgates", "baseline"]);

		expect(logs).toEqual([
			"Parent branch: main (default)",
			"No baseline established yet.",
		]);
	});

	it("clears the baseline and keeps other state", async () => {
		await writeState({
			parent_branch: "develop",
			quality_gates: { baseline_sha: "base1", failed_files: [] },
		});

		await program.parseAsync(["node", "qgates", "baseline", "--reset"]);

		expect(logs).toEqual(["Baseline cleared."]);
		expect(await readJson(statePath)).toEqual({ parent_branch: "develop" });
		await expect(fs.access(getLockPath(path.dirname(statePath)))).rejects.toThrow();
	});

	it("has nothing to clear without a baseline", async () => {
		await program.parseAsync(["node", "qgates", "baseline", "--reset"]);

		expect(logs).toEqual(["No baseline to clear."]);
		expect(process.exitCode).toBeUndefined();
	});

	it("refuses to reset a state file that is not a JSON object", async () => {
		await writeFiles(root, { ".qgates/state.json": "{ not json" });

		await program.parseAsync(["node", "qgates", "baseline", "--reset"]);

		expect(errors).toEqual([
			`Error: ${statePath} is not a JSON object; fix or remove it first.`,
		]);
		expect(process.exitCode).toBe(1);
		expect(await fs.readFile(statePath, "utf-8")).toBe("{ not json");
	});

	it("does not reset while a run holds the lock", async () => {
		await writeState({ quality_gates: { baseline_sha: "base1", failed_files: [] } });
		await acquireLock(path.dirname(statePath));

		await program.parseAsync(["node", "qgates", "baseline", "--reset"]);

		expect(process.exitCode).toBe(1);
		expect(errors[0]).toMatch(/^Error: /);
		expect(await readJson(statePath)).toEqual({
			quality_gates: { baseline_sha: "base1", failed_files: [] },
		});
	});
});
