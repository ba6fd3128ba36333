import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, RunInProgressError } from "../../src/errors.js";
import type { CommandEnvironment } from "../../src/gates/command.js";
import {
	parseScopeRequest,
	runQualityGates,
	toErrorResponse,
} from "../../src/tools/run-quality-gates.js";
import {
	createFakeRunner,
	exited,
	gitHandler,
	toolHandler,
} from "../helpers/fake-process.js";
import {
	createWorkspace,
	makeConfig,
	removeWorkspace,
	writeFiles,
} from "../helpers/workspace.js";

const noVenv: CommandEnvironment = {
	env: {},
	platform: "linux",
	exists: () => false,
};

describe("parseScopeRequest", () => {
	it("defaults to auto", () => {
		expect(parseScopeRequest({})).toEqual({ mode: "auto" });
	});

	it("passes the files list through for files scope", () => {
		expect(parseScopeRequest({ scope: "files", files: ["src/a.py"] })).toEqual({
			mode: "files",
			files: ["src/a.py"],
		});
	});

	it.each([
		[{ scope: "files", files: [] }],
		[{ scope: "files" }],
		[{ scope: "project", files: ["src/a.py"] }],
		[{ scope: "everything" }],
		[{ scope: "auto", extra: true }],
	])("rejects %o", (input) => {
		expect(() => parseScopeRequest(input)).toThrow(/Invalid run_quality_gates input/);
	});
});

describe("runQualityGates", () => {
	let root: string;

	beforeEach(async () => {
		root = await createWorkspace({
			"src/app.py": "import os\n",
			"src/pkg/mod.py": "x = 1\n",
			"src/pkg/helpers.py": "y = 2\n",
		});
	});

	afterEach(async () => {
		await removeWorkspace(root);
	});

	it("rejects an empty files list before running anything", async () => {
		const { runner } = createFakeRunner();

		const response = await runQualityGates(
			{ scope: "files", files: [] },
			{ config: makeConfig(root), runner },
		);

		expect(response.isError).toBe(true);
		if (response.isError) {
			expect(response.error.code).toBe("invalid_input");
			expect(response.content[0].text).toMatch(/^❌ Quality gates not run: /);
		}
		expect(runner).not.toHaveBeenCalled();
	});

	it("returns the summary line and the compact payload in order", async () => {
		const lintOutput = JSON.stringify([
			{ filename: "src/app.py", message: "unused import", row: 1, code: "F401" },
		]);
		const { runner } = createFakeRunner(
			gitHandler({}),
			toolHandler("lint", exited(lintOutput, 1)),
		);

		const response = await runQualityGates(
			{ scope: "project" },
			{ config: makeConfig(root), runner, commandEnvironment: noVenv },
		);

		expect(response.isError).toBe(false);
		if (!response.isError) {
			const [text, json] = response.content;
			expect(text.type).toBe("text");
			expect(text.text).toMatch(
				/^❌ Quality gates: 0\/1 passed — 1 violations in Lint \[project · 3 files\] — \d+ms$/,
			);
			expect(json).toEqual({
				type: "json",
				json: {
					overall_pass: false,
					gates: [
						{
							id: "lint",
							status: "failed",
							violations: [
								{
									file: "src/app.py",
									message: "unused import",
									line: 1,
									col: null,
									rule: "F401",
									fixable: false,
									severity: "error",
								},
							],
						},
					],
				},
			});
		}
	});

	it("evaluates the files inside a directory entry", async () => {
		const { runner, calls } = createFakeRunner(toolHandler("lint", exited("[]")));

		const response = await runQualityGates(
			{ scope: "files", files: ["src/pkg"] },
			{ config: makeConfig(root), runner, commandEnvironment: noVenv },
		);

		expect(response.isError).toBe(false);
		if (!response.isError) {
			expect(response.report.gates.map((gate) => gate.status)).toEqual(["passed"]);
			expect(response.content[1].json.overall_pass).toBe(true);
		}
		expect(calls[0]?.argv).toEqual([
			"lint",
			"--json",
			"src/pkg/helpers.py",
			"src/pkg/mod.py",
		]);
	});

	it("fails a directory entry that holds nothing to check", async () => {
		await writeFiles(root, { "assets/logo.txt": "logo\n" });
		const { runner } = createFakeRunner(toolHandler("lint", exited("[]")));

		const response = await runQualityGates(
			{ scope: "files", files: ["assets"] },
			{ config: makeConfig(root), runner, commandEnvironment: noVenv },
		);

		expect(response.isError).toBe(false);
		if (!response.isError) {
			expect(response.content[1].json).toEqual({
				overall_pass: false,
				gates: [
					{
						id: "scope",
						status: "failed",
						violations: [
							{
								file: null,
								message: "assets contains no files with a supported extension (.py)",
								line: null,
								col: null,
								rule: null,
								fixable: false,
								severity: "error",
							},
						],
					},
					{ id: "lint", status: "skipped", violations: [] },
				],
			});
		}
		expect(runner).not.toHaveBeenCalled();
	});

	it("reports a missing configuration as a config error", async () => {
		const response = await runQualityGates({ scope: "project" }, { rootDir: root });

		expect(response.isError).toBe(true);
		if (response.isError) {
			expect(response.error.code).toBe("config_error");
		}
	});
});

describe("toErrorResponse", () => {
	it("keeps the code of known errors", () => {
		expect(toErrorResponse(new RunInProgressError("/tmp/x.lock")).error.code).toBe(
			"lock_conflict",
		);
		expect(toErrorResponse(new ConfigError("bad yaml")).error).toEqual({
			code: "config_error",
			message: "bad yaml",
		});
	});

	it("maps anything else to internal_error", () => {
		expect(toErrorResponse(new Error("disk full"))).toEqual({
			isError: true,
			content: [{ type: "text", text: "❌ Quality gates not run: disk full" }],
			error: { code: "internal_error", message: "disk full" },
		});
	});
});
