import { describe, expect, it } from "vitest";
import { probeArgv, probeGate } from "../../src/commands/health.js";
import { gateSchema } from "../../src/config/schema.js";
import type { ActiveGate } from "../../src/config/types.js";
import type { CommandEnvironment } from "../../src/gates/command.js";
import {
	createFakeRunner,
	exited,
	toolHandler,
} from "../helpers/fake-process.js";
import { lintGate } from "../helpers/workspace.js";

const noVenv: CommandEnvironment = {
	env: {},
	platform: "linux",
	exists: () => false,
};

const root = "/work/repo";

function gate(command: string[]): ActiveGate {
	return {
		id: "lint",
		config: gateSchema.parse(
			lintGate({ execution: { command, timeout_seconds: 30 } }),
		),
	};
}

describe("probeArgv", () => {
	it("asks python modules for their own version", () => {
		expect(probeArgv(["python", "-m", "mypy", "--strict"])).toEqual([
			"python",
			"-m",
			"mypy",
			"--version",
		]);
	});

	it("asks plain executables for their version", () => {
		expect(probeArgv(["pyright", "--outputjson"])).toEqual(["pyright", "--version"]);
	});
});

describe("probeGate", () => {
	it("reports the first output line of an available tool", async () => {
		const { runner, calls } = createFakeRunner(
			toolHandler("--version", exited("\nlint 1.2.3\nextra\n")),
		);

		const probe = await probeGate(gate(["lint", "--json"]), root, runner, noVenv);

		expect(probe).toEqual({
			id: "lint",
			argv: ["lint", "--version"],
			available: true,
			detail: "lint 1.2.3",
		});
		expect(calls[0]?.options).toEqual({ cwd: root, timeoutMs: 10_000 });
	});

	it("reports a tool that cannot be launched", async () => {
		const { runner } = createFakeRunner();

		const probe = await probeGate(gate(["lint"]), root, runner, noVenv);

		expect(probe.available).toBe(false);
		expect(probe.detail).toBe("executable not found: lint");
	});

	it("reports a non-zero exit", async () => {
		const { runner } = createFakeRunner(toolHandler("--version", exited("", 1)));

		const probe = await probeGate(
			gate(["python", "-m", "mypy"]),
			root,
			runner,
			noVenv,
		);

		expect(probe).toMatchObject({ available: false, detail: "exit code 1" });
	});
});
