import { describe, expect, it } from "vitest";
import { runProcess } from "../../src/utils/process.js";

const node = process.execPath;
const cwd = process.cwd();

function script(source: string): string[] {
	return [node, "-e", source];
}

describe("runProcess", () => {
	it("collects stdout, stderr and the exit code", async () => {
		const outcome = await runProcess(
			script("process.stdout.write('out'); process.stderr.write('err'); process.exitCode = 3;"),
			{ cwd, timeoutMs: 10_000 },
		);

		expect(outcome).toEqual({
			kind: "exited",
			exitCode: 3,
			stdout: "out",
			stderr: "err",
			timedOut: false,
		});
	});

	it("keeps multibyte characters split across chunks intact", async () => {
		const outcome = await runProcess(
			script(
				[
					"const bytes = Buffer.from('é'.repeat(70000));",
					"process.stdout.write(bytes.subarray(0, 65537));",
					"setTimeout(() => process.stdout.write(bytes.subarray(65537)), 50);",
				].join(" "),
			),
			{ cwd, timeoutMs: 10_000 },
		);

		expect(outcome.kind).toBe("exited");
		if (outcome.kind === "exited") {
			expect(outcome.stdout).toHaveLength(70000);
			expect(outcome.stdout).toBe("é".repeat(70000));
		}
	});

	it("kills a process that outlives its timeout", async () => {
		const outcome = await runProcess(script("setTimeout(() => {}, 30000);"), {
			cwd,
			timeoutMs: 200,
		});

		expect(outcome).toMatchObject({ kind: "exited", timedOut: true });
	});

	it("reports an executable that does not exist", async () => {
		const outcome = await runProcess(["qgates-no-such-tool"], {
			cwd,
			timeoutMs: 10_000,
		});

		expect(outcome).toEqual({
			kind: "failed",
			error: "executable not found: qgates-no-such-tool",
		});
	});

	it("refuses an empty command", async () => {
		await expect(runProcess([], { cwd, timeoutMs: 1000 })).resolves.toEqual({
			kind: "failed",
			error: "empty command",
		});
	});
});
