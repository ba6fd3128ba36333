import { spawn } from "node:child_process";

export interface ProcessOptions {
	cwd: string;
	timeoutMs: number;
	env?: NodeJS.ProcessEnv;
}

export type ProcessOutcome =
	| {
			kind: "exited";
			exitCode: number;
			stdout: string;
			stderr: string;
			timedOut: boolean;
	  }
	| {
			kind: "failed";
			error: string;
	  };

/**
 * Runs an argv without a shell. Injected wherever a subprocess is needed so
 * tests can substitute an in-process fake.
 */
export type ProcessRunner = (
	argv: readonly string[],
	options: ProcessOptions,
) => Promise<ProcessOutcome>;

const MAX_BUFFER_BYTES = 10 * 1024 * 1024;

/**
 * Spawn `argv[0]` with the remaining arguments and collect its output.
 * The child is killed once `timeoutMs` elapses; the outcome then reports
 * `timedOut: true` with whatever output was produced so far.
 */
export const runProcess: ProcessRunner = (argv, options) => {
	const [executable, ...args] = argv;
	if (!executable) {
		return Promise.resolve({ kind: "failed", error: "empty command" });
	}

	return new Promise((resolve) => {
		let stdout = "";
		let stderr = "";
		let timedOut = false;
		let settled = false;

		const settle = (outcome: ProcessOutcome) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			resolve(outcome);
		};

		const child = spawn(executable, args, {
			cwd: options.cwd,
			env: options.env ?? process.env,
			stdio: ["ignore", "pipe", "pipe"],
			windowsHide: true,
		});

		const timer = setTimeout(() => {
			timedOut = true;
			child.kill("SIGKILL");
		}, options.timeoutMs);

		// Decode as a stream so a character split across chunks survives
		child.stdout.setEncoding("utf8");
		child.stderr.setEncoding("utf8");
		child.stdout.on("data", (data: string) => {
			if (stdout.length < MAX_BUFFER_BYTES) stdout += data;
		});
		child.stderr.on("data", (data: string) => {
			if (stderr.length < MAX_BUFFER_BYTES) stderr += data;
		});

		child.on("error", (error: NodeJS.ErrnoException) => {
			settle({
				kind: "failed",
				error:
					error.code === "ENOENT"
						? `executable not found: ${executable}`
						: error.message,
			});
		});

		child.on("close", (code) => {
			settle({
				kind: "exited",
				exitCode: code ?? -1,
				stdout,
				stderr,
				timedOut,
			});
		});
	});
};
