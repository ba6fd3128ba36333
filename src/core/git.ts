import { getCategoryLogger } from "../output/app-logger.js";
import { type ProcessRunner, runProcess } from "../utils/process.js";

const log = getCategoryLogger("git");

export type ChangedFilesResult =
	| { ok: true; files: string[] }
	| { ok: false; error: string };

export interface GitClientOptions {
	cwd: string;
	timeoutMs: number;
	runner?: ProcessRunner;
}

/**
 * The few git queries scope resolution and the baseline need. Every call is
 * bounded by `timeoutMs`; failures come back as values, never as throws.
 */
export class GitClient {
	private readonly runner: ProcessRunner;

	constructor(private readonly options: GitClientOptions) {
		this.runner = options.runner ?? runProcess;
	}

	/**
	 * Files that exist at `to` and differ from `from`. Deleted entries are
	 * filtered out both by `--diff-filter=d` and while parsing, and renames
	 * or copies report their destination path.
	 */
	async changedFiles(from: string, to = "HEAD"): Promise<ChangedFilesResult> {
		const range = `${from}..${to}`;
		const result = await this.git([
			"-c",
			"core.quotepath=off",
			"diff",
			"--name-status",
			"--diff-filter=d",
			range,
		]);

		if (!result.ok) {
			log.warn(`git diff ${range} failed: ${result.error}`);
			return { ok: false, error: `git diff ${range} failed: ${result.error}` };
		}

		const files = parseNameStatus(result.stdout);
		log.debug(`git diff ${range}: ${files.length} changed file(s)`);
		return { ok: true, files };
	}

	/**
	 * Get the current HEAD commit SHA, or null when it cannot be read.
	 */
	async headSha(): Promise<string | null> {
		const result = await this.git(["rev-parse", "HEAD"]);
		if (!result.ok) {
			log.warn(`git rev-parse HEAD failed: ${result.error}`);
			return null;
		}
		const sha = result.stdout.trim();
		return sha.length > 0 ? sha : null;
	}

	private async git(
		args: string[],
	): Promise<{ ok: true; stdout: string } | { ok: false; error: string }> {
		const outcome = await this.runner(["git", ...args], {
			cwd: this.options.cwd,
			timeoutMs: this.options.timeoutMs,
		});

		if (outcome.kind === "failed") {
			return { ok: false, error: outcome.error };
		}
		if (outcome.timedOut) {
			return {
				ok: false,
				error: `timed out after ${Math.round(this.options.timeoutMs / 1000)}s`,
			};
		}
		if (outcome.exitCode !== 0) {
			const detail = outcome.stderr.trim().split("\n")[0] ?? "";
			return {
				ok: false,
				error: `exit code ${outcome.exitCode}${detail ? `: ${detail}` : ""}`,
			};
		}
		return { ok: true, stdout: outcome.stdout };
	}
}

/**
 * Parse `git diff --name-status` output.
 * Lines look like `M\tpath`, `A\tpath`, `D\tpath` or `R100\told\tnew`.
 */
export function parseNameStatus(stdout: string): string[] {
	const files: string[] = [];
	for (const rawLine of stdout.split("\n")) {
		const line = rawLine.trim();
		if (line.length === 0) continue;

		const fields = line.split("\t");
		const status = fields[0] ?? "";
		if (status.startsWith("D")) continue;

		const target = fields[fields.length - 1];
		if (fields.length >= 2 && target) {
			files.push(target);
		}
	}
	return files;
}
