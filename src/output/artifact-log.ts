import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { GateDiagnostics, GateResult } from "../gates/result.js";
import { sanitizeGateId } from "../utils/sanitizer.js";
import { getCategoryLogger } from "./app-logger.js";

const log = getCategoryLogger("runner");

export const MAX_OUTPUT_LINES = 50;
export const MAX_OUTPUT_BYTES = 5120;

export interface TruncatedOutput {
	text: string;
	truncated: boolean;
}

export interface ArtifactLogOptions {
	enabled: boolean;
	outputDir: string; // absolute
	maxFiles: number;
}

/**
 * Keep the first MAX_OUTPUT_LINES lines and at most MAX_OUTPUT_BYTES bytes.
 */
export function truncateOutput(text: string): TruncatedOutput {
	if (!text) return { text: "", truncated: false };

	let truncated = false;
	let lines = text.split(/\r?\n/);
	if (lines.length > MAX_OUTPUT_LINES) {
		lines = lines.slice(0, MAX_OUTPUT_LINES);
		truncated = true;
	}

	let trimmed = lines.join("\n").trim();
	const encoded = Buffer.from(trimmed, "utf-8");
	if (encoded.length > MAX_OUTPUT_BYTES) {
		// Drop a multi-byte sequence cut in half at the boundary
		trimmed = encoded
			.subarray(0, MAX_OUTPUT_BYTES)
			.toString("utf-8")
			.replace(/\uFFFD+$/, "")
			.trimEnd();
		truncated = true;
	}

	return { text: trimmed, truncated };
}

/**
 * Failed-gate diagnostics land here instead of the response payload.
 */
export class ArtifactLog {
	constructor(private readonly options: ArtifactLogOptions) {}

	/**
	 * Returns the written path, or null when disabled or the write failed.
	 */
	async write(
		result: GateResult,
		diagnostics: GateDiagnostics,
		now: Date = new Date(),
	): Promise<string | null> {
		if (!this.options.enabled) return null;

		const timestamp = now.toISOString().replace(/[-:]/g, "").replace(".", "");
		const artifactPath = path.join(
			this.options.outputDir,
			`${timestamp}_${sanitizeGateId(result.id)}.json`,
		);
		const stdout = truncateOutput(diagnostics.stdout);
		const stderr = truncateOutput(diagnostics.stderr);

		const payload = {
			timestamp: now.toISOString(),
			gate_id: result.id,
			gate_name: result.name,
			status: result.status,
			command: {
				argv: diagnostics.argv,
				cwd: diagnostics.cwd,
				exit_code: diagnostics.exitCode,
				timed_out: diagnostics.timedOut,
				launch_error: diagnostics.launchError ?? null,
			},
			files: result.files,
			violations: result.violations,
			hints: result.hints ?? [],
			output: {
				stdout: stdout.text,
				stderr: stderr.text,
				truncated: stdout.truncated || stderr.truncated,
			},
			environment: {
				node_version: diagnostics.environment.node,
				platform: diagnostics.environment.platform,
				executable: diagnostics.environment.executable,
				virtual_env: diagnostics.environment.virtualEnv,
			},
		};

		try {
			await fs.mkdir(this.options.outputDir, { recursive: true });
			await fs.writeFile(
				artifactPath,
				`${JSON.stringify(payload, null, 2)}\n`,
				"utf-8",
			);
			log.debug(`Artifact written: ${artifactPath}`);
			await this.rotate();
			return artifactPath;
		} catch (error) {
			log.warn(
				`Could not write artifact ${artifactPath}: ${errorMessage(error)}`,
			);
			return null;
		}
	}

	/**
	 * Keep only the newest `maxFiles` artifacts. Names start with a sortable
	 * UTC timestamp, so lexical order is chronological.
	 */
	private async rotate(): Promise<void> {
		const entries = await fs.readdir(this.options.outputDir);
		const artifacts = entries
			.filter((name) => name.endsWith(".json") && /^\d{8}T/.test(name))
			.sort()
			.reverse();

		for (const stale of artifacts.slice(this.options.maxFiles)) {
			await fs.rm(path.join(this.options.outputDir, stale), { force: true });
		}
	}
}
