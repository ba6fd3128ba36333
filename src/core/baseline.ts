import type { GateResult } from "../gates/result.js";
import type { BaselineState } from "./state-store.js";

/**
 * How a run may affect the persisted baseline. Decided once by the scope
 * resolver from the effective scope and carried to the single write path.
 *
 * - `track`: effective `auto` scope against an established baseline
 * - `bootstrap`: `auto` requested with no baseline, resolved as `project`
 * - `frozen`: `branch`, `project` or `files`; the baseline is never touched
 */
export type BaselinePolicy = "track" | "bootstrap" | "frozen";

export interface RunOutcome {
	allPassed: boolean;
	failingFiles: string[];
	headSha: string | null;
	// Recorded failures that were deleted since; never carried forward
	droppedFailures: string[];
}

/**
 * Compute the state to persist after a run, or null to leave it untouched.
 */
export function nextBaseline(
	previous: BaselineState | null,
	outcome: RunOutcome,
	policy: BaselinePolicy,
): BaselineState | null {
	switch (policy) {
		case "frozen":
			return null;

		case "bootstrap":
			// A failing first run keeps the workspace without a baseline
			if (!outcome.allPassed || !outcome.headSha) return null;
			return { baseline_sha: outcome.headSha, failed_files: [] };

		case "track": {
			if (outcome.allPassed) {
				if (!outcome.headSha) return null;
				return { baseline_sha: outcome.headSha, failed_files: [] };
			}
			if (!previous) return null;
			const dropped = new Set(outcome.droppedFailures);
			const merged = new Set([
				...previous.failed_files.filter((file) => !dropped.has(file)),
				...outcome.failingFiles,
			]);
			return {
				baseline_sha: previous.baseline_sha,
				failed_files: [...merged].sort(),
			};
		}
	}
}

/**
 * Files named by violations of failed gates, limited to the files each gate
 * was actually asked to evaluate. Files a tool reports outside its inputs are
 * not recorded, and neither is anything for a gate that failed without
 * attributing a finding to a file (a crash, timeout or unexpected exit code).
 */
export function failingFiles(results: readonly GateResult[]): string[] {
	const failing = new Set<string>();
	for (const result of results) {
		if (result.status !== "failed") continue;
		const evaluated = new Set(result.files);
		for (const violation of result.violations) {
			if (violation.file && evaluated.has(violation.file)) {
				failing.add(violation.file);
			}
		}
	}
	return [...failing].sort();
}
