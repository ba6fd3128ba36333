import type { Severity } from "../config/types.js";

export type GateStatus = "passed" | "failed" | "skipped";

export type Violation = Readonly<{
	file: string | null; // workspace-relative POSIX path
	message: string; // always a single line
	line: number | null;
	col: number | null;
	rule: string | null;
	fixable: boolean;
	severity: Severity;
}>;

export interface GateResult {
	id: string;
	name: string;
	status: GateStatus;
	violations: Violation[];
	files: string[]; // the subset this gate evaluated
	durationMs: number;
	skipReason?: string;
	// Failed gates only: how to reproduce and fix
	hints?: string[];
}

/**
 * Everything about a gate execution that must stay out of the response
 * payload. Only the artifact log sees it.
 */
export interface GateDiagnostics {
	argv: string[];
	cwd: string;
	exitCode: number | null;
	timedOut: boolean;
	stdout: string;
	stderr: string;
	launchError?: string;
	environment: {
		node: string;
		platform: string;
		executable: string;
		virtualEnv: string | null;
	};
}

export interface GateExecution {
	result: GateResult;
	diagnostics: GateDiagnostics | null; // null for skipped gates
}

export function skippedResult(
	id: string,
	name: string,
	reason: string,
): GateResult {
	return {
		id,
		name,
		status: "skipped",
		violations: [],
		files: [],
		durationMs: 0,
		skipReason: reason,
	};
}

export function syntheticViolation(
	message: string,
	file: string | null = null,
): Violation {
	return {
		file,
		message,
		line: null,
		col: null,
		rule: null,
		fixable: false,
		severity: "error",
	};
}

/**
 * Gate counters for a run. Violations of skipped gates are not counted.
 */
export interface RunSummary {
	passed: number;
	failed: number;
	skipped: number;
	total_violations: number;
	auto_fixable: number;
}

export function summarizeGates(results: readonly GateResult[]): RunSummary {
	const summary: RunSummary = {
		passed: 0,
		failed: 0,
		skipped: 0,
		total_violations: 0,
		auto_fixable: 0,
	};
	for (const result of results) {
		summary[result.status] += 1;
		if (result.status === "skipped") continue;
		summary.total_violations += result.violations.length;
		summary.auto_fixable += result.violations.filter((v) => v.fixable).length;
	}
	return summary;
}
