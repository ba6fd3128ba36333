import { describeScope, type QualityGatesReport } from "../core/runner.js";
import type { GateStatus, Violation } from "../gates/result.js";

export interface CompactGate {
	id: string;
	status: GateStatus;
	violations: Violation[];
}

/**
 * The machine-readable half of a response. Raw output, commands and
 * environment details never appear here; they go to the artifact log.
 */
export interface CompactPayload {
	overall_pass: boolean;
	gates: CompactGate[];
}

export function formatSummaryLine(report: QualityGatesReport): string {
	const scope = `[${describeScope(report.scope)} · ${report.scope.files.length} files]`;
	return `${outcomeMessage(report)} ${scope} — ${report.durationMs}ms`;
}

function outcomeMessage(report: QualityGatesReport): string {
	const { gates } = report;
	const passed = gates.filter((gate) => gate.status === "passed");
	const failed = gates.filter((gate) => gate.status === "failed");
	const skipped = gates.filter((gate) => gate.status === "skipped");

	if (failed.length > 0) {
		const violations = failed.reduce(
			(sum, gate) => sum + gate.violations.length,
			0,
		);
		const names = failed.map((gate) => gate.name).join(", ");
		return `❌ Quality gates: ${passed.length}/${passed.length + failed.length} passed — ${violations} violations in ${names}`;
	}

	if (skipped.length === gates.length) {
		return "⏭️ Quality gates: nothing to check";
	}

	if (skipped.length > 0) {
		return `⚠️ Quality gates: ${passed.length}/${passed.length} active (${skipped.length} skipped)`;
	}

	const violations = passed.reduce(
		(sum, gate) => sum + gate.violations.length,
		0,
	);
	return `✅ Quality gates: ${passed.length}/${passed.length} passed (${violations} violations)`;
}

export function buildCompactPayload(
	report: QualityGatesReport,
): CompactPayload {
	return {
		overall_pass: report.overallPass,
		gates: report.gates.map((gate) => ({
			id: gate.id,
			status: gate.status,
			violations: gate.violations.map((violation) => ({ ...violation })),
		})),
	};
}
