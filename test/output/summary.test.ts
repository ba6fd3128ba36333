import { describe, expect, it } from "vitest";
import type { QualityGatesReport } from "../../src/core/runner.js";
import type { ResolvedScope } from "../../src/core/scope.js";
import {
	type GateResult,
	summarizeGates,
	syntheticViolation,
} from "../../src/gates/result.js";
import {
	buildCompactPayload,
	formatSummaryLine,
} from "../../src/output/summary.js";

function scope(overrides: Partial<ResolvedScope> = {}): ResolvedScope {
	return {
		requested: "project",
		effective: "project",
		files: ["src/a.py", "src/b.py"],
		policy: "frozen",
		baselineSha: null,
		droppedFailures: [],
		issues: [],
		...overrides,
	};
}

function gate(
	id: string,
	status: GateResult["status"],
	violations = 0,
): GateResult {
	return {
		id,
		name: id.toUpperCase(),
		status,
		violations: Array.from({ length: violations }, (_, i) =>
			syntheticViolation(`problem ${i}`, "src/a.py"),
		),
		files: status === "skipped" ? [] : ["src/a.py"],
		durationMs: 5,
	};
}

function report(
	gates: GateResult[],
	overrides: Partial<QualityGatesReport> = {},
): QualityGatesReport {
	return {
		scope: scope(),
		gates,
		overallPass: gates.every((g) => g.status !== "failed"),
		summary: summarizeGates(gates),
		durationMs: 1234,
		baselineWritten: null,
		artifacts: [],
		...overrides,
	};
}

describe("formatSummaryLine", () => {
	it("names the failed gates and counts their violations", () => {
		const line = formatSummaryLine(
			report([gate("lint", "failed", 2), gate("fmt", "passed"), gate("types", "failed", 1)]),
		);

		expect(line).toBe(
			"❌ Quality gates: 1/3 passed — 3 violations in LINT, TYPES [project · 2 files] — 1234ms",
		);
	});

	it("reports nothing to check when every gate skipped", () => {
		const line = formatSummaryLine(
			report([gate("lint", "skipped"), gate("fmt", "skipped")], {
				scope: scope({ requested: "auto", effective: "auto", files: [] }),
			}),
		);

		expect(line).toBe("⏭️ Quality gates: nothing to check [auto · 0 files] — 1234ms");
	});

	it("warns when some gates skipped", () => {
		const line = formatSummaryLine(
			report([gate("lint", "passed"), gate("fmt", "skipped")]),
		);

		expect(line).toBe(
			"⚠️ Quality gates: 1/1 active (1 skipped) [project · 2 files] — 1234ms",
		);
	});

	it("shows the effective scope when auto bootstrapped to project", () => {
		const line = formatSummaryLine(
			report([gate("lint", "passed"), gate("fmt", "passed")], {
				scope: scope({ requested: "auto", policy: "bootstrap" }),
				durationMs: 40,
			}),
		);

		expect(line).toBe(
			"✅ Quality gates: 2/2 passed (0 violations) [auto→project · 2 files] — 40ms",
		);
	});
});

describe("buildCompactPayload", () => {
	it("carries only ids, statuses and violations", () => {
		const payload = buildCompactPayload(
			report([gate("lint", "failed", 1), gate("fmt", "skipped")]),
		);

		expect(payload).toEqual({
			overall_pass: false,
			gates: [
				{
					id: "lint",
					status: "failed",
					violations: [
						{
							file: "src/a.py",
							message: "problem 0",
							line: null,
							col: null,
							rule: null,
							fixable: false,
							severity: "error",
						},
					],
				},
				{ id: "fmt", status: "skipped", violations: [] },
			],
		});
	});
});
