import chalk from "chalk";
import type { ActiveGate } from "../config/types.js";
import {
	type QualityGatesReport,
	type RunReporter,
	SCOPE_GATE_ID,
} from "../core/runner.js";
import type { GateResult, Violation } from "../gates/result.js";
import { formatSummaryLine } from "./summary.js";

const MAX_VIOLATIONS_SHOWN = 20;

export class ConsoleReporter implements RunReporter {
	onGateStart(gate: ActiveGate) {
		console.log(chalk.blue(`[START] ${gate.id}`));
	}

	onGateComplete(result: GateResult) {
		const duration = `${(result.durationMs / 1000).toFixed(2)}s`;

		if (result.status === "passed") {
			console.log(chalk.green(`[PASS]  ${result.id} (${duration})`));
		} else if (result.status === "skipped") {
			console.log(
				chalk.dim(`[SKIP]  ${result.id} - ${result.skipReason ?? "skipped"}`),
			);
		} else {
			console.log(
				chalk.red(
					`[FAIL]  ${result.id} (${duration}) - ${result.violations.length} violation(s)`,
				),
			);
			for (const line of this.formatViolations(result.violations)) {
				console.log(line);
			}
			for (const hint of result.hints ?? []) {
				console.log(chalk.dim(`  hint: ${hint}`));
			}
		}
	}

	printSummary(report: QualityGatesReport) {
		console.log(
			`\n${chalk.bold("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━")}`,
		);

		const scopeGate = report.gates.find(
			(gate) => gate.id === SCOPE_GATE_ID && gate.status === "failed",
		);
		if (scopeGate) {
			console.log(chalk.yellow("Scope issues:"));
			for (const violation of scopeGate.violations) {
				console.log(chalk.yellow(`  ${violation.message}`));
			}
		}

		const statusColor = report.overallPass ? chalk.green : chalk.red;
		console.log(statusColor(formatSummaryLine(report)));

		const { passed, failed, skipped, total_violations, auto_fixable } =
			report.summary;
		console.log(
			chalk.dim(
				`Gates: ${passed} passed, ${failed} failed, ${skipped} skipped · Violations: ${total_violations} (${auto_fixable} auto-fixable)`,
			),
		);

		if (report.baselineWritten) {
			const { baseline_sha, failed_files } = report.baselineWritten;
			console.log(
				chalk.dim(
					`Baseline: ${baseline_sha.slice(0, 12)} (${failed_files.length} failed file(s))`,
				),
			);
		}
		for (const artifact of report.artifacts) {
			console.log(chalk.dim(`Log: ${artifact}`));
		}
		console.log(chalk.bold("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n"));
	}

	/** @internal Public for testing */
	formatViolations(violations: readonly Violation[]): string[] {
		const lines = violations.slice(0, MAX_VIOLATIONS_SHOWN).map((violation) => {
			const location = violation.file
				? `${chalk.cyan(violation.file)}:${chalk.yellow(violation.line ?? "?")}`
				: chalk.cyan("(no file)");
			const rule = violation.rule ? ` ${chalk.dim(`[${violation.rule}]`)}` : "";
			const fix = violation.fixable ? ` ${chalk.green("(fixable)")}` : "";
			return `  ${location} - ${violation.message}${rule}${fix}`;
		});

		const hidden = violations.length - MAX_VIOLATIONS_SHOWN;
		if (hidden > 0) {
			lines.push(chalk.dim(`  ... and ${hidden} more`));
		}
		return lines;
	}
}
