import path from "node:path";
import type { ActiveGate } from "../config/types.js";
import { filesForGate } from "../core/gate-files.js";
import { getCategoryLogger } from "../output/app-logger.js";
import {
	type ProcessOutcome,
	type ProcessRunner,
	runProcess,
} from "../utils/process.js";
import {
	type CommandEnvironment,
	formatCommand,
	resolveCommand,
} from "./command.js";
import { parseGateOutput } from "./parsers/index.js";
import { normalizeMessage } from "./parsers/normalize.js";
import {
	type GateDiagnostics,
	type GateExecution,
	type GateResult,
	skippedResult,
	syntheticViolation,
	type Violation,
} from "./result.js";

const log = getCategoryLogger("gate");

export interface GateExecutorOptions {
	rootDir: string;
	runner?: ProcessRunner;
	commandEnvironment?: CommandEnvironment;
}

export class GateExecutor {
	private readonly runner: ProcessRunner;

	constructor(private readonly options: GateExecutorOptions) {
		this.runner = options.runner ?? runProcess;
	}

	/**
	 * Run one gate over its subset of the candidates. Never throws for tool
	 * failures: they come back as a failed result with a synthetic violation.
	 */
	async execute(
		gate: ActiveGate,
		candidates: readonly string[],
	): Promise<GateExecution> {
		const { id, config } = gate;
		const files = filesForGate(config, candidates);

		if (files.length === 0) {
			log.info(`${config.name}: skipped (no matching files)`);
			return {
				result: skippedResult(id, config.name, "no matching files in scope"),
				diagnostics: null,
			};
		}

		const startTime = Date.now();
		const cwd = config.execution.working_dir
			? path.resolve(this.options.rootDir, config.execution.working_dir)
			: this.options.rootDir;
		const fileArgs = files.map((file) => this.argumentPath(file, cwd));
		const command = resolveCommand(
			[...config.execution.command, ...fileArgs],
			this.options.rootDir,
			this.options.commandEnvironment,
		);

		log.debug(`${config.name}: ${formatCommand(command.argv)} (cwd ${cwd})`);
		const outcome = await this.runner(command.argv, {
			cwd,
			timeoutMs: config.execution.timeout_seconds * 1000,
		});

		const { violations, passed } = this.evaluate(gate, outcome, cwd);
		const result: GateResult = {
			id,
			name: config.name,
			status: passed ? "passed" : "failed",
			violations,
			files,
			durationMs: Date.now() - startTime,
		};

		if (passed) {
			log.info(`${config.name}: passed`);
		} else {
			log.info(`${config.name}: failed (${violations.length} violation(s))`);
			result.hints = gateHints(gate, fileArgs);
		}

		const diagnostics: GateDiagnostics = {
			argv: command.argv,
			cwd,
			exitCode: outcome.kind === "exited" ? outcome.exitCode : null,
			timedOut: outcome.kind === "exited" && outcome.timedOut,
			stdout: outcome.kind === "exited" ? outcome.stdout : "",
			stderr: outcome.kind === "exited" ? outcome.stderr : "",
			environment: {
				node: process.version,
				platform: `${process.platform}-${process.arch}`,
				executable: command.argv[0] ?? "",
				virtualEnv: command.virtualEnv,
			},
		};
		if (outcome.kind === "failed") diagnostics.launchError = outcome.error;

		return { result, diagnostics };
	}

	private evaluate(
		gate: ActiveGate,
		outcome: ProcessOutcome,
		cwd: string,
	): Evaluation {
		const { name, execution, parsing, capabilities, success } = gate.config;

		if (outcome.kind === "failed") {
			return failure(
				normalizeMessage(`${name} could not be started: ${outcome.error}`),
			);
		}

		if (outcome.timedOut) {
			return failure(`${name} timed out after ${execution.timeout_seconds}s`);
		}

		const parsed = parseGateOutput(
			parsing,
			{ stdout: outcome.stdout, stderr: outcome.stderr },
			{
				rootDir: this.options.rootDir,
				cwd,
				supportsAutofix: capabilities.supports_autofix,
			},
		);
		if (parsed.length > 0) {
			return { violations: parsed, passed: meetsSuccessCriteria(gate, parsed) };
		}

		if (success.exit_codes_ok.includes(outcome.exitCode)) {
			return { violations: [], passed: true };
		}

		const firstStderrLine = outcome.stderr
			.split(/\r?\n/)
			.map((line) => line.trim())
			.find((line) => line.length > 0);
		const message = firstStderrLine
			? `${name} exited with code ${outcome.exitCode}: ${firstStderrLine}`
			: `${name} exited with code ${outcome.exitCode}`;
		return failure(normalizeMessage(message));
	}

	// Candidates are workspace-relative; the tool sees them relative to its cwd
	private argumentPath(file: string, cwd: string): string {
		if (cwd === this.options.rootDir) return file;
		return path
			.relative(cwd, path.join(this.options.rootDir, file))
			.replace(/\\/g, "/");
	}
}

interface Evaluation {
	violations: Violation[];
	passed: boolean;
}

function failure(message: string): Evaluation {
	return { violations: [syntheticViolation(message)], passed: false };
}

/**
 * Whether parsed findings still let the gate pass. `max_errors` counts only
 * error-severity findings; otherwise `require_no_issues` decides.
 */
function meetsSuccessCriteria(
	gate: ActiveGate,
	violations: readonly Violation[],
): boolean {
	const { max_errors, require_no_issues } = gate.config.success;
	if (max_errors !== undefined) {
		const errors = violations.filter((v) => v.severity === "error").length;
		return errors <= max_errors;
	}
	return !require_no_issues || violations.length === 0;
}

/**
 * The configured command over the gate's files, followed by the gate's own
 * advice.
 */
function gateHints(
	gate: ActiveGate,
	fileArgs: readonly string[],
): string[] {
	const { execution, hints } = gate.config;
	const command = formatCommand([...execution.command, ...fileArgs]);
	const where = execution.working_dir ? ` (from ${execution.working_dir})` : "";
	return [`Re-run: ${command}${where}`, ...hints];
}
