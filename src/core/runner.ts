import path from "node:path";
import { getActiveGates } from "../config/loader.js";
import type { ActiveGate, LoadedConfig } from "../config/types.js";
import type { CommandEnvironment } from "../gates/command.js";
import { GateExecutor } from "../gates/executor.js";
import {
	type GateResult,
	type RunSummary,
	summarizeGates,
	syntheticViolation,
} from "../gates/result.js";
import { getCategoryLogger } from "../output/app-logger.js";
import { ArtifactLog } from "../output/artifact-log.js";
import type { ProcessRunner } from "../utils/process.js";
import { failingFiles, nextBaseline } from "./baseline.js";
import { GitClient } from "./git.js";
import { acquireLock, releaseLock } from "./lock.js";
import {
	type ResolvedScope,
	type ScopeIssue,
	type ScopeRequest,
	ScopeResolver,
} from "./scope.js";
import { type BaselineState, StateStore } from "./state-store.js";

const log = getCategoryLogger("runner");

export const SCOPE_GATE_ID = "scope";

export interface QualityGatesReport {
	scope: ResolvedScope;
	// A failed `scope` entry leads the list when resolution reported issues
	gates: GateResult[];
	overallPass: boolean;
	summary: RunSummary;
	durationMs: number;
	baselineWritten: BaselineState | null;
	artifacts: string[];
}

/**
 * Progress hooks for interactive output.
 */
export interface RunReporter {
	onGateStart?(gate: ActiveGate): void;
	onGateComplete?(result: GateResult): void;
}

export interface QualityGateRunnerOptions {
	runner?: ProcessRunner;
	commandEnvironment?: CommandEnvironment;
	reporter?: RunReporter;
}

export class QualityGateRunner {
	private readonly git: GitClient;
	private readonly state: StateStore;
	private readonly resolver: ScopeResolver;
	private readonly executor: GateExecutor;
	private readonly artifacts: ArtifactLog;

	constructor(
		private readonly config: LoadedConfig,
		private readonly options: QualityGateRunnerOptions = {},
	) {
		const { rootDir, quality } = config;
		this.git = new GitClient({
			cwd: rootDir,
			timeoutMs: quality.scope.git_timeout_seconds * 1000,
			runner: options.runner,
		});
		this.state = new StateStore(rootDir, quality.state_file);
		this.resolver = new ScopeResolver({
			rootDir,
			config: quality,
			git: this.git,
			state: this.state,
		});
		this.executor = new GateExecutor({
			rootDir,
			runner: options.runner,
			commandEnvironment: options.commandEnvironment,
		});
		this.artifacts = new ArtifactLog({
			enabled: quality.artifact_logging.enabled,
			outputDir: path.resolve(rootDir, quality.artifact_logging.output_dir),
			maxFiles: quality.artifact_logging.max_files,
		});
	}

	get scopeResolver(): ScopeResolver {
		return this.resolver;
	}

	/**
	 * One complete run under the advisory lock. The baseline is written at
	 * most once, after every gate finished.
	 */
	async run(request: ScopeRequest): Promise<QualityGatesReport> {
		const stateDir = path.dirname(this.state.statePath);
		await acquireLock(stateDir);
		try {
			return await this.runLocked(request);
		} finally {
			await releaseLock(stateDir);
		}
	}

	private async runLocked(request: ScopeRequest): Promise<QualityGatesReport> {
		const startTime = Date.now();
		const scope = await this.resolver.resolve(request);
		log.info(
			`Scope ${describeScope(scope)}: ${scope.files.length} file(s), policy ${scope.policy}`,
		);

		const results: GateResult[] = [];
		const artifacts: string[] = [];

		for (const gate of getActiveGates(this.config)) {
			this.options.reporter?.onGateStart?.(gate);
			const { result, diagnostics } = await this.executor.execute(
				gate,
				scope.files,
			);
			results.push(result);
			this.options.reporter?.onGateComplete?.(result);

			if (result.status === "failed" && diagnostics) {
				const artifactPath = await this.artifacts.write(result, diagnostics);
				if (artifactPath) artifacts.push(artifactPath);
			}
		}

		const gates =
			scope.issues.length > 0 ? [scopeGate(scope.issues), ...results] : results;
		const overallPass = gates.every((gate) => gate.status !== "failed");
		const baselineWritten = await this.applyBaseline(
			scope,
			results,
			overallPass,
		);

		return {
			scope,
			gates,
			overallPass,
			summary: summarizeGates(gates),
			durationMs: Date.now() - startTime,
			baselineWritten,
			artifacts,
		};
	}

	/**
	 * The only place the baseline is ever written.
	 */
	private async applyBaseline(
		scope: ResolvedScope,
		results: readonly GateResult[],
		allPassed: boolean,
	): Promise<BaselineState | null> {
		if (scope.policy === "frozen") {
			log.debug(`Baseline untouched: ${scope.effective} scope`);
			return null;
		}

		const previous = await this.state.readBaseline();
		const headSha = allPassed ? await this.git.headSha() : null;
		if (allPassed && !headSha) {
			log.warn("Cannot read HEAD; baseline not advanced");
		}

		const next = nextBaseline(
			previous,
			{
				allPassed,
				failingFiles: failingFiles(results),
				headSha,
				droppedFailures: scope.droppedFailures,
			},
			scope.policy,
		);
		if (!next) {
			log.debug(`Baseline unchanged (policy ${scope.policy})`);
			return null;
		}

		return (await this.state.writeBaseline(next)) ? next : null;
	}
}

export function describeScope(scope: ResolvedScope): string {
	return scope.requested === scope.effective
		? scope.effective
		: `${scope.requested}→${scope.effective}`;
}

function scopeGate(issues: readonly ScopeIssue[]): GateResult {
	return {
		id: SCOPE_GATE_ID,
		name: "Scope resolution",
		status: "failed",
		violations: issues.map((issue) => syntheticViolation(issue.message)),
		files: [],
		durationMs: 0,
	};
}
