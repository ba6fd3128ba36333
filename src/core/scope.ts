import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import { minimatch } from "minimatch";
import type { QualityConfig } from "../config/types.js";
import { getCategoryLogger } from "../output/app-logger.js";
import type { BaselinePolicy } from "./baseline.js";
import type { GitClient } from "./git.js";
import type { StateStore } from "./state-store.js";

const log = getCategoryLogger("scope");

export const SCOPE_MODES = ["auto", "branch", "project", "files"] as const;
export type ScopeMode = (typeof SCOPE_MODES)[number];

export type ScopeRequest =
	| { mode: "auto" | "branch" | "project" }
	| { mode: "files"; files: string[] };

export type ScopeIssueKind =
	| "missing_path"
	| "unsupported_file"
	| "empty_directory"
	| "outside_workspace"
	| "vcs_failure";

export interface ScopeIssue {
	kind: ScopeIssueKind;
	path: string | null;
	message: string;
}

export interface ResolvedScope {
	requested: ScopeMode;
	effective: ScopeMode; // the mode actually used to resolve files
	files: string[];
	policy: BaselinePolicy;
	baselineSha: string | null;
	// Recorded failures that no longer exist on disk; pruned from the baseline
	droppedFailures: string[];
	issues: ScopeIssue[];
}

export interface ScopeResolverDeps {
	rootDir: string;
	config: QualityConfig;
	git: GitClient;
	state: StateStore;
}

/**
 * Turns a scope request into the sorted, deduplicated candidate list the
 * gates filter from, and decides how the run may affect the baseline.
 */
export class ScopeResolver {
	constructor(private readonly deps: ScopeResolverDeps) {}

	async resolve(request: ScopeRequest): Promise<ResolvedScope> {
		switch (request.mode) {
			case "project":
				return {
					requested: "project",
					effective: "project",
					files: await this.projectFiles(),
					policy: "frozen",
					baselineSha: null,
					droppedFailures: [],
					issues: [],
				};
			case "branch":
				return this.resolveBranch();
			case "auto":
				return this.resolveAuto();
			case "files":
				return this.resolveFiles(request.files);
		}
	}

	/**
	 * Expand the configured project globs against the workspace root.
	 */
	async projectFiles(): Promise<string[]> {
		const { include_globs, exclude_globs } = this.deps.config.project_scope;
		const matches = await glob(include_globs, {
			cwd: this.deps.rootDir,
			ignore: exclude_globs,
			nodir: true,
			posix: true,
			dot: false,
		});
		const files = uniqueSorted(matches.map(toPosix));
		log.debug(`project scope: ${files.length} file(s)`);
		return files;
	}

	private async resolveBranch(): Promise<ResolvedScope> {
		const parent =
			(await this.deps.state.readParentBranch()) ??
			this.deps.config.scope.default_parent_branch;
		log.debug(`branch scope against parent ${parent}`);

		const diff = await this.deps.git.changedFiles(parent);
		const base: ResolvedScope = {
			requested: "branch",
			effective: "branch",
			files: [],
			policy: "frozen",
			baselineSha: null,
			droppedFailures: [],
			issues: [],
		};
		if (!diff.ok) {
			return { ...base, issues: [vcsIssue(diff.error)] };
		}
		return { ...base, files: uniqueSorted(this.withExtensions(diff.files)) };
	}

	private async resolveAuto(): Promise<ResolvedScope> {
		const baseline = await this.deps.state.readBaseline();

		if (!baseline) {
			log.info("No baseline yet; auto scope resolves as project");
			return {
				requested: "auto",
				effective: "project",
				files: await this.projectFiles(),
				policy: "bootstrap",
				baselineSha: null,
				droppedFailures: [],
				issues: [],
			};
		}

		const base: ResolvedScope = {
			requested: "auto",
			effective: "auto",
			files: [],
			policy: "track",
			baselineSha: baseline.baseline_sha,
			droppedFailures: [],
			issues: [],
		};

		const diff = await this.deps.git.changedFiles(baseline.baseline_sha);
		if (!diff.ok) {
			return { ...base, issues: [vcsIssue(diff.error)] };
		}
		const changed = this.withExtensions(diff.files);

		const stillFailing: string[] = [];
		const droppedFailures: string[] = [];
		for (const file of baseline.failed_files) {
			if (await isFile(path.resolve(this.deps.rootDir, file))) {
				stillFailing.push(file);
			} else {
				log.debug(`dropping ${file} from rerun set: no longer exists`);
				droppedFailures.push(file);
			}
		}

		const files = uniqueSorted([...changed, ...stillFailing]);
		log.debug(
			`auto scope: ${changed.length} changed, ${stillFailing.length} previously failing, ${files.length} total`,
		);
		return { ...base, files, droppedFailures };
	}

	private async resolveFiles(
		entries: readonly string[],
	): Promise<ResolvedScope> {
		const files: string[] = [];
		const issues: ScopeIssue[] = [];

		for (const entry of entries) {
			const absolute = path.resolve(this.deps.rootDir, entry);
			const relative = toPosix(path.relative(this.deps.rootDir, absolute));

			if (
				relative === ".." ||
				relative.startsWith("../") ||
				path.isAbsolute(relative)
			) {
				issues.push({
					kind: "outside_workspace",
					path: entry,
					message: `${entry} is outside the workspace`,
				});
				continue;
			}

			const stat = await statOrNull(absolute);
			if (!stat) {
				issues.push({
					kind: "missing_path",
					path: entry,
					message: `${entry} does not exist`,
				});
			} else if (stat.isDirectory()) {
				const expanded = await this.expandDirectory(absolute);
				log.debug(`expanded ${entry} to ${expanded.length} file(s)`);
				if (expanded.length === 0) {
					issues.push({
						kind: "empty_directory",
						path: entry,
						message: `${entry} contains no files with a supported extension (${this.deps.config.scope.file_extensions.join(", ")})`,
					});
				}
				files.push(...expanded);
			} else if (this.hasConfiguredExtension(relative)) {
				files.push(relative);
			} else {
				issues.push({
					kind: "unsupported_file",
					path: entry,
					message: `${entry} has no supported extension (${this.deps.config.scope.file_extensions.join(", ")})`,
				});
			}
		}

		return {
			requested: "files",
			effective: "files",
			files: uniqueSorted(files),
			policy: "frozen",
			baselineSha: null,
			droppedFailures: [],
			issues,
		};
	}

	/**
	 * Recursively collect files with a configured extension below `dir`,
	 * honouring the project exclude globs. Results are workspace-relative.
	 * The directory is the glob root rather than part of the pattern, so
	 * names such as `lib[1]` are taken literally.
	 */
	private async expandDirectory(dir: string): Promise<string[]> {
		const relativeDir = toPosix(path.relative(this.deps.rootDir, dir));
		const prefix = relativeDir === "" ? "" : `${relativeDir}/`;
		const patterns = this.deps.config.scope.file_extensions.map(
			(ext) => `**/*${ext}`,
		);
		const matches = await glob(patterns, {
			cwd: dir,
			nodir: true,
			posix: true,
		});
		const { exclude_globs } = this.deps.config.project_scope;
		return uniqueSorted(
			matches
				.map((match) => `${prefix}${toPosix(match)}`)
				.filter(
					(file) => !exclude_globs.some((pattern) =>
						minimatch(file, pattern, { dot: true }),
					),
				),
		);
	}

	private withExtensions(files: readonly string[]): string[] {
		return files.filter((file) => this.hasConfiguredExtension(file));
	}

	private hasConfiguredExtension(file: string): boolean {
		const ext = path.posix.extname(file);
		return this.deps.config.scope.file_extensions.includes(ext);
	}
}

export function toPosix(file: string): string {
	return file.replace(/\\/g, "/").replace(/^\.\//, "");
}

function uniqueSorted(files: readonly string[]): string[] {
	return [...new Set(files)].sort();
}

function vcsIssue(error: string): ScopeIssue {
	return { kind: "vcs_failure", path: null, message: error };
}

async function statOrNull(filePath: string): Promise<Stats | null> {
	try {
		return await fs.stat(filePath);
	} catch {
		return null;
	}
}

async function isFile(filePath: string): Promise<boolean> {
	const stat = await statOrNull(filePath);
	return stat?.isFile() ?? false;
}
