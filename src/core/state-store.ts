import fs from "node:fs/promises";
import path from "node:path";
import { getCategoryLogger } from "../output/app-logger.js";
import { errorMessage } from "../errors.js";

const log = getCategoryLogger("state");

export const BASELINE_KEY = "quality_gates";
const PARENT_BRANCH_KEY = "parent_branch";

export interface BaselineState {
	baseline_sha: string;
	failed_files: string[];
}

type StateDocument = Record<string, unknown>;

export type ClearOutcome = "cleared" | "absent" | "refused";

function isRecord(value: unknown): value is StateDocument {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Workspace state file shared with other tooling. This subsystem reads the
 * top-level `parent_branch` and owns only the `quality_gates` key; every
 * other key is carried through writes untouched.
 */
export class StateStore {
	readonly statePath: string;

	constructor(rootDir: string, stateFile: string) {
		this.statePath = path.resolve(rootDir, stateFile);
	}

	async readParentBranch(): Promise<string | null> {
		const doc = (await this.readDocument()) ?? {};
		const value = doc[PARENT_BRANCH_KEY];
		return typeof value === "string" && value.trim().length > 0
			? value.trim()
			: null;
	}

	/**
	 * Returns null when no baseline has been established yet.
	 */
	async readBaseline(): Promise<BaselineState | null> {
		const doc = (await this.readDocument()) ?? {};
		const raw = doc[BASELINE_KEY];
		if (!isRecord(raw)) return null;

		const sha = raw.baseline_sha;
		if (typeof sha !== "string" || sha.length === 0) return null;

		const failed = Array.isArray(raw.failed_files)
			? raw.failed_files.filter(
					(file): file is string => typeof file === "string",
				)
			: [];

		return { baseline_sha: sha, failed_files: [...new Set(failed)].sort() };
	}

	/**
	 * Returns false, leaving the file alone, when the existing state file
	 * cannot be read as a JSON object.
	 */
	async writeBaseline(state: BaselineState): Promise<boolean> {
		const doc = await this.readDocument();
		if (!doc) {
			log.error(
				`Baseline not written: ${this.statePath} is unreadable or not a JSON object`,
			);
			return false;
		}
		doc[BASELINE_KEY] = {
			baseline_sha: state.baseline_sha,
			failed_files: [...state.failed_files],
		};
		await this.writeDocument(doc);
		log.info(
			`Baseline written: ${state.baseline_sha.slice(0, 12)} (${state.failed_files.length} failed file(s))`,
		);
		return true;
	}

	/**
	 * Remove the baseline entirely.
	 */
	async clearBaseline(): Promise<ClearOutcome> {
		const doc = await this.readDocument();
		if (!doc) {
			log.error(
				`Baseline not cleared: ${this.statePath} is unreadable or not a JSON object`,
			);
			return "refused";
		}
		if (!(BASELINE_KEY in doc)) return "absent";
		delete doc[BASELINE_KEY];
		await this.writeDocument(doc);
		log.info("Baseline cleared");
		return "cleared";
	}

	/**
	 * The parsed state document; `{}` when the file does not exist, null when
	 * it exists but is unusable.
	 */
	private async readDocument(): Promise<StateDocument | null> {
		let content: string;
		try {
			content = await fs.readFile(this.statePath, "utf-8");
		} catch (error) {
			if (isMissing(error)) return {};
			log.warn(`Cannot read ${this.statePath}: ${errorMessage(error)}`);
			return null;
		}

		let data: unknown;
		try {
			data = JSON.parse(content);
		} catch (error) {
			log.warn(
				`Ignoring malformed state file ${this.statePath}: ${errorMessage(error)}`,
			);
			return null;
		}

		if (!isRecord(data)) {
			log.warn(`Ignoring state file ${this.statePath}: not a JSON object`);
			return null;
		}
		return data;
	}

	private async writeDocument(doc: StateDocument): Promise<void> {
		await fs.mkdir(path.dirname(this.statePath), { recursive: true });
		const tempPath = `${this.statePath}.${process.pid}.tmp`;
		await fs.writeFile(tempPath, `${JSON.stringify(doc, null, 2)}\n`, "utf-8");
		await fs.rename(tempPath, this.statePath);
	}
}

function isMissing(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	);
}
