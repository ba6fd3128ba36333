import path from "node:path";
import { minimatch } from "minimatch";
import type { GateConfig } from "../config/types.js";

/**
 * The candidates a gate actually receives: matching one of its file types,
 * inside its include globs (when it declares any) and outside its excludes.
 */
export function filesForGate(
	gate: GateConfig,
	candidates: readonly string[],
): string[] {
	const fileTypes = new Set(gate.capabilities.file_types);
	const include = gate.scope?.include_globs ?? [];
	const exclude = gate.scope?.exclude_globs ?? [];

	return candidates.filter((file) => {
		if (!fileTypes.has(path.posix.extname(file))) return false;
		if (
			include.length > 0 &&
			!include.some((pattern) => minimatch(file, pattern, { dot: true }))
		) {
			return false;
		}
		return !exclude.some((pattern) => minimatch(file, pattern, { dot: true }));
	});
}
