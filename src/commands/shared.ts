import fs from "node:fs/promises";
import path from "node:path";
import type { LoadedConfig } from "../config/types.js";
import { initLogger } from "../output/app-logger.js";

export async function exists(filePath: string): Promise<boolean> {
	try {
		await fs.stat(filePath);
		return true;
	} catch {
		return false;
	}
}

/**
 * Configure logging from the loaded config. `quiet` keeps stderr free of
 * log lines, e.g. when stdout carries JSON.
 */
export async function initCliLogger(
	config: LoadedConfig,
	options: { quiet?: boolean } = {},
): Promise<void> {
	const { logging, artifact_logging } = config.quality;
	await initLogger({
		level: logging.level,
		quiet: options.quiet,
		logDir: path.resolve(config.rootDir, artifact_logging.output_dir),
		debugLog: logging.debug_log,
	});
}

/**
 * Build tool input from CLI arguments. Positional paths imply `files`
 * scope; any conflict with an explicit --scope is left for validation.
 */
export function buildToolInput(
	paths: readonly string[],
	scope: string | undefined,
): { scope: string; files?: string[] } {
	if (paths.length > 0) {
		return { scope: scope ?? "files", files: [...paths] };
	}
	return { scope: scope ?? "auto" };
}
