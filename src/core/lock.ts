import fs from "node:fs/promises";
import path from "node:path";
import { RunInProgressError } from "../errors.js";

const LOCK_FILENAME = ".qgates-run.lock";

export function getLockPath(stateDir: string): string {
	return path.resolve(stateDir, LOCK_FILENAME);
}

/**
 * Create the advisory run lock. Throws RunInProgressError when another run
 * holds it.
 */
export async function acquireLock(stateDir: string): Promise<string> {
	await fs.mkdir(stateDir, { recursive: true });
	const lockPath = getLockPath(stateDir);
	try {
		await fs.writeFile(lockPath, String(process.pid), { flag: "wx" });
	} catch (err: unknown) {
		if (
			typeof err === "object" &&
			err !== null &&
			"code" in err &&
			err.code === "EEXIST"
		) {
			throw new RunInProgressError(lockPath);
		}
		throw err;
	}
	return lockPath;
}

export async function releaseLock(stateDir: string): Promise<void> {
	// force: a missing lock is not an error
	await fs.rm(getLockPath(stateDir), { force: true });
}
