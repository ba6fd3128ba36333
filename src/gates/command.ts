import { existsSync } from "node:fs";
import path from "node:path";
import { getCategoryLogger } from "../output/app-logger.js";

const log = getCategoryLogger("gate");

const PYTHON_NAMES = new Set(["python", "python3"]);
const VENV_DIRS = [".venv", "venv"];

export interface ResolvedCommand {
	argv: string[];
	virtualEnv: string | null;
}

export interface CommandEnvironment {
	env: NodeJS.ProcessEnv;
	platform: NodeJS.Platform;
	exists: (filePath: string) => boolean;
}

const defaultEnvironment: CommandEnvironment = {
	env: process.env,
	platform: process.platform,
	exists: existsSync,
};

/**
 * Locate the project virtual environment: `$VIRTUAL_ENV` first, then
 * `<root>/.venv` and `<root>/venv`.
 */
export function findVirtualEnv(
	rootDir: string,
	environment: CommandEnvironment = defaultEnvironment,
): string | null {
	const candidates: string[] = [];
	const active = environment.env.VIRTUAL_ENV;
	if (active) candidates.push(path.resolve(rootDir, active));
	for (const dir of VENV_DIRS) candidates.push(path.join(rootDir, dir));

	for (const candidate of candidates) {
		if (environment.exists(interpreterPath(candidate, environment.platform))) {
			return candidate;
		}
	}
	return null;
}

/**
 * Rewrite a gate command so it runs from the project virtual environment
 * rather than whatever happens to be first on PATH. `python`/`python3`
 * become the venv interpreter; any other bare executable is taken from the
 * venv script directory when it exists there.
 */
export function resolveCommand(
	argv: readonly string[],
	rootDir: string,
	environment: CommandEnvironment = defaultEnvironment,
): ResolvedCommand {
	const [executable, ...args] = argv;
	if (!executable) return { argv: [], virtualEnv: null };

	// Explicit paths are used as written
	if (executable.includes("/") || executable.includes("\\")) {
		return { argv: [executable, ...args], virtualEnv: null };
	}

	const venv = findVirtualEnv(rootDir, environment);
	if (!venv) {
		log.warn(
			`No virtual environment found for ${executable}; using it from PATH`,
		);
		return { argv: [executable, ...args], virtualEnv: null };
	}

	if (PYTHON_NAMES.has(executable)) {
		return {
			argv: [interpreterPath(venv, environment.platform), ...args],
			virtualEnv: venv,
		};
	}

	const script = scriptPath(venv, executable, environment.platform);
	if (environment.exists(script)) {
		return { argv: [script, ...args], virtualEnv: venv };
	}

	log.debug(`${executable} is not installed in ${venv}; using it from PATH`);
	return { argv: [executable, ...args], virtualEnv: venv };
}

/**
 * Render an argv for logs, quoting arguments that contain whitespace.
 */
export function formatCommand(argv: readonly string[]): string {
	return argv
		.map((arg) => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg))
		.join(" ");
}

function binDir(venv: string, platform: NodeJS.Platform): string {
	return platform === "win32"
		? path.join(venv, "Scripts")
		: path.join(venv, "bin");
}

function interpreterPath(venv: string, platform: NodeJS.Platform): string {
	return path.join(
		binDir(venv, platform),
		platform === "win32" ? "python.exe" : "python",
	);
}

function scriptPath(
	venv: string,
	executable: string,
	platform: NodeJS.Platform,
): string {
	const name =
		platform === "win32" && !executable.endsWith(".exe")
			? `${executable}.exe`
			: executable;
	return path.join(binDir(venv, platform), name);
}
