import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import type { ZodError } from "zod";
import { ConfigError } from "../errors.js";
import { qualityConfigSchema } from "./schema.js";
import type { ActiveGate, LoadedConfig } from "./types.js";

export const CONFIG_DIR = ".qgates";
export const CONFIG_FILE = "quality.yml";

export function getConfigPath(rootDir: string): string {
	return path.join(rootDir, CONFIG_DIR, CONFIG_FILE);
}

export async function loadConfig(
	rootDir: string = process.cwd(),
): Promise<LoadedConfig> {
	const resolvedRoot = path.resolve(rootDir);
	const configPath = getConfigPath(resolvedRoot);

	if (!(await fileExists(configPath))) {
		throw new ConfigError(
			`Configuration file not found at ${configPath}. Run "qgates init" to create one.`,
			configPath,
		);
	}

	const content = await fs.readFile(configPath, "utf-8");
	let raw: unknown;
	try {
		raw = YAML.parse(content);
	} catch (error) {
		throw new ConfigError(
			`Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
			configPath,
		);
	}

	const parsed = qualityConfigSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigError(
			`Invalid configuration in ${configPath}:\n${formatZodIssues(parsed.error)}`,
			configPath,
		);
	}

	return {
		rootDir: resolvedRoot,
		configPath,
		quality: parsed.data,
	};
}

/**
 * Active gates in catalog order. The schema guarantees every id resolves.
 */
export function getActiveGates(config: LoadedConfig): ActiveGate[] {
	const gates: ActiveGate[] = [];
	for (const id of config.quality.active_gates) {
		const gate = config.quality.gates[id];
		if (gate) gates.push({ id, config: gate });
	}
	return gates;
}

export function formatZodIssues(error: ZodError): string {
	return error.issues
		.map((issue) => {
			const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
			return `  - ${where}: ${issue.message}`;
		})
		.join("\n");
}

async function fileExists(filePath: string): Promise<boolean> {
	try {
		const stat = await fs.stat(filePath);
		return stat.isFile();
	} catch {
		return false;
	}
}
