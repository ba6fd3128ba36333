import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { qualityConfigSchema } from "../../src/config/schema.js";
import type { LoadedConfig } from "../../src/config/types.js";

/**
 * Create a temp workspace populated with `files` (path -> content).
 */
export async function createWorkspace(
	files: Record<string, string> = {},
): Promise<string> {
	const root = await fs.mkdtemp(path.join(os.tmpdir(), "qgates-test-"));
	await writeFiles(root, files);
	return root;
}

export async function writeFiles(
	root: string,
	files: Record<string, string>,
): Promise<void> {
	for (const [relative, content] of Object.entries(files)) {
		const target = path.join(root, relative);
		await fs.mkdir(path.dirname(target), { recursive: true });
		await fs.writeFile(target, content);
	}
}

export async function removeWorkspace(root: string): Promise<void> {
	await fs.rm(root, { recursive: true, force: true });
}

export async function readJson(filePath: string): Promise<unknown> {
	return JSON.parse(await fs.readFile(filePath, "utf-8"));
}

export function lintGate(overrides: Record<string, unknown> = {}) {
	return {
		name: "Lint",
		execution: { command: ["lint", "--json"], timeout_seconds: 30 },
		capabilities: { file_types: [".py"] },
		parsing: {
			strategy: "json_violations",
			violations_path: null,
			field_map: {
				file: "filename",
				message: "message",
				line: "row",
				rule: "code",
			},
		},
		...overrides,
	};
}

/**
 * Build a validated config the same way the loader does, with defaults
 * applied, for a workspace at `rootDir`.
 */
export function makeConfig(
	rootDir: string,
	overrides: Record<string, unknown> = {},
): LoadedConfig {
	const quality = qualityConfigSchema.parse({
		version: "1",
		project_scope: { include_globs: ["src/**/*.py"] },
		artifact_logging: { enabled: false },
		active_gates: ["lint"],
		gates: { lint: lintGate() },
		...overrides,
	});
	return {
		rootDir,
		configPath: path.join(rootDir, ".qgates", "quality.yml"),
		quality,
	};
}

/**
 * `.qgates/quality.yml` equivalent to `makeConfig` with its defaults, for
 * commands that load the config from the working directory.
 */
export const QUALITY_YML = `version: "1"
project_scope:
  include_globs: ["src/**/*.py"]
artifact_logging:
  enabled: false
logging:
  level: error
active_gates: [lint]
gates:
  lint:
    name: Lint
    execution:
      command: ["lint", "--json"]
      timeout_seconds: 30
    capabilities:
      file_types: [".py"]
    parsing:
      strategy: json_violations
      violations_path: null
      field_map:
        file: filename
        message: message
        line: row
        rule: code
`;
