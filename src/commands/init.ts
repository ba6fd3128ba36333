import fs from "node:fs/promises";
import path from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { CONFIG_DIR, CONFIG_FILE } from "../config/loader.js";
import { exists } from "./shared.js";

export const STARTER_CONFIG = `version: "1"
state_file: .qgates/state.json

scope:
  default_parent_branch: main
  file_extensions: [".py"]
  git_timeout_seconds: 30

project_scope:
  include_globs:
    - "src/**/*.py"
    - "tests/**/*.py"
  exclude_globs:
    - "**/__pycache__/**"
    - ".venv/**"

artifact_logging:
  enabled: true
  output_dir: .qgates/logs
  max_files: 200

logging:
  level: info

# mypy and pyright overlap on type errors; keep one or both
active_gates:
  - ruff-format
  - ruff-lint
  - mypy
  - pyright

gates:
  ruff-format:
    name: Ruff Format
    execution:
      command: ["python", "-m", "ruff", "format", "--check"]
      timeout_seconds: 60
    capabilities:
      file_types: [".py"]
      supports_autofix: true
    parsing:
      strategy: text_violations
      pattern: '^Would reformat: (?P<file>.+)$'
      defaults:
        message: "{file} would be reformatted"
        rule: format
      fixable_when: gate
    hints:
      - "Drop --check from the command to apply the formatting"

  ruff-lint:
    name: Ruff Lint
    execution:
      command: ["python", "-m", "ruff", "check", "--output-format=json"]
      timeout_seconds: 60
    capabilities:
      file_types: [".py"]
      supports_autofix: true
    parsing:
      strategy: json_violations
      violations_path: null
      field_map:
        file: filename
        message: message
        line: location/row
        col: location/column
        rule: code
      fixable_when:
        path: fix
    hints:
      - "Add --fix to the command to apply the fixable findings"

  mypy:
    name: Mypy
    execution:
      command: ["python", "-m", "mypy", "--no-error-summary", "--show-column-numbers"]
      timeout_seconds: 300
    capabilities:
      file_types: [".py"]
    parsing:
      strategy: text_violations
      pattern: '^(?P<file>[^:]+):(?P<line>\\d+):(?:(?P<col>\\d+):)? (?P<severity>error|warning|note): (?P<message>.*?)(?:  \\[(?P<rule>[\\w-]+)\\])?$'
    # notes and warnings are reported without failing the gate
    success:
      max_errors: 0

  pyright:
    name: Pyright
    execution:
      command: ["pyright", "--outputjson"]
      timeout_seconds: 300
    capabilities:
      file_types: [".py"]
    parsing:
      strategy: json_violations
      violations_path: /generalDiagnostics
      field_map:
        file: file
        message: message
        line: range/start/line
        col: range/start/character
        rule: rule
        severity: severity
      line_offset: 1
      col_offset: 1
    success:
      max_errors: 0
`;

export function registerInitCommand(program: Command): void {
	program
		.command("init")
		.description("Create a starter .qgates/quality.yml")
		.action(async () => {
			const targetDir = path.join(process.cwd(), CONFIG_DIR);
			const configPath = path.join(targetDir, CONFIG_FILE);

			if (await exists(configPath)) {
				console.log(chalk.yellow(`${CONFIG_DIR}/${CONFIG_FILE} already exists.`));
				return;
			}

			await fs.mkdir(targetDir, { recursive: true });
			await fs.writeFile(configPath, STARTER_CONFIG);
			console.log(chalk.green(`Created ${CONFIG_DIR}/${CONFIG_FILE}`));
		});
}
