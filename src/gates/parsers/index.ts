import type { ParsingConfig } from "../../config/types.js";
import type { Violation } from "../result.js";
import { parseJsonViolations } from "./json-violations.js";
import { normalizeViolation, type RawViolation } from "./normalize.js";
import { parseTextViolations } from "./text-violations.js";

export interface ParseInput {
	stdout: string;
	stderr: string;
}

export interface ParseContext {
	rootDir: string;
	cwd: string;
	supportsAutofix: boolean;
}

/**
 * Run the configured strategy over a gate's output and normalize the result.
 * Dispatch is on the strategy tag only.
 */
export function parseGateOutput(
	parsing: ParsingConfig,
	output: ParseInput,
	context: ParseContext,
): Violation[] {
	return extract(parsing, output, context.supportsAutofix).map((violation) =>
		normalizeViolation(violation, {
			rootDir: context.rootDir,
			cwd: context.cwd,
			defaultSeverity: parsing.default_severity,
		}),
	);
}

function extract(
	parsing: ParsingConfig,
	output: ParseInput,
	supportsAutofix: boolean,
): RawViolation[] {
	switch (parsing.strategy) {
		case "json_violations": {
			// JSON goes to stdout; fall back to stderr for tools that misroute it
			const source = output.stdout.trim() ? output.stdout : output.stderr;
			return parseJsonViolations(source, parsing, supportsAutofix);
		}
		case "text_violations":
			return parseTextViolations(
				`${output.stdout}\n${output.stderr}`,
				parsing,
				supportsAutofix,
			);
	}
}
