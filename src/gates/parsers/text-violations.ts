import type {
	TextViolationsParsing,
	ViolationField,
} from "../../config/types.js";
import { getCategoryLogger } from "../../output/app-logger.js";
import { evaluateFixable } from "./fixable.js";
import { type RawViolation, toNumberOrNull } from "./normalize.js";

const log = getCategoryLogger("gate");

const FLAG_MAP: Record<TextViolationsParsing["flags"][number], string> = {
	IGNORECASE: "i",
	MULTILINE: "m",
};

type Groups = Record<string, string | undefined>;

export function compilePattern(parsing: TextViolationsParsing): RegExp {
	const flags = [...new Set(parsing.flags.map((flag) => FLAG_MAP[flag]))].join(
		"",
	);
	return new RegExp(parsing.pattern, flags);
}

/**
 * Replace `{group}` placeholders with captured values. Unknown or unmatched
 * groups render as an empty string.
 */
export function interpolate(template: string, groups: Groups): string {
	return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
		return groups[name] ?? "";
	});
}

export function parseTextViolations(
	output: string,
	parsing: TextViolationsParsing,
	supportsAutofix: boolean,
): RawViolation[] {
	const pattern = compilePattern(parsing);
	const violations: RawViolation[] = [];

	for (const line of output.split(/\r?\n/)) {
		if (line.trim() === "") continue;
		const match = pattern.exec(line);
		if (!match) continue;

		const groups: Groups = { ...match.groups };
		const field = (name: ViolationField): string | null => {
			const captured = groups[name];
			if (captured !== undefined && captured !== "") return captured;
			const fallback = parsing.defaults[name];
			return fallback === undefined ? null : interpolate(fallback, groups);
		};

		violations.push({
			file: field("file"),
			message: field("message"),
			line: toNumberOrNull(field("line")),
			col: toNumberOrNull(field("col")),
			rule: field("rule"),
			severity: field("severity"),
			fixable: evaluateFixable(
				parsing.fixable_when,
				supportsAutofix,
				(name) => groups[name],
			),
		});
	}

	if (violations.length === 0 && output.trim() !== "") {
		log.debug("text_violations: pattern matched no output line");
	}
	return violations;
}
