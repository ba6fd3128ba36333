import { describe, expect, it } from "vitest";
import { textViolationsParsingSchema } from "../../../src/config/schema.js";
import {
	interpolate,
	parseTextViolations,
} from "../../../src/gates/parsers/text-violations.js";

describe("interpolate", () => {
	it("substitutes captured groups and blanks unknown ones", () => {
		expect(interpolate("{file} needs {what}{missing}", { file: "a.py", what: "formatting" })).toBe(
			"a.py needs formatting",
		);
	});
});

describe("parseTextViolations", () => {
	const mypyLike = textViolationsParsingSchema.parse({
		strategy: "text_violations",
		pattern:
			"^(?P<file>[^:]+):(?P<line>\\d+):(?:(?P<col>\\d+):)? (?P<severity>error|note): (?P<message>.*?)(?:  \\[(?P<rule>[\\w-]+)\\])?$",
	});

	it("extracts named groups line by line", () => {
		const output = [
			'src/app.py:12:5: error: Incompatible return value type (got "int", expected "str")  [return-value]',
			"src/app.py:30: note: See https://example.invalid/docs",
			"Found 1 error in 1 file",
		].join("\n");

		expect(parseTextViolations(output, mypyLike, false)).toEqual([
			{
				file: "src/app.py",
				message: 'Incompatible return value type (got "int", expected "str")',
				line: 12,
				col: 5,
				rule: "return-value",
				severity: "error",
				fixable: false,
			},
			{
				file: "src/app.py",
				message: "See https://example.invalid/docs",
				line: 30,
				col: null,
				rule: null,
				severity: "note",
				fixable: false,
			},
		]);
	});

	it("fills uncaptured fields from interpolated defaults", () => {
		const formatLike = textViolationsParsingSchema.parse({
			strategy: "text_violations",
			pattern: "^Would reformat: (?P<file>.+)$",
			defaults: { message: "{file} would be reformatted", rule: "format" },
			fixable_when: "gate",
		});

		const parsed = parseTextViolations(
			"Would reformat: src/app.py\n2 files already formatted\n",
			formatLike,
			true,
		);

		expect(parsed).toEqual([
			{
				file: "src/app.py",
				message: "src/app.py would be reformatted",
				line: null,
				col: null,
				rule: "format",
				severity: null,
				fixable: true,
			},
		]);
	});

	it("honours IGNORECASE", () => {
		const parsing = textViolationsParsingSchema.parse({
			strategy: "text_violations",
			pattern: "^warning: (?<message>.+)$",
			flags: ["IGNORECASE"],
			defaults: { severity: "warning" },
		});

		expect(parseTextViolations("WARNING: deprecated call", parsing, false)).toEqual([
			{
				file: null,
				message: "deprecated call",
				line: null,
				col: null,
				rule: null,
				severity: "warning",
				fixable: false,
			},
		]);
	});

	it("returns nothing when no line matches", () => {
		expect(parseTextViolations("all good\n", mypyLike, false)).toEqual([]);
	});
});
