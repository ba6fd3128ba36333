import { describe, expect, it } from "vitest";
import { gateSchema } from "../../src/config/schema.js";
import { filesForGate } from "../../src/core/gate-files.js";
import { lintGate } from "../helpers/workspace.js";

const candidates = [
	"src/app.py",
	"src/app.pyi",
	"src/generated/models.py",
	"tests/test_app.py",
	"README.md",
];

describe("filesForGate", () => {
	it("keeps candidates with the gate's file types", () => {
		const gate = gateSchema.parse(lintGate());

		expect(filesForGate(gate, candidates)).toEqual([
			"src/app.py",
			"src/generated/models.py",
			"tests/test_app.py",
		]);
	});

	it("applies include and exclude globs", () => {
		const gate = gateSchema.parse(
			lintGate({
				capabilities: { file_types: [".py", ".pyi"] },
				scope: {
					include_globs: ["src/**"],
					exclude_globs: ["src/generated/**"],
				},
			}),
		);

		expect(filesForGate(gate, candidates)).toEqual(["src/app.py", "src/app.pyi"]);
	});

	it("returns nothing when no candidate matches", () => {
		const gate = gateSchema.parse(lintGate({ capabilities: { file_types: [".ts"] } }));

		expect(filesForGate(gate, candidates)).toEqual([]);
	});
});
