import { z } from "zod";

export const VIOLATION_FIELDS = [
	"file",
	"message",
	"line",
	"col",
	"rule",
	"severity",
] as const;

export const severitySchema = z.enum(["error", "warning", "information"]);

const globListSchema = z.array(z.string().min(1));

/**
 * How `fixable` is derived for each parsed violation:
 * - "gate": fixable iff the gate declares supports_autofix
 * - { path, equals }: the value at `path` (a JSON path for json_violations,
 *   a capture group name for text_violations) equals `equals`, or is truthy
 *   when `equals` is omitted
 */
export const fixableWhenSchema = z.union([
	z.literal("gate"),
	z
		.object({
			path: z.string().min(1),
			equals: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
		})
		.strict(),
]);

export const jsonViolationsParsingSchema = z
	.object({
		strategy: z.literal("json_violations"),
		// RFC 6901 pointer to the violations array; null or "/" for a root array
		violations_path: z
			.string()
			.nullable()
			.default(null)
			.refine((value) => value === null || value.startsWith("/"), {
				message: "violations_path must be a JSON Pointer starting with '/'",
			}),
		field_map: z
			.object({
				file: z.string().min(1).optional(),
				message: z.string().min(1).optional(),
				line: z.string().min(1).optional(),
				col: z.string().min(1).optional(),
				rule: z.string().min(1).optional(),
				severity: z.string().min(1).optional(),
			})
			.strict(),
		line_offset: z.number().int().default(0),
		col_offset: z.number().int().default(0),
		fixable_when: fixableWhenSchema.optional(),
		default_severity: severitySchema.default("error"),
	})
	.strict();

export const textViolationsParsingSchema = z
	.object({
		strategy: z.literal("text_violations"),
		// Python-style named groups are accepted so existing catalogs load as-is
		pattern: z
			.string()
			.min(1)
			.transform((pattern) => pattern.replace(/\(\?P</g, "(?<")),
		flags: z.array(z.enum(["IGNORECASE", "MULTILINE"])).default([]),
		defaults: z.record(z.enum(VIOLATION_FIELDS), z.string()).default({}),
		fixable_when: fixableWhenSchema.optional(),
		default_severity: severitySchema.default("error"),
	})
	.strict();

export const parsingConfigSchema = z.discriminatedUnion("strategy", [
	jsonViolationsParsingSchema,
	textViolationsParsingSchema,
]);

export const gateScopeSchema = z
	.object({
		include_globs: globListSchema.default([]),
		exclude_globs: globListSchema.default([]),
	})
	.strict();

export const gateSchema = z
	.object({
		name: z.string().min(1),
		description: z.string().default(""),
		execution: z
			.object({
				command: z.array(z.string().min(1)).min(1),
				timeout_seconds: z.number().positive(),
				working_dir: z.string().min(1).optional(),
			})
			.strict(),
		capabilities: z
			.object({
				file_types: z.array(z.string().min(1)).min(1),
				supports_autofix: z.boolean().default(false),
			})
			.strict(),
		scope: gateScopeSchema.optional(),
		parsing: parsingConfigSchema,
		success: z
			.object({
				exit_codes_ok: z.array(z.number().int()).min(1).default([0]),
				// Error-severity findings tolerated before the gate fails
				max_errors: z.number().int().nonnegative().optional(),
				// Without max_errors: whether any finding at all fails the gate
				require_no_issues: z.boolean().default(true),
			})
			.strict()
			.default({}),
		// Advice shown after the re-run command when the gate fails
		hints: z.array(z.string().min(1)).default([]),
	})
	.strict()
	.superRefine((gate, ctx) => {
		if (gate.capabilities.supports_autofix && !gate.parsing.fixable_when) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["parsing", "fixable_when"],
				message:
					"gates that support autofix must declare parsing.fixable_when",
			});
		}

		if (gate.parsing.strategy === "text_violations") {
			const { pattern } = gate.parsing;
			try {
				new RegExp(pattern);
			} catch (error) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["parsing", "pattern"],
					message: `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
				});
				return;
			}
			if (!/\(\?<[A-Za-z_]\w*>/.test(pattern)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["parsing", "pattern"],
					message: "pattern must declare at least one named capture group",
				});
			}
		}
	});

export const scopeSettingsSchema = z
	.object({
		default_parent_branch: z.string().min(1).default("main"),
		file_extensions: z
			.array(z.string().regex(/^\.\w+$/, "extensions look like '.py'"))
			.min(1)
			.default([".py"]),
		git_timeout_seconds: z.number().positive().default(30),
	})
	.strict();

export const projectScopeSchema = z
	.object({
		include_globs: globListSchema,
		exclude_globs: globListSchema.default([]),
	})
	.strict();

export const artifactLoggingSchema = z
	.object({
		enabled: z.boolean().default(true),
		output_dir: z.string().min(1).default(".qgates/logs"),
		max_files: z.number().int().positive().default(200),
	})
	.strict();

export const loggingConfigSchema = z
	.object({
		level: z.enum(["debug", "info", "warning", "error"]).default("info"),
		debug_log: z
			.object({
				enabled: z.boolean().default(false),
			})
			.strict()
			.default({}),
	})
	.strict();

export const qualityConfigSchema = z
	.object({
		version: z.string().min(1),
		state_file: z.string().min(1).default(".qgates/state.json"),
		scope: scopeSettingsSchema.default({}),
		project_scope: projectScopeSchema,
		artifact_logging: artifactLoggingSchema.default({}),
		logging: loggingConfigSchema.default({}),
		active_gates: z.array(z.string().min(1)).min(1),
		gates: z.record(z.string().min(1), gateSchema),
	})
	.strict()
	.superRefine((config, ctx) => {
		config.active_gates.forEach((gateId, index) => {
			if (!(gateId in config.gates)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["active_gates", index],
					message: `active gate "${gateId}" is not defined under gates`,
				});
			}
		});
	});
