import { z } from "zod";
import { formatZodIssues, loadConfig } from "../config/loader.js";
import type { LoadedConfig } from "../config/types.js";
import {
	type QualityGateRunnerOptions,
	type QualityGatesReport,
	QualityGateRunner,
} from "../core/runner.js";
import { SCOPE_MODES, type ScopeRequest } from "../core/scope.js";
import {
	errorMessage,
	InputValidationError,
	QualityGatesError,
	type QualityGatesErrorCode,
} from "../errors.js";
import { getCategoryLogger } from "../output/app-logger.js";
import {
	buildCompactPayload,
	type CompactPayload,
	formatSummaryLine,
} from "../output/summary.js";

const log = getCategoryLogger("runner");

export const runQualityGatesInputSchema = z
	.object({
		scope: z.enum(SCOPE_MODES).default("auto"),
		files: z.array(z.string().min(1)).optional(),
	})
	.strict()
	.superRefine((input, ctx) => {
		if (input.scope === "files" && (!input.files || input.files.length === 0)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["files"],
				message: 'scope "files" requires a non-empty files list',
			});
		}
		if (input.scope !== "files" && input.files !== undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["files"],
				message: `files is only accepted with scope "files" (got "${input.scope}")`,
			});
		}
	});

export type RunQualityGatesInput = z.input<typeof runQualityGatesInputSchema>;

export interface TextContent {
	type: "text";
	text: string;
}

export interface JsonContent {
	type: "json";
	json: CompactPayload;
}

export interface RunQualityGatesSuccess {
	isError: false;
	content: [TextContent, JsonContent];
	report: QualityGatesReport;
}

export interface RunQualityGatesFailure {
	isError: true;
	content: [TextContent];
	error: { code: QualityGatesErrorCode; message: string };
}

export type RunQualityGatesResponse =
	| RunQualityGatesSuccess
	| RunQualityGatesFailure;

export interface RunQualityGatesContext extends QualityGateRunnerOptions {
	rootDir?: string;
	// Skips loading .qgates/quality.yml when the caller already has it
	config?: LoadedConfig;
}

/**
 * Validate the request and parse it into a scope request. Nothing runs when
 * this throws.
 */
export function parseScopeRequest(input: unknown): ScopeRequest {
	const parsed = runQualityGatesInputSchema.safeParse(input);
	if (!parsed.success) {
		throw new InputValidationError(
			`Invalid run_quality_gates input:\n${formatZodIssues(parsed.error)}`,
			parsed.error.issues.map((issue) => issue.message),
		);
	}

	const { scope, files } = parsed.data;
	if (scope === "files") {
		return { mode: "files", files: files ?? [] };
	}
	return { mode: scope };
}

/**
 * Tool entry point: two content items in fixed order on success (the
 * summary line, then the compact payload), or a structured error.
 */
export async function runQualityGates(
	input: unknown,
	context: RunQualityGatesContext = {},
): Promise<RunQualityGatesResponse> {
	try {
		const request = parseScopeRequest(input);
		const config = context.config ?? (await loadConfig(context.rootDir));
		const report = await new QualityGateRunner(config, context).run(request);

		return {
			isError: false,
			content: [
				{ type: "text", text: formatSummaryLine(report) },
				{ type: "json", json: buildCompactPayload(report) },
			],
			report,
		};
	} catch (error) {
		return toErrorResponse(error);
	}
}

/**
 * Map a thrown error to the structured error response.
 */
export function toErrorResponse(error: unknown): RunQualityGatesFailure {
	if (error instanceof QualityGatesError) {
		log.error(error.message);
		return errorResponse(error.code, error.message);
	}
	log.error(`Unexpected failure: ${errorMessage(error)}`);
	return errorResponse("internal_error", errorMessage(error));
}

function errorResponse(
	code: QualityGatesErrorCode,
	message: string,
): RunQualityGatesFailure {
	return {
		isError: true,
		content: [{ type: "text", text: `❌ Quality gates not run: ${message}` }],
		error: { code, message },
	};
}
