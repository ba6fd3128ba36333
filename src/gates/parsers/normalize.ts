import path from "node:path";
import type { Severity } from "../../config/types.js";
import type { Violation } from "../result.js";

export const MESSAGE_SEPARATOR = " — ";

/**
 * A finding as a strategy extracted it, before any cleanup.
 */
export interface RawViolation {
	file: string | null;
	message: string | null;
	line: number | null;
	col: number | null;
	rule: string | null;
	severity: string | null;
	fixable: boolean;
}

export interface NormalizeOptions {
	rootDir: string;
	// Directory the tool ran in; relative paths it reports are resolved against it
	cwd: string;
	defaultSeverity: Severity;
}

const SEVERITY_ALIASES: Record<string, Severity> = {
	error: "error",
	err: "error",
	fatal: "error",
	warning: "warning",
	warn: "warning",
	information: "information",
	info: "information",
	note: "information",
	hint: "information",
};

/**
 * The single place every parsed finding passes through, whatever strategy
 * produced it.
 */
export function normalizeViolation(
	raw: RawViolation,
	options: NormalizeOptions,
): Violation {
	return {
		file: raw.file ? normalizeFilePath(raw.file, options) : null,
		message: normalizeMessage(raw.message ?? ""),
		line: positiveIntOrNull(raw.line),
		col: positiveIntOrNull(raw.col),
		rule: raw.rule && raw.rule.trim().length > 0 ? raw.rule.trim() : null,
		fixable: raw.fixable,
		severity: normalizeSeverity(raw.severity, options.defaultSeverity),
	};
}

/**
 * Workspace-relative POSIX path. Absolute paths are relativized, relative
 * ones are taken relative to the directory the tool ran in.
 */
export function normalizeFilePath(
	file: string,
	options: Pick<NormalizeOptions, "rootDir" | "cwd">,
): string {
	const cleaned = file.trim().replace(/\\/g, "/");
	const isWindowsAbsolute = /^[A-Za-z]:\//.test(cleaned);

	let relative: string;
	if (isWindowsAbsolute) {
		const root = options.rootDir.replace(/\\/g, "/").replace(/\/+$/, "");
		relative =
			cleaned.toLowerCase().startsWith(`${root.toLowerCase()}/`)
				? cleaned.slice(root.length + 1)
				: cleaned;
	} else {
		const absolute = path.resolve(options.cwd, cleaned);
		relative = path.relative(options.rootDir, absolute).replace(/\\/g, "/");
	}

	return relative.replace(/^(\.\/)+/, "");
}

export function normalizeMessage(message: string): string {
	const text = message
		.replace(/\u00a0/g, " ")
		.split(/\r\n|\r|\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0)
		.join(MESSAGE_SEPARATOR);
	return text.length > 0 ? text : "(no message)";
}

export function normalizeSeverity(
	value: string | null,
	fallback: Severity,
): Severity {
	if (!value) return fallback;
	return SEVERITY_ALIASES[value.trim().toLowerCase()] ?? fallback;
}

function positiveIntOrNull(value: number | null): number | null {
	if (value === null || !Number.isFinite(value)) return null;
	const int = Math.trunc(value);
	return int >= 1 ? int : null;
}

/**
 * Coerce a loosely typed value from tool output to a number.
 */
export function toNumberOrNull(value: unknown): number | null {
	if (typeof value === "number") return Number.isFinite(value) ? value : null;
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
}

export function toStringOrNull(value: unknown): string | null {
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	return null;
}
