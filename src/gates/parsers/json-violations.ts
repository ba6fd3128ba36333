import type {
	JsonViolationsParsing,
	ViolationField,
} from "../../config/types.js";
import { getCategoryLogger } from "../../output/app-logger.js";
import { evaluateFixable } from "./fixable.js";
import {
	type RawViolation,
	toNumberOrNull,
	toStringOrNull,
} from "./normalize.js";

const log = getCategoryLogger("gate");

/**
 * Resolve an RFC 6901 JSON Pointer. Returns undefined when any segment misses.
 */
export function resolveJsonPointer(data: unknown, pointer: string): unknown {
	if (pointer === "" || pointer === "/") return data;
	if (!pointer.startsWith("/")) return undefined;

	let current: unknown = data;
	for (const rawSegment of pointer.slice(1).split("/")) {
		const segment = rawSegment.replace(/~1/g, "/").replace(/~0/g, "~");
		current = child(current, segment);
		if (current === undefined) return undefined;
	}
	return current;
}

/**
 * Resolve a `/`-separated field path such as `location/row` inside one entry.
 */
export function resolveFieldPath(item: unknown, fieldPath: string): unknown {
	let current: unknown = item;
	for (const segment of fieldPath.split("/")) {
		if (segment === "") continue;
		current = child(current, segment);
		if (current === undefined) return undefined;
	}
	return current;
}

function child(value: unknown, key: string): unknown {
	if (Array.isArray(value)) {
		if (!/^\d+$/.test(key)) return undefined;
		return value[Number(key)];
	}
	if (typeof value === "object" && value !== null) {
		return Object.prototype.hasOwnProperty.call(value, key)
			? Reflect.get(value, key)
			: undefined;
	}
	return undefined;
}

/**
 * Parse tool output as JSON. A single document is tried first; tools that
 * print one JSON object per line are accepted as an array of those objects.
 */
function parseJsonOutput(output: string): unknown {
	const trimmed = output.trim();
	if (trimmed === "") return undefined;
	try {
		return JSON.parse(trimmed);
	} catch {
		const entries: unknown[] = [];
		for (const line of trimmed.split(/\r?\n/)) {
			if (line.trim() === "") continue;
			try {
				entries.push(JSON.parse(line));
			} catch {
				return undefined;
			}
		}
		return entries;
	}
}

// A single JSON-lines record parses as a lone object rather than an array
function rootEntries(document: unknown): unknown {
	return typeof document === "object" &&
		document !== null &&
		!Array.isArray(document)
		? [document]
		: document;
}

export function parseJsonViolations(
	output: string,
	parsing: JsonViolationsParsing,
	supportsAutofix: boolean,
): RawViolation[] {
	const document = parseJsonOutput(output);
	if (document === undefined) {
		log.debug("json_violations: output is not JSON");
		return [];
	}

	const entries =
		parsing.violations_path === null
			? rootEntries(document)
			: resolveJsonPointer(document, parsing.violations_path);
	if (!Array.isArray(entries)) {
		log.debug(
			`json_violations: ${parsing.violations_path ?? "document root"} is not an array`,
		);
		return [];
	}

	const field = (entry: unknown, name: ViolationField): unknown => {
		const fieldPath = parsing.field_map[name];
		return fieldPath === undefined
			? undefined
			: resolveFieldPath(entry, fieldPath);
	};

	return entries.map((entry): RawViolation => {
		const line = toNumberOrNull(field(entry, "line"));
		const col = toNumberOrNull(field(entry, "col"));
		return {
			file: toStringOrNull(field(entry, "file")),
			message: toStringOrNull(field(entry, "message")),
			line: line === null ? null : line + parsing.line_offset,
			col: col === null ? null : col + parsing.col_offset,
			rule: toStringOrNull(field(entry, "rule")),
			severity: toStringOrNull(field(entry, "severity")),
			fixable: evaluateFixable(parsing.fixable_when, supportsAutofix, (p) =>
				resolveFieldPath(entry, p),
			),
		};
	});
}
