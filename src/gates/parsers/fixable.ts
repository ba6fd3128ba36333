import type { FixableWhen } from "../../config/types.js";

/**
 * Derive `fixable` for one finding. `lookup` reads a field path for JSON
 * output or a capture group for text output.
 */
export function evaluateFixable(
	rule: FixableWhen | undefined,
	supportsAutofix: boolean,
	lookup: (path: string) => unknown,
): boolean {
	if (rule === undefined) return false;
	if (rule === "gate") return supportsAutofix;

	const value = lookup(rule.path);
	if (rule.equals === undefined) return isTruthy(value);
	if (value === undefined) return false;
	if (typeof value === "string" && typeof rule.equals !== "string") {
		return value === String(rule.equals);
	}
	return value === rule.equals;
}

function isTruthy(value: unknown): boolean {
	if (Array.isArray(value)) return value.length > 0;
	if (typeof value === "object" && value !== null) return true;
	return Boolean(value);
}
