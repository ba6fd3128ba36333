/**
 * Make a gate id safe to embed in a file name.
 */
export function sanitizeGateId(gateId: string): string {
	return gateId.replace(/[^a-zA-Z0-9._-]/g, "_");
}
