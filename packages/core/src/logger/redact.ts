// =============================================================================
// LOG REDACTION
// =============================================================================

const DEFAULT_REDACT_KEYS: readonly string[] = ["key", "password", "token", "secret"];

/**
 * Replace the values of redacted keys with "[REDACTED]". Only top-level keys
 * are inspected; the input object is never mutated.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: ReadonlySet<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const key of Object.keys(data)) {
		if (!keys.has(key)) continue;
		redacted ??= { ...data };
		redacted[key] = "[REDACTED]";
	}
	return redacted ?? data;
}

export function buildRedactKeys(userKeys?: readonly string[]): ReadonlySet<string> {
	return new Set(userKeys ?? DEFAULT_REDACT_KEYS);
}
