// =============================================================================
// LIST FILTERS
// =============================================================================
// Query filters arrive as raw strings, so every comparison is made against the
// stringified field value. Unknown filter keys are ignored.

import type { QueryFilters } from "@cloudapi-double/core";

export function matchesFilters<T extends object>(
	record: T,
	filters: QueryFilters | undefined,
	fields: readonly (keyof T & string)[],
): boolean {
	if (!filters) return true;
	for (const field of fields) {
		const wanted = filters[field];
		if (wanted === undefined) continue;
		if (String(record[field]) !== wanted) return false;
	}
	return true;
}

/** Match `tag.<name>=<value>` filters against a tag map. */
export function matchesTagFilters(
	tags: Record<string, string>,
	filters: QueryFilters | undefined,
): boolean {
	if (!filters) return true;
	for (const [key, wanted] of Object.entries(filters)) {
		if (!key.startsWith("tag.")) continue;
		if (tags[key.slice("tag.".length)] !== wanted) return false;
	}
	return true;
}

function parseCount(value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const n = Number(value);
	return Number.isInteger(n) && n >= 0 ? n : undefined;
}

/** Apply `offset` and `limit` filters; invalid values are ignored. */
export function paginate<T>(items: T[], filters: QueryFilters | undefined): T[] {
	const offset = parseCount(filters?.offset) ?? 0;
	const limit = parseCount(filters?.limit);
	return limit === undefined ? items.slice(offset) : items.slice(offset, offset + limit);
}
