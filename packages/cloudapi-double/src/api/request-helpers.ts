// =============================================================================
// REQUEST HELPERS: request shape and query parsing shared by all handlers
// =============================================================================

import { CloudApiError, type QueryFilters } from "@cloudapi-double/core";

export interface ApiRequest {
	method: string;
	/** Decoded URL path, e.g. `/test/machines/abc`. */
	path: string;
	/** Raw query string without the leading `?`; `undefined` when absent. */
	query?: string;
	/** Raw request body; `undefined` or `""` when there is none. */
	body?: string;
}

/**
 * Parse a raw query string into filters: pairs split on `&`, key and value
 * split on the first `=`, no URL decoding. Empty pairs (`a=1&`, `a=1&&b=2`)
 * are skipped. An absent or empty query yields `undefined` so callers can
 * tell "no filters" from an empty filter set.
 */
export function parseFilters(rawQuery: string | undefined): QueryFilters | undefined {
	if (!rawQuery) return undefined;
	const filters: Record<string, string> = {};
	for (const pair of rawQuery.split("&")) {
		if (pair === "") continue;
		const eq = pair.indexOf("=");
		if (eq === -1) {
			throw CloudApiError.invalidArgument(`malformed query filter "${pair}"`);
		}
		filters[pair.slice(0, eq)] = pair.slice(eq + 1);
	}
	return filters;
}

/** First URL-decoded value of a query parameter, or `""` when missing. */
export function queryParam(rawQuery: string | undefined, name: string): string {
	if (!rawQuery) return "";
	return new URLSearchParams(rawQuery).get(name) ?? "";
}

/**
 * Split a request target into decoded path and raw query. Returns `null` when
 * the path holds a malformed percent-escape.
 */
export function splitTarget(target: string): { path: string; query: string | undefined } | null {
	const q = target.indexOf("?");
	const rawPath = q === -1 ? target : target.slice(0, q);
	const query = q === -1 ? undefined : target.slice(q + 1);
	try {
		return { path: decodeURIComponent(rawPath), query };
	} catch {
		return null;
	}
}
