import type { ApiRequest } from "cloudapi-double";

/**
 * Build an ApiRequest from a method and a request target such as
 * `/test/images?os=smartos`. The path is taken as already decoded.
 */
export function request(method: string, target: string, body?: unknown): ApiRequest {
	const q = target.indexOf("?");
	return {
		method,
		path: q === -1 ? target : target.slice(0, q),
		query: q === -1 ? undefined : target.slice(q + 1),
		body: body === undefined ? "" : typeof body === "string" ? body : JSON.stringify(body),
	};
}
