// =============================================================================
// FETCH INTEGRATION: Web Fetch API handler
// =============================================================================
// Lets tests and fetch-based runtimes drive the double with Request/Response
// objects and no socket.

import type { CloudApiDouble } from "../double/index.js";
import { BAD_REQUEST } from "./response.js";
import { splitTarget } from "./request-helpers.js";

function toWebResponse(status: number, body: string, headers: Readonly<Record<string, string>>) {
	return new Response(body.length > 0 ? body : null, { status, headers });
}

/**
 * Create a `(request: Request) => Promise<Response>` handler for the double.
 *
 * @example
 * ```ts
 * const fetchDouble = createFetchHandler(double);
 * const res = await fetchDouble(new Request("http://double.local/test/keys"));
 * ```
 */
export function createFetchHandler(double: CloudApiDouble): (request: Request) => Promise<Response> {
	return async (request) => {
		const url = new URL(request.url);
		const target = splitTarget(`${url.pathname}${url.search}`);
		if (!target) {
			return toWebResponse(BAD_REQUEST.status, BAD_REQUEST.body, BAD_REQUEST.headers);
		}

		const response = await double.handle({
			method: request.method,
			path: target.path,
			query: target.query,
			body: await request.text(),
		});
		return toWebResponse(response.status, response.body, response.headers);
	};
}
