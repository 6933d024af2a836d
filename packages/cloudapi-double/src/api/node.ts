// =============================================================================
// NODE INTEGRATION: node:http request listener
// =============================================================================

import type { IncomingMessage, ServerResponse } from "node:http";
import type { CloudApiDouble } from "../double/index.js";
import { splitTarget } from "./request-helpers.js";
import { type ApiResponse, BAD_REQUEST, fromError } from "./response.js";

async function readBody(req: IncomingMessage): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of req) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
	}
	return Buffer.concat(chunks).toString("utf8");
}

/** Copy a rendered ApiResponse onto a Node response. */
export function writeResponse(res: ServerResponse, response: ApiResponse): void {
	for (const [name, value] of Object.entries(response.headers)) {
		res.setHeader(name, value);
	}
	res.statusCode = response.status;
	res.end(response.body.length > 0 ? response.body : undefined);
}

/**
 * Create a `node:http` request listener serving the double.
 *
 * @example
 * ```ts
 * import { createServer } from "node:http";
 *
 * const server = createServer(createNodeHandler(double));
 * server.listen(8080);
 * ```
 */
export function createNodeHandler(
	double: CloudApiDouble,
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
	return async (req, res) => {
		const target = splitTarget(req.url ?? "/");
		if (!target) {
			writeResponse(res, BAD_REQUEST);
			return;
		}

		let body: string;
		try {
			body = await readBody(req);
		} catch (error) {
			writeResponse(res, fromError(error));
			return;
		}

		const response = await double.handle({
			method: req.method ?? "GET",
			path: target.path,
			query: target.query,
			body,
		});
		writeResponse(res, response);
	};
}
