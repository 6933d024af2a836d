// =============================================================================
// API HANDLER: top-level dispatch for the CloudAPI double
// =============================================================================

import type { CloudApiLogger } from "@cloudapi-double/core";
import type { ApiRequest } from "./request-helpers.js";
import { type ApiResponse, fromError, NOT_FOUND } from "./response.js";
import type { Router } from "./router.js";

export interface HandlerContext {
	router: Router;
	logger: CloudApiLogger;
}

/**
 * Route a request and turn whatever the handler produced into an ApiResponse.
 * Thrown ErrorResponses render as themselves; any other error becomes the
 * generic 500 envelope with the error's message kept in `errorText`.
 */
export async function handleRequest(ctx: HandlerContext, req: ApiRequest): Promise<ApiResponse> {
	const started = Date.now();
	const route = ctx.router.match(req.path);

	let response: ApiResponse;
	if (!route) {
		response = NOT_FOUND;
	} else {
		try {
			response = await route.handler(req);
		} catch (error) {
			response = fromError(error);
		}
	}

	if (response.status >= 500) {
		ctx.logger.error("request failed", {
			method: req.method,
			path: req.path,
			status: response.status,
			errorText: response.errorText,
		});
	}
	ctx.logger.debug("request handled", {
		method: req.method,
		path: req.path,
		query: req.query,
		route: route?.path,
		status: response.status,
		durationMs: Date.now() - started,
	});

	return response;
}
