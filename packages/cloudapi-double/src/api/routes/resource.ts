// =============================================================================
// RESOURCE FAMILIES: method tables for one collection of resources
// =============================================================================

import type { CloudApiStore } from "@cloudapi-double/core";
import { CloudApiError } from "@cloudapi-double/core";
import type { ApiRequest } from "../request-helpers.js";
import { type ApiResponse, NOT_ALLOWED } from "../response.js";

export const HTTP_METHODS = ["GET", "HEAD", "POST", "PUT", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

function isHttpMethod(method: string): method is HttpMethod {
	return HTTP_METHODS.some((m) => m === method);
}

export interface ResourceRequest {
	method: string;
	path: string;
	/** Path suffix after `/{account}/{family}/`; `""` for the collection itself. */
	id: string;
	isCollection: boolean;
	query: string | undefined;
	body: string | undefined;
}

export type MethodHandler = (req: ResourceRequest, store: CloudApiStore) => Promise<ApiResponse>;

export interface ResourceFamily {
	/** Collection segment, e.g. `"machines"`. */
	readonly name: string;
	readonly methods: Readonly<Partial<Record<HttpMethod, MethodHandler>>>;
}

export function defineResource(
	name: string,
	methods: Partial<Record<HttpMethod, MethodHandler>>,
): ResourceFamily {
	return Object.freeze({ name, methods: Object.freeze({ ...methods }) });
}

export const notAllowed: MethodHandler = async () => NOT_ALLOWED;

/**
 * Run a family's handler for a request already routed to `collectionPath`.
 * A method the family has no entry for raises UNKNOWN_METHOD.
 */
export async function dispatchResource(
	family: ResourceFamily,
	collectionPath: string,
	req: ApiRequest,
	store: CloudApiStore,
): Promise<ApiResponse> {
	const handler = isHttpMethod(req.method) ? family.methods[req.method] : undefined;
	if (!handler) {
		throw CloudApiError.unknownMethod(req.method, req.path);
	}

	const prefix = `${collectionPath}/`;
	const id = req.path.startsWith(prefix) ? req.path.slice(prefix.length) : "";
	return handler(
		{
			method: req.method,
			path: req.path,
			id,
			isCollection: req.path === collectionPath,
			query: req.query,
			body: req.body,
		},
		store,
	);
}
