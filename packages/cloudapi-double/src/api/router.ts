// =============================================================================
// PATH ROUTER: account-scoped route table with trailing-slash twins
// =============================================================================
// An exact path wins, otherwise the longest registered path that ends in "/"
// and prefixes the request path.

import type { CloudApiStore } from "@cloudapi-double/core";
import { CloudApiError } from "@cloudapi-double/core";
import type { ApiRequest } from "./request-helpers.js";
import { type ApiResponse, BAD_REQUEST, type ErrorResponse, NOT_FOUND } from "./response.js";
import { dispatchResource, type ResourceFamily } from "./routes/resource.js";

export const ACCOUNT_PLACEHOLDER = ":account";

export type RouteHandler = (req: ApiRequest) => Promise<ApiResponse>;

export interface Route {
	readonly path: string;
	readonly handler: RouteHandler;
}

export interface Router {
	readonly account: string;
	/** Registered routes, in registration order. */
	readonly routes: readonly Route[];
	match(path: string): Route | undefined;
}

export interface RouterBuilder {
	/** Register `handler` under `pattern` (and `pattern + "/"` unless it already ends in "/"). */
	handle(pattern: string, handler: RouteHandler): RouterBuilder;
	/** Register a resource family under `/:account/{family.name}`. */
	resource(family: ResourceFamily, store: CloudApiStore): RouterBuilder;
	build(): Router;
}

/** A handler that always answers with the same shared error response. */
export function respondWith(response: ErrorResponse): RouteHandler {
	return async () => response;
}

/**
 * Resource paths never end in "/": the slash twin of a collection route
 * exists so it reaches this guard instead of a shorter subtree route.
 */
function guardTrailingSlash(handler: RouteHandler): RouteHandler {
	return async (req) => {
		if (req.path !== "/" && req.path.endsWith("/")) return NOT_FOUND;
		return handler(req);
	};
}

export function createRouterBuilder(account: string): RouterBuilder {
	const table = new Map<string, RouteHandler>();

	function register(path: string, handler: RouteHandler): void {
		if (table.has(path)) {
			throw CloudApiError.invalidArgument(`route ${path} is already registered`);
		}
		table.set(path, handler);
	}

	const builder: RouterBuilder = {
		handle(pattern, handler) {
			const path = pattern.replace(ACCOUNT_PLACEHOLDER, account);
			register(path, handler);
			if (!path.endsWith("/")) {
				register(`${path}/`, handler);
			}
			return builder;
		},

		resource(family, store) {
			const collectionPath = `/${account}/${family.name}`;
			return builder.handle(
				`/${ACCOUNT_PLACEHOLDER}/${family.name}`,
				guardTrailingSlash(async (req) => dispatchResource(family, collectionPath, req, store)),
			);
		},

		build() {
			const routes: readonly Route[] = Object.freeze(
				[...table].map(([path, handler]) => Object.freeze({ path, handler })),
			);
			const exact = new Map(routes.map((r) => [r.path, r]));
			// Longest first, so the first prefix hit is the most specific subtree.
			const subtrees = routes
				.filter((r) => r.path.endsWith("/"))
				.sort((a, b) => b.path.length - a.path.length);

			return Object.freeze({
				account,
				routes,
				match(path: string) {
					return exact.get(path) ?? subtrees.find((r) => path.startsWith(r.path));
				},
			});
		},
	};
	return builder;
}

/**
 * The CloudAPI route table: `/` is not found, `/{account}/...` without a known
 * family is a bad request, and each family gets its collection routes.
 */
export function buildCloudApiRouter(
	account: string,
	store: CloudApiStore,
	families: readonly ResourceFamily[],
): Router {
	const builder = createRouterBuilder(account)
		.handle("/", respondWith(NOT_FOUND))
		.handle(`/${ACCOUNT_PLACEHOLDER}/`, respondWith(BAD_REQUEST));
	for (const family of families) {
		builder.resource(family, store);
	}
	return builder.build();
}
