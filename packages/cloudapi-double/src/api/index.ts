export { createFetchHandler } from "./fetch.js";
export { handleRequest, type HandlerContext } from "./handler.js";
export { createNodeHandler, writeResponse } from "./node.js";
export { type ApiRequest, parseFilters, queryParam, splitTarget } from "./request-helpers.js";
export {
	type ApiResponse,
	BAD_REQUEST,
	ErrorResponse,
	empty,
	fromError,
	INTERNAL_ERROR_BODY,
	internalError,
	json,
	NOT_ALLOWED,
	NOT_FOUND,
} from "./response.js";
export {
	ACCOUNT_PLACEHOLDER,
	buildCloudApiRouter,
	createRouterBuilder,
	respondWith,
	type Route,
	type RouteHandler,
	type Router,
	type RouterBuilder,
} from "./router.js";
export * from "./routes/index.js";
export { type RunningServer, type ServerOptions, startServer } from "./server.js";
export { createKeySchema, createMachineSchema, decodeBody, firewallRuleSchema } from "./validation.js";
