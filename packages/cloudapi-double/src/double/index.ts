// =============================================================================
// CLOUDAPI DOUBLE: factory wiring router, store and logger together
// =============================================================================

import type { CloudApiDoubleOptions, CloudApiLogger, CloudApiStore } from "@cloudapi-double/core";
import { noopLogger } from "@cloudapi-double/core/logger";
import { handleRequest } from "../api/handler.js";
import type { ApiRequest } from "../api/request-helpers.js";
import type { ApiResponse } from "../api/response.js";
import { buildCloudApiRouter, type Router } from "../api/router.js";
import { resourceFamilies } from "../api/routes/index.js";
import { validateConfig } from "../config/index.js";

export interface CloudApiDouble {
	readonly account: string;
	readonly store: CloudApiStore;
	readonly router: Router;
	readonly logger: CloudApiLogger;
	/** Route one request and render the result. Never rejects. */
	handle(req: ApiRequest): Promise<ApiResponse>;
}

/**
 * Create a CloudAPI double for one account.
 *
 * @example
 * ```ts
 * import { createCloudApiDouble } from "cloudapi-double";
 * import { memoryStore } from "@cloudapi-double/memory-store";
 *
 * const double = createCloudApiDouble({ account: "test", store: memoryStore() });
 * const res = await double.handle({ method: "GET", path: "/test/keys", query: undefined, body: "" });
 * ```
 */
export function createCloudApiDouble(options: CloudApiDoubleOptions): CloudApiDouble {
	validateConfig(options);

	const { account, store } = options;
	const logger = options.logger ?? noopLogger;
	const router = buildCloudApiRouter(account, store, resourceFamilies);

	return Object.freeze({
		account,
		store,
		router,
		logger,
		handle: (req: ApiRequest) => handleRequest({ router, logger }, req),
	});
}
