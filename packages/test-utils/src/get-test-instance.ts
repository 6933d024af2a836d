import type { CloudApiLogger } from "@cloudapi-double/core";
import { noopLogger } from "@cloudapi-double/core/logger";
import { type MemoryStoreOptions, memoryStore } from "@cloudapi-double/memory-store";
import { type CloudApiDouble, createCloudApiDouble, createFetchHandler } from "cloudapi-double";

export interface TestInstanceOptions {
	/** Account name. Default: "test" */
	account?: string;
	/** Memory store options. Default: seeded, real clock */
	store?: MemoryStoreOptions;
	/** Default: silent */
	logger?: CloudApiLogger;
}

export interface TestInstance {
	double: CloudApiDouble;
	/** Fetch-style client bound to the double; paths are relative to the root. */
	fetch: (path: string, init?: RequestInit) => Promise<Response>;
}

const BASE_URL = "http://cloudapi.test";

export function getTestInstance(options: TestInstanceOptions = {}): TestInstance {
	const double = createCloudApiDouble({
		account: options.account ?? "test",
		store: memoryStore(options.store),
		logger: options.logger ?? noopLogger,
	});
	const handle = createFetchHandler(double);

	return {
		double,
		fetch: (path, init) => handle(new Request(`${BASE_URL}${path}`, init)),
	};
}
