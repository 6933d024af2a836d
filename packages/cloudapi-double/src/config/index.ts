import type { CloudApiDoubleOptions } from "@cloudapi-double/core";
import { CloudApiError } from "@cloudapi-double/core";

const ACCOUNT_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Validate double options at runtime.
 * Throws CloudApiError (INVALID_ARGUMENT) naming the offending option.
 */
export function validateConfig(options: CloudApiDoubleOptions): void {
	if (!options.store) {
		throw CloudApiError.invalidArgument("cloudapi config: 'store' is required");
	}

	if (typeof options.account !== "string" || options.account.length === 0) {
		throw CloudApiError.invalidArgument("cloudapi config: 'account' must be a non-empty string");
	}

	// The account becomes a single path segment of every route.
	if (!ACCOUNT_PATTERN.test(options.account)) {
		throw CloudApiError.invalidArgument(
			`cloudapi config: account "${options.account}" may only contain letters, digits, '_', '.' and '-'`,
		);
	}
}
