// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes raised by the store and the request layer.
// None of these map to an HTTP status: the request layer renders every
// non-ErrorResponse failure as a 500 and keeps the message for diagnostics.

export type RawErrorCode = {
	message: string;
};

export const ERROR_CODES = {
	NOT_FOUND: { message: "Resource not found" },
	ALREADY_EXISTS: { message: "Resource already exists" },
	INVALID_ARGUMENT: { message: "Invalid argument" },
	INVALID_STATE: { message: "Resource is in an invalid state for this operation" },
	UNKNOWN_METHOD: { message: "Unknown request method" },
	INTERNAL: { message: "Internal error" },
} as const satisfies Record<string, RawErrorCode>;

export type CloudApiErrorCode = keyof typeof ERROR_CODES;
