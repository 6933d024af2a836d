import { type CloudApiErrorCode, ERROR_CODES } from "./codes.js";

export { type CloudApiErrorCode, ERROR_CODES, type RawErrorCode } from "./codes.js";

export class CloudApiError extends Error {
	readonly code: CloudApiErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(
		code: CloudApiErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.details = options?.details;
		this.name = "CloudApiError";
	}

	/**
	 * Create a CloudApiError from a typed error code, using the registry's
	 * default message unless one is given.
	 */
	static fromCode(
		code: CloudApiErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): CloudApiError {
		return new CloudApiError(code, options?.message ?? ERROR_CODES[code].message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	static notFound(message: string = ERROR_CODES.NOT_FOUND.message, cause?: unknown) {
		return new CloudApiError("NOT_FOUND", message, { cause });
	}

	static alreadyExists(message: string = ERROR_CODES.ALREADY_EXISTS.message, cause?: unknown) {
		return new CloudApiError("ALREADY_EXISTS", message, { cause });
	}

	static invalidArgument(message: string = ERROR_CODES.INVALID_ARGUMENT.message, cause?: unknown) {
		return new CloudApiError("INVALID_ARGUMENT", message, { cause });
	}

	static invalidState(message: string = ERROR_CODES.INVALID_STATE.message, cause?: unknown) {
		return new CloudApiError("INVALID_STATE", message, { cause });
	}

	/** Raised when a resource handler has no branch for the request's method. */
	static unknownMethod(method: string, path: string) {
		return new CloudApiError("UNKNOWN_METHOD", `unknown request method "${method}" for ${path}`, {
			details: { method, path },
		});
	}

	static internal(message: string = ERROR_CODES.INTERNAL.message, cause?: unknown) {
		return new CloudApiError("INTERNAL", message, { cause });
	}
}
