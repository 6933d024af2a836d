// =============================================================================
// RESPONSES: the single result shape every handler returns
// =============================================================================
// An ApiResponse is fully rendered: the body is already encoded and the
// headers already carry Content-Type and Content-Length, so adapters only
// copy it onto their transport.

export interface ApiResponse {
	readonly status: number;
	/** Encoded body; empty for 202 and 204. */
	readonly body: string;
	readonly headers: Readonly<Record<string, string>>;
	/**
	 * Diagnostic text for failures. Never written to the wire; internal errors
	 * carry the original error message here.
	 */
	readonly errorText?: string;
}

const JSON_CONTENT_TYPE = "application/json";
const TEXT_CONTENT_TYPE = "text/plain; charset=UTF-8";

/**
 * Build the final header set: content type first (when non-empty), then the
 * extra headers, then Content-Length from the body's UTF-8 byte length.
 */
function renderHeaders(
	body: string,
	contentType: string,
	extra?: Readonly<Record<string, string>>,
): Readonly<Record<string, string>> {
	const headers: Record<string, string> = {};
	if (contentType) headers["Content-Type"] = contentType;
	if (extra) Object.assign(headers, extra);
	headers["Content-Length"] = String(Buffer.byteLength(body, "utf8"));
	return Object.freeze(headers);
}

// =============================================================================
// ERROR RESPONSES
// =============================================================================

/** A failure that renders as itself. Instances are frozen and shared. */
export class ErrorResponse implements ApiResponse {
	readonly status: number;
	readonly body: string;
	readonly contentType: string;
	readonly errorText: string;
	readonly headers: Readonly<Record<string, string>>;

	constructor(
		status: number,
		body: string,
		contentType: string,
		errorText: string,
		headers?: Readonly<Record<string, string>>,
	) {
		this.status = status;
		this.body = body;
		this.contentType = contentType;
		this.errorText = errorText;
		this.headers = renderHeaders(body, contentType, headers);
		Object.freeze(this);
	}
}

export const NOT_ALLOWED = new ErrorResponse(
	405,
	"Method is not allowed",
	TEXT_CONTENT_TYPE,
	"MethodNotAllowedError",
);

export const NOT_FOUND = new ErrorResponse(
	404,
	"Resource Not Found",
	TEXT_CONTENT_TYPE,
	"NotFoundError",
);

export const BAD_REQUEST = new ErrorResponse(
	400,
	"Malformed request url",
	TEXT_CONTENT_TYPE,
	"BadRequestError",
);

export const INTERNAL_ERROR_BODY = JSON.stringify({
	internalServerError: { message: "Unknown Error", code: 500 },
});

/** 500 with the fixed wire envelope; `errorText` keeps the real cause. */
export function internalError(errorText: string): ErrorResponse {
	return new ErrorResponse(500, INTERNAL_ERROR_BODY, JSON_CONTENT_TYPE, errorText);
}

// =============================================================================
// ENCODERS
// =============================================================================

/** JSON-encode `value`. A value that cannot be encoded yields a 500. */
export function json(status: number, value: unknown): ApiResponse {
	let body: string | undefined;
	try {
		body = JSON.stringify(value);
	} catch (error) {
		return internalError(error instanceof Error ? error.message : String(error));
	}
	if (body === undefined) {
		return internalError(`cannot encode ${typeof value} as JSON`);
	}
	return { status, body, headers: renderHeaders(body, JSON_CONTENT_TYPE) };
}

/** A response with no body, e.g. 202 for lifecycle actions and 204 for deletes. */
export function empty(status: number): ApiResponse {
	return { status, body: "", headers: renderHeaders("", "") };
}

/** Map any thrown value to a response: ErrorResponses render as themselves. */
export function fromError(error: unknown): ApiResponse {
	if (error instanceof ErrorResponse) return error;
	return internalError(error instanceof Error ? error.message : String(error));
}
