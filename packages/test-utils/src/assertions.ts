import { INTERNAL_ERROR_BODY } from "cloudapi-double";

/**
 * Assert that a response is the generic 500 envelope.
 * Reads the body, so the response cannot be read again afterwards.
 */
export async function assertInternalError(res: Response): Promise<void> {
	const body = await res.text();
	if (res.status !== 500 || body !== INTERNAL_ERROR_BODY) {
		throw new Error(`Expected the 500 envelope, got ${res.status}: ${body}`);
	}
}

/**
 * Assert that Content-Length matches the UTF-8 byte length of the body and
 * return the body text.
 */
export async function assertContentLength(res: Response): Promise<string> {
	const body = await res.text();
	const expected = String(Buffer.byteLength(body, "utf8"));
	const actual = res.headers.get("content-length");
	if (actual !== expected) {
		throw new Error(`Content-Length mismatch: header ${actual ?? "missing"}, body ${expected} bytes`);
	}
	return body;
}

/** Assert a JSON response with the given status and return the decoded body. */
export async function readJson(res: Response, status: number): Promise<unknown> {
	const body = await res.text();
	if (res.status !== status) {
		throw new Error(`Expected status ${status}, got ${res.status}: ${body}`);
	}
	if (res.headers.get("content-type") !== "application/json") {
		throw new Error(`Expected application/json, got ${res.headers.get("content-type") ?? "no content type"}`);
	}
	return JSON.parse(body);
}
