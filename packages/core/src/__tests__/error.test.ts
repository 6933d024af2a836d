import { describe, expect, it } from "vitest";
import { CloudApiError, ERROR_CODES } from "../error/index.js";

describe("CloudApiError", () => {
	describe("constructor", () => {
		it("creates an error with the given code and message", () => {
			const error = new CloudApiError("NOT_FOUND", "key k1 not found");
			expect(error.code).toBe("NOT_FOUND");
			expect(error.message).toBe("key k1 not found");
		});

		it("is an instance of Error and of CloudApiError", () => {
			const error = new CloudApiError("INTERNAL", "boom");
			expect(error).toBeInstanceOf(Error);
			expect(error).toBeInstanceOf(CloudApiError);
		});

		it("has the name 'CloudApiError'", () => {
			expect(new CloudApiError("INTERNAL", "boom").name).toBe("CloudApiError");
		});

		it("keeps the cause and details", () => {
			const cause = new Error("root");
			const error = new CloudApiError("INVALID_ARGUMENT", "bad", {
				cause,
				details: { field: "name" },
			});
			expect(error.cause).toBe(cause);
			expect(error.details).toEqual({ field: "name" });
		});
	});

	describe("fromCode", () => {
		it("uses the registry message by default", () => {
			const error = CloudApiError.fromCode("ALREADY_EXISTS");
			expect(error.code).toBe("ALREADY_EXISTS");
			expect(error.message).toBe(ERROR_CODES.ALREADY_EXISTS.message);
		});

		it("accepts a custom message", () => {
			const error = CloudApiError.fromCode("INVALID_STATE", { message: "machine is stopped" });
			expect(error.message).toBe("machine is stopped");
		});
	});

	describe("static factories", () => {
		it("notFound uses the default message when none is given", () => {
			const error = CloudApiError.notFound();
			expect(error.code).toBe("NOT_FOUND");
			expect(error.message).toBe("Resource not found");
		});

		it("invalidArgument carries the given message", () => {
			const error = CloudApiError.invalidArgument("networks[0]: Expected string");
			expect(error.code).toBe("INVALID_ARGUMENT");
			expect(error.message).toBe("networks[0]: Expected string");
		});

		it("unknownMethod formats the method and path", () => {
			const error = CloudApiError.unknownMethod("PATCH", "/test/keys");
			expect(error.code).toBe("UNKNOWN_METHOD");
			expect(error.message).toBe('unknown request method "PATCH" for /test/keys');
			expect(error.details).toEqual({ method: "PATCH", path: "/test/keys" });
		});

		it("alreadyExists, invalidState and internal set their codes", () => {
			expect(CloudApiError.alreadyExists().code).toBe("ALREADY_EXISTS");
			expect(CloudApiError.invalidState().code).toBe("INVALID_STATE");
			expect(CloudApiError.internal().code).toBe("INTERNAL");
		});
	});
});
