export { assertContentLength, assertInternalError, readJson } from "./assertions.js";
export { getTestInstance, type TestInstance, type TestInstanceOptions } from "./get-test-instance.js";
export { request } from "./request.js";
