// Errors
export type { CloudApiErrorCode, RawErrorCode } from "./error/index.js";
export { CloudApiError, ERROR_CODES } from "./error/index.js";

// Type definitions
export * from "./types/index.js";
