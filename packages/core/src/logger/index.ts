import type { CloudApiLogger } from "../types/config.js";

export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { isLogLevel, LOG_LEVELS, type LogLevel } from "./levels.js";
export { buildRedactKeys, redactData } from "./redact.js";

export const noopLogger: CloudApiLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
