// =============================================================================
// JSON LOGGER: one JSON object per line
// =============================================================================

import type { CloudApiLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Value of the `service` field. Default: `"cloudapi-double"` */
	service?: string;
	redactKeys?: string[];
	/** Line sink. Default: `console.log` for debug/info, `console.error` otherwise. */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	if (level === "error" || level === "warn") {
		console.error(line);
	} else {
		console.log(line);
	}
}

export function createJsonLogger(options: JsonLoggerOptions = {}): CloudApiLogger {
	const { level = "info", service = "cloudapi-double", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...redactData(data, redactKeys),
		};
		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
