// =============================================================================
// CONSOLE LOGGER: one colored line per entry, data as key=value fields
// =============================================================================
// GET /test/keys at debug renders as
//   2025-01-02T03:04:05.000Z DEBUG cloudapi request handled method=GET path=/test/keys status=200

import pc from "picocolors";
import type { CloudApiLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: pc.magenta,
	info: pc.blue,
	warn: pc.yellow,
	error: pc.red,
};

export interface ConsoleLoggerOptions {
	/** Default: `"info"` */
	level?: LogLevel;
	/** Tag after the level. Default: `"cloudapi"` */
	prefix?: string;
	/** Lead each line with an ISO timestamp. Default: `true` */
	timestamps?: boolean;
	redactKeys?: string[];
	/** Line sink. Default: `console.error` for warn and error, `console.log` otherwise. */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	if (level === "error" || level === "warn") {
		console.error(line);
	} else {
		console.log(line);
	}
}

function formatValue(value: unknown): string {
	if (typeof value === "string") {
		return value === "" || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
	}
	if (typeof value === "object" && value !== null) {
		try {
			return JSON.stringify(value);
		} catch {
			return String(value);
		}
	}
	return String(value);
}

/** Render data as ` key=value` pairs; undefined values are left out. */
export function formatFields(data: Record<string, unknown> | undefined): string {
	if (!data) return "";
	let out = "";
	for (const [key, value] of Object.entries(data)) {
		if (value === undefined) continue;
		out += ` ${pc.dim(`${key}=`)}${formatValue(value)}`;
	}
	return out;
}

/**
 * Create a human-readable logger for local runs of the double.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.info("listening", { url: "http://127.0.0.1:8080" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): CloudApiLogger {
	const { level = "info", prefix = "cloudapi", timestamps = true, write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);
	const tag = pc.cyan(prefix);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const head = LEVEL_COLOR[lvl](pc.bold(lvl.toUpperCase().padEnd(5)));
		const stamp = timestamps ? `${pc.dim(new Date().toISOString())} ` : "";
		write(`${stamp}${head} ${tag} ${message}${formatFields(redactData(data, redactKeys))}`, lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
