// =============================================================================
// Serve config: flags over environment over defaults
// =============================================================================

import { CloudApiError, type CloudApiLogger } from "@cloudapi-double/core";
import { createConsoleLogger, createJsonLogger, isLogLevel, type LogLevel } from "@cloudapi-double/core/logger";

export type LogFormat = "pretty" | "json";

export interface ServeConfig {
	account: string;
	host: string;
	port: number;
	logLevel: LogLevel;
	logFormat: LogFormat;
	/** Start the memory store with the built-in images, packages and networks. */
	seed: boolean;
}

/** Raw option values as commander hands them over. */
export interface ServeFlags {
	account?: string;
	host?: string;
	port?: string;
	logLevel?: string;
	logFormat?: string;
	seed?: boolean;
}

export const DEFAULT_SERVE_CONFIG: Readonly<ServeConfig> = Object.freeze({
	account: "test",
	host: "127.0.0.1",
	port: 8080,
	logLevel: "info",
	logFormat: "pretty",
	seed: true,
});

function parsePort(raw: string): number {
	const port = Number(raw);
	if (!/^\d+$/.test(raw) || port > 65535) {
		throw CloudApiError.invalidArgument(`invalid port "${raw}": expected an integer between 0 and 65535`);
	}
	return port;
}

function parseLogLevel(raw: string): LogLevel {
	if (!isLogLevel(raw)) {
		throw CloudApiError.invalidArgument(`invalid log level "${raw}": expected debug, info, warn or error`);
	}
	return raw;
}

function parseLogFormat(raw: string): LogFormat {
	if (raw !== "pretty" && raw !== "json") {
		throw CloudApiError.invalidArgument(`invalid log format "${raw}": expected pretty or json`);
	}
	return raw;
}

/**
 * Resolve the serve configuration. Each value comes from its flag, then from
 * `CLOUDAPI_*` in `env`, then from the defaults.
 */
export function resolveServeConfig(flags: ServeFlags, env: NodeJS.ProcessEnv = process.env): ServeConfig {
	const port = flags.port ?? env.CLOUDAPI_PORT;
	const logLevel = flags.logLevel ?? env.CLOUDAPI_LOG_LEVEL;
	const logFormat = flags.logFormat ?? env.CLOUDAPI_LOG_FORMAT;

	return {
		account: flags.account ?? env.CLOUDAPI_ACCOUNT ?? DEFAULT_SERVE_CONFIG.account,
		host: flags.host ?? env.CLOUDAPI_HOST ?? DEFAULT_SERVE_CONFIG.host,
		port: port === undefined ? DEFAULT_SERVE_CONFIG.port : parsePort(port),
		logLevel: logLevel === undefined ? DEFAULT_SERVE_CONFIG.logLevel : parseLogLevel(logLevel),
		logFormat: logFormat === undefined ? DEFAULT_SERVE_CONFIG.logFormat : parseLogFormat(logFormat),
		seed: flags.seed ?? DEFAULT_SERVE_CONFIG.seed,
	};
}

export function createLogger(config: Pick<ServeConfig, "logLevel" | "logFormat">): CloudApiLogger {
	return config.logFormat === "json"
		? createJsonLogger({ level: config.logLevel })
		: createConsoleLogger({ level: config.logLevel });
}
