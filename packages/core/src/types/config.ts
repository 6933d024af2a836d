import type { CloudApiStore } from "./store.js";

export interface CloudApiLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

export interface CloudApiDoubleOptions {
	/** Account name every route is scoped under, e.g. `/{account}/machines`. */
	account: string;

	/** Resource store the handlers delegate to. */
	store: CloudApiStore;

	/** Logger for request and failure diagnostics. Default: silent. */
	logger?: CloudApiLogger;
}
