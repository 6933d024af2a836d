// =============================================================================
// SERVER: listen on a socket with the node:http listener
// =============================================================================

import { createServer } from "node:http";
import type { CloudApiDouble } from "../double/index.js";
import { createNodeHandler } from "./node.js";

export interface ServerOptions {
	/** Default: `"127.0.0.1"` */
	host?: string;
	/** Default: `0` (any free port) */
	port?: number;
}

export interface RunningServer {
	/** Base URL, e.g. `http://127.0.0.1:8080`. */
	url: string;
	port: number;
	close(): Promise<void>;
}

export function startServer(double: CloudApiDouble, options: ServerOptions = {}): Promise<RunningServer> {
	const host = options.host ?? "127.0.0.1";
	const handler = createNodeHandler(double);
	const server = createServer((req, res) => {
		handler(req, res).catch((error: unknown) => {
			double.logger.error("response write failed", {
				error: error instanceof Error ? error.message : String(error),
			});
			res.destroy();
		});
	});

	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(options.port ?? 0, host, () => {
			server.off("error", reject);
			const address = server.address();
			if (address === null || typeof address === "string") {
				reject(new Error("server is not listening on a TCP port"));
				return;
			}
			const { port } = address;
			resolve({
				url: `http://${host.includes(":") ? `[${host}]` : host}:${port}`,
				port,
				close: () =>
					new Promise<void>((done, fail) => {
						server.close((err) => (err ? fail(err) : done()));
					}),
			});
		});
	});
}
