import * as p from "@clack/prompts";
import { memoryStore } from "@cloudapi-double/memory-store";
import { Command } from "commander";
import { createCloudApiDouble, startServer } from "cloudapi-double";
import pc from "picocolors";
import { createLogger, resolveServeConfig, type ServeFlags } from "../utils/get-config.js";

export const serveCommand = new Command("serve")
	.description("Start the CloudAPI double on a local port")
	.option("-a, --account <name>", "Account the routes are scoped under (or set CLOUDAPI_ACCOUNT)")
	.option("--host <host>", "Interface to listen on (or set CLOUDAPI_HOST)")
	.option("-p, --port <port>", "Port to listen on, 0 for any free port (or set CLOUDAPI_PORT)")
	.option("--log-level <level>", "debug, info, warn or error (or set CLOUDAPI_LOG_LEVEL)")
	.option("--log-format <format>", "pretty or json (or set CLOUDAPI_LOG_FORMAT)")
	.option("--no-seed", "Start with no images, packages or networks")
	.action(async (flags: ServeFlags) => {
		const config = resolveServeConfig(flags);
		const logger = createLogger(config);
		const double = createCloudApiDouble({
			account: config.account,
			store: memoryStore({ seed: config.seed }),
			logger,
		});
		const server = await startServer(double, { host: config.host, port: config.port });

		p.intro(pc.bgCyan(pc.black(" cloudapi-double ")));
		p.log.success(`Listening on ${pc.cyan(server.url)}`);
		p.log.info(`Account:  ${pc.cyan(config.account)}`);
		p.log.info(`Seeded:   ${config.seed ? pc.green("yes") : pc.dim("no")}`);
		p.outro(pc.dim(`Try: curl ${server.url}/${config.account}/packages`));

		const shutdown = (signal: string) => {
			logger.info("shutting down", { signal });
			server.close().then(
				() => process.exit(0),
				(error: unknown) => {
					logger.error("shutdown failed", { error: error instanceof Error ? error.message : String(error) });
					process.exit(1);
				},
			);
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));
	});
