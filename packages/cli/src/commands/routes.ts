import * as p from "@clack/prompts";
import { memoryStore } from "@cloudapi-double/memory-store";
import { Command } from "commander";
import { createCloudApiDouble } from "cloudapi-double";
import pc from "picocolors";
import { resolveServeConfig } from "../utils/get-config.js";

export const routesCommand = new Command("routes")
	.description("Print the resolved route table")
	.option("-a, --account <name>", "Account the routes are scoped under (or set CLOUDAPI_ACCOUNT)")
	.option("--json", "Output as JSON")
	.action((options: { account?: string; json?: boolean }) => {
		const { account } = resolveServeConfig({ account: options.account });
		const double = createCloudApiDouble({ account, store: memoryStore({ seed: false }) });
		const paths = double.router.routes.map((route) => route.path);

		if (options.json) {
			process.stdout.write(`${JSON.stringify(paths, null, 2)}\n`);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" cloudapi-double routes ")));
		p.note(paths.map((path) => (path.endsWith("/") ? pc.dim(path) : path)).join("\n"), `account ${account}`);
		p.outro(pc.dim(`${paths.length} routes`));
	});
