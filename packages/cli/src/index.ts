#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { routesCommand } from "./commands/routes.js";
import { serveCommand } from "./commands/serve.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/ and dist/ both sit directly under the package root.
function readVersion(): string {
	const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../package.json"), "utf-8"));
	if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
		return pkg.version;
	}
	return "0.0.0";
}

const cliVersion = readVersion();

const BANNER = `
  ${pc.bold(pc.cyan("cloudapi-double"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Local test double for the CloudAPI control plane")}
`;

const program = new Command()
	.name("cloudapi-double")
	.description("CLI for cloudapi-double, a local CloudAPI test server")
	.version(cliVersion, "-v, --version")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(serveCommand);
program.addCommand(routesCommand);

const CLEAN_EXIT_CODES = new Set(["commander.help", "commander.helpDisplayed", "commander.version"]);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof CommanderError && CLEAN_EXIT_CODES.has(error.code)) {
		process.exit(0);
	}
	console.error(pc.red(error instanceof Error ? error.message : String(error)));
	process.exit(1);
}
