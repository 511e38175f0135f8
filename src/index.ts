#!/usr/bin/env node
import { runCli } from "./cli/run-cli.js";

runCli().catch((error: unknown) => {
	const message = error instanceof Error ? error.message : String(error);
	process.stderr.write(`Unexpected error: ${message}\n`);
	process.exitCode = 1;
});
