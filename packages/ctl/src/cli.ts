#!/usr/bin/env tsx
/**
 * CLI entry point for schedctl.
 * This module handles command-line execution and the process exit code.
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { runCli } from "./run-cli.js";
import { formatError } from "./utils/index.js";

/**
 * Check if this module is being run directly (as CLI entry point).
 * The bin link is resolved so that `schedctl` on PATH counts too.
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	try {
		return realpathSync(scriptPath) === fileURLToPath(import.meta.url);
	} catch {
		return false;
	}
}

// CLI entry point
if (isMainModule()) {
	runCli(process.argv.slice(2))
		.then((exitCode) => {
			process.exitCode = exitCode;
		})
		.catch((err: unknown) => {
			console.error(`schedctl failed: ${formatError(err)}`);
			process.exit(1);
		});
}
