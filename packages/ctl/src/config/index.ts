/**
 * schedctl configuration module.
 *
 * Load the invocation's configuration from CLI arguments, environment variables, and defaults.
 * Priority: CLI > Environment > Defaults
 */

import type { CommandInvocation } from "@schedctl/shared";
import type { CtlConfig } from "../types/index.js";
import { UsageError } from "../errors/index.js";
import { type ParsedArgs, parseCliArgs } from "./cli-parser.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";
import { buildInvocation } from "./invocation.js";

/**
 * Result of reading the command line.
 * - help: the operator asked for usage text
 * - run: a validated command and the configuration to run it with
 */
export type CommandLine =
	| { kind: "help"; config: CtlConfig }
	| { kind: "run"; config: CtlConfig; invocation: CommandInvocation };

function mergeConfig(cli: ParsedArgs): CtlConfig {
	const env = parseEnvVars();
	const defaults = getDefaultConfig();

	// Merge with priority: CLI > Environment > Defaults
	return {
		addr: cli.addr ?? env.addr ?? defaults.addr,
		port: cli.port ?? env.port ?? defaults.port,
		cacert: cli.cacert ?? env.cacert ?? defaults.cacert,
		token: cli.token ?? env.token ?? defaults.token,
		logLevel: cli.logLevel ?? env.logLevel ?? defaults.logLevel,
	};
}

/**
 * Load configuration alone, ignoring any command on the line.
 */
export function loadConfig(args: string[]): CtlConfig {
	return mergeConfig(parseCliArgs(args));
}

/**
 * Parse the full command line.
 * @throws UsageError when no command is given or a flag is missing or malformed.
 */
export function parseCommandLine(args: string[]): CommandLine {
	const cli = parseCliArgs(args);
	const config = mergeConfig(cli);

	if (cli.help) {
		return { kind: "help", config };
	}
	if (cli.command === undefined) {
		throw new UsageError("the following arguments are required: command");
	}

	return { kind: "run", config, invocation: buildInvocation(cli.command, cli.params) };
}

export { parseCliArgs, type ParsedArgs } from "./cli-parser.js";
export { buildInvocation } from "./invocation.js";
export { parseInteger } from "./parse-integer.js";
