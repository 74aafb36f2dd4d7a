import { COMMAND_NAMES } from "@schedctl/shared";
import { PARAM_DEFINITIONS, listCommandDefinitions } from "./commands.js";

export const PROGRAM_NAME = "schedctl";

const GLOBAL_OPTIONS: readonly [string, string][] = [
	["--port PORT", "scheduler port (default 8002)"],
	["--addr ADDR", "scheduler address (default localhost)"],
	["--cacert PATH", "CA certificate used to verify the scheduler"],
	["--token TOKEN", "bearer token used to authenticate with the scheduler"],
	["--log-level LEVEL", "debug, info, warn, error or silent (default warn)"],
	["-h, --help", "show this help and exit"],
];

export function formatUsageLine(): string {
	return `usage: ${PROGRAM_NAME} [--port PORT] [--addr ADDR] [--cacert PATH] [--token TOKEN] {${COMMAND_NAMES.join(",")}} ...`;
}

/**
 * Full help text, built from the command table.
 */
export function formatUsage(): string {
	const lines = [formatUsageLine(), "", "Control in-flight scheduler jobs.", "", "commands:"];

	for (const definition of listCommandDefinitions()) {
		const flags = [
			...definition.required.map((param) => `--${param} ${PARAM_DEFINITIONS[param].metavar}`),
			...definition.optional.map((param) => `[--${param} ${PARAM_DEFINITIONS[param].metavar}]`),
		].join(" ");
		lines.push(`  ${`${definition.name} ${flags}`.trimEnd().padEnd(52)}${definition.summary}`);
	}

	lines.push("", "options:");
	for (const [flag, help] of GLOBAL_OPTIONS) {
		lines.push(`  ${flag.padEnd(52)}${help}`);
	}

	lines.push("", "exit status: 0 success, 1 command failed, 2 SSL negotiation or usage error");
	return lines.join("\n");
}
