import type { ExitCode } from "@schedctl/shared";
import { type CommandLine, parseCommandLine } from "./config/index.js";
import { type ContainerOverrides, COMMAND_DISPATCHER, LOGGER, createCtlContainer } from "./di/index.js";
import { UsageError } from "./errors/index.js";
import { setLogLevel } from "./logger/index.js";
import { consoleOutput } from "./output.js";
import { runCommand } from "./run-command.js";
import { PROGRAM_NAME, formatUsage, formatUsageLine } from "./usage.js";

/**
 * Run one schedctl invocation and resolve its exit code.
 *
 * Usage errors are reported on stderr and never reach the network.
 * Errors that are neither usage nor negotiation failures reject.
 */
export async function runCli(args: string[], overrides: ContainerOverrides = {}): Promise<ExitCode> {
	const output = overrides.output ?? consoleOutput;

	let commandLine: CommandLine;
	try {
		commandLine = parseCommandLine(args);
	} catch (err) {
		if (err instanceof UsageError) {
			output.stderr(formatUsageLine());
			output.stderr(`${PROGRAM_NAME}: error: ${err.message}`);
			return err.exitCode;
		}
		throw err;
	}

	setLogLevel(commandLine.config.logLevel);

	if (commandLine.kind === "help") {
		output.stdout(formatUsage());
		return 0;
	}

	const container = createCtlContainer(commandLine.config, { ...overrides, output });
	return runCommand(
		container.resolve(COMMAND_DISPATCHER),
		commandLine.invocation,
		output,
		container.resolve(LOGGER),
	);
}
