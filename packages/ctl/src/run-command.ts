import type { CommandInvocation, ExitCode } from "@schedctl/shared";
import type { CommandDispatcher, Logger, Output } from "./types/index.js";
import { classifyFailure } from "./failure-classifier.js";
import { toExitCode } from "./result-interpreter.js";
import { formatError } from "./utils/index.js";

/**
 * Dispatch one command and resolve the process exit code.
 *
 * - 0: the remote operation returned success
 * - 1: the remote operation returned failure
 * - 2: the secure session could not be negotiated (one diagnostic line on stderr)
 *
 * Any other error rejects the returned promise.
 */
export async function runCommand(
	dispatcher: CommandDispatcher,
	invocation: CommandInvocation,
	output: Output,
	logger: Logger,
): Promise<ExitCode> {
	let ok: boolean;
	try {
		ok = await dispatcher.dispatch(invocation);
	} catch (err) {
		const exitCode = classifyFailure(err);
		output.stderr(`SSL negotiation failed: ${formatError(err)}`);
		return exitCode;
	}

	logger.debug(`${invocation.command} returned ${ok ? "success" : "failure"}`);
	return toExitCode(ok);
}
