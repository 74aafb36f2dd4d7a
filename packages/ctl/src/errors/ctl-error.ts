import { EXIT_CODE, type ExitCode } from "@schedctl/shared";

/**
 * Base class for schedctl errors
 *
 * Includes the process exit code the error maps to when it reaches the CLI boundary.
 */
export class CtlError extends Error {
	readonly exitCode: ExitCode;

	constructor(message: string, exitCode: ExitCode = EXIT_CODE.COMMAND_FAILED, options?: { cause?: unknown }) {
		super(message, options);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}
