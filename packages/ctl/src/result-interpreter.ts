import { EXIT_CODE, type ExitCode, REMOTE_SUCCESS_LITERAL, type RemoteBooleanBody } from "@schedctl/shared";

/**
 * Decode the scheduler's string-encoded boolean.
 * Only the exact literal "True" is success; "False", "", "true" and any
 * other text (including "True" with surrounding whitespace) are failure.
 */
export function isRemoteSuccess(body: RemoteBooleanBody): boolean {
	return body === REMOTE_SUCCESS_LITERAL;
}

/**
 * Map a completed remote operation's outcome to the process exit code.
 */
export function toExitCode(ok: boolean): ExitCode {
	return ok ? EXIT_CODE.SUCCESS : EXIT_CODE.COMMAND_FAILED;
}
