import type { CommandInvocation } from "@schedctl/shared";

/**
 * Maps a validated command onto a single remote call.
 */
export interface CommandDispatcher {
	/**
	 * Perform the remote operation bound to the invocation.
	 * Resolves to the operation's outcome; rejects on transport failures.
	 */
	dispatch(invocation: CommandInvocation): Promise<boolean>;
}
