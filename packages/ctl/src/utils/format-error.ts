/**
 * Format an unknown error value into a string message.
 * Handles both Error objects and other types.
 */
export function formatError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Read the `code` property Node attaches to system and TLS errors.
 */
export function errorCode(err: unknown): string | undefined {
	if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
		return err.code;
	}
	return undefined;
}
