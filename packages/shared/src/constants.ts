/**
 * Shared constants for the scheduler control client.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Connection Defaults
// =============================================================================

/** Scheduler address used when neither --addr nor SCHEDCTL_ADDR is given */
export const DEFAULT_SCHEDULER_ADDR = "localhost";
/** Scheduler HTTPS port used when neither --port nor SCHEDCTL_PORT is given */
export const DEFAULT_SCHEDULER_PORT = 8002;

/**
 * Grouped connection defaults.
 */
export const CONNECTION_DEFAULTS = {
	ADDR: DEFAULT_SCHEDULER_ADDR,
	PORT: DEFAULT_SCHEDULER_PORT,
	/** No CA certificate: the platform trust store verifies the scheduler */
	CACERT: null,
	/** Empty token: no Authorization header is sent */
	TOKEN: "",
} as const;

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Process exit codes. The set is closed: nothing else is ever returned.
 * - SUCCESS: the remote operation returned success
 * - COMMAND_FAILED: the remote operation completed but returned failure
 * - NEGOTIATION_FAILED: the secure session could not be established
 * - USAGE: the command line was rejected before any network activity
 *   (shares its value with NEGOTIATION_FAILED)
 */
export const EXIT_CODE = {
	SUCCESS: 0,
	COMMAND_FAILED: 1,
	NEGOTIATION_FAILED: 2,
	USAGE: 2,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

// =============================================================================
// Protocol
// =============================================================================

/**
 * The only response body the scheduler uses to signal success.
 * Compared with strict equality: "true", "TRUE" or "True\n" are failures.
 */
export const REMOTE_SUCCESS_LITERAL = "True";
