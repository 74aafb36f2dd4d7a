import type { LogLevel } from "../logger/log-level.js";

/**
 * Configuration for a single schedctl invocation.
 * Values are populated from CLI arguments, environment variables, or defaults,
 * and passed explicitly to everything that needs them.
 */
export interface CtlConfig {
	/** Scheduler host name or IP address */
	addr: string;
	/** Scheduler HTTPS port */
	port: number;
	/** Path to a PEM CA certificate used to verify the scheduler, null for the platform store */
	cacert: string | null;
	/** Bearer token; empty means no Authorization header */
	token: string;
	logLevel: LogLevel;
}
