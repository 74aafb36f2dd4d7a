import type { SessionCredentials } from "./session-credentials.js";

/**
 * Where the scheduler listens.
 */
export interface SchedulerEndpoint {
	addr: string;
	port: number;
}

/**
 * Client for the scheduler's remote operations.
 * Each method performs exactly one round trip and resolves to the decoded
 * boolean outcome. Methods reject with a NegotiationError when the
 * authenticated session cannot be established.
 */
export interface SchedulerClient {
	supported(feature: string): Promise<boolean>;
	manualOverride(script: string): Promise<boolean>;
	progress(script: string, value: number, version?: string): Promise<boolean>;
	reschedule(script: string): Promise<boolean>;
	reclone(): Promise<boolean>;
	cancel(): Promise<boolean>;
}

/**
 * Builds a client bound to one endpoint and one set of credentials.
 * May throw a NegotiationError when the trust material cannot be loaded.
 */
export type SchedulerClientFactory = (endpoint: SchedulerEndpoint, credentials: SessionCredentials) => SchedulerClient;
