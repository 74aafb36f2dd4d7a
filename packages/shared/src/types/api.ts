// =============================================================================
// Remote Operations
// =============================================================================

/**
 * Path segment of each remote operation exposed by the scheduler.
 * Every operation is a POST to https://<addr>:<port>/<path>.
 */
export const REMOTE_OPERATION = {
	SUPPORTED: "supported",
	MANUAL_OVERRIDE: "override",
	PROGRESS: "progress",
	RESCHEDULE: "reschedule",
	RECLONE: "reclone",
	CANCEL: "cancel",
} as const;

export type RemoteOperation = (typeof REMOTE_OPERATION)[keyof typeof REMOTE_OPERATION];

// =============================================================================
// Request Bodies
// =============================================================================

/**
 * Request body for POST /supported.
 */
export interface SupportedRequest {
	/** Capability name to probe */
	feature: string;
}

/**
 * Request body for POST /override.
 */
export interface ManualOverrideRequest {
	/** Failed script to mark as successful */
	script: string;
}

/**
 * Request body for POST /progress.
 * `version` is omitted entirely (never null) when the operator did not give one.
 */
export interface ProgressRequest {
	script: string;
	progress: number;
	version?: string;
}

/**
 * Request body for POST /reschedule.
 */
export interface RescheduleRequest {
	/** Failed script to put back in the queue */
	script: string;
}

/**
 * Request body for POST /reclone and POST /cancel.
 */
export type EmptyRequest = Record<string, never>;

/**
 * Maps each remote operation to its request body.
 */
export interface RemoteRequestMap {
	supported: SupportedRequest;
	override: ManualOverrideRequest;
	progress: ProgressRequest;
	reschedule: RescheduleRequest;
	reclone: EmptyRequest;
	cancel: EmptyRequest;
}

// =============================================================================
// Responses
// =============================================================================

/**
 * Raw response of every remote operation: a string-encoded boolean
 * ("True" or anything else). Only the transport boundary ever sees it.
 */
export type RemoteBooleanBody = string;
