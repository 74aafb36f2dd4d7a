// =============================================================================
// Command Names
// =============================================================================

/**
 * Command name values as a const object.
 * Use these constants instead of string literals for type safety.
 */
export const COMMAND_NAME = {
	FEATURE: "feature",
	OVERRIDE: "override",
	PROGRESS: "progress",
	RESCHEDULE: "reschedule",
	RECLONE: "reclone",
	CANCEL: "cancel",
} as const;

/**
 * Operator-facing subcommand.
 * - feature: ask whether the scheduler supports a named capability
 * - override: mark a failed script as successful without re-running it
 * - progress: report how far a running script has got
 * - reschedule: re-queue a previously failed script
 * - reclone: make the scheduler refresh its source checkout
 * - cancel: stop unstarted work and let started work finish
 */
export type CommandName = (typeof COMMAND_NAME)[keyof typeof COMMAND_NAME];

/**
 * All command names in the order they are listed in usage text.
 */
export const COMMAND_NAMES: readonly CommandName[] = Object.values(COMMAND_NAME);

// =============================================================================
// Script References
// =============================================================================

/**
 * Identifies a schedulable unit of work.
 * A reference without a version targets the scheduler's current version.
 */
export interface ScriptRef {
	/** Script name as known to the scheduler */
	script: string;
	/** Optional version qualifier */
	version?: string;
}

// =============================================================================
// Command Invocations
// =============================================================================

export interface FeatureInvocation {
	command: "feature";
	/** Capability name, forwarded verbatim */
	feature: string;
}

export interface OverrideInvocation {
	command: "override";
	script: string;
}

export interface ProgressInvocation {
	command: "progress";
	script: string;
	/** Completion percentage, nominally 0-100 but forwarded unclamped */
	progress: number;
	/** Present only when the operator passed --version */
	version?: string;
}

export interface RescheduleInvocation {
	command: "reschedule";
	script: string;
}

export interface RecloneInvocation {
	command: "reclone";
}

export interface CancelInvocation {
	command: "cancel";
}

/**
 * A fully validated command with its parameters.
 * Discriminate on `command`.
 */
export type CommandInvocation =
	| FeatureInvocation
	| OverrideInvocation
	| ProgressInvocation
	| RescheduleInvocation
	| RecloneInvocation
	| CancelInvocation;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a string is a known command name
 */
export function isCommandName(value: string): value is CommandName {
	return (COMMAND_NAMES as readonly string[]).includes(value);
}
