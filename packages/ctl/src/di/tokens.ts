/**
 * Injection tokens (identifiers) for all dependencies in the ctl package.
 */

import type {
	CommandDispatcher,
	CtlConfig,
	Logger,
	Output,
	SchedulerClientFactory,
} from "../types/index.js";

/**
 * Token type for identifying dependencies in the container.
 * Using symbols ensures type safety and avoids string collision.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

export const CONFIG = createToken<CtlConfig>("CtlConfig");

// ============================================================================
// Core Services
// ============================================================================

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

export const LOGGER = createToken<Logger>("Logger");

/**
 * Token for the operator-facing stdout/stderr writer.
 */
export const OUTPUT = createToken<Output>("Output");

/**
 * Token for the factory that binds a scheduler client to an endpoint and credentials.
 */
export const SCHEDULER_CLIENT_FACTORY = createToken<SchedulerClientFactory>("SchedulerClientFactory");

// ============================================================================
// Dispatch
// ============================================================================

export const COMMAND_DISPATCHER = createToken<CommandDispatcher>("CommandDispatcher");
