/**
 * Type definitions for the ctl package.
 */
export type { CommandDispatcher } from "./command-dispatcher.js";
export type { CtlConfig } from "./ctl-config.js";
export type { Logger } from "./logger.js";
export type { Output } from "./output.js";
export type { SchedulerClient, SchedulerClientFactory, SchedulerEndpoint } from "./scheduler-client.js";
export type { CredentialKind, SessionCredentials } from "./session-credentials.js";
