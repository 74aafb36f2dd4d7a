/**
 * ctl package public API
 *
 * This module exports the CLI runner, the dispatch pipeline and configuration types.
 */

// Entry points
export { runCli } from "./run-cli.js";
export { runCommand } from "./run-command.js";

// Configuration
export { loadConfig, parseCommandLine, type CommandLine } from "./config/index.js";
export { buildSessionCredentials } from "./credentials.js";
export { COMMAND_DEFINITIONS, PARAM_DEFINITIONS, type CommandDefinition, type CommandParam } from "./commands.js";
export { formatUsage } from "./usage.js";

// Class implementations
export { CommandDispatcherImpl } from "./dispatcher.js";
export { SchedulerClientImpl, httpsRequest, type HttpsRequester, type RawResponse } from "./scheduler-client.js";
export { LoggerImpl, setLogLevel, type LogLevel } from "./logger/index.js";
export { consoleOutput } from "./output.js";

// Result interpretation and failure classification
export { isRemoteSuccess, toExitCode } from "./result-interpreter.js";
export { classifyFailure, isNegotiationFailure } from "./failure-classifier.js";

// Errors
export { CtlError, NegotiationError, TransportError, UsageError } from "./errors/index.js";

// Interface types
export type {
	CommandDispatcher,
	CredentialKind,
	CtlConfig,
	Logger,
	Output,
	SchedulerClient,
	SchedulerClientFactory,
	SchedulerEndpoint,
	SessionCredentials,
} from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	createContainer,
	createToken,
	createCtlContainer,
	createDispatcher,
	configureContainer,
	COMMAND_DISPATCHER,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	OUTPUT,
	SCHEDULER_CLIENT_FACTORY,
} from "./di/index.js";
export type { Container, ContainerOverrides, Factory, LoggerFactory, Token } from "./di/index.js";
