/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	COMMAND_DISPATCHER,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	OUTPUT,
	SCHEDULER_CLIENT_FACTORY,
	createToken,
	type LoggerFactory,
	type Token,
} from "./tokens.js";
export { configureContainer, createCtlContainer, createDispatcher, type ContainerOverrides } from "./composition-root.js";
