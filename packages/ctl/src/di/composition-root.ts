/**
 * Composition root for the ctl package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import type { CommandDispatcher, CtlConfig, Output, SchedulerClientFactory } from "../types/index.js";
import { CommandDispatcherImpl } from "../dispatcher.js";
import { LoggerImpl } from "../logger/index.js";
import { consoleOutput } from "../output.js";
import { SchedulerClientImpl } from "../scheduler-client.js";
import { type Container, createContainer } from "./container.js";
import {
	COMMAND_DISPATCHER,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	type LoggerFactory,
	OUTPUT,
	SCHEDULER_CLIENT_FACTORY,
} from "./tokens.js";

/**
 * Replacements for the process-bound defaults, used by tests and embedders.
 */
export interface ContainerOverrides {
	output?: Output;
	loggerFactory?: LoggerFactory;
	clientFactory?: SchedulerClientFactory;
}

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens.
 */
export function configureContainer(container: Container, config: CtlConfig, overrides: ContainerOverrides = {}): void {
	container.instance(CONFIG, config);

	container.instance(OUTPUT, overrides.output ?? consoleOutput);

	container.singleton<LoggerFactory>(LOGGER_FACTORY, () => {
		return overrides.loggerFactory ?? ((prefix: string) => new LoggerImpl(prefix));
	});

	container.singleton(LOGGER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return factory("schedctl");
	});

	container.singleton<SchedulerClientFactory>(SCHEDULER_CLIENT_FACTORY, (c: Container) => {
		if (overrides.clientFactory) {
			return overrides.clientFactory;
		}
		const factory = c.resolve(LOGGER_FACTORY);
		return (endpoint, credentials) => new SchedulerClientImpl(endpoint, credentials, factory("scheduler-client"));
	});

	container.singleton(COMMAND_DISPATCHER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new CommandDispatcherImpl(
			c.resolve(CONFIG),
			c.resolve(SCHEDULER_CLIENT_FACTORY),
			c.resolve(OUTPUT),
			factory("dispatcher"),
		);
	});
}

/**
 * Create and configure a container with all dependencies for the given config.
 */
export function createCtlContainer(config: CtlConfig, overrides?: ContainerOverrides): Container {
	const container = createContainer();
	configureContainer(container, config, overrides);
	return container;
}

/**
 * Create and return the dispatcher from a fully configured container.
 */
export function createDispatcher(config: CtlConfig, overrides?: ContainerOverrides): CommandDispatcher {
	return createCtlContainer(config, overrides).resolve(COMMAND_DISPATCHER);
}
