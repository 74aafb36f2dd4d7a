import { beforeEach, describe, expect, it } from "vitest";
import {
	COMMAND_DISPATCHER,
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	OUTPUT,
	SCHEDULER_CLIENT_FACTORY,
	createContainer,
	createCtlContainer,
	createDispatcher,
	createToken,
} from "../di/index.js";
import type { Container, Token } from "../di/index.js";
import { CommandDispatcherImpl } from "../dispatcher.js";
import { consoleOutput } from "../output.js";
import { SchedulerClientImpl } from "../scheduler-client.js";
import {
	createCapturedOutput,
	createMockLogger,
	createRecordingClientFactory,
	createTestConfig,
	createUniqueTokenName,
} from "./test-utils.js";

describe("DI Container", () => {
	let container: Container;

	beforeEach(() => {
		container = createContainer();
	});

	describe("createToken", () => {
		it("should create same token for same description", () => {
			expect(createToken<string>("SameToken")).toBe(createToken<string>("SameToken"));
		});

		it("should create different tokens for different descriptions", () => {
			expect(createToken<string>("Token1")).not.toBe(createToken<string>("Token2"));
		});
	});

	describe("singleton registration", () => {
		it("should call the factory once", () => {
			const token = createToken<{ value: number }>(createUniqueTokenName("TestSingleton"));
			let callCount = 0;

			container.singleton(token, () => {
				callCount++;
				return { value: callCount };
			});

			const first = container.resolve(token);
			const second = container.resolve(token);

			expect(first).toBe(second);
			expect(callCount).toBe(1);
		});
	});

	describe("instance registration", () => {
		it("should return registered instance", () => {
			const token = createToken<{ name: string }>(createUniqueTokenName("TestInstance"));
			const instance = { name: "test" };

			container.instance(token, instance);

			expect(container.resolve(token)).toBe(instance);
		});
	});

	describe("has and resolve", () => {
		it("should report registration state", () => {
			const token = createToken<string>(createUniqueTokenName("TestHas"));
			expect(container.has(token)).toBe(false);

			container.instance(token, "test");

			expect(container.has(token)).toBe(true);
		});

		it("should throw for unregistered token", () => {
			const token = createToken<string>(createUniqueTokenName("Unknown"));

			expect(() => container.resolve(token)).toThrow(/No registration found/);
		});
	});
});

describe("Composition Root", () => {
	describe("createCtlContainer", () => {
		it("should register every dependency", () => {
			const container = createCtlContainer(createTestConfig());

			const tokens: Token<unknown>[] = [
				CONFIG,
				LOGGER_FACTORY,
				LOGGER,
				OUTPUT,
				SCHEDULER_CLIENT_FACTORY,
				COMMAND_DISPATCHER,
			];
			for (const token of tokens) {
				expect(container.has(token)).toBe(true);
			}
		});

		it("should return the config that was provided", () => {
			const config = createTestConfig({ addr: "sched.test" });

			expect(createCtlContainer(config).resolve(CONFIG)).toBe(config);
		});

		it("should default to console output and the HTTPS client", () => {
			const container = createCtlContainer(createTestConfig());
			const factory = container.resolve(SCHEDULER_CLIENT_FACTORY);

			expect(container.resolve(OUTPUT)).toBe(consoleOutput);
			expect(factory({ addr: "localhost", port: 8002 }, { kind: "none" })).toBeInstanceOf(SchedulerClientImpl);
		});

		it("should apply overrides", () => {
			const output = createCapturedOutput();
			const logger = createMockLogger();
			const recording = createRecordingClientFactory();

			const container = createCtlContainer(createTestConfig(), {
				output,
				clientFactory: recording.factory,
				loggerFactory: () => logger,
			});

			expect(container.resolve(OUTPUT)).toBe(output);
			expect(container.resolve(SCHEDULER_CLIENT_FACTORY)).toBe(recording.factory);
			expect(container.resolve(LOGGER)).toBe(logger);
		});
	});

	describe("createDispatcher", () => {
		it("should wire the dispatcher to the client factory", async () => {
			const recording = createRecordingClientFactory();
			const dispatcher = createDispatcher(createTestConfig({ port: 9000 }), {
				clientFactory: recording.factory,
				loggerFactory: () => createMockLogger(),
			});

			expect(dispatcher).toBeInstanceOf(CommandDispatcherImpl);
			await expect(dispatcher.dispatch({ command: "reclone" })).resolves.toBe(true);
			expect(recording.created[0].endpoint).toEqual({ addr: "localhost", port: 9000 });
		});
	});
});
