import type { CommandInvocation } from "@schedctl/shared";
import type {
	CommandDispatcher,
	CtlConfig,
	Logger,
	Output,
	SchedulerClient,
	SchedulerClientFactory,
} from "./types/index.js";
import { buildSessionCredentials } from "./credentials.js";
import { LoggerImpl } from "./logger/index.js";

/**
 * Dispatcher that maps each command onto exactly one scheduler call.
 * No retries, no batching, no caching: one invocation, one round trip.
 */
export class CommandDispatcherImpl implements CommandDispatcher {
	private readonly logger: Logger;

	constructor(
		private readonly config: CtlConfig,
		private readonly clientFactory: SchedulerClientFactory,
		private readonly output: Output,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("dispatcher");
	}

	async dispatch(invocation: CommandInvocation): Promise<boolean> {
		const credentials = buildSessionCredentials(this.config);
		this.logger.debug(
			`Dispatching ${invocation.command} to ${this.config.addr}:${this.config.port} (credentials=${credentials.kind})`,
		);

		const client = this.clientFactory({ addr: this.config.addr, port: this.config.port }, credentials);
		return this.call(client, invocation);
	}

	private async call(client: SchedulerClient, invocation: CommandInvocation): Promise<boolean> {
		switch (invocation.command) {
			case "feature": {
				const supported = await client.supported(invocation.feature);
				this.output.stdout(
					supported ? `${invocation.feature} is supported.` : `${invocation.feature} is not supported.`,
				);
				return supported;
			}
			case "override":
				return client.manualOverride(invocation.script);
			case "progress":
				// Keep the call arity identical to a version-less call when no version was given
				return invocation.version === undefined
					? client.progress(invocation.script, invocation.progress)
					: client.progress(invocation.script, invocation.progress, invocation.version);
			case "reschedule":
				return client.reschedule(invocation.script);
			case "reclone":
				return client.reclone();
			case "cancel":
				return client.cancel();
			default: {
				const unreachable: never = invocation;
				throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
			}
		}
	}
}
