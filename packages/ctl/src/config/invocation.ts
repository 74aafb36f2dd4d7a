/**
 * Turns raw command flags into a validated CommandInvocation.
 */

import type { CommandInvocation, CommandName, ProgressInvocation } from "@schedctl/shared";
import { COMMAND_DEFINITIONS, type CommandParam } from "../commands.js";
import { UsageError } from "../errors/index.js";
import { parseInteger } from "./parse-integer.js";

type RawParams = Partial<Record<CommandParam, string>>;

function requireParams(command: CommandName, params: RawParams): void {
	const missing = COMMAND_DEFINITIONS[command].required.filter((param) => params[param] === undefined);
	if (missing.length > 0) {
		throw new UsageError(`the following arguments are required: ${missing.map((p) => `--${p}`).join(", ")}`);
	}
}

/**
 * Read a parameter that requireParams has already checked.
 */
function required(params: RawParams, param: CommandParam): string {
	const value = params[param];
	if (value === undefined) {
		throw new UsageError(`the following arguments are required: --${param}`);
	}
	return value;
}

export function buildInvocation(command: CommandName, params: RawParams): CommandInvocation {
	requireParams(command, params);

	switch (command) {
		case "feature":
			return { command, feature: required(params, "feature") };
		case "override":
			return { command, script: required(params, "script") };
		case "progress": {
			const raw = required(params, "progress");
			const progress = parseInteger(raw);
			if (progress === undefined) {
				throw new UsageError(`argument --progress: invalid int value: '${raw}'`);
			}
			const invocation: ProgressInvocation = { command, script: required(params, "script"), progress };
			if (params.version !== undefined) {
				invocation.version = params.version;
			}
			return invocation;
		}
		case "reschedule":
			return { command, script: required(params, "script") };
		case "reclone":
			return { command };
		case "cancel":
			return { command };
	}
}
