import { COMMAND_NAMES, type CommandName } from "@schedctl/shared";

/**
 * Parameter accepted by at least one command.
 */
export type CommandParam = "feature" | "script" | "progress" | "version";

export interface ParamDefinition {
	/** How the flag value is parsed */
	kind: "string" | "integer";
	/** Placeholder shown in usage text */
	metavar: string;
	help: string;
}

export interface CommandDefinition {
	name: CommandName;
	summary: string;
	required: readonly CommandParam[];
	optional: readonly CommandParam[];
}

export const PARAM_DEFINITIONS: Readonly<Record<CommandParam, ParamDefinition>> = {
	feature: { kind: "string", metavar: "NAME", help: "capability to probe" },
	script: { kind: "string", metavar: "SCRIPT", help: "script name" },
	progress: { kind: "integer", metavar: "PCT", help: "completion, 0-100" },
	version: { kind: "string", metavar: "VERSION", help: "script version" },
};

/**
 * Static command table. Never mutated after load.
 */
export const COMMAND_DEFINITIONS: Readonly<Record<CommandName, CommandDefinition>> = {
	feature: {
		name: "feature",
		summary: "Check whether the scheduler supports a feature",
		required: ["feature"],
		optional: [],
	},
	override: {
		name: "override",
		summary: "Mark a failed script as successful",
		required: ["script"],
		optional: [],
	},
	progress: {
		name: "progress",
		summary: "Report execution progress of a script",
		required: ["script", "progress"],
		optional: ["version"],
	},
	reschedule: {
		name: "reschedule",
		summary: "Re-queue a previously failed script",
		required: ["script"],
		optional: [],
	},
	reclone: {
		name: "reclone",
		summary: "Make the scheduler refresh its source checkout",
		required: [],
		optional: [],
	},
	cancel: {
		name: "cancel",
		summary: "Abort the run: unstarted work is dropped, started work finishes",
		required: [],
		optional: [],
	},
};

/**
 * Every parameter a command accepts, required first.
 */
export function acceptedParams(command: CommandName): readonly CommandParam[] {
	const definition = COMMAND_DEFINITIONS[command];
	return [...definition.required, ...definition.optional];
}

export function listCommandDefinitions(): CommandDefinition[] {
	return COMMAND_NAMES.map((name) => COMMAND_DEFINITIONS[name]);
}
