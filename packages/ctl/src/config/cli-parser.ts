/**
 * CLI argument parsing for schedctl.
 *
 * Accepts `--flag value` and `--flag=value`. Global flags may appear before or
 * after the command; command flags are checked against the command table once
 * the command is known.
 */

import { type CommandName, isCommandName } from "@schedctl/shared";
import { type CommandParam, PARAM_DEFINITIONS, acceptedParams } from "../commands.js";
import { UsageError } from "../errors/index.js";
import { type LogLevel, isLogLevel } from "../logger/index.js";
import { parseInteger } from "./parse-integer.js";

export interface ParsedArgs {
	addr?: string;
	port?: number;
	cacert?: string;
	token?: string;
	logLevel?: LogLevel;
	help: boolean;
	command?: CommandName;
	/** Raw command flag values, last occurrence wins */
	params: Partial<Record<CommandParam, string>>;
}

type GlobalFlag = "addr" | "port" | "cacert" | "token" | "log-level";

const GLOBAL_FLAGS: readonly GlobalFlag[] = ["addr", "port", "cacert", "token", "log-level"];

function isGlobalFlag(name: string): name is GlobalFlag {
	return (GLOBAL_FLAGS as readonly string[]).includes(name);
}

function isCommandParam(name: string): name is CommandParam {
	return Object.prototype.hasOwnProperty.call(PARAM_DEFINITIONS, name);
}

function applyGlobalFlag(parsed: ParsedArgs, flag: GlobalFlag, value: string): void {
	switch (flag) {
		case "addr":
			parsed.addr = value;
			break;
		case "port": {
			const port = parseInteger(value);
			if (port === undefined) {
				throw new UsageError(`argument --port: invalid int value: '${value}'`);
			}
			parsed.port = port;
			break;
		}
		case "cacert":
			parsed.cacert = value;
			break;
		case "token":
			parsed.token = value;
			break;
		case "log-level":
			if (!isLogLevel(value)) {
				throw new UsageError(`argument --log-level: invalid choice: '${value}'`);
			}
			parsed.logLevel = value;
			break;
	}
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = { help: false, params: {} };
	const unrecognized: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			parsed.help = true;
			continue;
		}

		if (!arg.startsWith("--")) {
			if (parsed.command === undefined && isCommandName(arg)) {
				parsed.command = arg;
			} else if (parsed.command === undefined) {
				throw new UsageError(`argument command: invalid choice: '${arg}'`);
			} else {
				unrecognized.push(arg);
			}
			continue;
		}

		const eq = arg.indexOf("=");
		const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
		if (!isGlobalFlag(name) && !isCommandParam(name)) {
			unrecognized.push(arg);
			continue;
		}

		let value: string;
		if (eq !== -1) {
			value = arg.slice(eq + 1);
		} else {
			const next = args[i + 1];
			if (next === undefined || next.startsWith("--")) {
				throw new UsageError(`argument --${name}: expected one argument`);
			}
			value = next;
			i++;
		}

		if (isGlobalFlag(name)) {
			applyGlobalFlag(parsed, name, value);
		} else if (isCommandParam(name)) {
			parsed.params[name] = value;
		}
	}

	if (parsed.help) {
		return parsed;
	}

	if (parsed.command !== undefined) {
		const accepted = acceptedParams(parsed.command);
		for (const param of Object.keys(parsed.params)) {
			if (!(accepted as readonly string[]).includes(param)) {
				unrecognized.push(`--${param}`);
			}
		}
	}

	if (unrecognized.length > 0) {
		throw new UsageError(`unrecognized arguments: ${unrecognized.join(" ")}`);
	}

	return parsed;
}
