/**
 * Environment variable parsing utilities for schedctl configuration.
 */

import { type LogLevel, isLogLevel } from "../logger/index.js";
import { parseInteger } from "./parse-integer.js";

export function parseEnvNumber(key: string): number | undefined {
	const value = process.env[key];
	if (value === undefined) {
		return undefined;
	}
	return parseInteger(value);
}

function parseEnvLogLevel(key: string): LogLevel | undefined {
	const value = process.env[key];
	return value !== undefined && isLogLevel(value) ? value : undefined;
}

export interface ParsedEnv {
	addr?: string;
	port?: number;
	cacert?: string;
	token?: string;
	logLevel?: LogLevel;
}

export function parseEnvVars(): ParsedEnv {
	return {
		addr: process.env.SCHEDCTL_ADDR,
		port: parseEnvNumber("SCHEDCTL_PORT"),
		cacert: process.env.SCHEDCTL_CACERT,
		token: process.env.SCHEDCTL_TOKEN,
		logLevel: parseEnvLogLevel("LOG_LEVEL"),
	};
}
