export const LOG_LEVELS = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

let currentLevel: LogLevel = DEFAULT_LOG_LEVEL;

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getCurrentLevel(): LogLevel {
	return currentLevel;
}
