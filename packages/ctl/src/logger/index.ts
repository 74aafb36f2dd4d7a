export { LoggerImpl } from "./logger-impl.js";
export { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel, getCurrentLevel, isLogLevel, setLogLevel } from "./log-level.js";
