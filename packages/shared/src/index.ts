export * from "./constants.js";
export * from "./types/command.js";
export * from "./types/api.js";
