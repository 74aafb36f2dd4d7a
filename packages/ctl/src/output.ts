import type { Output } from "./types/index.js";

/**
 * Output bound to the process's standard streams.
 */
export const consoleOutput: Output = {
	stdout: (line) => console.log(line),
	stderr: (line) => console.error(line),
};
