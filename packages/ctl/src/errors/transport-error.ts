import { CtlError } from "./ctl-error.js";

/**
 * Thrown when the scheduler answers with an unexpected HTTP status
 */
export class TransportError extends CtlError {
	readonly status: number;

	constructor(operation: string, status: number) {
		super(`Scheduler returned HTTP ${status} for ${operation}`);
		this.status = status;
	}
}
