import { EXIT_CODE } from "@schedctl/shared";
import { CtlError } from "./ctl-error.js";

/**
 * Thrown when the command line is invalid (unknown command or flag, missing
 * or malformed value). Raised before any network activity.
 */
export class UsageError extends CtlError {
	constructor(message: string) {
		super(message, EXIT_CODE.USAGE);
	}
}
