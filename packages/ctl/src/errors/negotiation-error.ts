import { EXIT_CODE } from "@schedctl/shared";
import { CtlError } from "./ctl-error.js";

/**
 * Thrown when the authenticated HTTPS session with the scheduler cannot be
 * established: TLS handshake failure, unusable CA certificate, or a rejected token.
 */
export class NegotiationError extends CtlError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, EXIT_CODE.NEGOTIATION_FAILED, options);
	}
}
