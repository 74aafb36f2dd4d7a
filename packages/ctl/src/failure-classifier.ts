import { EXIT_CODE, type ExitCode } from "@schedctl/shared";
import { NegotiationError } from "./errors/index.js";
import { errorCode } from "./utils/index.js";

/**
 * Node error codes raised when a TLS session cannot be negotiated or the
 * peer certificate cannot be verified. Codes prefixed ERR_SSL_ or ERR_TLS_
 * are matched separately.
 */
const TLS_ERROR_CODES: ReadonlySet<string> = new Set([
	"EPROTO",
	"CERT_HAS_EXPIRED",
	"CERT_NOT_YET_VALID",
	"CERT_REVOKED",
	"CERT_SIGNATURE_FAILURE",
	"CERT_UNTRUSTED",
	"DEPTH_ZERO_SELF_SIGNED_CERT",
	"HOSTNAME_MISMATCH",
	"SELF_SIGNED_CERT_IN_CHAIN",
	"UNABLE_TO_GET_ISSUER_CERT",
	"UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
	"UNABLE_TO_VERIFY_LEAF_SIGNATURE",
]);

/**
 * Whether a raw Node error comes from TLS negotiation.
 */
export function isTlsErrorCode(code: string | undefined): boolean {
	if (code === undefined) {
		return false;
	}
	return TLS_ERROR_CODES.has(code) || code.startsWith("ERR_SSL_") || code.startsWith("ERR_TLS_");
}

/**
 * Whether an error means the authenticated session was never established.
 */
export function isNegotiationFailure(err: unknown): boolean {
	return err instanceof NegotiationError || isTlsErrorCode(errorCode(err));
}

/**
 * Resolve the exit code for an error raised while building the transport
 * or performing the remote call.
 *
 * Negotiation failures map to 2. Every other error is rethrown unchanged:
 * connection refused, DNS failures and unexpected HTTP statuses have no
 * dedicated code and propagate to the process boundary.
 */
export function classifyFailure(err: unknown): ExitCode {
	if (isNegotiationFailure(err)) {
		return EXIT_CODE.NEGOTIATION_FAILED;
	}
	throw err;
}
