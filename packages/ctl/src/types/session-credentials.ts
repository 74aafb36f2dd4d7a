/**
 * Credentials for one authenticated session with the scheduler.
 * Built once per invocation and never persisted.
 * - none: platform trust store, no client authentication
 * - ca-cert: the given CA is the only trust anchor for the scheduler's certificate
 * - token: bearer token authenticates the client
 * - ca-cert-token: both of the above
 */
export type SessionCredentials =
	| { kind: "none" }
	| { kind: "ca-cert"; caCertPath: string }
	| { kind: "token"; token: string }
	| { kind: "ca-cert-token"; caCertPath: string; token: string };

export type CredentialKind = SessionCredentials["kind"];
