import type { CtlConfig, SessionCredentials } from "./types/index.js";

/**
 * Build the session credentials for one invocation.
 * An empty token counts as no token.
 */
export function buildSessionCredentials(config: Pick<CtlConfig, "cacert" | "token">): SessionCredentials {
	const { cacert, token } = config;

	if (cacert !== null && token !== "") {
		return { kind: "ca-cert-token", caCertPath: cacert, token };
	}
	if (cacert !== null) {
		return { kind: "ca-cert", caCertPath: cacert };
	}
	if (token !== "") {
		return { kind: "token", token };
	}
	return { kind: "none" };
}

export function caCertPathOf(credentials: SessionCredentials): string | null {
	return credentials.kind === "ca-cert" || credentials.kind === "ca-cert-token" ? credentials.caCertPath : null;
}

export function tokenOf(credentials: SessionCredentials): string | null {
	return credentials.kind === "token" || credentials.kind === "ca-cert-token" ? credentials.token : null;
}
