import { readFileSync } from "node:fs";
import * as https from "node:https";
import {
	REMOTE_OPERATION,
	type RemoteBooleanBody,
	type RemoteOperation,
	type RemoteRequestMap,
} from "@schedctl/shared";
import type { Logger, SchedulerClient, SchedulerEndpoint, SessionCredentials } from "./types/index.js";
import { NegotiationError, TransportError } from "./errors/index.js";
import { caCertPathOf, tokenOf } from "./credentials.js";
import { isTlsErrorCode } from "./failure-classifier.js";
import { isRemoteSuccess } from "./result-interpreter.js";
import { LoggerImpl } from "./logger/index.js";
import { errorCode, formatError } from "./utils/index.js";

const PEM_CERTIFICATE_MARKER = "-----BEGIN CERTIFICATE-----";

/**
 * Status and body of one HTTPS exchange.
 */
export interface RawResponse {
	status: number;
	body: RemoteBooleanBody;
}

/**
 * Performs one HTTPS request and collects the whole response body.
 */
export type HttpsRequester = (options: https.RequestOptions, body: string) => Promise<RawResponse>;

export const httpsRequest: HttpsRequester = (options, body) => {
	return new Promise((resolve, reject) => {
		const req = https.request(options, (res) => {
			let responseBody = "";
			res.setEncoding("utf8");
			res.on("data", (chunk: string) => (responseBody += chunk));
			res.on("end", () => resolve({ status: res.statusCode ?? 0, body: responseBody }));
			res.on("error", reject);
		});
		req.on("error", reject);
		req.end(body);
	});
};

/**
 * Load the PEM trust anchor for the scheduler's certificate.
 * A missing or unreadable file is a local error and propagates as-is;
 * a file that holds no certificate cannot set up verification at all.
 */
function loadCaCertificate(caCertPath: string): string {
	const pem = readFileSync(caCertPath, "utf8");
	if (!pem.includes(PEM_CERTIFICATE_MARKER)) {
		throw new NegotiationError(`No PEM certificate found in ${caCertPath}`);
	}
	return pem;
}

/**
 * HTTPS client for the scheduler's remote operations.
 * Every operation is a POST with a JSON body; the response body is the
 * scheduler's string-encoded boolean, decoded here and nowhere else.
 */
export class SchedulerClientImpl implements SchedulerClient {
	private readonly ca: string | undefined;
	private readonly token: string | null;
	private readonly logger: Logger;

	constructor(
		private readonly endpoint: SchedulerEndpoint,
		credentials: SessionCredentials,
		logger?: Logger,
		private readonly requester: HttpsRequester = httpsRequest,
	) {
		const caCertPath = caCertPathOf(credentials);
		this.ca = caCertPath === null ? undefined : loadCaCertificate(caCertPath);
		this.token = tokenOf(credentials);
		this.logger = logger ?? new LoggerImpl("scheduler-client");
	}

	supported(feature: string): Promise<boolean> {
		return this.post(REMOTE_OPERATION.SUPPORTED, { feature });
	}

	manualOverride(script: string): Promise<boolean> {
		return this.post(REMOTE_OPERATION.MANUAL_OVERRIDE, { script });
	}

	progress(script: string, value: number, version?: string): Promise<boolean> {
		return this.post(
			REMOTE_OPERATION.PROGRESS,
			version === undefined ? { script, progress: value } : { script, progress: value, version },
		);
	}

	reschedule(script: string): Promise<boolean> {
		return this.post(REMOTE_OPERATION.RESCHEDULE, { script });
	}

	reclone(): Promise<boolean> {
		return this.post(REMOTE_OPERATION.RECLONE, {});
	}

	cancel(): Promise<boolean> {
		return this.post(REMOTE_OPERATION.CANCEL, {});
	}

	private requestOptions(operation: RemoteOperation, payload: string): https.RequestOptions {
		const headers: Record<string, string | number> = {
			"Content-Type": "application/json",
			"Content-Length": Buffer.byteLength(payload),
		};
		if (this.token !== null) {
			headers.Authorization = `Bearer ${this.token}`;
		}

		return {
			hostname: this.endpoint.addr,
			port: this.endpoint.port,
			path: `/${operation}`,
			method: "POST",
			headers,
			// One round trip per invocation: no pooled keep-alive socket
			agent: false,
			...(this.ca === undefined ? {} : { ca: this.ca }),
		};
	}

	private async post<Op extends RemoteOperation>(operation: Op, body: RemoteRequestMap[Op]): Promise<boolean> {
		const payload = JSON.stringify(body);
		const target = `${this.endpoint.addr}:${this.endpoint.port}`;
		this.logger.debug(`POST https://${target}/${operation} ${payload}`);

		let response: RawResponse;
		try {
			response = await this.requester(this.requestOptions(operation, payload), payload);
		} catch (err) {
			if (isTlsErrorCode(errorCode(err))) {
				throw new NegotiationError(`TLS negotiation with ${target} failed: ${formatError(err)}`, { cause: err });
			}
			throw err;
		}

		if (response.status === 401 || response.status === 403) {
			throw new NegotiationError(`Scheduler at ${target} rejected the credentials (HTTP ${response.status})`);
		}

		if (response.status < 200 || response.status >= 300) {
			throw new TransportError(operation, response.status);
		}

		const ok = isRemoteSuccess(response.body);
		this.logger.info(`${operation} -> ${JSON.stringify(response.body)} (${ok ? "success" : "failure"})`);
		return ok;
	}
}
