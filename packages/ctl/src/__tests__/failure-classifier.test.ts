/**
 * Tests for failure classification and the dispatch-to-exit-code pipeline
 */

import { describe, expect, it } from "vitest";
import { classifyFailure, isNegotiationFailure, isTlsErrorCode } from "../failure-classifier.js";
import { NegotiationError, TransportError, UsageError } from "../errors/index.js";
import { runCommand } from "../run-command.js";
import type { CommandDispatcher } from "../types/index.js";
import {
	createCapturedOutput,
	createConnectionRefusedError,
	createMockLogger,
	createTlsError,
} from "./test-utils.js";

function dispatcherReturning(result: boolean): CommandDispatcher {
	return { dispatch: () => Promise.resolve(result) };
}

function dispatcherRejecting(err: unknown): CommandDispatcher {
	return { dispatch: () => Promise.reject(err) };
}

describe("Failure classifier", () => {
	describe("isTlsErrorCode", () => {
		it.each([
			"DEPTH_ZERO_SELF_SIGNED_CERT",
			"SELF_SIGNED_CERT_IN_CHAIN",
			"UNABLE_TO_VERIFY_LEAF_SIGNATURE",
			"CERT_HAS_EXPIRED",
			"EPROTO",
			"ERR_TLS_CERT_ALTNAME_INVALID",
			"ERR_SSL_WRONG_VERSION_NUMBER",
		])("recognizes %s", (code) => {
			expect(isTlsErrorCode(code)).toBe(true);
		});

		it.each(["ECONNREFUSED", "ENOTFOUND", "ECONNRESET", "ETIMEDOUT"])("does not claim %s", (code) => {
			expect(isTlsErrorCode(code)).toBe(false);
		});

		it("returns false without a code", () => {
			expect(isTlsErrorCode(undefined)).toBe(false);
		});
	});

	describe("isNegotiationFailure", () => {
		it("is true for NegotiationError", () => {
			expect(isNegotiationFailure(new NegotiationError("bad CA"))).toBe(true);
		});

		it("is true for raw Node TLS errors", () => {
			expect(isNegotiationFailure(createTlsError())).toBe(true);
		});

		it("is false for transport and usage errors", () => {
			expect(isNegotiationFailure(new TransportError("cancel", 500))).toBe(false);
			expect(isNegotiationFailure(new UsageError("bad flag"))).toBe(false);
		});

		it("is false for non-Error values", () => {
			expect(isNegotiationFailure("boom")).toBe(false);
			expect(isNegotiationFailure(null)).toBe(false);
		});
	});

	describe("classifyFailure", () => {
		it("maps negotiation failures to 2", () => {
			expect(classifyFailure(new NegotiationError("handshake failed"))).toBe(2);
			expect(classifyFailure(createTlsError("CERT_HAS_EXPIRED"))).toBe(2);
		});

		it("rethrows unclassified errors unchanged", () => {
			const refused = createConnectionRefusedError();
			expect(() => classifyFailure(refused)).toThrow(refused);
		});
	});
});

describe("runCommand", () => {
	it("exits 0 when the operation succeeds", async () => {
		const output = createCapturedOutput();

		const code = await runCommand(dispatcherReturning(true), { command: "cancel" }, output, createMockLogger());

		expect(code).toBe(0);
		expect(output.stderrLines).toEqual([]);
	});

	it("exits 1 when the operation fails, without a diagnostic", async () => {
		const output = createCapturedOutput();

		const code = await runCommand(dispatcherReturning(false), { command: "reclone" }, output, createMockLogger());

		expect(code).toBe(1);
		expect(output.stderrLines).toEqual([]);
	});

	it("exits 2 with one diagnostic line on negotiation failure", async () => {
		const output = createCapturedOutput();

		const code = await runCommand(
			dispatcherRejecting(new NegotiationError("certificate verify failed")),
			{ command: "progress", script: "build-42", progress: 50 },
			output,
			createMockLogger(),
		);

		expect(code).toBe(2);
		expect(output.stderrLines).toEqual(["SSL negotiation failed: certificate verify failed"]);
	});

	it("rejects with unclassified errors", async () => {
		const output = createCapturedOutput();
		const refused = createConnectionRefusedError();

		await expect(
			runCommand(dispatcherRejecting(refused), { command: "cancel" }, output, createMockLogger()),
		).rejects.toBe(refused);
		expect(output.stderrLines).toEqual([]);
	});
});
