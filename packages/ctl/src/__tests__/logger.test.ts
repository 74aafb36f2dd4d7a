import { afterEach, describe, expect, it } from "vitest";
import { LoggerImpl, isLogLevel, setLogLevel } from "../logger/index.js";

describe("LoggerImpl", () => {
	afterEach(() => {
		setLogLevel("warn");
	});

	function capture(prefix: string) {
		const lines: string[] = [];
		return { lines, logger: new LoggerImpl(prefix, (line) => lines.push(line)) };
	}

	it("formats timestamp, padded level and prefix", () => {
		setLogLevel("debug");
		const { lines, logger } = capture("dispatcher");

		logger.info("dispatching cancel");

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO \] \[dispatcher\] dispatching cancel$/);
	});

	it("drops messages below the current level", () => {
		setLogLevel("warn");
		const { lines, logger } = capture("x");

		logger.debug("a");
		logger.info("b");
		logger.warn("c");
		logger.error("d");

		expect(lines.map((line) => line.slice(line.lastIndexOf(" ") + 1))).toEqual(["c", "d"]);
	});

	it("writes nothing when silent", () => {
		setLogLevel("silent");
		const { lines, logger } = capture("x");

		logger.error("boom");

		expect(lines).toEqual([]);
	});

	it("recognizes level names", () => {
		expect(isLogLevel("silent")).toBe(true);
		expect(isLogLevel("verbose")).toBe(false);
		expect(isLogLevel("toString")).toBe(false);
	});
});
