import test from "node:test";
import assert from "node:assert/strict";
import { createLogger, silentLogger } from "../src/logging/logger.js";

test("lines below the level are dropped", () => {
	const lines: string[] = [];
	const logger = createLogger("warn", (line) => lines.push(line));
	logger.debug("debug");
	logger.info("info");
	logger.warn("warn");
	logger.error("error");
	assert.deepEqual(
		lines.map((line) => JSON.parse(line).msg),
		["warn", "error"]
	);
});

test("entries are JSON with level, message, time and metadata", () => {
	const lines: string[] = [];
	createLogger("debug", (line) => lines.push(line)).info("reading block", { block: "values", size: 12n });
	assert.equal(lines.length, 1);
	const { time, ...rest } = JSON.parse(lines[0]);
	assert.equal(typeof time, "string");
	assert.deepEqual(rest, { level: "info", msg: "reading block", block: "values", size: "12" });
});

test("silent drops everything", () => {
	const lines: string[] = [];
	const logger = createLogger("silent", (line) => lines.push(line));
	logger.error("never");
	silentLogger.error("never");
	assert.deepEqual(lines, []);
});
