import {mock} from "node:test";
import {describe, test, expect} from "./node-test-utils.js";
import {Database} from "./database.js";
import {ConfigurationError} from "./errors.js";
import {createConsoleLogger} from "./logger.js";
import {DEFAULT_QUEUE_INTERVAL, resolveOptions} from "./options.js";
import {MemoryDriver, createRecordingLogger} from "./test-driver.js";

function issuesOf(fn: () => unknown): Record<string, string[]> {
	try {
		fn();
	} catch (error) {
		if (error instanceof ConfigurationError) {
			return error.issues;
		}
		throw error;
	}
	throw new Error("Expected a ConfigurationError");
}

describe("resolveOptions", () => {
	test("defaults", () => {
		const options = resolveOptions();

		expect(options.debug).toBe(false);
		expect(options.queue).toEqual({interval: DEFAULT_QUEUE_INTERVAL});
		expect(typeof options.logger.warn).toBe("function");
	});

	test("keeps a given logger", () => {
		const logger = createRecordingLogger();
		expect(resolveOptions({logger, debug: true}).logger).toBe(logger);
	});

	test("partial queue options get defaults", () => {
		expect(resolveOptions({queue: {}}).queue.interval).toBe(2000);
		expect(resolveOptions({queue: {interval: 50}}).queue.interval).toBe(50);
	});

	test("invalid values are listed by path", () => {
		const issues = issuesOf(() => resolveOptions({queue: {interval: 0}}));
		expect(Object.keys(issues)).toEqual(["queue.interval"]);
	});

	test("the Database constructor validates its options", () => {
		const issues = issuesOf(
			() => new Database(new MemoryDriver(), {queue: {interval: 1.5}}),
		);
		expect(Object.keys(issues)).toEqual(["queue.interval"]);
	});
});

describe("createConsoleLogger", () => {
	test("writes prefixed lines at or above its level", () => {
		const warn = mock.method(console, "warn", () => {});
		const info = mock.method(console, "info", () => {});
		try {
			const logger = createConsoleLogger({level: "warn"});
			logger.info("hidden");
			logger.warn("Queued statement failed", {sql: "bad"});

			expect(info.mock.calls.length).toBe(0);
			expect(warn.mock.calls.length).toBe(1);
			expect(warn.mock.calls[0].arguments).toEqual([
				"[rowcast] WARN Queued statement failed",
				{sql: "bad"},
			]);
		} finally {
			warn.mock.restore();
			info.mock.restore();
		}
	});

	test("silent writes nothing", () => {
		const error = mock.method(console, "error", () => {});
		try {
			createConsoleLogger({level: "silent", prefix: "[db]"}).error("boom");
			expect(error.mock.calls.length).toBe(0);
		} finally {
			error.mock.restore();
		}
	});
});
