import {describe, test, expect} from "./node-test-utils.js";
import {QueueError} from "./errors.js";
import {ExecutionQueue, type QueueItem} from "./queue.js";
import {createRecordingLogger} from "./test-driver.js";

function item(sql: string): QueueItem {
	return {sql, params: []};
}

function createQueue(interval = 10) {
	const ran: string[] = [];
	const logger = createRecordingLogger();
	const queue = new ExecutionQueue(
		async ({sql}) => {
			if (sql === "bad") throw new Error("syntax error");
			ran.push(sql);
		},
		{interval, logger},
	);
	return {queue, ran, logger};
}

describe("ExecutionQueue", () => {
	test("runs statements in order and drains on stop", async () => {
		const {queue, ran} = createQueue();
		queue.push(item("a"));
		queue.push(item("b"));
		queue.push(item("c"));
		expect(queue.size).toBe(3);

		queue.start();
		await queue.stop();

		expect(ran).toEqual(["a", "b", "c"]);
		expect(queue.size).toBe(0);
		expect(queue.quited).toBe(true);
		expect(queue.running).toBe(false);
	});

	test("logs failed statements and keeps going", async () => {
		const {queue, ran, logger} = createQueue();
		queue.start();
		queue.push(item("bad"));
		queue.push(item("good"));
		await queue.stop();

		expect(ran).toEqual(["good"]);
		expect(logger.entries.length).toBe(1);
		expect(logger.entries[0].level).toBe("warn");
		expect(logger.entries[0].message).toBe("Queued statement failed");
	});

	test("a push wakes an idle worker", async () => {
		let resolveRan: () => void = () => {};
		const ranOnce = new Promise<void>((resolve) => {
			resolveRan = resolve;
		});
		const queue = new ExecutionQueue(
			async () => {
				resolveRan();
			},
			{interval: 60_000, logger: createRecordingLogger()},
		);

		queue.start();
		queue.push(item("a"));
		await ranOnce;

		expect(queue.running).toBe(true);
		await queue.stop();
	});

	test("stop({drain: false}) drops pending statements", async () => {
		const {queue, ran, logger} = createQueue();
		queue.start();
		queue.push(item("a"));
		await queue.stop({drain: false});

		expect(ran).toEqual([]);
		expect(logger.entries).toEqual([
			{level: "warn", message: "Dropping queued statements", data: {count: 1}},
		]);
	});

	test("stopping a queue that never started", async () => {
		const {queue, ran} = createQueue();
		queue.push(item("a"));
		await queue.stop({drain: false});

		expect(ran).toEqual([]);
		expect(queue.quited).toBe(true);
	});

	test("start() twice runs one worker", async () => {
		const {queue, ran} = createQueue();
		queue.start();
		queue.start();
		expect(queue.running).toBe(true);

		queue.push(item("a"));
		await queue.stop();

		expect(ran).toEqual(["a"]);
	});

	test("push after stop throws", async () => {
		const {queue} = createQueue();
		queue.start();
		await queue.stop();

		expect(() => queue.push(item("late"))).toThrow(QueueError);
		expect(() => queue.push(item("late"))).toThrow(
			"cannot push to a stopped queue",
		);
	});

	test("start() after stop does nothing", async () => {
		const {queue} = createQueue();
		await queue.stop();
		queue.start();
		expect(queue.running).toBe(false);
	});
});
