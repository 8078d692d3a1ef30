import {describe, test, expect} from "./node-test-utils.js";
import {z} from "zod";
import {Database} from "./database.js";
import {NoRowsError} from "./errors.js";
import {defineRecord} from "./record.js";
import {MemoryDriver, column, createRecordingLogger} from "./test-driver.js";

function setup() {
	const driver = new MemoryDriver("sqlite");
	const db = new Database(driver, {logger: createRecordingLogger()});
	return {driver, db};
}

describe("Database", () => {
	test("takes its dialect from the driver", () => {
		expect(setup().db.dialect).toBe("sqlite");
	});

	test("exec() passes statements through", async () => {
		const {db, driver} = setup();
		driver.summarize({affected: 2, lastId: 0});

		const summary = await db.exec("DELETE FROM t WHERE id IN (?, ?)", [1, 2]);

		expect(summary).toEqual({affected: 2, lastId: 0});
		expect(driver.executed).toEqual([
			{sql: "DELETE FROM t WHERE id IN (?, ?)", params: [1, 2]},
		]);
	});

	test("cursor() leaves closing to the caller", async () => {
		const {db, driver} = setup();
		driver.respond("SELECT id FROM t", {
			columns: [column("id", "integer")],
			rows: [[1], [2]],
		});

		const cursor = await db.cursor("SELECT id FROM t");
		expect(await cursor.next()).toEqual([1]);
		expect(driver.openCursors).toBe(1);

		await cursor.close();
		expect(driver.openCursors).toBe(0);
	});

	test("record() and records()", async () => {
		const {db, driver} = setup();
		const Point = defineRecord({x: z.number(), y: z.number()});
		driver.respond("SELECT x, y FROM points", {
			columns: [column("x", "float"), column("y", "float")],
			rows: [
				["1.5", "2"],
				["-1", "0.25"],
			],
		});

		expect(await db.records(Point, "SELECT x, y FROM points")).toEqual([
			{x: 1.5, y: 2},
			{x: -1, y: 0.25},
		]);
		expect(await db.record(Point, "SELECT x, y FROM points")).toEqual({
			x: 1.5,
			y: 2,
		});
		await expect(db.record(Point, "SELECT x, y FROM empty")).rejects.toThrow(
			NoRowsError,
		);
		expect(driver.openCursors).toBe(0);
	});

	test("rows() and row() return text", async () => {
		const {db, driver} = setup();
		driver.respond("SELECT * FROM t", {
			columns: [column("id", "integer"), column("blob", "bytes")],
			rows: [[1, new TextEncoder().encode("abc")]],
		});

		expect(await db.rows("SELECT * FROM t")).toEqual([{id: "1", blob: "abc"}]);
		expect(await db.row("SELECT * FROM t")).toEqual({id: "1", blob: "abc"});
	});

	test("each database has its own cache", () => {
		const first = setup().db;
		const second = setup().db;
		first.cache.set("k", 1);

		expect(first.cache.get("k")).toBe(1);
		expect(second.cache.has("k")).toBe(false);
	});

	test("close() drains the queue before closing the driver", async () => {
		const {db, driver} = setup();
		db.enqueue("INSERT INTO log (msg) VALUES (?)", ["bye"]);

		await db.close();

		expect(driver.executed).toEqual([
			{sql: "INSERT INTO log (msg) VALUES (?)", params: ["bye"]},
		]);
		expect(driver.closed).toBe(true);
		expect(db.queue.quited).toBe(true);
	});
});
