/**
 * SQLite driver tests (Node.js)
 *
 * Runs statements, records and maps against an in-memory sqlite-wasm
 * database.
 */

import {describe, test, expect} from "./node-test-utils.js";
import {z} from "zod";
import {Database} from "./database.js";
import {NoRowsError} from "./errors.js";
import {defineRecord} from "./record.js";
import {createRecordingLogger} from "./test-driver.js";
import {createSQLiteDriver} from "../sqlite.js";

const User = defineRecord({
	id: z.number().int(),
	name: z.string(),
	score: z.number(),
	active: z.boolean(),
	avatar: z.instanceof(Uint8Array),
});

async function openDatabase() {
	const logger = createRecordingLogger();
	const db = new Database(await createSQLiteDriver(), {
		logger,
		queue: {interval: 10},
	});
	await db.exec(
		"CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, score REAL, balance DECIMAL(10,2), avatar BLOB, active BOOLEAN)",
	);
	return {db, logger};
}

describe("SQLiteDriver", () => {
	test("insert reports the row id", async () => {
		const {db} = await openDatabase();

		const first = await db.insert().table("users").value({name: "Tom"}).exec();
		const second = await db.insert().table("users").value({name: "Ann"}).exec();

		expect(first.success).toBe(true);
		expect(first.lastId).toBe(1);
		expect(second.lastId).toBe(2);

		await db.close();
	});

	test("records round-trip through the database", async () => {
		const {db} = await openDatabase();
		await db
			.insert()
			.table("users")
			.value({
				name: "Tom",
				score: 2.5,
				balance: "10.50",
				avatar: new Uint8Array([1, 2, 3]),
				active: true,
			})
			.exec();

		const user = await db.select().from("users").where("id = ?").one(User, 1);

		expect(user).toEqual({
			id: 1,
			name: "Tom",
			score: 2.5,
			active: true,
			avatar: new Uint8Array([1, 2, 3]),
		});

		await db.close();
	});

	test("maps use declared column types", async () => {
		const {db, logger} = await openDatabase();
		await db
			.insert()
			.table("users")
			.value({name: "Tom", score: 2.5, balance: "10.50", active: false})
			.exec();

		const maps = await db
			.select("id,name,score,balance,active")
			.from("users")
			.maps();

		expect(maps).toEqual([
			{id: 1, name: "Tom", score: 2.5, balance: 10.5, active: 0},
		]);
		expect(logger.entries.length).toBe(0);

		await db.close();
	});

	test("expression columns have no declared type", async () => {
		const {db, logger} = await openDatabase();
		await db.insert().table("users").value({name: "Tom"}).exec();

		expect(await db.map("SELECT COUNT(*) AS n FROM users")).toEqual({n: "1"});
		expect(logger.entries[0].message).toBe("Unhandled column type");
		expect(await db.row("SELECT COUNT(*) AS n FROM users")).toEqual({n: "1"});

		await db.close();
	});

	test("update and delete report affected rows", async () => {
		const {db} = await openDatabase();
		await db.insert().table("users").value({name: "Tom"}).exec();
		await db.insert().table("users").value({name: "Ann"}).exec();

		const updated = await db
			.update()
			.table("users")
			.value({score: 3})
			.where("id > ?")
			.exec(0);
		expect(updated.affected).toBe(2);

		const deleted = await db.delete().from("users").where("id = ?").exec(1);
		expect(deleted.affected).toBe(1);

		await expect(
			db.select().from("users").where("id = ?").one(User, 1),
		).rejects.toThrow(NoRowsError);

		await db.close();
	});

	test("insert-or-update with a conflict target", async () => {
		const {db} = await openDatabase();
		const upsert = () =>
			db
				.insertOrUpdate()
				.table("users")
				.value({id: 1, name: "Tom", score: 1})
				.value2({score: 9})
				.conflict("id")
				.exec();

		expect((await upsert()).success).toBe(true);
		const second = await upsert();
		expect(second.success).toBe(true);
		expect(second.affected).toBe(1);

		expect(await db.row("SELECT score FROM users WHERE id = 1")).toEqual({
			score: "9",
		});

		await db.close();
	});

	test("fullSQL() runs the inlined statement", async () => {
		const {db} = await openDatabase();
		await db.insert().table("users").value({name: "Tom"}).exec();

		const result = await db
			.update()
			.table("users")
			.value({name: "O'Brien"})
			.where("id = ?")
			.fullSQL()
			.exec(1);

		expect(result.sql).toBe('UPDATE users SET "name"=? WHERE id = ?');
		expect(await db.select("name").from("users").queryOne()).toEqual({
			name: "OBrien",
		});

		await db.close();
	});

	test("constraint violations are reported in the result", async () => {
		const {db} = await openDatabase();
		await db.insert().table("users").value({id: 1, name: "Tom"}).exec();

		const result = await db.insert().table("users").value({id: 1, name: "Ann"}).exec();

		expect(result.success).toBe(false);
		expect(result.error).toBeInstanceOf(Error);

		await db.close();
	});

	test("queued statements run before close", async () => {
		const {db} = await openDatabase();

		db.insert().table("users").value({name: "Queued"}).queue();
		db.insert().table("users").value({name: "Also queued"}).queue();
		await db.queue.stop();

		expect(await db.select("name").from("users").order("id").query()).toEqual([
			{name: "Queued"},
			{name: "Also queued"},
		]);

		await db.close();
	});

	test("statements queued during a read are not lost", async () => {
		const {db, logger} = await openDatabase();
		for (const name of ["a", "b", "c", "d", "e"]) {
			await db.insert().table("users").value({name}).exec();
		}
		db.queue.start();

		const reading = db.select("name").from("users").maps();
		db.insert().table("users").value({name: "queued"}).queue();
		expect((await reading).length).toBe(5);
		await db.queue.stop();

		expect(await db.map("SELECT COUNT(*) AS n FROM users")).toEqual({n: "6"});
		expect(
			logger.entries.filter((entry) => entry.message === "Queued statement failed"),
		).toEqual([]);

		await db.close();
	});

	test("an exec() while a cursor is open succeeds", async () => {
		const {db} = await openDatabase();
		await db.insert().table("users").value({name: "Tom"}).exec();
		await db.insert().table("users").value({name: "Ann"}).exec();

		const cursor = await db.cursor("SELECT name FROM users ORDER BY id");
		expect(await cursor.next()).toEqual(["Tom"]);
		const result = await db.insert().table("users").value({name: "Eve"}).exec();
		expect(result.success).toBe(true);
		expect(await cursor.next()).toEqual(["Ann"]);
		expect(await cursor.next()).toBe(null);
		await cursor.close();

		await db.close();
	});

	test("queryRow on an empty table", async () => {
		const {db} = await openDatabase();
		await expect(db.row("SELECT * FROM users")).rejects.toThrow(NoRowsError);
		await db.close();
	});
});
