import {describe, test, expect} from "../src/impl/node-test-utils.js";
import {
	Database,
	defineRecord,
	del,
	hasErrorCode,
	inlineSQL,
	insert,
	isDatabaseError,
	select,
	values,
	getBigInt,
	getInt,
	getNumber,
	getString,
	isSQLValue,
	type RecordOf,
} from "../src/rowcast.js";
import {z} from "zod";
import {MemoryDriver, column, createRecordingLogger} from "../src/impl/test-driver.js";

const Article = defineRecord({
	id: z.number().int(),
	title: z.string(),
	views: z.number().int().meta({column: "view_count"}),
	rating: z.number(),
	published: z.boolean(),
});

type Article = RecordOf<typeof Article>;

describe("rowcast", () => {
	test("builds, runs and reads back statements", async () => {
		const driver = new MemoryDriver();
		const db = new Database(driver, {logger: createRecordingLogger()});
		driver.summarize({affected: 1, lastId: 12});
		driver.respond("SELECT * FROM article WHERE id = ?", {
			columns: [
				column("id", "integer", "INT"),
				column("title", "text", "VARCHAR"),
				column("view_count", "integer", "INT"),
				column("rating", "text", "DECIMAL"),
				column("published", "integer", "TINYINT"),
			],
			rows: [[12, "Hello", "40", "4.50", "1"]],
		});

		const row = values({title: "Hello", rating: 4.5});
		const created = await db.insert().table("article").value(row).exec();
		expect(created.lastId).toBe(12);

		const article: Article = await db
			.select()
			.from("article")
			.where("id = ?")
			.one(Article, created.lastId);

		expect(article).toEqual({
			id: 12,
			title: "Hello",
			views: 40,
			rating: 4.5,
			published: true,
		});
		expect(driver.executed.map((statement) => statement.params)).toEqual([
			["Hello", 4.5],
			[12],
		]);

		await db.close();
	});

	test("unbound statements render for mysql and inline for logs", () => {
		const statement = select("id").from("article").where("title = ?");
		const {sql} = statement.render();

		expect(inlineSQL(sql, ["it's"])).toBe("SELECT id FROM article WHERE title = 'its'");
		expect(insert().table("t").value({a: 1}).render(true).sql).toBe(
			"INSERT INTO t (`a`) VALUES (1)",
		);
	});

	test("errors carry codes", () => {
		let caught: unknown;
		try {
			del().from("article").render();
		} catch (error) {
			caught = error;
		}

		expect(isDatabaseError(caught)).toBe(true);
		expect(hasErrorCode(caught, "CONFIGURATION_ERROR")).toBe(true);
		expect(hasErrorCode(caught, "NO_ROWS")).toBe(false);
	});

	test("value map helpers", () => {
		const row = values({id: 7n, name: "Tom", score: 2.9});

		expect(getInt(row, "id")).toBe(7);
		expect(getInt(row, "score")).toBe(2);
		expect(getString(row, "name")).toBe("Tom");
		expect(getString(row, "missing")).toBe("");
		expect(getNumber(row, "score")).toBe(2.9);
		expect(getNumber(row, "id")).toBe(0);
		expect(getBigInt(row, "id")).toBe(7n);
		expect(getBigInt(row, "score")).toBe(0n);
	});

	test("numeric getters read text rows", async () => {
		const driver = new MemoryDriver();
		const db = new Database(driver, {logger: createRecordingLogger()});
		driver.respond("SELECT * FROM article WHERE id = ? LIMIT 0,1", {
			columns: [
				column("id", "integer", "BIGINT"),
				column("title", "text", "VARCHAR"),
				column("rating", "text", "DECIMAL"),
			],
			rows: [["9007199254740993", "Hello", "4.50"]],
		});

		const row = await db.select().from("article").where("id = ?").queryOne(1);

		expect(row).toEqual({id: "9007199254740993", title: "Hello", rating: "4.50"});
		expect(getBigInt(row, "id")).toBe(9007199254740993n);
		expect(getInt(row, "id")).toBe(0);
		expect(getNumber(row, "rating")).toBe(4.5);
		expect(getInt(row, "rating")).toBe(0);
		expect(getInt(row, "title")).toBe(0);
		expect(getInt(values({n: " 42 "}), "n")).toBe(42);
		expect(getBigInt(values({n: "-7"}), "n")).toBe(-7n);

		await db.close();
	});

	test("isSQLValue", () => {
		expect(isSQLValue(new Uint8Array(1))).toBe(true);
		expect(isSQLValue(null)).toBe(true);
		expect(isSQLValue(undefined)).toBe(false);
		expect(isSQLValue(new Date(0))).toBe(false);
	});
});
