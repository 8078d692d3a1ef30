/**
 * SQLite adapter for rowcast
 *
 * Provides a Driver implementation using @sqlite.org/sqlite-wasm.
 * Runs in Node.js and the browser without native builds; under Node.js
 * databases are in-memory.
 *
 * Requires: @sqlite.org/sqlite-wasm
 *
 * @example
 * import {createSQLiteDriver} from "rowcast/sqlite";
 * import {Database} from "rowcast";
 *
 * const db = new Database(await createSQLiteDriver());
 * const rows = await db.select().from("users").maps();
 * await db.close();
 */

import type {
	ColumnCategory,
	ColumnType,
	Driver,
	ExecSummary,
	RowCursor,
} from "./rowcast.js";
import {toRawValue, type RawValue, type SQLValue} from "./impl/values.js";
import sqlite3InitModule, {
	type Database as SQLite3Database,
	type PreparedStatement,
} from "@sqlite.org/sqlite-wasm";

const DIALECT = "sqlite" as const;

type SQLite3 = Awaited<ReturnType<typeof sqlite3InitModule>>;

type SQLiteParam = string | number | bigint | Uint8Array | null;

let sqlite3Module: Promise<SQLite3> | undefined;

/**
 * Initialize the sqlite3 WASM module once per process.
 */
function loadSQLite3(): Promise<SQLite3> {
	sqlite3Module ??= sqlite3InitModule({
		print: console.log,
		printErr: console.error,
	});
	return sqlite3Module;
}

/**
 * Convert arguments to what sqlite3 binds.
 * Booleans become integers.
 */
function toParams(params: readonly SQLValue[]): SQLiteParam[] {
	return params.map((value) =>
		typeof value === "boolean" ? (value ? 1 : 0) : value,
	);
}

/**
 * Column category from a declared column type, following SQLite's type
 * affinity rules. Expression columns have no declared type.
 */
function categorize(declared: string | null): {
	databaseType: string;
	category: ColumnCategory;
} {
	if (!declared) {
		return {databaseType: "", category: "unknown"};
	}

	const databaseType = declared.toUpperCase().replace(/\s*\(.*$/, "");
	let category: ColumnCategory = "unknown";
	if (/DECIMAL|NUMERIC/.test(databaseType)) category = "text";
	else if (/INT|BOOL/.test(databaseType)) category = "integer";
	else if (/CHAR|CLOB|TEXT/.test(databaseType)) category = "text";
	else if (/BLOB/.test(databaseType)) category = "bytes";
	else if (/REAL|FLOA|DOUB/.test(databaseType)) category = "float";
	else if (/DATE|TIME/.test(databaseType)) category = "time";
	else if (/JSON/.test(databaseType)) category = "json";

	return {databaseType, category};
}

/**
 * Options for the SQLite adapter.
 */
export interface SQLiteOptions {
	/** Enforce foreign key constraints (default: true) */
	foreignKeys?: boolean;
}

/**
 * Open a database and wrap it in a driver.
 *
 * @param filename - Database filename (default ":memory:")
 */
export async function createSQLiteDriver(
	filename = ":memory:",
	options: SQLiteOptions = {},
): Promise<SQLiteDriver> {
	const sqlite3 = await loadSQLite3();
	const db = new sqlite3.oo1.DB(filename, "c");
	if (options.foreignKeys ?? true) {
		db.exec("PRAGMA foreign_keys = ON");
	}
	return new SQLiteDriver(sqlite3, db);
}

/**
 * SQLite driver using @sqlite.org/sqlite-wasm.
 *
 * Use createSQLiteDriver() to create instances. Query results are read in
 * full before the cursor is returned, so statements can run while a
 * cursor is open.
 */
export default class SQLiteDriver implements Driver {
	readonly dialect = DIALECT;
	#sqlite3: SQLite3;
	#db: SQLite3Database;

	/** @internal */
	constructor(sqlite3: SQLite3, db: SQLite3Database) {
		this.#sqlite3 = sqlite3;
		this.#db = db;
	}

	async exec(sql: string, params: readonly SQLValue[]): Promise<ExecSummary> {
		this.#db.exec({
			sql,
			bind: params.length > 0 ? toParams(params) : undefined,
		});
		return {
			affected: this.#count("SELECT changes()"),
			lastId: this.#count("SELECT last_insert_rowid()"),
		};
	}

	async query(sql: string, params: readonly SQLValue[]): Promise<RowCursor> {
		const {columns, rows} = this.#select(sql, params);
		let index = 0;
		let open = true;

		return {
			columns,
			next: async () => {
				if (!open || index >= rows.length) return null;
				return rows[index++];
			},
			close: async () => {
				open = false;
			},
		};
	}

	async queryRow(
		sql: string,
		params: readonly SQLValue[],
	): Promise<{columns: readonly ColumnType[]; row: RawValue[] | null}> {
		const {columns, rows} = this.#select(sql, params);
		return {columns, row: rows[0] ?? null};
	}

	async close(): Promise<void> {
		this.#db.close();
	}

	#count(sql: string): number {
		const value = this.#db.selectValue(sql);
		return typeof value === "number" || typeof value === "bigint"
			? Number(value)
			: 0;
	}

	/**
	 * Run a query to completion and finalize its statement.
	 */
	#select(
		sql: string,
		params: readonly SQLValue[],
	): {columns: ColumnType[]; rows: RawValue[][]} {
		const statement = this.#db.prepare(sql);
		try {
			if (params.length > 0) {
				statement.bind(toParams(params));
			}
			const columns = this.#describeColumns(statement);
			const rows: RawValue[][] = [];
			while (statement.step()) {
				rows.push(statement.get([]).map(toRawValue));
			}
			return {columns, rows};
		} finally {
			statement.finalize();
		}
	}

	#describeColumns(statement: PreparedStatement): ColumnType[] {
		const columns: ColumnType[] = [];
		for (let i = 0; i < statement.columnCount; i++) {
			columns.push({
				name: statement.getColumnName(i),
				...categorize(this.#sqlite3.capi.sqlite3_column_decltype(statement, i)),
				// Result columns carry no NOT NULL information
				nullable: true,
			});
		}
		return columns;
	}
}
