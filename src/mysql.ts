/**
 * mysql2 adapter for rowcast
 *
 * Provides a Driver implementation for mysql2.
 * Uses connection pooling - call close() when done to end all connections.
 *
 * Requires: mysql2
 */

import type {
	ColumnCategory,
	ColumnType,
	Driver,
	ExecSummary,
	RowCursor,
} from "./rowcast.js";
import {toRawValue, type RawValue, type SQLValue} from "./impl/values.js";
import mysql from "mysql2/promise";

const DIALECT = "mysql" as const;

// Field flag for NOT NULL columns
const NOT_NULL_FLAG = 1;

type MySQLParam = string | number | boolean | Buffer | null;

/**
 * Convert arguments to what mysql2 binds.
 * Big integers travel as strings so no precision is lost.
 */
function toParams(params: readonly SQLValue[]): MySQLParam[] {
	return params.map((value) => {
		if (typeof value === "bigint") return value.toString();
		if (value instanceof Uint8Array) {
			return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
		}
		return value;
	});
}

/**
 * Column category and type name from a MySQL protocol type code.
 */
function categorize(code: number): {
	databaseType: string;
	category: ColumnCategory;
} {
	switch (code) {
		case 0: // DECIMAL
		case 246: // NEWDECIMAL
			return {databaseType: "DECIMAL", category: "text"};
		case 1:
			return {databaseType: "TINYINT", category: "integer"};
		case 2:
			return {databaseType: "SMALLINT", category: "integer"};
		case 3:
			return {databaseType: "INT", category: "integer"};
		case 8:
			return {databaseType: "BIGINT", category: "integer"};
		case 9:
			return {databaseType: "MEDIUMINT", category: "integer"};
		case 13:
			return {databaseType: "YEAR", category: "integer"};
		case 4:
			return {databaseType: "FLOAT", category: "float"};
		case 5:
			return {databaseType: "DOUBLE", category: "float"};
		case 7:
			return {databaseType: "TIMESTAMP", category: "time"};
		case 10:
		case 14:
			return {databaseType: "DATE", category: "time"};
		case 11:
			return {databaseType: "TIME", category: "time"};
		case 12:
			return {databaseType: "DATETIME", category: "time"};
		case 15:
		case 253:
			return {databaseType: "VARCHAR", category: "text"};
		case 254:
			return {databaseType: "CHAR", category: "text"};
		case 247:
			return {databaseType: "ENUM", category: "text"};
		case 248:
			return {databaseType: "SET", category: "text"};
		case 249:
		case 250:
		case 251:
		case 252:
			return {databaseType: "BLOB", category: "bytes"};
		case 16:
			return {databaseType: "BIT", category: "bytes"};
		case 255:
			return {databaseType: "GEOMETRY", category: "bytes"};
		case 245:
			return {databaseType: "JSON", category: "json"};
		case 6:
			return {databaseType: "NULL", category: "unknown"};
		default:
			return {databaseType: "", category: "unknown"};
	}
}

function isNullable(flags: number | string[]): boolean {
	if (Array.isArray(flags)) return !flags.includes("NOT_NULL");
	return (flags & NOT_NULL_FLAG) === 0;
}

function describeColumns(fields: readonly mysql.FieldPacket[]): ColumnType[] {
	return fields.map((field) => ({
		name: field.name,
		...categorize(field.columnType ?? field.type ?? -1),
		nullable: isNullable(field.flags),
	}));
}

/**
 * Options for the mysql adapter.
 */
export interface MySQLOptions {
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Idle timeout in milliseconds (default: 60000) */
	idleTimeout?: number;
	/** Connection timeout in milliseconds (default: 10000) */
	connectTimeout?: number;
}

/**
 * MySQL driver using mysql2.
 *
 * Dates and decimals are read as strings so that their text form reaches
 * the conversion engine unchanged.
 *
 * @example
 * import MySQLDriver from "rowcast/mysql";
 * import {Database} from "rowcast";
 *
 * const db = new Database(new MySQLDriver("mysql://localhost/mydb"));
 * const user = await db.select().from("users").where("id = ?").map(1);
 *
 * // When done:
 * await db.close();
 */
export default class MySQLDriver implements Driver {
	readonly dialect = DIALECT;
	#pool: mysql.Pool;

	constructor(url: string, options: MySQLOptions = {}) {
		this.#pool = mysql.createPool({
			uri: url,
			connectionLimit: options.connectionLimit ?? 10,
			idleTimeout: options.idleTimeout ?? 60000,
			connectTimeout: options.connectTimeout ?? 10000,
			dateStrings: true,
			supportBigNumbers: true,
			bigNumberStrings: true,
		});
	}

	async exec(sql: string, params: readonly SQLValue[]): Promise<ExecSummary> {
		const [result] = await this.#pool.execute<mysql.ResultSetHeader>(
			sql,
			toParams(params),
		);
		return {affected: result.affectedRows, lastId: result.insertId};
	}

	/**
	 * Runs the query and reads the buffered result. Rows are fetched as
	 * arrays so duplicate column names keep their own cells.
	 */
	async query(sql: string, params: readonly SQLValue[]): Promise<RowCursor> {
		const [rows, fields] = await this.#pool.execute<mysql.RowDataPacket[][]>(
			{sql, rowsAsArray: true},
			toParams(params),
		);
		const columns = describeColumns(fields);
		let index = 0;
		let open = true;

		return {
			columns,
			next: async () => {
				if (!open || index >= rows.length) return null;
				return rows[index++].map(toRawValue);
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
		const cursor = await this.query(sql, params);
		try {
			return {columns: cursor.columns, row: await cursor.next()};
		} finally {
			await cursor.close();
		}
	}

	async close(): Promise<void> {
		await this.#pool.end();
	}
}
