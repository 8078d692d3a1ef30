/**
 * postgres.js adapter for rowcast
 *
 * Provides a Driver implementation for postgres.js.
 * Uses connection pooling - call close() when done to end all connections.
 *
 * Requires: postgres
 */

import type {
	ColumnCategory,
	ColumnType,
	Driver,
	ExecSummary,
	RowCursor,
} from "./rowcast.js";
import {toRawValue, type RawValue, type SQLValue} from "./impl/values.js";
import postgres from "postgres";

const DIALECT = "postgresql" as const;

type PostgresParam = string | number | boolean | Buffer | null;

/**
 * Convert arguments to what postgres.js binds.
 * Big integers travel as strings and are cast by the server.
 */
function toParams(params: readonly SQLValue[]): PostgresParam[] {
	return params.map((value) => {
		if (typeof value === "bigint") return value.toString();
		if (value instanceof Uint8Array) {
			return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
		}
		return value;
	});
}

/**
 * Column category and type name from a PostgreSQL type OID.
 */
function categorize(oid: number): {
	databaseType: string;
	category: ColumnCategory;
} {
	switch (oid) {
		case 16:
			return {databaseType: "BOOL", category: "boolean"};
		case 17:
			return {databaseType: "BYTEA", category: "bytes"};
		case 20:
			return {databaseType: "INT8", category: "integer"};
		case 21:
			return {databaseType: "INT2", category: "integer"};
		case 23:
			return {databaseType: "INT4", category: "integer"};
		case 26:
			return {databaseType: "OID", category: "integer"};
		case 700:
			return {databaseType: "FLOAT4", category: "float"};
		case 701:
			return {databaseType: "FLOAT8", category: "float"};
		case 1700:
			return {databaseType: "NUMERIC", category: "text"};
		case 25:
			return {databaseType: "TEXT", category: "text"};
		case 1043:
			return {databaseType: "VARCHAR", category: "text"};
		case 1042:
			return {databaseType: "BPCHAR", category: "text"};
		case 19:
			return {databaseType: "NAME", category: "text"};
		case 2950:
			return {databaseType: "UUID", category: "text"};
		case 1082:
			return {databaseType: "DATE", category: "time"};
		case 1083:
			return {databaseType: "TIME", category: "time"};
		case 1114:
			return {databaseType: "TIMESTAMP", category: "time"};
		case 1184:
			return {databaseType: "TIMESTAMPTZ", category: "time"};
		case 1266:
			return {databaseType: "TIMETZ", category: "time"};
		case 1186:
			return {databaseType: "INTERVAL", category: "time"};
		case 114:
			return {databaseType: "JSON", category: "json"};
		case 3802:
			return {databaseType: "JSONB", category: "json"};
		default:
			return {databaseType: "", category: "unknown"};
	}
}

/**
 * Options for the postgres adapter.
 */
export interface PostgresOptions {
	/** Maximum number of connections in the pool (default: 10) */
	max?: number;
	/** Idle timeout in seconds before closing connections (default: 30) */
	idleTimeout?: number;
	/** Connection timeout in seconds (default: 30) */
	connectTimeout?: number;
}

/**
 * PostgreSQL driver using postgres.js.
 *
 * Statements use $1, $2, ... placeholders; render them with a database
 * whose driver is this one.
 *
 * @example
 * import PostgresDriver from "rowcast/postgres";
 * import {Database} from "rowcast";
 *
 * const db = new Database(new PostgresDriver("postgresql://localhost/mydb"));
 * const result = await db.update().table("users").value({name: "Ann"}).where("id = $2").exec(7);
 *
 * // When done:
 * await db.close();
 */
export default class PostgresDriver implements Driver {
	readonly dialect = DIALECT;
	#sql: ReturnType<typeof postgres>;

	constructor(url: string, options: PostgresOptions = {}) {
		this.#sql = postgres(url, {
			max: options.max ?? 10,
			idle_timeout: options.idleTimeout ?? 30,
			connect_timeout: options.connectTimeout ?? 30,
			onnotice: () => {}, // Suppress PostgreSQL NOTICE messages
		});
	}

	async exec(sql: string, params: readonly SQLValue[]): Promise<ExecSummary> {
		const result = await this.#sql.unsafe(sql, toParams(params));
		// PostgreSQL has no last insert id; use RETURNING in a query instead
		return {affected: result.count, lastId: 0};
	}

	/**
	 * Runs the query and reads the buffered result as value arrays.
	 */
	async query(sql: string, params: readonly SQLValue[]): Promise<RowCursor> {
		const result = await this.#sql.unsafe(sql, toParams(params)).values();
		const columns: ColumnType[] = (result.columns ?? []).map((column) => ({
			name: String(column.name),
			...categorize(column.type),
			// Result descriptions carry no NOT NULL information
			nullable: true,
		}));
		const rows: unknown[][] = Array.from(result, (row) => Array.from(row));
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
		await this.#sql.end();
	}
}
