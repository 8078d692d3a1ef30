/**
 * In-process driver for tests.
 *
 * Records every statement it receives and answers queries from results
 * registered per SQL text, so statement rendering, materialization and
 * cursor handling can be tested without a database.
 */

import type {
	ColumnCategory,
	ColumnType,
	Driver,
	ExecSummary,
	RowCursor,
} from "./database.js";
import type {Logger} from "./logger.js";
import type {SQLDialect} from "./sql.js";
import type {RawValue, SQLValue} from "./values.js";

export interface MemoryResult {
	columns: ColumnType[];
	rows: RawValue[][];
}

export interface ExecutedStatement {
	sql: string;
	params: SQLValue[];
}

/**
 * Build column metadata. The database type defaults to the category name
 * in upper case.
 */
export function column(
	name: string,
	category: ColumnCategory,
	databaseType: string = category.toUpperCase(),
	nullable = true,
): ColumnType {
	return {name, category, databaseType, nullable};
}

export class MemoryDriver implements Driver {
	readonly dialect: SQLDialect;
	readonly executed: ExecutedStatement[] = [];
	openCursors = 0;
	closed = false;

	#results = new Map<string, MemoryResult>();
	#summary: ExecSummary = {affected: 0, lastId: 0};
	#failure: Error | undefined;

	constructor(dialect: SQLDialect = "mysql") {
		this.dialect = dialect;
	}

	/**
	 * Answer queries with exactly this SQL text with the given result.
	 */
	respond(sql: string, result: MemoryResult): this {
		this.#results.set(sql, result);
		return this;
	}

	/**
	 * Summary returned by every exec().
	 */
	summarize(summary: ExecSummary): this {
		this.#summary = summary;
		return this;
	}

	/**
	 * Make every following exec() and query() reject with this error.
	 */
	fail(error: Error | undefined): this {
		this.#failure = error;
		return this;
	}

	async exec(sql: string, params: readonly SQLValue[]): Promise<ExecSummary> {
		this.executed.push({sql, params: [...params]});
		if (this.#failure) throw this.#failure;
		return {...this.#summary};
	}

	async query(sql: string, params: readonly SQLValue[]): Promise<RowCursor> {
		this.executed.push({sql, params: [...params]});
		if (this.#failure) throw this.#failure;

		const result = this.#results.get(sql) ?? {columns: [], rows: []};
		const rows = result.rows.map((row) => [...row]);
		let index = 0;
		let open = true;
		this.openCursors++;

		return {
			columns: result.columns,
			next: async () => (index < rows.length ? rows[index++] : null),
			close: async () => {
				if (open) {
					open = false;
					this.openCursors--;
				}
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
		this.closed = true;
	}
}

export interface LogEntry {
	level: "debug" | "info" | "warn" | "error";
	message: string;
	data: unknown;
}

/**
 * Logger that keeps every entry in memory.
 */
export function createRecordingLogger(): Logger & {entries: LogEntry[]} {
	const entries: LogEntry[] = [];
	const record =
		(level: LogEntry["level"]) =>
		(message: string, data?: unknown): void => {
			entries.push({level, message, data});
		};
	return {
		entries,
		debug: record("debug"),
		info: record("info"),
		warn: record("warn"),
		error: record("error"),
	};
}
