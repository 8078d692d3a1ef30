/**
 * Database wrapper: driver contract, statement constructors and
 * materialization entry points.
 */

import type {z} from "zod";

import {Cache} from "./cache.js";
import {NoRowsError} from "./errors.js";
import type {Logger} from "./logger.js";
import {
	materializeText,
	readMap,
	readMaps,
	readRecord,
	readRecords,
	readTextRows,
	type RowMap,
	type TextRow,
} from "./materialize.js";
import {resolveOptions, type DatabaseOptions} from "./options.js";
import {ExecutionQueue} from "./queue.js";
import type {RecordDefinition, RecordShape} from "./record.js";
import type {SQLDialect} from "./sql.js";
import {Statement} from "./statement.js";
import type {RawValue, SQLValue} from "./values.js";

// ============================================================================
// Driver Interface
// ============================================================================

/**
 * Category a driver reports for a result column.
 *
 * Generic map conversion picks its coercion rule from this.
 */
export type ColumnCategory =
	| "text"
	| "bytes"
	| "time"
	| "float"
	| "integer"
	| "boolean"
	| "json"
	| "unknown";

export interface ColumnType {
	readonly name: string;
	/** Declared database type name, upper case (e.g. "DECIMAL", "VARCHAR") */
	readonly databaseType: string;
	readonly category: ColumnCategory;
	readonly nullable: boolean;
}

/**
 * Outcome of a statement that returns no rows.
 */
export interface ExecSummary {
	affected: number;
	/** Last auto-generated id, 0 when the driver has none */
	lastId: number;
}

/**
 * Sequential reader over a result set.
 *
 * Consumers must call close() when done, whether or not every row was read.
 */
export interface RowCursor {
	readonly columns: readonly ColumnType[];
	/** The next row, one raw value per column, or null when exhausted */
	next(): Promise<RawValue[] | null>;
	close(): Promise<void>;
}

/**
 * Database driver interface.
 *
 * Drivers execute finished SQL text with positional parameters and report
 * column metadata. Statement rendering happens before the driver is
 * involved; the driver only contributes its dialect.
 */
export interface Driver {
	readonly dialect: SQLDialect;

	/**
	 * Execute a statement (INSERT, UPDATE, DELETE, DDL).
	 */
	exec(sql: string, params: readonly SQLValue[]): Promise<ExecSummary>;

	/**
	 * Run a query and return a cursor over its rows.
	 */
	query(sql: string, params: readonly SQLValue[]): Promise<RowCursor>;

	/**
	 * Run a query and return its first row, or null if there is none.
	 */
	queryRow(
		sql: string,
		params: readonly SQLValue[],
	): Promise<{columns: readonly ColumnType[]; row: RawValue[] | null}>;

	/**
	 * Close the database connection.
	 */
	close(): Promise<void>;
}

// ============================================================================
// Database
// ============================================================================

/**
 * Database wrapper around a driver.
 *
 * Owns the logger, the fire-and-forget queue and the cache for this
 * connection; nothing is process-wide.
 *
 * @example
 * const db = new Database(await createSQLiteDriver());
 *
 * const {lastId} = await db.insert().table("users").value({name: "Tom"}).exec();
 * const users = await db.select().from("users").all(User);
 *
 * await db.close();
 */
export class Database {
	readonly driver: Driver;
	readonly logger: Logger;
	readonly debug: boolean;
	readonly cache: Cache;
	readonly queue: ExecutionQueue;

	constructor(driver: Driver, options?: DatabaseOptions) {
		const resolved = resolveOptions(options);
		this.driver = driver;
		this.logger = resolved.logger;
		this.debug = resolved.debug;
		this.cache = new Cache();
		this.queue = new ExecutionQueue(
			(item) => this.driver.exec(item.sql, item.params),
			{interval: resolved.queue.interval, logger: resolved.logger},
		);
	}

	get dialect(): SQLDialect {
		return this.driver.dialect;
	}

	// ==========================================================================
	// Statement Constructors
	// ==========================================================================

	insert(ignore = false): Statement {
		return new Statement("insert", this).ignore(ignore);
	}

	delete(): Statement {
		return new Statement("delete", this);
	}

	update(): Statement {
		return new Statement("update", this);
	}

	/**
	 * @param fields - Projection, passed through verbatim (default "*")
	 */
	select(fields = "*"): Statement {
		return new Statement("select", this).fields(fields);
	}

	insertOrUpdate(): Statement {
		return new Statement("insertOrUpdate", this);
	}

	// ==========================================================================
	// Raw Execution
	// ==========================================================================

	async exec(sql: string, params: readonly SQLValue[] = []): Promise<ExecSummary> {
		return this.driver.exec(sql, params);
	}

	async cursor(sql: string, params: readonly SQLValue[] = []): Promise<RowCursor> {
		return this.driver.query(sql, params);
	}

	/**
	 * Queue a statement for background execution.
	 * Errors are logged and discarded.
	 */
	enqueue(sql: string, params: readonly SQLValue[] = []): void {
		this.queue.start();
		this.queue.push({sql, params: [...params]});
	}

	// ==========================================================================
	// Materialization
	// ==========================================================================

	/**
	 * Every row with every value as text.
	 */
	async rows(sql: string, params: readonly SQLValue[] = []): Promise<TextRow[]> {
		return readTextRows(await this.driver.query(sql, params));
	}

	/**
	 * First row with every value as text.
	 *
	 * @throws NoRowsError when the query returns nothing
	 */
	async row(sql: string, params: readonly SQLValue[] = []): Promise<TextRow> {
		const {columns, row} = await this.driver.queryRow(sql, params);
		if (!row) {
			throw new NoRowsError(sql);
		}
		return materializeText(columns, row);
	}

	async maps(sql: string, params: readonly SQLValue[] = []): Promise<RowMap[]> {
		return readMaps(await this.driver.query(sql, params), this.logger);
	}

	/**
	 * @throws NoRowsError when the query returns nothing
	 */
	async map(sql: string, params: readonly SQLValue[] = []): Promise<RowMap> {
		return readMap(await this.driver.query(sql, params), this.logger, sql);
	}

	async records<TShape extends RecordShape>(
		definition: RecordDefinition<TShape>,
		sql: string,
		params: readonly SQLValue[] = [],
	): Promise<z.infer<z.ZodObject<TShape>>[]> {
		return readRecords(await this.driver.query(sql, params), definition);
	}

	/**
	 * @throws NoRowsError when the query returns nothing
	 */
	async record<TShape extends RecordShape>(
		definition: RecordDefinition<TShape>,
		sql: string,
		params: readonly SQLValue[] = [],
	): Promise<z.infer<z.ZodObject<TShape>>> {
		return readRecord(await this.driver.query(sql, params), definition, sql);
	}

	// ==========================================================================
	// Lifecycle
	// ==========================================================================

	/**
	 * Stop the queue (running what is still pending), then close the driver.
	 */
	async close(): Promise<void> {
		await this.queue.stop();
		await this.driver.close();
	}
}
