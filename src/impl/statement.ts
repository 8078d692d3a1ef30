/**
 * Statement builder: accumulates the shape of one SQL statement and renders
 * it to parameterized SQL.
 *
 * Clause fragments (where, group, order, field list) and the table name are
 * passed through verbatim; composing safe fragments is the caller's job.
 * Column names taken from value maps are quoted for the dialect.
 *
 * @example
 * select("id,name").from("user").where("age > 18").limit(10).render();
 * // {sql: "SELECT id,name FROM user WHERE age > 18 LIMIT 10", args: []}
 *
 * insert().table("user").value({name: "Tom", age: 20}).render();
 * // {sql: "INSERT INTO user (`name`,`age`) VALUES (?,?)", args: ["Tom", 20]}
 */

import type {z} from "zod";

import type {Database, ExecSummary, RowCursor} from "./database.js";
import {ConfigurationError} from "./errors.js";
import {inlineSQL} from "./literal.js";
import type {RowMap, TextRow} from "./materialize.js";
import type {RecordDefinition, RecordShape} from "./record.js";
import {placeholder, quoteIdent, supportsLimit, type SQLDialect} from "./sql.js";
import type {SQLValue, Values} from "./values.js";

// ============================================================================
// Types
// ============================================================================

export type StatementKind =
	| "insert"
	| "delete"
	| "update"
	| "select"
	| "insertOrUpdate";

export interface RenderedStatement {
	sql: string;
	args: SQLValue[];
}

/**
 * Result of Statement.exec(). exec() reports failures here instead of
 * rejecting.
 */
export interface ExecResult {
	success: boolean;
	error?: unknown;
	/** Last inserted id (INSERT only) */
	lastId: number;
	/** Affected rows (UPDATE, DELETE, insert-or-update only) */
	affected: number;
	/** The rendered SQL */
	sql: string;
}

// ============================================================================
// Statement
// ============================================================================

export class Statement {
	readonly kind: StatementKind;
	#db: Database | undefined;
	#dialect: SQLDialect;

	#fields = "*";
	#table = "";
	#where = "";
	#group = "";
	#order = "";
	#limit = "";
	#values: Values = {};
	#updateValues: Values = {};
	#conflict: string[] = [];

	#ignore = false;
	#unsafe = false;
	#debug = false;
	#fullSQL = false;

	#args: SQLValue[] = [];

	constructor(kind: StatementKind, db?: Database) {
		this.kind = kind;
		this.#db = db;
		this.#dialect = db?.dialect ?? "mysql";
	}

	// ==========================================================================
	// Configuration
	// ==========================================================================

	/**
	 * Bind the statement to a database (and its dialect).
	 */
	db(database: Database): this {
		this.#db = database;
		this.#dialect = database.dialect;
		return this;
	}

	/**
	 * Render for a dialect without binding a database.
	 */
	dialect(dialect: SQLDialect): this {
		this.#dialect = dialect;
		return this;
	}

	fields(fields: string): this {
		this.#fields = fields;
		return this;
	}

	from(table: string): this {
		this.#table = table;
		return this;
	}

	table(table: string): this {
		return this.from(table);
	}

	where(where: string): this {
		this.#where = where;
		return this;
	}

	group(group: string): this {
		this.#group = group;
		return this;
	}

	order(order: string): this {
		this.#order = order;
		return this;
	}

	/**
	 * Set the LIMIT clause. With an offset it renders as `offset,count`.
	 */
	limit(count: number, offset?: number): this {
		this.#limit = offset === undefined ? `${count}` : `${offset},${count}`;
		return this;
	}

	/**
	 * Replace the values written by INSERT/UPDATE.
	 */
	value(values: Values): this {
		this.#values = values;
		return this;
	}

	/**
	 * Replace the values written by the update part of an insert-or-update.
	 */
	value2(values: Values): this {
		this.#updateValues = values;
		return this;
	}

	addValue(key: string, value: SQLValue): this {
		this.#values[key] = value;
		return this;
	}

	addValue2(key: string, value: SQLValue): this {
		this.#updateValues[key] = value;
		return this;
	}

	/**
	 * Conflict target for insert-or-update on PostgreSQL and SQLite.
	 * MySQL resolves conflicts on any unique key and ignores this.
	 */
	conflict(...columns: string[]): this {
		this.#conflict = columns;
		return this;
	}

	/**
	 * INSERT IGNORE.
	 */
	ignore(flag = true): this {
		this.#ignore = flag;
		return this;
	}

	/**
	 * Allow UPDATE/DELETE without a WHERE clause.
	 */
	unsafe(flag = true): this {
		this.#unsafe = flag;
		return this;
	}

	/**
	 * Log the statement and its arguments when it runs.
	 */
	debug(flag = true): this {
		this.#debug = flag;
		return this;
	}

	/**
	 * Execute with every argument inlined as a literal instead of bound.
	 */
	fullSQL(flag = true): this {
		this.#fullSQL = flag;
		return this;
	}

	/**
	 * Positional arguments produced by the last render().
	 */
	get args(): SQLValue[] {
		return this.#args;
	}

	// ==========================================================================
	// Rendering
	// ==========================================================================

	/**
	 * Render the statement.
	 *
	 * Column lists and placeholders are generated together on every call,
	 * so they always line up with the returned arguments. UPDATE and DELETE
	 * without a table render as the empty statement.
	 *
	 * @param inline - Return the SQL with arguments inlined as literals
	 * @throws ConfigurationError for missing table/values and for UPDATE or
	 * DELETE without WHERE unless unsafe() was set
	 */
	render(inline = false): RenderedStatement {
		this.#args = [];
		const sql = this.#build();
		return {
			sql: inline ? inlineSQL(sql, this.#args, this.#dialect) : sql,
			args: this.#args,
		};
	}

	#build(): string {
		switch (this.kind) {
			case "insert": {
				if (this.#table === "") {
					throw new ConfigurationError("table cannot be empty");
				}
				this.#requireValues(this.#values, "values");
				const verb = this.#ignore ? "INSERT IGNORE INTO " : "INSERT INTO ";
				return verb + this.#table + this.#insertColumns();
			}

			case "delete": {
				if (this.#table === "") return "";
				this.#guardWhere("deleting all data is not safe");
				return (
					"DELETE FROM " +
					this.#table +
					this.#clause("WHERE", this.#where) +
					this.#limitClause()
				);
			}

			case "update": {
				if (this.#table === "") return "";
				this.#guardWhere("updating all data is not safe");
				this.#requireValues(this.#values, "values");
				return (
					"UPDATE " +
					this.#table +
					" SET " +
					this.#assignments(this.#values) +
					this.#clause("WHERE", this.#where) +
					this.#limitClause()
				);
			}

			case "insertOrUpdate": {
				if (this.#table === "") return "";
				this.#requireValues(this.#values, "values");
				this.#requireValues(this.#updateValues, "update values");
				const insert = "INSERT INTO " + this.#table + this.#insertColumns();
				return insert + this.#conflictClause() + this.#limitClause();
			}

			case "select":
				return (
					"SELECT " +
					this.#fields +
					this.#clause("FROM", this.#table) +
					this.#clause("WHERE", this.#where) +
					this.#clause("GROUP BY", this.#group) +
					this.#clause("ORDER BY", this.#order) +
					this.#limitClause()
				);
		}
	}

	#requireValues(values: Values, name: string): void {
		if (Object.keys(values).length === 0) {
			throw new ConfigurationError(`${name} cannot be empty`);
		}
	}

	#guardWhere(message: string): void {
		if (this.#where === "" && !this.#unsafe) {
			throw new ConfigurationError(message);
		}
	}

	#clause(keyword: string, fragment: string): string {
		return fragment === "" ? "" : ` ${keyword} ${fragment}`;
	}

	#limitClause(): string {
		if (this.#limit === "" || !supportsLimit(this.#dialect)) return "";
		return " LIMIT " + this.#limit;
	}

	#bind(value: SQLValue): string {
		this.#args.push(value);
		return placeholder(this.#args.length, this.#dialect);
	}

	/**
	 * ` (col,...) VALUES (?,...)`, pushing one argument per column.
	 */
	#insertColumns(): string {
		const columns: string[] = [];
		const placeholders: string[] = [];
		for (const [column, value] of Object.entries(this.#values)) {
			columns.push(quoteIdent(column, this.#dialect));
			placeholders.push(this.#bind(value));
		}
		return ` (${columns.join(",")}) VALUES (${placeholders.join(",")})`;
	}

	#assignments(values: Values): string {
		return Object.entries(values)
			.map(
				([column, value]) =>
					`${quoteIdent(column, this.#dialect)}=${this.#bind(value)}`,
			)
			.join(",");
	}

	#conflictClause(): string {
		if (this.#dialect === "mysql") {
			return (
				" ON DUPLICATE KEY UPDATE " + this.#assignments(this.#updateValues)
			);
		}
		if (this.#conflict.length === 0) {
			throw new ConfigurationError(
				`insert-or-update on ${this.#dialect} needs a conflict target`,
			);
		}
		const target = this.#conflict
			.map((column) => quoteIdent(column, this.#dialect))
			.join(",");
		return (
			` ON CONFLICT (${target}) DO UPDATE SET ` +
			this.#assignments(this.#updateValues)
		);
	}

	// ==========================================================================
	// Execution
	// ==========================================================================

	/**
	 * Execute an INSERT, UPDATE, DELETE or insert-or-update.
	 *
	 * Never rejects: render, driver and configuration errors are reported in
	 * the result. The statement's own arguments are bound before `params`.
	 */
	async exec(...params: SQLValue[]): Promise<ExecResult> {
		const result: ExecResult = {
			success: false,
			lastId: 0,
			affected: 0,
			sql: "",
		};
		try {
			const {sql, args} = this.render();
			result.sql = sql;
			const db = this.#requireDatabase();
			this.#log(db, sql, params);

			// UPDATE/DELETE without a table is a no-op
			if (sql === "") {
				result.success = true;
				return result;
			}

			const summary = await this.#run(db, sql, [...args, ...params]);
			result.success = true;
			if (this.kind === "insert") {
				result.lastId = summary.lastId;
			} else if (this.kind !== "select") {
				result.affected = summary.affected;
			}
		} catch (error) {
			result.error = error;
		}
		return result;
	}

	async #run(
		db: Database,
		sql: string,
		params: SQLValue[],
	): Promise<ExecSummary> {
		if (this.#fullSQL) {
			return db.exec(inlineSQL(sql, params, this.#dialect));
		}
		return db.exec(sql, params);
	}

	/**
	 * Render and hand the statement to the database's background queue.
	 */
	queue(...params: SQLValue[]): void {
		const {sql, args} = this.render();
		const db = this.#requireDatabase();
		this.#log(db, sql, params);
		if (sql === "") return;
		const all = [...args, ...params];
		if (this.#fullSQL) {
			db.enqueue(inlineSQL(sql, all, this.#dialect));
		} else {
			db.enqueue(sql, all);
		}
	}

	/**
	 * All rows, every value as text.
	 */
	async query(...params: SQLValue[]): Promise<TextRow[]> {
		const [db, sql, all] = this.#prepareQuery(params);
		return db.rows(sql, all);
	}

	/**
	 * First row, every value as text. Forces `LIMIT 0,1`.
	 *
	 * @throws NoRowsError when nothing matches
	 */
	async queryOne(...params: SQLValue[]): Promise<TextRow> {
		this.limit(1, 0);
		const [db, sql, all] = this.#prepareQuery(params);
		return db.row(sql, all);
	}

	async cursor(...params: SQLValue[]): Promise<RowCursor> {
		const [db, sql, all] = this.#prepareQuery(params);
		return db.cursor(sql, all);
	}

	/**
	 * All rows converted by column category.
	 */
	async maps(...params: SQLValue[]): Promise<RowMap[]> {
		const [db, sql, all] = this.#prepareQuery(params);
		return db.maps(sql, all);
	}

	/**
	 * First row converted by column category.
	 *
	 * @throws NoRowsError when nothing matches
	 */
	async map(...params: SQLValue[]): Promise<RowMap> {
		const [db, sql, all] = this.#prepareQuery(params);
		return db.map(sql, all);
	}

	async all<TShape extends RecordShape>(
		definition: RecordDefinition<TShape>,
		...params: SQLValue[]
	): Promise<z.infer<z.ZodObject<TShape>>[]> {
		const [db, sql, all] = this.#prepareQuery(params);
		return db.records(definition, sql, all);
	}

	/**
	 * @throws NoRowsError when nothing matches
	 */
	async one<TShape extends RecordShape>(
		definition: RecordDefinition<TShape>,
		...params: SQLValue[]
	): Promise<z.infer<z.ZodObject<TShape>>> {
		const [db, sql, all] = this.#prepareQuery(params);
		return db.record(definition, sql, all);
	}

	#prepareQuery(params: SQLValue[]): [Database, string, SQLValue[]] {
		const {sql, args} = this.render();
		const db = this.#requireDatabase();
		this.#log(db, sql, params);
		return [db, sql, [...args, ...params]];
	}

	#requireDatabase(): Database {
		if (!this.#db) {
			throw new ConfigurationError(
				"statement is not bound to a database; use db.select() or .db(database)",
			);
		}
		return this.#db;
	}

	#log(db: Database, sql: string, params: SQLValue[]): void {
		if (this.#debug || db.debug) {
			db.logger.debug("SQL prepare statement", {
				sql,
				args: this.#args,
				params,
			});
		}
	}
}

// ============================================================================
// Unbound Constructors
// ============================================================================

/**
 * Statements that are not bound to a database render for MySQL until
 * `.db()` or `.dialect()` says otherwise.
 */
export function insert(ignore = false): Statement {
	return new Statement("insert").ignore(ignore);
}

export function del(): Statement {
	return new Statement("delete");
}

export function update(): Statement {
	return new Statement("update");
}

export function select(fields = "*"): Statement {
	return new Statement("select").fields(fields);
}

export function insertOrUpdate(): Statement {
	return new Statement("insertOrUpdate");
}
