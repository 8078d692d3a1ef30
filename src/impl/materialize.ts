/**
 * Row materialization: raw driver rows into records, typed maps and text maps.
 *
 * Every read* function consumes a cursor and closes it on all exit paths,
 * including errors thrown while converting.
 */

import {
	coerceBoolean,
	coerceBytes,
	coerceFloat,
	coerceInteger,
	coerceString,
	parseFloatOrZero,
	parseIntOrZero,
	rawText,
} from "./coerce.js";
import type {ColumnType, RowCursor} from "./database.js";
import {NoRowsError} from "./errors.js";
import type {Logger} from "./logger.js";
import {
	resolveBindings,
	type FieldBinding,
	type FieldValue,
	type RecordDefinition,
	type RecordShape,
} from "./record.js";
import type {RawValue} from "./values.js";
import type {z} from "zod";

/**
 * A schema-less row: numbers for numeric columns, text for the rest.
 */
export type RowMap = Record<string, string | number>;

/**
 * A row with every value as text.
 */
export type TextRow = Record<string, string>;

const DECIMAL_TYPES = new Set(["DECIMAL", "NEWDECIMAL", "NUMERIC"]);

// ============================================================================
// Records
// ============================================================================

/**
 * Populate one record from one row.
 */
export function materializeRecord<TShape extends RecordShape>(
	definition: RecordDefinition<TShape>,
	bindings: readonly (FieldBinding | undefined)[],
	row: readonly RawValue[],
): z.infer<z.ZodObject<TShape>> {
	const values = definition.create();
	for (let i = 0; i < bindings.length; i++) {
		const binding = bindings[i];
		if (!binding) continue;
		const raw = row[i] ?? null;
		values[binding.field] = coerceField(binding, raw, values[binding.field]);
	}
	return definition.parse(values);
}

function coerceField(
	binding: FieldBinding,
	raw: RawValue,
	previous: FieldValue,
): FieldValue {
	switch (binding.kind) {
		case "boolean":
			return coerceBoolean(raw);
		case "string":
			return coerceString(raw);
		case "float":
			return coerceFloat(raw, typeof previous === "number" ? previous : 0);
		case "integer":
			return coerceInteger(raw, typeof previous === "number" ? previous : 0);
		case "bytes":
			return coerceBytes(
				raw,
				previous instanceof Uint8Array ? previous : new Uint8Array(0),
			);
	}
}

/**
 * Read the first row of a cursor into a record.
 *
 * @throws NoRowsError when the cursor is empty
 */
export async function readRecord<TShape extends RecordShape>(
	cursor: RowCursor,
	definition: RecordDefinition<TShape>,
	sql?: string,
): Promise<z.infer<z.ZodObject<TShape>>> {
	try {
		const row = await cursor.next();
		if (!row) {
			throw new NoRowsError(sql);
		}
		return materializeRecord(
			definition,
			resolveBindings(definition, cursor.columns),
			row,
		);
	} finally {
		await cursor.close();
	}
}

/**
 * Read every row of a cursor into records, in row order.
 */
export async function readRecords<TShape extends RecordShape>(
	cursor: RowCursor,
	definition: RecordDefinition<TShape>,
): Promise<z.infer<z.ZodObject<TShape>>[]> {
	try {
		const bindings = resolveBindings(definition, cursor.columns);
		const records: z.infer<z.ZodObject<TShape>>[] = [];
		for (let row = await cursor.next(); row; row = await cursor.next()) {
			records.push(materializeRecord(definition, bindings, row));
		}
		return records;
	} finally {
		await cursor.close();
	}
}

// ============================================================================
// Generic Maps
// ============================================================================

/**
 * Convert one row using the driver-reported category of each column.
 *
 * Columns of an unhandled category fall back to their text form and
 * produce a warning.
 */
export function materializeMap(
	columns: readonly ColumnType[],
	row: readonly RawValue[],
	logger: Logger,
): RowMap {
	const map: RowMap = {};
	for (let i = 0; i < columns.length; i++) {
		const column = columns[i];
		const raw = row[i] ?? null;
		switch (column.category) {
			case "time":
			case "bytes":
			case "text":
				map[column.name] = DECIMAL_TYPES.has(column.databaseType.toUpperCase())
					? parseFloatOrZero(raw)
					: rawText(raw);
				break;
			case "float":
				map[column.name] = parseFloatOrZero(raw);
				break;
			case "integer":
				map[column.name] = parseIntOrZero(raw);
				break;
			default:
				logger.warn("Unhandled column type", {
					column: column.name,
					databaseType: column.databaseType,
					category: column.category,
				});
				map[column.name] = rawText(raw);
		}
	}
	return map;
}

/**
 * @throws NoRowsError when the cursor is empty
 */
export async function readMap(
	cursor: RowCursor,
	logger: Logger,
	sql?: string,
): Promise<RowMap> {
	try {
		const row = await cursor.next();
		if (!row) {
			throw new NoRowsError(sql);
		}
		return materializeMap(cursor.columns, row, logger);
	} finally {
		await cursor.close();
	}
}

export async function readMaps(
	cursor: RowCursor,
	logger: Logger,
): Promise<RowMap[]> {
	try {
		const maps: RowMap[] = [];
		for (let row = await cursor.next(); row; row = await cursor.next()) {
			maps.push(materializeMap(cursor.columns, row, logger));
		}
		return maps;
	} finally {
		await cursor.close();
	}
}

// ============================================================================
// Text Rows
// ============================================================================

/**
 * Every value as text; NULL becomes the empty string.
 */
export function materializeText(
	columns: readonly ColumnType[],
	row: readonly RawValue[],
): TextRow {
	const text: TextRow = {};
	for (let i = 0; i < columns.length; i++) {
		text[columns[i].name] = rawText(row[i] ?? null);
	}
	return text;
}

export async function readTextRows(cursor: RowCursor): Promise<TextRow[]> {
	try {
		const rows: TextRow[] = [];
		for (let row = await cursor.next(); row; row = await cursor.next()) {
			rows.push(materializeText(cursor.columns, row));
		}
		return rows;
	} finally {
		await cursor.close();
	}
}
