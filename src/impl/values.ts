/**
 * Value types shared by statements, drivers and the conversion engine.
 */

/**
 * A statement argument or a value in a Values map.
 *
 * The set is closed: every consumer formats or binds each member
 * explicitly. Integers and floats are both `number`; arbitrary-precision
 * integers are `bigint`; binary data is `Uint8Array`; SQL NULL is `null`.
 */
export type SQLValue = string | number | bigint | boolean | Uint8Array | null;

/**
 * One cell as a driver returns it.
 *
 * Drivers already type their cells per column, so a cell may also be a
 * Date for date/time columns.
 */
export type RawValue =
	| string
	| number
	| bigint
	| boolean
	| Uint8Array
	| Date
	| null;

/**
 * Column name to value mapping used for INSERT/UPDATE values.
 */
export type Values = Record<string, SQLValue>;

export function values(init: Values = {}): Values {
	return {...init};
}

export function getString(vals: Values, key: string): string {
	const val = vals[key];
	return typeof val === "string" ? val : "";
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const NUMBER_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Number value of a key. Numeric text, as in rows read by queryOne(), is
 * parsed. 0 when absent or not numeric.
 */
export function getNumber(vals: Values, key: string): number {
	const val = vals[key];
	if (typeof val === "number") return val;
	if (typeof val === "string" && NUMBER_TEXT.test(val.trim())) {
		const parsed = Number(val.trim());
		return Number.isFinite(parsed) ? parsed : 0;
	}
	return 0;
}

/**
 * Integer value of a key, truncating floats and parsing decimal integer
 * text. 0 when absent, not numeric or beyond the safe integer range.
 */
export function getInt(vals: Values, key: string): number {
	const val = vals[key];
	if (typeof val === "number" && Number.isFinite(val)) {
		return Math.trunc(val);
	}
	if (typeof val === "bigint") {
		return Number(val);
	}
	if (typeof val === "string" && INTEGER_TEXT.test(val.trim())) {
		const parsed = Number.parseInt(val.trim(), 10);
		return Number.isSafeInteger(parsed) ? parsed : 0;
	}
	return 0;
}

export function getBigInt(vals: Values, key: string): bigint {
	const val = vals[key];
	if (typeof val === "bigint") return val;
	if (typeof val === "number" && Number.isInteger(val)) return BigInt(val);
	if (typeof val === "string" && INTEGER_TEXT.test(val.trim())) {
		return BigInt(val.trim());
	}
	return 0n;
}

/**
 * Check whether a value belongs to the SQLValue set, for callers holding
 * untyped data. Driver cells go through toRawValue instead.
 */
export function isSQLValue(value: unknown): value is SQLValue {
	return (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "bigint" ||
		typeof value === "boolean" ||
		value instanceof Uint8Array
	);
}

/**
 * Normalize a cell returned by a driver library into a RawValue.
 * Values outside the set keep their text form.
 */
export function toRawValue(value: unknown): RawValue {
	if (value === null || value === undefined) return null;
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "bigint" ||
		typeof value === "boolean" ||
		value instanceof Uint8Array ||
		value instanceof Date
	) {
		return value;
	}
	if (typeof value === "object") {
		return JSON.stringify(value);
	}
	return String(value);
}
