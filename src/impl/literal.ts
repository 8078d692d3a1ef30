/**
 * Literal inlining: turn a parameterized statement into a fully literal one.
 *
 * Used for debug output and for drivers or call sites that need the whole
 * statement as text.
 */

import {UnsupportedValueError} from "./errors.js";
import type {SQLDialect} from "./sql.js";
import type {SQLValue} from "./values.js";

/**
 * Substitute positional arguments into a parameterized statement.
 *
 * Excess arguments are ignored. When there are fewer arguments than
 * placeholders, the remaining placeholders are dropped and the trailing
 * text is still appended.
 *
 * @example
 * inlineSQL("age > ?", [18]); // "age > 18"
 */
export function inlineSQL(
	sql: string,
	args: readonly SQLValue[],
	dialect: SQLDialect = "mysql",
): string {
	if (dialect === "postgresql") {
		return sql.replace(/\$(\d+)/g, (token, index: string) => {
			const i = Number(index) - 1;
			return i >= 0 && i < args.length ? literal(args[i], sql) : token;
		});
	}

	if (!sql.includes("?")) {
		return sql;
	}

	const segments = sql.split("?");
	let result = "";
	let argIndex = 0;
	for (let i = 0; i < segments.length; i++) {
		result += segments[i];
		if (i < segments.length - 1 && argIndex < args.length) {
			result += literal(args[argIndex], sql);
			argIndex++;
		}
	}

	return result;
}

/**
 * Format one value as an SQL literal.
 *
 * Strings have embedded single quotes removed (not doubled) and
 * backslashes escaped before quoting: `O'Brien` becomes `'OBrien'`.
 */
export function formatLiteral(value: SQLValue): string {
	return literal(value, "");
}

function literal(value: SQLValue, sql: string): string {
	if (value === null) {
		return "NULL";
	}

	switch (typeof value) {
		case "number":
			if (!Number.isFinite(value)) {
				throw new UnsupportedValueError(value, sql);
			}
			return formatNumber(value);
		case "bigint":
			return value.toString();
		case "boolean":
			return value ? "true" : "false";
		case "string":
			return `'${value.replace(/'/g, "").replace(/\\/g, "\\\\")}'`;
		case "object":
			if (value instanceof Uint8Array) {
				return `X'${Buffer.from(value).toString("hex")}'`;
			}
			break;
	}

	// Reachable only from untyped callers
	throw new UnsupportedValueError(value, sql);
}

/**
 * Shortest round-trip decimal text, never in exponent notation.
 */
function formatNumber(value: number): string {
	const text = String(value);
	const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
	if (!match) {
		return text;
	}

	const [, sign, lead, fraction = "", exp] = match;
	const digits = lead + fraction;
	const point = 1 + Number(exp);
	if (point <= 0) {
		return `${sign}0.${"0".repeat(-point)}${digits}`;
	}
	if (point >= digits.length) {
		return sign + digits + "0".repeat(point - digits.length);
	}
	return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
