/**
 * Type coercion for raw cell values.
 *
 * Each function converts one cell into a target type. None of them throw:
 * a value that cannot be parsed leaves the caller's previous value in
 * place (records) or yields zero (generic maps).
 *
 * @example
 * coerceInteger("42", 0);        // -> 42
 * coerceInteger("4.2", 7);       // -> 7 (unparsable, previous kept)
 * coerceInteger(null, 7);        // -> 0
 * coerceBoolean("false");        // -> false
 * coerceBoolean("0");            // -> true (only the text "false" is false)
 */

import type {RawValue} from "./values.js";

const decoder = new TextDecoder();
const encoder = new TextEncoder();

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Text form of a raw value. Bytes are decoded as UTF-8, dates are
 * rendered as ISO-8601, NULL is the empty string.
 */
export function rawText(raw: RawValue): string {
	if (raw === null) return "";
	if (raw instanceof Uint8Array) return decoder.decode(raw);
	if (raw instanceof Date) return raw.toISOString();
	return String(raw);
}

export function coerceBoolean(raw: RawValue): boolean {
	if (raw === null) return false;
	return rawText(raw) !== "false";
}

export function coerceString(raw: RawValue): string {
	return rawText(raw);
}

export function coerceFloat(raw: RawValue, previous: number): number {
	if (raw === null) return 0;
	return parseFloatText(raw) ?? previous;
}

export function coerceInteger(raw: RawValue, previous: number): number {
	if (raw === null) return 0;
	return parseIntegerText(raw) ?? previous;
}

/**
 * Bytes are copied. NULL leaves the previous value untouched.
 */
export function coerceBytes(raw: RawValue, previous: Uint8Array): Uint8Array {
	if (raw === null) return previous;
	if (raw instanceof Uint8Array) return Uint8Array.from(raw);
	return encoder.encode(rawText(raw));
}

export function parseFloatOrZero(raw: RawValue): number {
	if (raw === null) return 0;
	return parseFloatText(raw) ?? 0;
}

export function parseIntOrZero(raw: RawValue): number {
	if (raw === null) return 0;
	return parseIntegerText(raw) ?? 0;
}

// ============================================================================
// Parsing
// ============================================================================

function parseFloatText(raw: RawValue): number | undefined {
	if (typeof raw === "number") {
		return Number.isFinite(raw) ? raw : undefined;
	}
	const text = rawText(raw);
	if (!FLOAT_PATTERN.test(text)) return undefined;
	const value = Number(text);
	return Number.isFinite(value) ? value : undefined;
}

function parseIntegerText(raw: RawValue): number | undefined {
	if (typeof raw === "number") {
		return Number.isSafeInteger(raw) ? raw : undefined;
	}
	const text = rawText(raw);
	if (!INTEGER_PATTERN.test(text)) return undefined;
	const value = Number.parseInt(text, 10);
	// Integers beyond 2^53 count as parse failures
	return Number.isSafeInteger(value) ? value : undefined;
}
