import {describe, test, expect} from "./node-test-utils.js";
import {UnsupportedValueError} from "./errors.js";
import {formatLiteral, inlineSQL} from "./literal.js";

describe("inlineSQL", () => {
	test("substitutes placeholders in order", () => {
		expect(inlineSQL("age > ?", [18])).toBe("age > 18");
		expect(inlineSQL("a = ? AND b = ?", ["x", 2])).toBe("a = 'x' AND b = 2");
	});

	test("returns statements without placeholders unchanged", () => {
		expect(inlineSQL("SELECT 1", [5])).toBe("SELECT 1");
	});

	test("ignores excess arguments", () => {
		expect(inlineSQL("a = ?", [1, 2])).toBe("a = 1");
	});

	test("drops placeholders that have no argument", () => {
		expect(inlineSQL("a = ? AND b = ? LIMIT 1", [1])).toBe(
			"a = 1 AND b =  LIMIT 1",
		);
	});

	test("numbered placeholders on postgresql", () => {
		expect(inlineSQL("a = $2 OR b = $1", ["x", 3], "postgresql")).toBe(
			"a = 3 OR b = 'x'",
		);
		expect(inlineSQL("a = $1 AND b = $2", ["x"], "postgresql")).toBe(
			"a = 'x' AND b = $2",
		);
	});

	test("reports the statement for values it cannot write", () => {
		expect(() => inlineSQL("a = ?", [Number.POSITIVE_INFINITY])).toThrow(
			"invalid sql argument type: number => Infinity (sql: a = ?)",
		);
	});
});

describe("formatLiteral", () => {
	test("null", () => {
		expect(formatLiteral(null)).toBe("NULL");
	});

	test("booleans", () => {
		expect(formatLiteral(true)).toBe("true");
		expect(formatLiteral(false)).toBe("false");
	});

	test("strings lose single quotes and escape backslashes", () => {
		expect(formatLiteral("O'Brien")).toBe("'OBrien'");
		expect(formatLiteral("a\\b")).toBe("'a\\\\b'");
		expect(formatLiteral("")).toBe("''");
	});

	test("numbers never use exponent notation", () => {
		expect(formatLiteral(42)).toBe("42");
		expect(formatLiteral(-3.25)).toBe("-3.25");
		expect(formatLiteral(1e-7)).toBe("0.0000001");
		expect(formatLiteral(-1.5e-7)).toBe("-0.00000015");
		expect(formatLiteral(1e21)).toBe("1000000000000000000000");
		expect(formatLiteral(1.25e22)).toBe("12500000000000000000000");
	});

	test("big integers", () => {
		expect(formatLiteral(12345678901234567890n)).toBe("12345678901234567890");
	});

	test("bytes as a hex literal", () => {
		expect(formatLiteral(new Uint8Array([0xde, 0xad, 0x01]))).toBe("X'dead01'");
	});

	test("non-finite numbers", () => {
		expect(() => formatLiteral(Number.NaN)).toThrow(UnsupportedValueError);
	});
});
