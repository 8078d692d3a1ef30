import {describe, test, expect} from "./node-test-utils.js";
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

describe("rawText", () => {
	test("decodes bytes as UTF-8", () => {
		expect(rawText(new TextEncoder().encode("héllo"))).toBe("héllo");
	});

	test("formats dates as ISO-8601", () => {
		expect(rawText(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe(
			"2024-01-02T03:04:05.000Z",
		);
	});

	test("null is empty", () => {
		expect(rawText(null)).toBe("");
	});
});

describe("coerceBoolean", () => {
	test("only the text false is false", () => {
		expect(coerceBoolean("false")).toBe(false);
		expect(coerceBoolean("0")).toBe(true);
		expect(coerceBoolean("")).toBe(true);
		expect(coerceBoolean("FALSE")).toBe(true);
	});

	test("null is false", () => {
		expect(coerceBoolean(null)).toBe(false);
	});

	test("typed driver values", () => {
		expect(coerceBoolean(false)).toBe(false);
		expect(coerceBoolean(true)).toBe(true);
		expect(coerceBoolean(0)).toBe(true);
	});
});

describe("coerceString", () => {
	test("numbers and null", () => {
		expect(coerceString(12.5)).toBe("12.5");
		expect(coerceString(7n)).toBe("7");
		expect(coerceString(null)).toBe("");
	});
});

describe("coerceInteger", () => {
	test("parses decimal text", () => {
		expect(coerceInteger("42", 0)).toBe(42);
		expect(coerceInteger("-17", 0)).toBe(-17);
		expect(coerceInteger("+3", 0)).toBe(3);
	});

	test("keeps the previous value when parsing fails", () => {
		expect(coerceInteger("4.2", 7)).toBe(7);
		expect(coerceInteger("abc", 7)).toBe(7);
		expect(coerceInteger(" 42", 7)).toBe(7);
		expect(coerceInteger("", 7)).toBe(7);
	});

	test("null is zero", () => {
		expect(coerceInteger(null, 7)).toBe(0);
	});

	test("integers beyond the safe range fail to parse", () => {
		expect(coerceInteger("9007199254740993", 3)).toBe(3);
		expect(coerceInteger(9007199254740992, 3)).toBe(3);
	});

	test("typed driver values", () => {
		expect(coerceInteger(12, 0)).toBe(12);
		expect(coerceInteger(12n, 0)).toBe(12);
		expect(coerceInteger(1.5, 4)).toBe(4);
	});
});

describe("coerceFloat", () => {
	test("parses decimal and exponent text", () => {
		expect(coerceFloat("3.5", 0)).toBe(3.5);
		expect(coerceFloat("-.25", 0)).toBe(-0.25);
		expect(coerceFloat("1e3", 0)).toBe(1000);
		expect(coerceFloat("10", 0)).toBe(10);
	});

	test("keeps the previous value when parsing fails", () => {
		expect(coerceFloat("abc", 2.5)).toBe(2.5);
		expect(coerceFloat("inf", 2.5)).toBe(2.5);
		expect(coerceFloat("1e999", 2.5)).toBe(2.5);
	});

	test("null is zero", () => {
		expect(coerceFloat(null, 2.5)).toBe(0);
	});
});

describe("coerceBytes", () => {
	test("copies bytes", () => {
		const source = new Uint8Array([1, 2, 3]);
		const result = coerceBytes(source, new Uint8Array(0));

		expect(result).toEqual(new Uint8Array([1, 2, 3]));
		expect(result).not.toBe(source);
	});

	test("encodes text", () => {
		expect(coerceBytes("abc", new Uint8Array(0))).toEqual(
			new Uint8Array([97, 98, 99]),
		);
	});

	test("null keeps the previous value", () => {
		const previous = new Uint8Array([9]);
		expect(coerceBytes(null, previous)).toBe(previous);
	});
});

describe("parse-or-zero", () => {
	test("parseFloatOrZero", () => {
		expect(parseFloatOrZero("12.50")).toBe(12.5);
		expect(parseFloatOrZero("x")).toBe(0);
		expect(parseFloatOrZero(null)).toBe(0);
		expect(parseFloatOrZero(2.25)).toBe(2.25);
	});

	test("parseIntOrZero", () => {
		expect(parseIntOrZero("-7")).toBe(-7);
		expect(parseIntOrZero("12.5")).toBe(0);
		expect(parseIntOrZero(null)).toBe(0);
	});
});
