/**
 * expect-style test utilities for Node's built-in test runner.
 *
 * Provides describe, test, expect over node:test and node:assert.
 */

import {
	describe as nodeDescribe,
	test as nodeTest,
	beforeEach as nodeBeforeEach,
	afterEach as nodeAfterEach,
} from "node:test";
import assert from "node:assert";

export {describe, test, beforeEach, afterEach};

// Re-export Node's describe, test and hooks
const describe = nodeDescribe;
const test = nodeTest;
const beforeEach = nodeBeforeEach;
const afterEach = nodeAfterEach;

type ErrorClass = new (...args: never[]) => Error;

/**
 * A string matches as a substring of the error message.
 */
type ThrowExpectation = string | RegExp | ErrorClass;

function toValidator(expected: ThrowExpectation): RegExp | ErrorClass {
	if (typeof expected === "string") {
		return new RegExp(expected.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
	}
	return expected;
}

export function expect<T>(actual: T) {
	return {
		toBe(expected: T) {
			assert.strictEqual(actual, expected);
		},
		toEqual(expected: T) {
			assert.deepStrictEqual(actual, expected);
		},
		toBeNull() {
			assert.strictEqual(actual, null);
		},
		toBeUndefined() {
			assert.strictEqual(actual, undefined);
		},
		toBeTruthy() {
			assert.ok(actual);
		},
		toBeFalsy() {
			assert.ok(!actual);
		},
		toBeGreaterThan(expected: number) {
			assert.ok(typeof actual === "number" && actual > expected);
		},
		toBeLessThan(expected: number) {
			assert.ok(typeof actual === "number" && actual < expected);
		},
		toBeInstanceOf(expected: ErrorClass) {
			assert.ok(actual instanceof expected);
		},
		toContain(expected: unknown) {
			if (Array.isArray(actual)) {
				assert.ok(actual.includes(expected));
			} else if (typeof actual === "string" && typeof expected === "string") {
				assert.ok(actual.includes(expected));
			} else {
				throw new Error("toContain expects an array or string");
			}
		},
		toMatch(expected: RegExp) {
			if (typeof actual !== "string") {
				throw new Error("toMatch expects a string");
			}
			assert.match(actual, expected);
		},
		toThrow(expected?: ThrowExpectation) {
			if (typeof actual !== "function") {
				throw new Error("toThrow expects a function");
			}
			const fn = (): unknown => actual();
			if (expected) {
				assert.throws(fn, toValidator(expected));
			} else {
				assert.throws(fn);
			}
		},
		not: {
			toBe(expected: T) {
				assert.notStrictEqual(actual, expected);
			},
			toEqual(expected: T) {
				assert.notDeepStrictEqual(actual, expected);
			},
			toBeNull() {
				assert.notStrictEqual(actual, null);
			},
			toThrow() {
				if (typeof actual !== "function") {
					throw new Error("toThrow expects a function");
				}
				assert.doesNotThrow((): unknown => actual());
			},
		},
		rejects: {
			async toThrow(expected?: ThrowExpectation) {
				if (!(actual instanceof Promise)) {
					throw new Error("rejects.toThrow expects a Promise");
				}
				if (expected) {
					await assert.rejects(actual, toValidator(expected));
				} else {
					await assert.rejects(actual);
				}
			},
		},
	};
}
