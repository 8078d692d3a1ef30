import {describe, test, expect} from "./node-test-utils.js";
import {Cache, DEFAULT_GROUP} from "./cache.js";

describe("Cache", () => {
	test("set and get in the default group", () => {
		const cache = new Cache();
		cache.set("user:1", {name: "Tom"});

		expect(cache.get("user:1")).toEqual({name: "Tom"});
		expect(cache.get("user:1", DEFAULT_GROUP)).toEqual({name: "Tom"});
		expect(cache.has("user:1")).toBe(true);
		expect(cache.get("user:2")).toBeUndefined();
	});

	test("groups are separate", () => {
		const cache = new Cache();
		cache.set("key", 1, "a");
		cache.set("key", 2, "b");

		expect(cache.get("key", "a")).toBe(1);
		expect(cache.get("key", "b")).toBe(2);
		expect(cache.has("key")).toBe(false);
	});

	test("pick() narrows with a guard", () => {
		const cache = new Cache();
		cache.set("count", 3);
		cache.set("label", "three");

		const isNumber = (value: unknown): value is number => typeof value === "number";
		expect(cache.pick("count", isNumber)).toBe(3);
		expect(cache.pick("label", isNumber)).toBeUndefined();
	});

	test("delete()", () => {
		const cache = new Cache();
		cache.set("key", "value");

		expect(cache.delete("key")).toBe(true);
		expect(cache.delete("key")).toBe(false);
		expect(cache.delete("key", "missing")).toBe(false);
	});

	test("clear() one group or all of them", () => {
		const cache = new Cache();
		cache.set("a", 1);
		cache.set("b", 2, "other");

		cache.clear("other");
		expect(cache.has("b", "other")).toBe(false);
		expect(cache.has("a")).toBe(true);

		cache.set("b", 2, "other");
		cache.clear();
		expect(cache.has("a")).toBe(false);
		expect(cache.has("b", "other")).toBe(false);
	});
});
