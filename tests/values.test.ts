/**
 * Tests for ValueStore, parseInteger, FlagKey and ConditionalRunner
 */

import { describe, expect, test } from "vitest";
import {
	ConditionalRunner,
	FlagKey,
	parseInteger,
	ValueStore,
} from "../src/index.js";

describe("parseInteger", () => {
	test.each([
		["456", 456],
		["0", 0],
		["-12", -12],
		["+7", 7],
		["0x1F", 31],
		["-0x10", -16],
		["0o17", 15],
		["017", 15],
		["0b101", 5],
		["1_000", 1000],
		["0x_ff", 255],
	])("parses %s", (text, expected) => {
		expect(parseInteger(text)).toBe(expected);
	});

	test.each([
		"",
		"not-an-int",
		"12a",
		"08",
		"1.5",
		" 1",
		"_1",
		"1_",
		"1__0",
		"0x",
		"9007199254740993",
	])("rejects %j", (text) => {
		expect(parseInteger(text)).toBeUndefined();
	});

	test("accepts the edges of the safe range", () => {
		expect(parseInteger("9007199254740991")).toBe(Number.MAX_SAFE_INTEGER);
		expect(parseInteger("-9007199254740991")).toBe(Number.MIN_SAFE_INTEGER);
	});
});

describe("ValueStore", () => {
	test("round-trips values under any key", () => {
		const store = new ValueStore();
		const objectKey = { name: "object" };

		store.set("k", "v");
		store.set(objectKey, 1);
		store.set(42, undefined);

		expect(store.getExists("k")).toEqual(["v", true]);
		expect(store.getExists(objectKey)).toEqual([1, true]);
		expect(store.getExists(42)).toEqual([undefined, true]);
		expect(store.getExists("missing")).toEqual([undefined, false]);
		expect(store.size).toBe(3);
	});

	test("last write wins", () => {
		const store = new ValueStore([["k", "first"]]);

		store.set("k", "second");

		expect(store.get("k")).toBe("second");
	});

	test("delete removes the key", () => {
		const store = new ValueStore([["k", 1]]);

		expect(store.delete("k")).toBe(true);
		expect(store.has("k")).toBe(false);
		expect(store.delete("k")).toBe(false);
	});

	describe("getString", () => {
		test("returns strings unchanged", () => {
			const store = new ValueStore([["k", "text"]]);
			expect(store.getString("k")).toBe("text");
		});

		test("renders other values", () => {
			const store = new ValueStore([
				["number", 42],
				["boolean", true],
				["null", null],
				["bigint", 12n],
				["error", new Error("went wrong")],
				["custom", { toString: () => "custom text" }],
			]);

			expect(store.getString("number")).toBe("42");
			expect(store.getString("boolean")).toBe("true");
			expect(store.getString("null")).toBe("null");
			expect(store.getString("bigint")).toBe("12");
			expect(store.getString("error")).toBe("went wrong");
			expect(store.getString("custom")).toBe("custom text");
		});

		test("gives an empty string for a missing key", () => {
			expect(new ValueStore().getString("absent")).toBe("");
		});
	});

	describe("getInt", () => {
		test("parses integer text", () => {
			const store = new ValueStore([
				["decimal", "456"],
				["hex", "0xff"],
				["bad", "not-an-int"],
			]);

			expect(store.getInt("decimal")).toBe(456);
			expect(store.getInt("hex")).toBe(255);
			expect(store.getInt("bad")).toBe(0);
		});

		test("returns integers and bigints directly", () => {
			const store = new ValueStore([
				["number", -3],
				["bigint", 99n],
				["huge", 2n ** 64n],
			]);

			expect(store.getInt("number")).toBe(-3);
			expect(store.getInt("bigint")).toBe(99);
			expect(store.getInt("huge")).toBe(0);
		});

		test("gives 0 for everything else", () => {
			const store = new ValueStore([
				["fraction", 1.5],
				["boolean", true],
				["object", {}],
			]);

			expect(store.getInt("fraction")).toBe(0);
			expect(store.getInt("boolean")).toBe(0);
			expect(store.getInt("object")).toBe(0);
			expect(store.getInt("absent")).toBe(0);
		});
	});
});

describe("FlagKey", () => {
	test("is interned by name", () => {
		expect(FlagKey.for("interned")).toBe(FlagKey.for("interned"));
		expect(FlagKey.for("interned")).not.toBe(FlagKey.for("other"));
	});

	test("renders its name", () => {
		expect(String(FlagKey.for("beta"))).toBe("FlagKey(beta)");
	});
});

describe("ConditionalRunner", () => {
	test("runs only when the flag is exactly true", () => {
		const store = new ValueStore();
		const runner = new ConditionalRunner(store);
		const on = FlagKey.for("runner-on");
		const off = FlagKey.for("runner-off");
		const truthy = FlagKey.for("runner-truthy");
		let calls = 0;

		runner.setFlag(on, true);
		runner.setFlag(off, false);
		store.set(truthy, "true");

		expect(runner.runIf(on, () => calls++)).toBe(true);
		expect(runner.runIf(off, () => calls++)).toBe(false);
		expect(runner.runIf(truthy, () => calls++)).toBe(false);
		expect(runner.runIf(FlagKey.for("runner-unset"), () => calls++)).toBe(
			false,
		);
		expect(calls).toBe(1);
	});

	test("a flag can be turned off again", () => {
		const runner = new ConditionalRunner(new ValueStore());
		const key = FlagKey.for("runner-toggle");

		runner.setFlag(key, true);
		runner.setFlag(key, false);

		expect(runner.runIf(key, () => {})).toBe(false);
	});
});
