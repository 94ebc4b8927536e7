/**
 * Numeric normalization tests
 */

import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
	FlexibleNumberSchema,
	nullableList,
	OptionalFlexibleNumberSchema,
	parseFlexibleNumber,
} from "./numbers.js";

describe("parseFlexibleNumber", () => {
	it("reads numbers and decimal strings alike", () => {
		expect(parseFlexibleNumber(187.25)).toBe(187.25);
		expect(parseFlexibleNumber("187.25")).toBe(187.25);
		expect(parseFlexibleNumber("-3")).toBe(-3);
	});

	it("rejects non-numeric input", () => {
		expect(parseFlexibleNumber("abc")).toBeUndefined();
		expect(parseFlexibleNumber("")).toBeUndefined();
		expect(parseFlexibleNumber("  ")).toBeUndefined();
		expect(parseFlexibleNumber(Number.NaN)).toBeUndefined();
		expect(parseFlexibleNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
	});
});

describe("FlexibleNumberSchema", () => {
	it("produces identical values for 3 and \"3\"", () => {
		expect(FlexibleNumberSchema.parse(3)).toBe(3);
		expect(FlexibleNumberSchema.parse("3")).toBe(3);
	});

	it("fails on a non-numeric string", () => {
		const result = FlexibleNumberSchema.safeParse("ten");
		expect(result.success).toBe(false);
	});

	it("fails on null", () => {
		expect(FlexibleNumberSchema.safeParse(null).success).toBe(false);
	});
});

describe("OptionalFlexibleNumberSchema", () => {
	const schema = z.object({ limit_price: OptionalFlexibleNumberSchema });

	it("maps null and absence to undefined", () => {
		expect(schema.parse({ limit_price: null })).toEqual({ limit_price: undefined });
		expect(schema.parse({})).toEqual({ limit_price: undefined });
	});

	it("normalizes present values", () => {
		expect(schema.parse({ limit_price: "101.5" })).toEqual({ limit_price: 101.5 });
	});
});

describe("nullableList", () => {
	const schema = z.object({ trades: nullableList(z.string()) });

	it("maps null and absence to an empty list", () => {
		expect(schema.parse({ trades: null }).trades).toEqual([]);
		expect(schema.parse({}).trades).toEqual([]);
	});

	it("keeps list contents in order", () => {
		expect(schema.parse({ trades: ["a", "b"] }).trades).toEqual(["a", "b"]);
	});
});
