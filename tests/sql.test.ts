import { describe, expect, it } from "vitest";
import { Decimal } from "../src/core/decimal.js";
import { decimalValue, nullDecimalValue, scanDecimal, scanNullDecimal } from "../src/core/sql.js";

describe("sql scan", () => {
	it("accepts driver values", () => {
		expect(scanDecimal("5.67").toString()).toBe("5.67");
		expect(scanDecimal(42n).toString()).toBe("42");
		expect(scanDecimal(0.25).toString()).toBe("0.25");
		expect(scanDecimal(Buffer.from("1.50")).toString()).toBe("1.50");
	});

	it("rejects null and unknown types", () => {
		expect(() => scanDecimal(null)).toThrow(
			"converting from null to Decimal: Decimal does not support null values, use NullDecimal",
		);
		expect(() => scanDecimal(true)).toThrow(
			"converting from boolean to Decimal: type boolean is not supported",
		);
		expect(() => scanDecimal("abc")).toThrow(
			"converting from string to Decimal: parsing decimal: invalid decimal: unexpected character 'a'",
		);
	});

	it("maps null for nullable decimals", () => {
		expect(scanNullDecimal(null)).toEqual({ valid: false });
		const scanned = scanNullDecimal("7");
		expect(scanned.valid && scanned.decimal.toString()).toBe("7");
	});
});

describe("sql value", () => {
	it("returns the string form", () => {
		expect(decimalValue(Decimal.parse("5.670"))).toBe("5.670");
		expect(nullDecimalValue({ valid: true, decimal: Decimal.parse("1") })).toBe("1");
		expect(nullDecimalValue({ valid: false })).toBeNull();
	});
});
