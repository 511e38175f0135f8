import { describe, expect, it } from "vitest";
import { Decimal } from "../src/core/decimal.js";

const dec = (text: string): Decimal => Decimal.parse(text);

describe("decimal powers", () => {
	it("raises to integer powers", () => {
		expect([-2, -1, 0, 1, 2].map((power) => dec("2").powInt(power).toString())).toEqual([
			"0.25",
			"0.5",
			"1",
			"2",
			"4",
		]);
		expect(dec("2").pow(dec("10")).toString()).toBe("1024");
	});

	it("raises to fractional powers", () => {
		expect(dec("4").pow(dec("0.5")).toString()).toBe("2.000000000000000000");
		expect(dec("4").pow(dec("-0.5")).toString()).toBe("0.5000000000000000000");
		expect(dec("0").pow(dec("0.5")).toString()).toBe("0");
	});

	it("rejects invalid powers", () => {
		expect(() => dec("0").powInt(-1)).toThrow(
			"computing [0^-1]: invalid operation: zero to negative power",
		);
		expect(() => dec("-8").pow(dec("0.5"))).toThrow(
			"computing [-8^0.5]: invalid operation: negative to fractional power",
		);
		expect(() => dec("10").powInt(19)).toThrow(
			"computing [10^19]: decimal overflow: the integer part of a Decimal can have at most 19 digits, but it has 20 digits",
		);
	});
});

describe("decimal square root", () => {
	it("computes square roots", () => {
		expect(dec("1").sqrt().toString()).toBe("1");
		expect(dec("2").sqrt().toString()).toBe("1.414213562373095049");
		expect(dec("3").sqrt().toString()).toBe("1.732050807568877294");
		expect(dec("4").sqrt().toString()).toBe("2");
		expect(dec("0.00").sqrt().toString()).toBe("0.0");
	});

	it("rejects negative input", () => {
		expect(() => dec("-1").sqrt()).toThrow(
			"computing sqrt(-1): invalid operation: square root of negative",
		);
	});
});

describe("decimal exponentials", () => {
	it("computes exp and expm1", () => {
		expect(dec("0").exp().toString()).toBe("1");
		expect(dec("2.302585092994045684").exp().toString()).toBe("10.00000000000000000");
		expect(dec("-2.302585092994045684").exp().toString()).toBe("0.1000000000000000000");
		expect(dec("0").expm1().toString()).toBe("0");
		expect(dec("2.302585092994045684").expm1().toString()).toBe("9.000000000000000000");
		expect(dec("-2.302585092994045684").expm1().toString()).toBe("-0.9000000000000000000");
	});

	it("saturates large negative exponents", () => {
		expect(dec("-100").exp().toString()).toBe("0.0000000000000000000");
		expect(dec("-100").expm1().toString()).toBe("-1.000000000000000000");
	});

	it("overflows large positive exponents", () => {
		expect(() => dec("100").exp()).toThrow(
			"computing exp(100): decimal overflow: the integer part of a Decimal can have at most 19 digits, but it has significantly more digits",
		);
	});
});

describe("decimal logarithms", () => {
	it("computes natural logarithms", () => {
		expect(dec("1").log().toString()).toBe("0");
		expect(dec("2").log().toString()).toBe("0.6931471805599453094");
		expect(dec("10").log().toString()).toBe("2.302585092994045684");
		expect(dec("2.718281828459045236").log().toString()).toBe("1.000000000000000000");
	});

	it("computes log1p", () => {
		expect(dec("1").log1p().toString()).toBe("0.6931471805599453094");
		expect(dec("2").log1p().toString()).toBe("1.098612288668109691");
		expect(dec("10").log1p().toString()).toBe("2.397895272798370544");
	});

	it("computes binary and decimal logarithms", () => {
		expect(dec("2").log2().toString()).toBe("1");
		expect(dec("10").log2().toString()).toBe("3.321928094887362348");
		expect(dec("2.718281828459045236").log2().toString()).toBe("1.442695040888963408");
		expect(dec("2").log10().toString()).toBe("0.3010299956639811952");
		expect(dec("10").log10().toString()).toBe("1");
		expect(dec("2.718281828459045236").log10().toString()).toBe("0.4342944819032518278");
	});

	it("rejects values outside the domain", () => {
		expect(() => dec("0").log()).toThrow(
			"computing log(0): invalid operation: logarithm of non-positive",
		);
		expect(() => dec("-1").log1p()).toThrow(
			"computing log1p(-1): invalid operation: logarithm of a decimal less than or equal to -1",
		);
	});
});
