import { describe, expect, it } from "vitest";
import { Decimal } from "../src/core/decimal.js";
import { formatDecimal, parsePattern } from "../src/core/format.js";

const dec = (text: string): Decimal => Decimal.parse(text);

describe("format decimal", () => {
	it("renders plain verbs", () => {
		expect(formatDecimal(dec("12.34"), "%v")).toBe("12.34");
		expect(formatDecimal(dec("12.34"), "%s")).toBe("12.34");
		expect(formatDecimal(dec("-0.5"), "%f")).toBe("-0.5");
		expect(formatDecimal(dec("12.34"), "%q")).toBe('"12.34"');
	});

	it("applies precision to %f", () => {
		expect(formatDecimal(dec("9.996208266660"), "%.2f")).toBe("10.00");
		expect(formatDecimal(dec("0"), "%5.2f")).toBe(" 0.00");
		expect(formatDecimal(dec("-404.040"), "%-010.f")).toBe("-404      ");
	});

	it("renders percentages", () => {
		expect(formatDecimal(dec("12.34"), "%k")).toBe("1234%");
		expect(formatDecimal(dec("0.0230"), "%k")).toBe("2.30%");
		expect(formatDecimal(dec("0.0567"), "%.1k")).toBe("5.7%");
	});

	it("pads and signs", () => {
		expect(formatDecimal(dec("12.34"), "%010q")).toBe('"00012.34"');
		expect(formatDecimal(dec("12.34"), "%+10s")).toBe("    +12.34");
		expect(formatDecimal(dec("12.34"), "% v")).toBe(" 12.34");
	});

	it("keeps literal text", () => {
		expect(formatDecimal(dec("5.67"), "total: %v EUR (100%%)")).toBe("total: 5.67 EUR (100%)");
	});

	it("marks bad verbs and directives", () => {
		expect(formatDecimal(dec("12.34"), "%e")).toBe("%!e(Decimal=12.34)");
		expect(formatDecimal(dec("12.34"), "%v %v")).toBe("12.34 %!v(MISSING)");
		expect(formatDecimal(dec("12.34"), "%v%")).toBe("12.34%!(NOVERB)");
	});

	it("reports percent overflow inline", () => {
		expect(formatDecimal(dec("100000000000000000"), "%k")).toBe(
			"%!k(PANIC=formatting percent: computing [100000000000000000 * 100]: decimal overflow: the integer part of a Decimal can have at most 19 digits, but it has 20 digits)",
		);
	});
});

describe("parse pattern", () => {
	it("splits text and directives", () => {
		expect(parsePattern("a%+8.3fb")).toEqual([
			{ kind: "text", text: "a" },
			{
				kind: "directive",
				directive: {
					verb: "f",
					flags: { plus: true, space: false, zero: false, minus: false },
					width: 8,
					precision: 3,
				},
			},
			{ kind: "text", text: "b" },
		]);
	});
});
