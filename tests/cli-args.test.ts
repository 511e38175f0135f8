import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("cli args", () => {
	it("parses a command, operands and options", () => {
		const parsed = parseArgs(["add", "5.67", "-8", "--scale", "2", "--format", "%.2f", "--json"]);

		expect(parsed).toMatchObject({
			command: "add",
			operands: ["5.67", "-8"],
			scale: 2,
			format: "%.2f",
			json: true,
			unknown: [],
			errors: [],
		});
	});

	it("treats negative numbers and a bare dash as operands", () => {
		const parsed = parseArgs(["eval", "5", "-.5", "-"]);
		expect(parsed.operands).toEqual(["5", "-.5", "-"]);
		expect(parsed.unknown).toEqual([]);
	});

	it("captures unknown options", () => {
		const parsed = parseArgs(["--wat", "--json"]);
		expect(parsed.unknown).toEqual(["--wat"]);
		expect(parsed.json).toBe(true);
		expect(parsed.command).toBeUndefined();
	});

	it("reports missing values for valued flags", () => {
		const parsed = parseArgs(["--scale", "--json"]);
		expect(parsed.errors).toEqual(["Missing value for --scale"]);
		expect(parsed.json).toBe(true);
	});

	it("reports an invalid scale", () => {
		const parsed = parseArgs(["--scale", "20"]);
		expect(parsed.scale).toBeUndefined();
		expect(parsed.errors).toEqual(["Invalid value for --scale: 20 (expected 0-19)"]);
	});

	it("stops reading options after --", () => {
		const parsed = parseArgs(["eval", "--", "1", "--json"]);
		expect(parsed.operands).toEqual(["1", "--json"]);
		expect(parsed.json).toBeUndefined();
	});

	it("parses help, version and interactivity flags", () => {
		expect(parseArgs(["-h"]).help).toBe(true);
		expect(parseArgs(["--version"]).version).toBe(true);
		expect(parseArgs(["--no-interactive"]).interactive).toBe(false);
	});
});
