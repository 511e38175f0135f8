import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/load-config.js";
import { ConfigSchema } from "../src/config/schema.js";

describe("config schema", () => {
	it("applies defaults", () => {
		expect(ConfigSchema.parse({})).toEqual({
			scale: 0,
			format: "%v",
			output: "text",
			interactive: true,
		});
	});

	it("rejects out of range values", () => {
		expect(() => ConfigSchema.parse({ scale: 20 })).toThrow();
		expect(() => ConfigSchema.parse({ scale: 1.5 })).toThrow();
		expect(() => ConfigSchema.parse({ output: "xml" })).toThrow();
	});
});

describe("load config", () => {
	it("returns defaults when .dec19.yml does not exist", () => {
		const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "dec19-config-empty-"));
		const loaded = loadConfig(cwd);

		expect(loaded.path).toBeUndefined();
		expect(loaded.config.scale).toBe(0);
		expect(loaded.config.format).toBe("%v");
	});

	it("loads and validates .dec19.yml", () => {
		const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "dec19-config-ok-"));
		const configPath = path.join(cwd, ".dec19.yml");
		fs.writeFileSync(
			configPath,
			["scale: 2", 'format: "%.2f"', "output: json", "interactive: false"].join("\n"),
		);

		const loaded = loadConfig(cwd);
		expect(loaded.path).toBe(configPath);
		expect(loaded.config).toEqual({
			scale: 2,
			format: "%.2f",
			output: "json",
			interactive: false,
		});
	});

	it("treats an empty file as defaults", () => {
		const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "dec19-config-blank-"));
		fs.writeFileSync(path.join(cwd, ".dec19.yml"), "");

		expect(loadConfig(cwd).config.output).toBe("text");
	});

	it("throws on invalid config shape", () => {
		const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "dec19-config-invalid-"));
		fs.writeFileSync(path.join(cwd, ".dec19.yml"), "scale: 42\n");

		expect(() => loadConfig(cwd)).toThrow(/^Invalid \.dec19\.yml: /);
	});
});
