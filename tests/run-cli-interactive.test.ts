import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { cancel, intro, outro, select, text } from "@clack/prompts";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../src/cli/run-cli.js";

vi.mock("@clack/prompts", () => ({
	cancel: vi.fn(),
	intro: vi.fn(),
	outro: vi.fn(),
	select: vi.fn(),
	text: vi.fn(),
	isCancel: (value: unknown) => typeof value === "symbol",
}));

const canceled = Symbol("clack:cancel");
const originalExitCode = process.exitCode;
const originalIsTTY = process.stdout.isTTY;

let cwd: string;

async function runInteractive(): Promise<typeof process.exitCode> {
	const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
	try {
		await runCli([], cwd);
		return process.exitCode;
	} finally {
		stdout.mockRestore();
		process.exitCode = originalExitCode;
	}
}

beforeEach(() => {
	cwd = fs.mkdtempSync(path.join(os.tmpdir(), "dec19-prompt-"));
	process.stdout.isTTY = true;
});

afterEach(() => {
	process.stdout.isTTY = originalIsTTY;
	vi.resetAllMocks();
});

describe("interactive cli", () => {
	it("prompts for an operation and its operands", async () => {
		vi.mocked(select).mockResolvedValueOnce("add");
		vi.mocked(text).mockResolvedValueOnce("1").mockResolvedValueOnce(" 2 ");

		const exitCode = await runInteractive();

		expect(exitCode).toBe(originalExitCode);
		expect(intro).toHaveBeenCalledWith("dec19");
		expect(text).toHaveBeenCalledTimes(2);
		expect(vi.mocked(text).mock.calls[0]?.[0]).toMatchObject({ message: "add <x>" });
		expect(outro).toHaveBeenCalledWith("3");
	});

	it("splits operands for variadic operations", async () => {
		vi.mocked(select).mockResolvedValueOnce("sum");
		vi.mocked(text).mockResolvedValueOnce("5.67  -8 23");

		await runInteractive();

		expect(outro).toHaveBeenCalledWith("20.67");
	});

	it("shows operation errors through outro", async () => {
		vi.mocked(select).mockResolvedValueOnce("quo");
		vi.mocked(text).mockResolvedValueOnce("1").mockResolvedValueOnce("0");

		const exitCode = await runInteractive();

		expect(exitCode).toBe(1);
		expect(outro).toHaveBeenCalledWith("Error: computing [1 / 0]: division by zero");
	});

	it("exits with 130 when the operation prompt is canceled", async () => {
		vi.mocked(select).mockResolvedValueOnce(canceled);

		const exitCode = await runInteractive();

		expect(exitCode).toBe(130);
		expect(cancel).toHaveBeenCalledWith("Canceled.");
		expect(text).not.toHaveBeenCalled();
		expect(outro).not.toHaveBeenCalled();
	});

	it("exits with 130 when an operand prompt is canceled", async () => {
		vi.mocked(select).mockResolvedValueOnce("sqrt");
		vi.mocked(text).mockResolvedValueOnce(canceled);

		const exitCode = await runInteractive();

		expect(exitCode).toBe(130);
		expect(cancel).toHaveBeenCalledWith("Canceled.");
		expect(outro).not.toHaveBeenCalled();
	});
});
