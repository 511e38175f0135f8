import process from "node:process";
import { intro, outro } from "@clack/prompts";
import { loadConfig } from "../config/load-config.js";
import type { Dec19Config } from "../config/schema.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import type { Operation, OperationValue } from "./operations.js";
import { OPERATIONS, checkArity, createContext, findOperation } from "./operations.js";
import { buildJsonSummary, renderText } from "./output.js";
import { promptOperands, selectOperation } from "./select.js";

type Settings = {
	scale: number;
	format: string;
	json: boolean;
	interactive: boolean;
};

export async function runCli(
	argv: string[] = process.argv.slice(2),
	cwd: string = process.cwd(),
): Promise<void> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return;
	}
	if (args.version) {
		const version = readPackageVersion();
		process.stdout.write(`dec19 ${version}\n`);
		return;
	}
	if (args.unknown?.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `dec19 --help` for usage.\n");
		process.exitCode = 2;
		return;
	}
	if (args.errors?.length) {
		for (const error of args.errors) {
			process.stderr.write(`${error}\n`);
		}
		process.exitCode = 2;
		return;
	}

	let config: Dec19Config;
	try {
		config = loadConfig(cwd).config;
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown config error.";
		process.stderr.write(`Config error: ${message}\n`);
		process.exitCode = 1;
		return;
	}

	const settings = resolveSettings(args, config);
	const isTty = Boolean(process.stdout.isTTY);
	const prompting = !args.command && isTty && settings.interactive && !settings.json;

	let operation: Operation | undefined;
	let operands = args.operands;
	if (prompting) {
		intro("dec19");
		const selected = await selectOperation(OPERATIONS);
		if (!selected) {
			process.exitCode = 130;
			return;
		}
		const prompted = await promptOperands(selected);
		if (!prompted) {
			process.exitCode = 130;
			return;
		}
		operation = selected;
		operands = prompted;
	} else if (args.command) {
		operation = findOperation(args.command);
		if (!operation) {
			process.stderr.write(`Unknown command: ${args.command}\n`);
			process.stderr.write("Run `dec19 --help` for usage.\n");
			process.exitCode = 2;
			return;
		}
	}

	if (!operation) {
		process.stderr.write("No command given. Run `dec19 --help` for usage.\n");
		process.exitCode = 2;
		return;
	}

	const arityError = checkArity(operation, operands.length);
	if (arityError) {
		process.stderr.write(`${arityError}\n`);
		process.stderr.write(`Usage: dec19 ${operation.usage}\n`);
		process.exitCode = 2;
		return;
	}

	let value: OperationValue;
	try {
		value = operation.run(createContext(operands, settings.scale));
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown operation error.";
		if (prompting) {
			outro(`Error: ${message}`);
		} else {
			process.stderr.write(`Error: ${message}\n`);
		}
		process.exitCode = 1;
		return;
	}

	if (settings.json) {
		const summary = buildJsonSummary(operation.name, operands, value);
		process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
		return;
	}

	const rendered = renderText(value, settings.format);
	if (prompting) {
		outro(rendered);
		return;
	}
	process.stdout.write(`${rendered}\n`);
}

function resolveSettings(args: CliOptions, config: Dec19Config): Settings {
	return {
		scale: args.scale ?? config.scale,
		format: args.format ?? config.format,
		json: args.json ?? config.output === "json",
		interactive: args.interactive ?? config.interactive,
	};
}
