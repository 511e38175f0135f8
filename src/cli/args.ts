import fs from "node:fs";
import { OPERATIONS } from "./operations.js";

export type CliOptions = {
	command?: string;
	operands: string[];
	scale?: number;
	format?: string;
	json?: boolean;
	interactive?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { operands: [], unknown: [], errors: [] };
	const args = [...argv];
	let literal = false;

	while (args.length) {
		const arg = args.shift();
		if (arg === undefined) {
			break;
		}
		if (literal || isOperand(arg)) {
			if (options.command === undefined) {
				options.command = arg;
			} else {
				options.operands.push(arg);
			}
			continue;
		}
		switch (arg) {
			case "--":
				literal = true;
				break;
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--scale":
				{
					const value = takeValue("--scale", args, options);
					if (value) {
						const scale = toScale(value);
						if (scale === undefined) {
							options.errors?.push(`Invalid value for --scale: ${value} (expected 0-19)`);
						} else {
							options.scale = scale;
						}
					}
				}
				break;
			case "--format":
				options.format = takeValue("--format", args, options);
				break;
			case "--json":
				options.json = true;
				break;
			case "--no-interactive":
				options.interactive = false;
				break;
			default:
				options.unknown?.push(arg);
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`dec19 <command> [operands] [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	for (const operation of OPERATIONS) {
		process.stdout.write(`  ${operation.usage.padEnd(28)} ${operation.summary}\n`);
	}
	process.stdout.write(`\nOptions:\n`);
	process.stdout.write(`  --scale <n>          Keep at least n digits after the decimal point (0-19)\n`);
	process.stdout.write(`  --format <pattern>   Output pattern, e.g. %.2f or %k (default %v)\n`);
	process.stdout.write(`  --json               Print JSON summary\n`);
	process.stdout.write(`  --no-interactive     Never prompt for a command\n`);
	process.stdout.write(`  --                   Treat the remaining arguments as operands\n`);
	process.stdout.write(`  -h, --help           Show help\n`);
	process.stdout.write(`  -v, --version        Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed = JSON.parse(raw) as { version?: string };
	return parsed.version ?? "0.0.0";
}

/** Negative numbers such as -5.67 and the bare "-" operator are operands, not flags. */
function isOperand(arg: string): boolean {
	return !arg.startsWith("-") || arg === "-" || /^-(\d|\.\d)/.test(arg);
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}

function toScale(value: string): number | undefined {
	if (!/^\d+$/.test(value)) {
		return undefined;
	}
	const scale = Number(value);
	return scale <= 19 ? scale : undefined;
}
