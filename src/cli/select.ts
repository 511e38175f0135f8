import { cancel, isCancel, select, text } from "@clack/prompts";
import type { Operation } from "./operations.js";

export async function selectOperation(operations: readonly Operation[]): Promise<Operation | null> {
	const selection = await select({
		message: "Select an operation",
		options: operations.map((operation) => ({
			value: operation.name,
			label: operation.usage,
			hint: operation.summary,
		})),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return operations.find((operation) => operation.name === selection) ?? null;
}

export async function promptOperands(operation: Operation): Promise<string[] | null> {
	if (operation.arity === "many") {
		const selection = await text({
			message: `Operands for ${operation.name} (space separated)`,
			placeholder: operation.name === "eval" ? "1.23 4.56 + 10 *" : "5.67 -8 23",
		});
		if (isCancel(selection)) {
			cancel("Canceled.");
			return null;
		}
		return parseOperandInput(selection);
	}

	const names = operation.usage.split(" ").slice(1);
	const operands: string[] = [];
	for (let index = 0; index < operation.arity; index += 1) {
		const name = names[index] ?? `<operand ${index + 1}>`;
		const selection = await text({
			message: `${operation.name} ${name}`,
		});
		if (isCancel(selection)) {
			cancel("Canceled.");
			return null;
		}
		operands.push(selection.trim());
	}
	return operands;
}

function parseOperandInput(input: string): string[] {
	return input
		.split(/\s+/)
		.map((item) => item.trim())
		.filter(Boolean);
}
