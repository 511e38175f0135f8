import { Decimal } from "../core/decimal.js";
import { formatDecimal } from "../core/format.js";
import type { OperationValue } from "./operations.js";

type JsonResult = string | number | boolean | string[] | Record<string, string | number | boolean>;

export function buildJsonSummary(
	command: string,
	operands: string[],
	value: OperationValue,
): Record<string, unknown> {
	return {
		command,
		operands,
		result: toJsonResult(value),
	};
}

export function renderText(value: OperationValue, pattern: string): string {
	if (value instanceof Decimal) {
		return formatDecimal(value, pattern);
	}
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	if (Array.isArray(value)) {
		return value.map((item) => formatDecimal(item, pattern)).join(" ");
	}
	return Object.entries(value)
		.map(([key, item]) => `${key}: ${String(item)}`)
		.join("\n");
}

function toJsonResult(value: OperationValue): JsonResult {
	if (value instanceof Decimal) {
		return value.toString();
	}
	if (Array.isArray(value)) {
		return value.map((item) => item.toString());
	}
	return value;
}
