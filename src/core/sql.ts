import type { NullDecimal } from "./codec.js";
import { unmarshalText } from "./codec.js";
import { Decimal } from "./decimal.js";
import { DecimalError, withContext } from "./errors.js";
import type { SqlValue } from "./types.js";

/**
 * Converts a value returned by a database driver. Drivers hand DECIMAL
 * columns over as strings or bytes, integers as number or bigint.
 */
export function scanDecimal(value: unknown): Decimal {
	return withContext(`converting from ${typeName(value)} to Decimal`, () => {
		if (typeof value === "string") {
			return Decimal.parse(value);
		}
		if (typeof value === "bigint") {
			return Decimal.of(value);
		}
		if (typeof value === "number") {
			return Decimal.fromNumber(value);
		}
		if (value instanceof Uint8Array) {
			return unmarshalText(value);
		}
		if (value === null || value === undefined) {
			throw new DecimalError(
				"unsupported",
				"Decimal does not support null values, use NullDecimal",
			);
		}
		throw new DecimalError("unsupported", `type ${typeName(value)} is not supported`);
	});
}

export function decimalValue(d: Decimal): SqlValue {
	return d.toString();
}

export function scanNullDecimal(value: unknown): NullDecimal {
	if (value === null || value === undefined) {
		return { valid: false };
	}
	return { valid: true, decimal: scanDecimal(value) };
}

export function nullDecimalValue(n: NullDecimal): SqlValue {
	return n.valid ? decimalValue(n.decimal) : null;
}

function typeName(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (value instanceof Uint8Array) {
		return "Uint8Array";
	}
	return typeof value;
}
