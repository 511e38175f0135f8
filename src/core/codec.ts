import { Decimal } from "./decimal.js";
import { DecimalError, decimalError, withContext } from "./errors.js";
import type { BsonValue } from "./types.js";

// BSON element types, see https://bsonspec.org/spec.html
export const BSON_DOUBLE = 1;
export const BSON_STRING = 2;
export const BSON_NULL = 10;
export const BSON_INT32 = 16;
export const BSON_INT64 = 18;
export const BSON_DECIMAL128 = 19;

const DECIMAL128_BIAS = 6176;
const MAX_BSON_STRING = 330;

/** A decimal that may be absent, as stored in nullable columns and fields. */
export type NullDecimal = { valid: true; decimal: Decimal } | { valid: false };

export function marshalJSON(d: Decimal): string {
	return `"${d.toString()}"`;
}

/** Accepts JSON numbers and numeric strings; `null` yields undefined. */
export function unmarshalJSON(text: string): Decimal | undefined {
	if (text === "null") {
		return undefined;
	}
	const unquoted =
		text.length >= 2 && text.startsWith('"') && text.endsWith('"') ? text.slice(1, -1) : text;
	return withContext("unmarshaling Decimal", () => Decimal.parse(unquoted));
}

export function marshalText(d: Decimal): Buffer {
	return Buffer.from(d.toString(), "utf-8");
}

export function unmarshalText(data: Uint8Array): Decimal {
	const text = Buffer.from(data).toString("utf-8");
	return withContext("unmarshaling Decimal", () => Decimal.parse(text));
}

export const marshalBinary = marshalText;
export const unmarshalBinary = unmarshalText;

/** Always encodes as Decimal128. */
export function marshalBSONValue(d: Decimal): BsonValue {
	return { type: BSON_DECIMAL128, data: encodeDecimal128(d) };
}

/** Decodes double, string, int32, int64 and Decimal128 values; null yields undefined. */
export function unmarshalBSONValue(type: number, data: Uint8Array): Decimal | undefined {
	return withContext(`converting from BSON type ${type} to Decimal`, () => {
		const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
		switch (type) {
			case BSON_DOUBLE:
				checkLength(buf, 8);
				return Decimal.fromNumber(buf.readDoubleLE(0));
			case BSON_STRING:
				return parseBSONString(buf);
			case BSON_NULL:
				return undefined;
			case BSON_INT32:
				checkLength(buf, 4);
				return Decimal.of(buf.readInt32LE(0));
			case BSON_INT64:
				checkLength(buf, 8);
				return Decimal.of(buf.readBigInt64LE(0));
			case BSON_DECIMAL128:
				return decodeDecimal128(buf);
			default:
				throw new DecimalError("unsupported", `BSON type ${type} is not supported`);
		}
	});
}

export function marshalNullJSON(n: NullDecimal): string {
	return n.valid ? marshalJSON(n.decimal) : "null";
}

export function unmarshalNullJSON(text: string): NullDecimal {
	const decimal = unmarshalJSON(text);
	return decimal ? { valid: true, decimal } : { valid: false };
}

export function marshalNullBSONValue(n: NullDecimal): BsonValue {
	return n.valid ? marshalBSONValue(n.decimal) : { type: BSON_NULL, data: new Uint8Array(0) };
}

export function unmarshalNullBSONValue(type: number, data: Uint8Array): NullDecimal {
	const decimal = unmarshalBSONValue(type, data);
	return decimal ? { valid: true, decimal } : { valid: false };
}

function checkLength(buf: Buffer, length: number): void {
	if (buf.length !== length) {
		throw decimalError("invalid-decimal", `invalid data length ${buf.length}`);
	}
}

function parseBSONString(buf: Buffer): Decimal {
	if (buf.length < 4) {
		throw decimalError("invalid-decimal", `invalid data length ${buf.length}`);
	}
	const length = buf.readInt32LE(0);
	if (length < 1 || length > MAX_BSON_STRING || buf.length < length + 4) {
		throw decimalError("invalid-decimal", `invalid string length ${length}`);
	}
	const terminator = buf[length + 3];
	if (terminator !== 0) {
		throw decimalError("invalid-decimal", `invalid null terminator ${terminator}`);
	}
	return Decimal.parse(buf.toString("utf-8", 4, length + 3));
}

/** IEEE 754-2008 decimal128 with binary integer significand, little-endian. */
export function encodeDecimal128(d: Decimal): Buffer {
	const buf = Buffer.alloc(16);
	const exponent = DECIMAL128_BIAS - d.scale;
	buf[15] = (d.isNeg() ? 0b1000_0000 : 0) | ((exponent >> 7) & 0b0111_1111);
	buf[14] = (exponent << 1) & 0b1111_1110;
	buf.writeBigUInt64LE(d.coef, 0);
	return buf;
}

export function decodeDecimal128(buf: Buffer): Decimal {
	checkLength(buf, 16);
	const high = buf[15];
	if ((high & 0b0111_1100) === 0b0111_1100) {
		throw decimalError("invalid-decimal", "special value NaN");
	}
	if ((high & 0b0111_1100) === 0b0111_1000) {
		throw decimalError("invalid-decimal", "special value Inf");
	}
	if ((high & 0b0110_0000) === 0b0110_0000) {
		throw decimalError("invalid-decimal", "unsupported encoding");
	}

	const neg = (high & 0b1000_0000) !== 0;
	let scale = DECIMAL128_BIAS - ((buf[14] >> 1) | ((high & 0b0111_1111) << 7));

	let coef = BigInt(buf[14] & 0b0000_0001);
	for (let i = 13; i >= 0; i--) {
		coef = (coef << 8n) | BigInt(buf[i]);
	}
	if (coef === 0n) {
		scale = Math.max(scale, 0);
	}
	return Decimal.fromCoef(neg, coef, scale, 0);
}
