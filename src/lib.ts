export { mean, prod, sum } from "./core/aggregate.js";
export {
	BSON_DECIMAL128,
	BSON_DOUBLE,
	BSON_INT32,
	BSON_INT64,
	BSON_NULL,
	BSON_STRING,
	decodeDecimal128,
	encodeDecimal128,
	marshalBinary,
	marshalBSONValue,
	marshalJSON,
	marshalNullBSONValue,
	marshalNullJSON,
	marshalText,
	unmarshalBinary,
	unmarshalBSONValue,
	unmarshalJSON,
	unmarshalNullBSONValue,
	unmarshalNullJSON,
	unmarshalText,
} from "./core/codec.js";
export type { NullDecimal } from "./core/codec.js";
export {
	Decimal,
	E,
	HUNDRED,
	NEG_ONE,
	ONE,
	PI,
	TEN,
	THOUSAND,
	TWO,
	ZERO,
} from "./core/decimal.js";
export { DecimalError } from "./core/errors.js";
export type { DecimalErrorCode } from "./core/errors.js";
export { formatDecimal } from "./core/format.js";
export { MAX_COEF, MAX_PREC, MAX_SCALE, MIN_SCALE } from "./core/integer.js";
export { evaluate } from "./core/rpn.js";
export type { EvaluateOptions } from "./core/rpn.js";
export { decimalValue, nullDecimalValue, scanDecimal, scanNullDecimal } from "./core/sql.js";
export type { BsonValue, Int64Parts, SqlValue } from "./core/types.js";
