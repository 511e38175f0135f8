import { mean, prod, sum } from "../core/aggregate.js";
import { Decimal } from "../core/decimal.js";
import { decimalError } from "../core/errors.js";
import { formatDecimal } from "../core/format.js";
import { evaluate } from "../core/rpn.js";

export type OperationValue =
	| Decimal
	| Decimal[]
	| string
	| number
	| boolean
	| Record<string, string | number | boolean>;

export type OperationContext = {
	scale: number;
	operands: string[];
	decimal(index: number): Decimal;
	integer(index: number): number;
	decimals(): Decimal[];
};

export type Operation = {
	name: string;
	usage: string;
	summary: string;
	/** Exact operand count, or "many" for one or more. */
	arity: number | "many";
	run(context: OperationContext): OperationValue;
};

const unary = (
	name: string,
	summary: string,
	fn: (x: Decimal) => OperationValue,
): Operation => ({
	name,
	usage: `${name} <x>`,
	summary,
	arity: 1,
	run: (ctx) => fn(ctx.decimal(0)),
});

const binary = (
	name: string,
	summary: string,
	fn: (x: Decimal, y: Decimal, scale: number) => OperationValue,
): Operation => ({
	name,
	usage: `${name} <x> <y>`,
	summary,
	arity: 2,
	run: (ctx) => fn(ctx.decimal(0), ctx.decimal(1), ctx.scale),
});

const ternary = (
	name: string,
	summary: string,
	fn: (x: Decimal, y: Decimal, z: Decimal, scale: number) => OperationValue,
): Operation => ({
	name,
	usage: `${name} <x> <y> <z>`,
	summary,
	arity: 3,
	run: (ctx) => fn(ctx.decimal(0), ctx.decimal(1), ctx.decimal(2), ctx.scale),
});

const scaled = (
	name: string,
	summary: string,
	fn: (x: Decimal, scale: number) => Decimal,
): Operation => ({
	name,
	usage: `${name} <x> <scale>`,
	summary,
	arity: 2,
	run: (ctx) => fn(ctx.decimal(0), ctx.integer(1)),
});

const variadic = (
	name: string,
	summary: string,
	fn: (...values: Decimal[]) => Decimal,
): Operation => ({
	name,
	usage: `${name} <x>...`,
	summary,
	arity: "many",
	run: (ctx) => fn(...ctx.decimals()),
});

export const OPERATIONS: readonly Operation[] = [
	binary("add", "x + y", (x, y, scale) => x.addExact(y, scale)),
	binary("sub", "x - y", (x, y, scale) => x.subExact(y, scale)),
	binary("mul", "x * y", (x, y, scale) => x.mulExact(y, scale)),
	binary("quo", "x / y", (x, y, scale) => x.quoExact(y, scale)),
	binary("quo-rem", "Integer quotient and remainder of x / y", (x, y) => [...x.quoRem(y)]),
	binary("sub-abs", "|x - y|", (x, y) => x.subAbs(y)),
	ternary("add-mul", "x + y * z", (x, y, z, scale) => x.addMulExact(y, z, scale)),
	ternary("sub-mul", "x - y * z", (x, y, z, scale) => x.subMulExact(y, z, scale)),
	ternary("add-quo", "x + y / z", (x, y, z, scale) => x.addQuoExact(y, z, scale)),
	ternary("sub-quo", "x - y / z", (x, y, z, scale) => x.subQuoExact(y, z, scale)),
	unary("inv", "1 / x", (x) => x.inv()),
	binary("pow", "x raised to the power y", (x, y) => x.pow(y)),
	{
		name: "pow-int",
		usage: "pow-int <x> <n>",
		summary: "x raised to the integer power n",
		arity: 2,
		run: (ctx) => ctx.decimal(0).powInt(ctx.integer(1)),
	},
	unary("sqrt", "Square root of x", (x) => x.sqrt()),
	unary("exp", "e raised to the power x", (x) => x.exp()),
	unary("expm1", "e raised to the power x, minus 1", (x) => x.expm1()),
	unary("log", "Natural logarithm of x", (x) => x.log()),
	unary("log1p", "Natural logarithm of 1 + x", (x) => x.log1p()),
	unary("log2", "Binary logarithm of x", (x) => x.log2()),
	unary("log10", "Decimal logarithm of x", (x) => x.log10()),
	unary("abs", "Absolute value of x", (x) => x.abs()),
	unary("neg", "Opposite of x", (x) => x.neg()),
	scaled("round", "Round half to even to scale digits", (x, scale) => x.round(scale)),
	scaled("trunc", "Round towards zero to scale digits", (x, scale) => x.trunc(scale)),
	scaled("ceil", "Round towards positive infinity", (x, scale) => x.ceil(scale)),
	scaled("floor", "Round towards negative infinity", (x, scale) => x.floor(scale)),
	scaled("pad", "Add trailing zeros up to scale digits", (x, scale) => x.pad(scale)),
	scaled("rescale", "Round or pad to exactly scale digits", (x, scale) => x.rescale(scale)),
	scaled("trim", "Drop trailing zeros down to scale digits", (x, scale) => x.trim(scale)),
	binary("quantize", "Rescale x to the scale of y", (x, y) => x.quantize(y)),
	variadic("sum", "Sum of all operands", sum),
	variadic("mean", "Arithmetic mean of all operands", mean),
	variadic("prod", "Product of all operands", prod),
	binary("cmp", "Compare x and y (-1, 0 or 1)", (x, y) => x.cmp(y)),
	binary("cmp-total", "Compare representations of x and y", (x, y) => x.cmpTotal(y)),
	binary("min", "Smaller of x and y", (x, y) => x.min(y)),
	binary("max", "Larger of x and y", (x, y) => x.max(y)),
	ternary("clamp", "Limit x to the range [y, z]", (x, y, z) => x.clamp(y, z)),
	{
		name: "eval",
		usage: "eval <expression>",
		summary: "Evaluate a postfix expression, e.g. '1.23 4.56 + 10 *'",
		arity: "many",
		run: (ctx) => evaluate(ctx.operands.join(" "), { scale: ctx.scale }),
	},
	{
		name: "format",
		usage: "format <x> <pattern>",
		summary: "Render x with a pattern such as %.2f or %k",
		arity: 2,
		run: (ctx) => formatDecimal(ctx.decimal(0), ctx.operands[1] ?? "%v"),
	},
	unary("info", "Show coefficient, scale and sign of x", describe),
];

export function findOperation(name: string): Operation | undefined {
	return OPERATIONS.find((operation) => operation.name === name);
}

export function checkArity(operation: Operation, count: number): string | undefined {
	if (operation.arity === "many") {
		return count > 0 ? undefined : `${operation.name} expects at least 1 operand, got 0`;
	}
	if (count === operation.arity) {
		return undefined;
	}
	const noun = operation.arity === 1 ? "operand" : "operands";
	return `${operation.name} expects ${operation.arity} ${noun}, got ${count}`;
}

export function createContext(operands: string[], scale: number): OperationContext {
	const operand = (index: number): string => {
		const text = operands[index];
		if (text === undefined) {
			throw decimalError("invalid-operation", `missing operand ${index + 1}`);
		}
		return text;
	};
	return {
		scale,
		operands,
		decimal: (index) => Decimal.parseExact(operand(index), scale),
		integer: (index) => {
			const text = operand(index);
			if (!/^[+-]?\d+$/.test(text)) {
				throw new Error(`expected an integer, got "${text}"`);
			}
			return Number(text);
		},
		decimals: () => operands.map((text) => Decimal.parseExact(text, scale)),
	};
}

function describe(x: Decimal): Record<string, string | number | boolean> {
	return {
		value: x.toString(),
		sign: x.sign(),
		coefficient: x.coef.toString(),
		scale: x.scale,
		precision: x.prec(),
		minScale: x.minScale(),
		integer: x.isInt(),
	};
}
