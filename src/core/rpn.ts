import { mean, prod, sum } from "./aggregate.js";
import { Decimal } from "./decimal.js";
import { decimalError, withContext } from "./errors.js";

export type EvaluateOptions = {
	/** Minimum number of digits after the decimal point for every step. */
	scale?: number;
};

type Binary = (left: Decimal, right: Decimal, scale: number) => Decimal;
type Unary = (value: Decimal) => Decimal;
type Variadic = (...values: Decimal[]) => Decimal;

const BINARY = new Map<string, Binary>([
	["+", (left, right, scale) => left.addExact(right, scale)],
	["-", (left, right, scale) => left.subExact(right, scale)],
	["*", (left, right, scale) => left.mulExact(right, scale)],
	["/", (left, right, scale) => left.quoExact(right, scale)],
	["^", (left, right) => left.pow(right)],
	["min", (left, right) => left.min(right)],
	["max", (left, right) => left.max(right)],
]);

const UNARY = new Map<string, Unary>([
	["abs", (value) => value.abs()],
	["neg", (value) => value.neg()],
	["inv", (value) => value.inv()],
	["sqrt", (value) => value.sqrt()],
	["exp", (value) => value.exp()],
	["expm1", (value) => value.expm1()],
	["log", (value) => value.log()],
	["log1p", (value) => value.log1p()],
	["log2", (value) => value.log2()],
	["log10", (value) => value.log10()],
]);

const VARIADIC = new Map<string, Variadic>([
	["sum", sum],
	["mean", mean],
	["prod", prod],
]);

/**
 * Evaluates a postfix expression such as `1.23 4.56 + 10 *`.
 * `sum`, `mean` and `prod` consume the whole stack.
 */
export function evaluate(input: string, options: EvaluateOptions = {}): Decimal {
	const scale = options.scale ?? 0;
	const tokens = input.split(/\s+/).filter(Boolean);
	if (tokens.length === 0) {
		throw new Error("no tokens");
	}

	const stack: Decimal[] = [];
	tokens.forEach((token, index) => {
		const result = withContext(`processing token "${token}" at position ${index}`, () =>
			applyToken(token, stack, scale),
		);
		stack.push(result);
	});

	const [result] = stack;
	if (stack.length !== 1 || result === undefined) {
		throw new Error(`stack contains [${stack.join(" ")}], expected exactly one item`);
	}
	return result;
}

function applyToken(token: string, stack: Decimal[], scale: number): Decimal {
	const binary = BINARY.get(token);
	if (binary) {
		const right = stack.pop();
		const left = stack.pop();
		if (left === undefined || right === undefined) {
			throw decimalError("invalid-operation", "not enough operands");
		}
		return binary(left, right, scale);
	}
	const unary = UNARY.get(token);
	if (unary) {
		const value = stack.pop();
		if (value === undefined) {
			throw decimalError("invalid-operation", "not enough operands");
		}
		return unary(value);
	}
	const variadic = VARIADIC.get(token);
	if (variadic) {
		return variadic(...stack.splice(0, stack.length));
	}
	return Decimal.parseExact(token, scale);
}
