import { Decimal } from "./decimal.js";
import { decimalError, unknownOverflowError, withContext } from "./errors.js";
import { addTerms, BIG_SCALE, hasPrec, lsh, rshDown } from "./integer.js";
import type { Term } from "./types.js";

const MAX_BIG_PREC = 100;

type Aggregate = (values: readonly Decimal[]) => Decimal;

function aggregate(name: string, values: readonly Decimal[], compute: Aggregate): Decimal {
	return withContext(
		() => `computing [${name}([${values.join(" ")}])]`,
		() => {
			const [first] = values;
			if (first === undefined) {
				throw decimalError("invalid-operation");
			}
			return values.length === 1 ? first : compute(values);
		},
	);
}

function exactSum(values: readonly Decimal[]): Term {
	let total: Term = { neg: false, coef: 0n, scale: 0 };
	for (const value of values) {
		total = addTerms(total, { neg: value.isNeg(), coef: value.coef, scale: value.scale });
	}
	return total;
}

export function sum(...values: Decimal[]): Decimal {
	return aggregate("sum", values, (items) => {
		const total = exactSum(items);
		return Decimal.fromCoef(total.neg, total.coef, total.scale, 0);
	});
}

/** Arithmetic mean, trimmed to the largest scale among the values. */
export function mean(...values: Decimal[]): Decimal {
	return aggregate("mean", values, (items) => {
		const total = exactSum(items);
		const coef = lsh(total.coef, BIG_SCALE - total.scale) / BigInt(items.length);
		const scale = Math.max(0, ...items.map((item) => item.scale));
		return Decimal.fromCoef(total.neg, coef, BIG_SCALE, 0).trim(scale);
	});
}

export function prod(...values: Decimal[]): Decimal {
	return aggregate("prod", values, (items) => {
		let coef = 1n;
		let scale = 0;
		let neg = false;
		for (const item of items) {
			coef *= item.coef;
			neg = neg !== item.isNeg();
			scale += item.scale;
			if (scale > BIG_SCALE) {
				coef = rshDown(coef, scale - BIG_SCALE);
				scale = BIG_SCALE;
			}
			if (hasPrec(coef, MAX_BIG_PREC)) {
				throw unknownOverflowError();
			}
		}
		return Decimal.fromCoef(neg, coef, scale, 0);
	});
}
