import type { Term } from "./types.js";

export const MAX_PREC = 19;
export const MIN_SCALE = 0;
export const MAX_SCALE = 19;
export const MAX_COEF = 9_999_999_999_999_999_999n;

/** Number of fractional digits used by intermediate big computations. */
export const BIG_SCALE = 41;

const POW10_CACHE: bigint[] = [1n];

export function pow10(power: number): bigint {
	if (power < 0) {
		throw new RangeError(`negative power of ten: ${power}`);
	}
	while (POW10_CACHE.length <= power) {
		POW10_CACHE.push(POW10_CACHE[POW10_CACHE.length - 1] * 10n);
	}
	return POW10_CACHE[power];
}

/** Number of decimal digits in x; zero has none. */
export function prec(x: bigint): number {
	return x === 0n ? 0 : x.toString().length;
}

/** Reports whether x has at least the given number of digits. */
export function hasPrec(x: bigint, digits: number): boolean {
	if (digits < 1) {
		return true;
	}
	return x >= pow10(digits - 1);
}

/** Number of trailing zeros of x; zero has none. */
export function ntz(x: bigint): number {
	if (x === 0n) {
		return 0;
	}
	let count = 0;
	let rest = x;
	while (rest % 10n === 0n) {
		rest /= 10n;
		count++;
	}
	return count;
}

export function lsh(x: bigint, shift: number): bigint {
	return shift <= 0 ? x : x * pow10(shift);
}

export function rshDown(x: bigint, shift: number): bigint {
	if (x === 0n || shift <= 0) {
		return x;
	}
	return x / pow10(shift);
}

export function rshUp(x: bigint, shift: number): bigint {
	if (x === 0n || shift <= 0) {
		return x;
	}
	const y = pow10(shift);
	const z = x / y;
	return x % y === 0n ? z : z + 1n;
}

export function rshHalfEven(x: bigint, shift: number): bigint {
	if (x === 0n || shift <= 0) {
		return x;
	}
	const y = pow10(shift);
	let z = x / y;
	const r2 = (x - z * y) * 2n;
	if (r2 > y || (r2 === y && z % 2n === 1n)) {
		z++;
	}
	return z;
}

export function subAbs(x: bigint, y: bigint): bigint {
	return x > y ? x - y : y - x;
}

/** Signed addition of two coefficients after aligning their scales. */
export function addTerms(d: Term, e: Term): Term {
	let dcoef = d.coef;
	let ecoef = e.coef;
	let scale = d.scale;
	if (d.scale > e.scale) {
		ecoef = lsh(ecoef, d.scale - e.scale);
	} else if (d.scale < e.scale) {
		dcoef = lsh(dcoef, e.scale - d.scale);
		scale = e.scale;
	}
	if (d.neg === e.neg) {
		return { neg: d.neg, coef: dcoef + ecoef, scale };
	}
	return { neg: ecoef > dcoef ? e.neg : d.neg, coef: subAbs(dcoef, ecoef), scale };
}
