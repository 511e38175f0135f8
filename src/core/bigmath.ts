import { BIG_SCALE, pow10, prec, rshDown, rshHalfEven } from "./integer.js";

// Fixed-point kernels: every value is an integer scaled by 10^BIG_SCALE.

const WORK_SCALE = 100;
const EXP_TABLE_SIZE = 100;
const FACTORIAL_TABLE_SIZE = 60;
const MAX_ITERATIONS = 50;

const ONE = pow10(BIG_SCALE);

function factorials(count: number): bigint[] {
	const table: bigint[] = [1n];
	for (let i = 1; i < count; i++) {
		table.push(table[i - 1] * BigInt(i));
	}
	return table;
}

const FACTORIALS = factorials(FACTORIAL_TABLE_SIZE);

/** atanh(1/m) at WORK_SCALE. */
function atanhInverse(m: bigint): bigint {
	const unit = pow10(WORK_SCALE);
	let sum = 0n;
	let power = m;
	for (let k = 1n; ; k += 2n) {
		const term = unit / (k * power);
		if (term === 0n) {
			break;
		}
		sum += term;
		power *= m * m;
	}
	return sum;
}

function eulerWork(): bigint {
	const unit = pow10(WORK_SCALE);
	let sum = 0n;
	let factorial = 1n;
	for (let i = 1n; ; i++) {
		const term = unit / factorial;
		if (term === 0n) {
			break;
		}
		sum += term;
		factorial *= i;
	}
	return sum;
}

function expTable(): bigint[] {
	const unit = pow10(WORK_SCALE);
	const e = eulerWork();
	const table: bigint[] = [];
	let power = unit;
	for (let k = 0; k < EXP_TABLE_SIZE; k++) {
		table.push(rshHalfEven(power, WORK_SCALE - BIG_SCALE));
		power = (power * e) / unit;
	}
	return table;
}

const LN2_WORK = 2n * atanhInverse(3n);
const LN10_WORK = 3n * LN2_WORK + 2n * atanhInverse(9n);

/** round(e^k * 10^BIG_SCALE) for k in [0, 100). */
const EXP_TABLE = expTable();

export const LN2 = rshHalfEven(LN2_WORK, WORK_SCALE - BIG_SCALE);
export const LN10 = rshHalfEven(LN10_WORK, WORK_SCALE - BIG_SCALE);

/** n * ln(10), n >= 0. */
function nlog10(n: number): bigint {
	return rshHalfEven(BigInt(n) * LN10_WORK, WORK_SCALE - BIG_SCALE);
}

/**
 * e^x for 0 <= x < 100. The integer part comes from the table, the
 * fractional part from the Taylor series.
 */
export function bigExp(x: bigint): bigint {
	const whole = x / ONE;
	const frac = x % ONE;
	if (whole < 0n || whole >= BigInt(EXP_TABLE_SIZE)) {
		throw new RangeError(`exponent out of table range: ${whole}`);
	}
	const base = EXP_TABLE[Number(whole)];
	if (frac === 0n) {
		return base;
	}
	let series = 0n;
	let power = ONE;
	for (const factorial of FACTORIALS) {
		const term = power / factorial;
		if (term === 0n) {
			break;
		}
		series += term;
		power = rshDown(power * frac, BIG_SCALE);
	}
	return rshDown(base * series, BIG_SCALE);
}

/** ln(x) for x >= 1 using Halley's method. */
export function bigLog(x: bigint): bigint {
	const n = prec(x) - BIG_SCALE;
	let z = nlog10(Math.max(n, 0));
	for (let i = 0; i < MAX_ITERATIONS; i++) {
		const ez = bigExp(z);
		const num = (ez - x) * 2n * ONE;
		const next = z - num / (ez + x);
		if (next === z) {
			break;
		}
		z = next;
	}
	return z;
}

/** floor(sqrt(x)) refined by Newton's method from the given start. */
export function bigSqrt(x: bigint, start: bigint): bigint {
	let z = start;
	let previous = 0n;
	for (let i = 0; i < MAX_ITERATIONS; i++) {
		if (z === previous) {
			break;
		}
		previous = z;
		z = (x / z + previous) / 2n;
	}
	return z;
}
