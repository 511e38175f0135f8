import { bigExp, bigLog, bigSqrt, LN10, LN2 } from "./bigmath.js";
import {
	DecimalError,
	decimalError,
	overflowError,
	unknownOverflowError,
	withContext,
} from "./errors.js";
import {
	addTerms,
	BIG_SCALE,
	hasPrec,
	lsh,
	MAX_COEF,
	MAX_PREC,
	MAX_SCALE,
	MIN_SCALE,
	ntz,
	pow10,
	prec,
	rshDown,
	rshHalfEven,
	rshUp,
	subAbs,
} from "./integer.js";
import type { Int64Parts, Term } from "./types.js";

const MAX_TEXT_LENGTH = 330;
const MAX_EXPONENT = 330;
const MAX_BIG_PREC = 100;
const INT64_MAX = 9_223_372_036_854_775_807n;

/**
 * A finite decimal number with a coefficient of at most 19 digits and
 * 0 to 19 digits after the decimal point. Instances are immutable.
 *
 * Operations return the exact result when it fits; otherwise the result is
 * rounded half to even to 19 significant digits.
 */
export class Decimal {
	private constructor(
		private readonly negative: boolean,
		readonly coef: bigint,
		readonly scale: number,
	) {}

	/** Returns value / 10^scale. */
	static of(value: bigint | number, scale = 0): Decimal {
		if (typeof value === "number" && !Number.isSafeInteger(value)) {
			throw decimalError("invalid-decimal", `${value} is not a safe integer`);
		}
		const big = BigInt(value);
		return Decimal.safe(big < 0n, big < 0n ? -big : big, scale);
	}

	/**
	 * Builds a decimal from a coefficient of any size, rounding it to fit and
	 * keeping at least minScale digits after the decimal point.
	 */
	static fromCoef(neg: boolean, coef: bigint, scale: number, minScale = 0): Decimal {
		if (coef < 0n) {
			throw new RangeError(`negative coefficient: ${coef}`);
		}
		const digits = prec(coef);
		if (digits - scale > MAX_PREC - minScale) {
			throw overflowError(digits, scale, minScale);
		}
		let next = coef;
		let nextScale = scale;
		if (scale < minScale) {
			next = lsh(next, minScale - scale);
			nextScale = minScale;
		} else if (scale >= digits && scale > MAX_SCALE) {
			next = rshHalfEven(next, scale - MAX_SCALE);
			nextScale = MAX_SCALE;
		} else if (digits > scale && digits > MAX_PREC) {
			next = rshHalfEven(next, digits - MAX_PREC);
			nextScale = MAX_PREC - digits + scale;
		}
		// Rounding can carry a 19-digit coefficient into 20 digits.
		if (hasPrec(next, MAX_PREC + 1)) {
			return Decimal.fromCoef(neg, next, nextScale, minScale);
		}
		return Decimal.safe(neg, next, nextScale);
	}

	/**
	 * Parses `[sign] significand [exponent]`, e.g. `1.234`, `-1234`,
	 * `+0.000001234`, `1.83e5`, `0.22e-9`. Trailing zeros after the decimal
	 * point are kept.
	 */
	static parse(text: string): Decimal {
		return Decimal.parseExact(text, 0);
	}

	/** Like parse, but fails if fewer than scale fractional digits survive rounding. */
	static parseExact(text: string, scale: number): Decimal {
		return withContext("parsing decimal", () => {
			if (text.length > MAX_TEXT_LENGTH) {
				throw decimalError("invalid-decimal");
			}
			checkScale(scale);
			return parseText(text, scale);
		});
	}

	/** Returns whole + frac / 10^scale with trailing zeros removed. */
	static fromInt64(whole: bigint | number, frac: bigint | number, scale: number): Decimal {
		return withContext("converting integers", () => {
			let d = Decimal.of(whole, 0);
			const f = Decimal.of(frac, scale);
			if (!f.isZero()) {
				if (!d.isZero() && d.sign() !== f.sign()) {
					throw new DecimalError("invalid-decimal", "inconsistent signs");
				}
				if (!f.withinOne()) {
					throw new DecimalError("invalid-decimal", "inconsistent fraction");
				}
				d = d.add(f.trim(0));
			}
			return d;
		});
	}

	/** Converts a float through its shortest round-trip text. */
	static fromNumber(value: number): Decimal {
		if (!Number.isFinite(value)) {
			throw new DecimalError("invalid-decimal", `converting float: special value ${value}`);
		}
		return withContext("converting float", () => Decimal.parse(String(value)));
	}

	private static safe(neg: boolean, coef: bigint, scale: number): Decimal {
		checkScale(scale);
		if (coef > MAX_COEF) {
			throw decimalError("overflow");
		}
		return Decimal.unsafe(neg, coef, scale);
	}

	private static unsafe(neg: boolean, coef: bigint, scale: number): Decimal {
		return new Decimal(coef === 0n ? false : neg, coef, scale);
	}

	toString(): string {
		let digits = this.coef.toString();
		if (this.scale > 0) {
			digits = digits.padStart(this.scale + 1, "0");
			digits = `${digits.slice(0, -this.scale)}.${digits.slice(-this.scale)}`;
		}
		return this.negative ? `-${digits}` : digits;
	}

	toJSON(): string {
		return this.toString();
	}

	toNumber(): number {
		return Number(this.toString());
	}

	/**
	 * Splits the decimal into whole and fractional integers so that
	 * d = whole + frac / 10^scale, rounding half to even. Returns undefined
	 * when the parts do not fit in int64 or the scale is out of range.
	 */
	toInt64(scale: number): Int64Parts | undefined {
		if (!Number.isInteger(scale) || scale < MIN_SCALE || scale > MAX_SCALE) {
			return undefined;
		}
		let x = this.coef;
		let y = pow10(this.scale);
		if (scale < this.scale) {
			x = rshHalfEven(x, this.scale - scale);
			y = pow10(scale);
		}
		const q = x / y;
		const r = lsh(x % y, scale - this.scale);
		const limit = this.negative ? INT64_MAX + 1n : INT64_MAX;
		if (q > limit || r > limit) {
			return undefined;
		}
		return this.negative ? { whole: -q, frac: -r } : { whole: q, frac: r };
	}

	/** Zero at the scale of d. */
	zero(): Decimal {
		return Decimal.unsafe(false, 0n, this.scale);
	}

	/** One at the scale of d. */
	one(): Decimal {
		return Decimal.unsafe(false, pow10(this.scale), this.scale);
	}

	/** Unit in the last place at the scale of d. */
	ulp(): Decimal {
		return Decimal.unsafe(false, 1n, this.scale);
	}

	prec(): number {
		return prec(this.coef);
	}

	/** Smallest scale that represents d exactly. */
	minScale(): number {
		if (this.isZero()) {
			return MIN_SCALE;
		}
		return Math.max(MIN_SCALE, this.scale - ntz(this.coef));
	}

	sign(): -1 | 0 | 1 {
		if (this.negative) {
			return -1;
		}
		return this.coef === 0n ? 0 : 1;
	}

	isPos(): boolean {
		return this.coef !== 0n && !this.negative;
	}

	isNeg(): boolean {
		return this.negative;
	}

	isZero(): boolean {
		return this.coef === 0n;
	}

	isInt(): boolean {
		return this.scale === 0 || this.coef % pow10(this.scale) === 0n;
	}

	/** True for 1 and -1. */
	isOne(): boolean {
		return this.coef === pow10(this.scale);
	}

	/** True when -1 < d < 1. */
	withinOne(): boolean {
		return this.coef < pow10(this.scale);
	}

	round(scale: number): Decimal {
		return this.shrink(scale, (coef, shift) => rshHalfEven(coef, shift));
	}

	trunc(scale: number): Decimal {
		return this.shrink(scale, (coef, shift) => rshDown(coef, shift));
	}

	ceil(scale: number): Decimal {
		return this.shrink(scale, (coef, shift) =>
			this.negative ? rshDown(coef, shift) : rshUp(coef, shift),
		);
	}

	floor(scale: number): Decimal {
		return this.shrink(scale, (coef, shift) =>
			this.negative ? rshUp(coef, shift) : rshDown(coef, shift),
		);
	}

	/** Adds trailing zeros up to scale, as far as the coefficient allows. */
	pad(scale: number): Decimal {
		if (!Number.isInteger(scale)) {
			throw decimalError("scale-range");
		}
		const target = Math.min(scale, MAX_SCALE, MAX_PREC - this.prec() + this.scale);
		if (target <= this.scale) {
			return this;
		}
		return Decimal.unsafe(this.negative, lsh(this.coef, target - this.scale), target);
	}

	rescale(scale: number): Decimal {
		return scale > this.scale ? this.pad(scale) : this.round(scale);
	}

	quantize(e: Decimal): Decimal {
		return this.rescale(e.scale);
	}

	sameScale(e: Decimal): boolean {
		return this.scale === e.scale;
	}

	/** Removes trailing zeros, keeping at least scale fractional digits. */
	trim(scale: number): Decimal {
		if (this.scale <= scale) {
			return this;
		}
		return this.trunc(Math.max(scale, this.minScale()));
	}

	neg(): Decimal {
		return Decimal.unsafe(!this.negative, this.coef, this.scale);
	}

	abs(): Decimal {
		return Decimal.unsafe(false, this.coef, this.scale);
	}

	copySign(e: Decimal): Decimal {
		return this.negative === e.negative ? this : this.neg();
	}

	add(e: Decimal): Decimal {
		return this.addExact(e, 0);
	}

	addExact(e: Decimal, scale: number): Decimal {
		return withContext(
			() => `computing [${this} + ${e}]`,
			() => {
				checkScale(scale);
				const sum = addTerms(this.term(), e.term());
				return Decimal.fromCoef(sum.neg, sum.coef, sum.scale, scale);
			},
		);
	}

	sub(e: Decimal): Decimal {
		return this.addExact(e.neg(), 0);
	}

	subExact(e: Decimal, scale: number): Decimal {
		return this.addExact(e.neg(), scale);
	}

	/** |d - e| */
	subAbs(e: Decimal): Decimal {
		return withContext(
			() => `computing [abs(${this} - ${e})]`,
			() => this.sub(e).abs(),
		);
	}

	mul(e: Decimal): Decimal {
		return this.mulExact(e, 0);
	}

	mulExact(e: Decimal, scale: number): Decimal {
		return withContext(
			() => `computing [${this} * ${e}]`,
			() => {
				checkScale(scale);
				return Decimal.fromCoef(
					this.negative !== e.negative,
					this.coef * e.coef,
					this.scale + e.scale,
					scale,
				);
			},
		);
	}

	/** d + e * f */
	addMul(e: Decimal, f: Decimal): Decimal {
		return this.addMulExact(e, f, 0);
	}

	addMulExact(e: Decimal, f: Decimal, scale: number): Decimal {
		return withContext(
			() => `computing [${this} + ${e} * ${f}]`,
			() => {
				checkScale(scale);
				const product = {
					neg: e.negative !== f.negative,
					coef: e.coef * f.coef,
					scale: e.scale + f.scale,
				};
				const sum = addTerms(this.term(), product);
				return Decimal.fromCoef(sum.neg, sum.coef, sum.scale, scale);
			},
		);
	}

	/** d - e * f */
	subMul(e: Decimal, f: Decimal): Decimal {
		return this.addMulExact(e.neg(), f, 0);
	}

	subMulExact(e: Decimal, f: Decimal, scale: number): Decimal {
		return this.addMulExact(e.neg(), f, scale);
	}

	/** d + e / f */
	addQuo(e: Decimal, f: Decimal): Decimal {
		return this.addQuoExact(e, f, 0);
	}

	addQuoExact(e: Decimal, f: Decimal, scale: number): Decimal {
		return withContext(
			() => `computing [${this} + ${e} / ${f}]`,
			() => {
				checkScale(scale);
				if (f.isZero()) {
					throw decimalError("division-by-zero");
				}
				if (e.isZero()) {
					return this.pad(Math.max(scale, e.scale - f.scale));
				}
				const quotient = {
					neg: e.negative !== f.negative,
					coef: lsh(e.coef, BIG_SCALE - e.scale + f.scale) / f.coef,
					scale: BIG_SCALE,
				};
				const sum = addTerms(this.term(), quotient);
				const g = Decimal.fromCoef(sum.neg, sum.coef, sum.scale, scale);
				return g.trim(Math.max(scale, this.scale, e.scale - f.scale));
			},
		);
	}

	/** d - e / f */
	subQuo(e: Decimal, f: Decimal): Decimal {
		return this.addQuoExact(e.neg(), f, 0);
	}

	subQuoExact(e: Decimal, f: Decimal, scale: number): Decimal {
		return this.addQuoExact(e.neg(), f, scale);
	}

	quo(e: Decimal): Decimal {
		return this.quoExact(e, 0);
	}

	quoExact(e: Decimal, scale: number): Decimal {
		return withContext(
			() => `computing [${this} / ${e}]`,
			() => {
				checkScale(scale);
				if (e.isZero()) {
					throw decimalError("division-by-zero");
				}
				const minScale = Math.max(scale, this.scale - e.scale);
				if (this.isZero()) {
					return Decimal.safe(false, 0n, minScale);
				}
				const coef = lsh(this.coef, BIG_SCALE + e.scale - this.scale) / e.coef;
				const f = Decimal.fromCoef(this.negative !== e.negative, coef, BIG_SCALE, scale);
				return f.trim(minScale);
			},
		);
	}

	/**
	 * Truncated division: q is an integer and r = d - e * q has the sign of d
	 * and the larger of both scales.
	 */
	quoRem(e: Decimal): readonly [Decimal, Decimal] {
		return withContext(
			() => `computing [${this} div ${e}] and [${this} mod ${e}]`,
			() => {
				if (e.isZero()) {
					throw decimalError("division-by-zero");
				}
				let dcoef = this.coef;
				let ecoef = e.coef;
				let rscale = this.scale;
				if (this.scale > e.scale) {
					ecoef = lsh(ecoef, this.scale - e.scale);
				} else if (this.scale < e.scale) {
					dcoef = lsh(dcoef, e.scale - this.scale);
					rscale = e.scale;
				}
				const q = Decimal.fromCoef(this.negative !== e.negative, dcoef / ecoef, 0, 0);
				const r = Decimal.fromCoef(this.negative, dcoef % ecoef, rscale, rscale);
				return [q, r] as const;
			},
		);
	}

	/** 1 / d */
	inv(): Decimal {
		return withContext(`inverting ${this}`, () => ONE.quo(this));
	}

	/** d^e; e may be fractional when d is positive. */
	pow(e: Decimal): Decimal {
		return withContext(
			() => `computing [${this}^${e}]`,
			() => {
				if (e.isNeg() && this.isZero()) {
					throw decimalError("invalid-operation", "zero to negative power");
				}
				if (e.isInt()) {
					const f = this.powIntBig(e.trunc(0).coef, e.isNeg());
					return e.isNeg() ? f.trim(0) : f;
				}
				if (this.isZero()) {
					return Decimal.safe(false, 0n, 0);
				}
				if (this.isNeg()) {
					throw decimalError("invalid-operation", "negative to fractional power");
				}
				return this.powBig(e);
			},
		);
	}

	/** d^power using exponentiation by squaring. */
	powInt(power: number | bigint): Decimal {
		return withContext(
			() => `computing [${this}^${power}]`,
			() => {
				if (typeof power === "number" && !Number.isSafeInteger(power)) {
					throw decimalError("invalid-operation", `${power} is not a safe integer`);
				}
				const big = BigInt(power);
				const inv = big < 0n;
				if (inv && this.isZero()) {
					throw decimalError("invalid-operation", "zero to negative power");
				}
				const e = this.powIntBig(inv ? -big : big, inv);
				return inv ? e.trim(0) : e;
			},
		);
	}

	sqrt(): Decimal {
		return withContext(
			() => `computing sqrt(${this})`,
			() => {
				if (this.isNeg()) {
					throw decimalError("invalid-operation", "square root of negative");
				}
				const halfScale = Math.trunc(this.scale / 2);
				if (this.isZero()) {
					return Decimal.safe(false, 0n, halfScale);
				}
				const dcoef = lsh(this.coef, 2 * BIG_SCALE - this.scale);
				const n = prec(dcoef) - 2 * BIG_SCALE;
				const root = bigSqrt(dcoef, pow10(Math.trunc(n / 2) + BIG_SCALE));
				return Decimal.fromCoef(false, root, BIG_SCALE, 0).trim(halfScale);
			},
		);
	}

	exp(): Decimal {
		return withContext(
			() => `computing exp(${this})`,
			() => {
				if (this.isZero()) {
					return Decimal.safe(false, 1n, 0);
				}
				if (this.cmpAbs(HUNDRED) >= 0) {
					if (!this.isNeg()) {
						throw unknownOverflowError();
					}
					return Decimal.safe(false, 0n, MAX_SCALE);
				}
				return Decimal.fromCoef(false, this.expBig(), BIG_SCALE, 0);
			},
		);
	}

	/** e^d - 1 */
	expm1(): Decimal {
		return withContext(
			() => `computing expm1(${this})`,
			() => {
				if (this.isZero()) {
					return Decimal.safe(false, 0n, 0);
				}
				if (this.cmpAbs(HUNDRED) >= 0) {
					if (!this.isNeg()) {
						throw unknownOverflowError();
					}
					return Decimal.safe(true, pow10(MAX_SCALE - 1), MAX_SCALE - 1);
				}
				const ecoef = this.expBig();
				const unit = pow10(BIG_SCALE);
				return Decimal.fromCoef(ecoef < unit, subAbs(ecoef, unit), BIG_SCALE, 0);
			},
		);
	}

	/** Natural logarithm. */
	log(): Decimal {
		return this.logOf("log", (x) => bigLog(x));
	}

	log2(): Decimal {
		return this.logOf("log2", (x) => lsh(bigLog(x), BIG_SCALE) / LN2).trimInt();
	}

	log10(): Decimal {
		return this.logOf("log10", (x) => lsh(bigLog(x), BIG_SCALE) / LN10).trimInt();
	}

	/** ln(1 + d) */
	log1p(): Decimal {
		return withContext(
			() => `computing log1p(${this})`,
			() => {
				if (this.isNeg() && this.cmp(NEG_ONE) <= 0) {
					throw decimalError(
						"invalid-operation",
						"logarithm of a decimal less than or equal to -1",
					);
				}
				if (this.isZero()) {
					return Decimal.safe(false, 0n, 0);
				}
				const unit = pow10(this.scale);
				const x = this.isNeg()
					? pow10(BIG_SCALE + this.scale) / subAbs(this.coef, unit)
					: lsh(this.coef + unit, BIG_SCALE - this.scale);
				return Decimal.fromCoef(this.isNeg(), bigLog(x), BIG_SCALE, 0);
			},
		);
	}

	/** Compares numeric values: -1 if d < e, 0 if equal, 1 if d > e. */
	cmp(e: Decimal): -1 | 0 | 1 {
		const ds = this.sign();
		const es = e.sign();
		if (ds !== es) {
			return ds > es ? 1 : -1;
		}
		let dcoef = this.coef;
		let ecoef = e.coef;
		if (this.scale > e.scale) {
			ecoef = lsh(ecoef, this.scale - e.scale);
		} else if (this.scale < e.scale) {
			dcoef = lsh(dcoef, e.scale - this.scale);
		}
		if (dcoef === ecoef) {
			return 0;
		}
		return (dcoef > ecoef) === (ds > 0) ? 1 : -1;
	}

	cmpAbs(e: Decimal): -1 | 0 | 1 {
		return this.abs().cmp(e.abs());
	}

	/** Like cmp, but orders equal values by scale: 2.0 > 2.00. */
	cmpTotal(e: Decimal): -1 | 0 | 1 {
		const c = this.cmp(e);
		if (c !== 0) {
			return c;
		}
		if (this.scale > e.scale) {
			return -1;
		}
		return this.scale < e.scale ? 1 : 0;
	}

	equal(e: Decimal): boolean {
		return this.cmp(e) === 0;
	}

	less(e: Decimal): boolean {
		return this.cmp(e) < 0;
	}

	max(e: Decimal): Decimal {
		return this.cmpTotal(e) >= 0 ? this : e;
	}

	min(e: Decimal): Decimal {
		return this.cmpTotal(e) <= 0 ? this : e;
	}

	clamp(min: Decimal, max: Decimal): Decimal {
		if (min.cmp(max) > 0) {
			throw new DecimalError("invalid-operation", `clamping ${this}: invalid range`);
		}
		const [low, high] = min.cmpTotal(max) > 0 ? [max, min] : [min, max];
		if (this.cmpTotal(low) < 0) {
			return low;
		}
		if (this.cmpTotal(high) > 0) {
			return high;
		}
		return this;
	}

	private term(): Term {
		return { neg: this.negative, coef: this.coef, scale: this.scale };
	}

	private shrink(scale: number, shift: (coef: bigint, shift: number) => bigint): Decimal {
		if (!Number.isInteger(scale)) {
			throw decimalError("scale-range");
		}
		const target = Math.max(scale, MIN_SCALE);
		if (target >= this.scale) {
			return this;
		}
		return Decimal.unsafe(this.negative, shift(this.coef, this.scale - target), target);
	}

	private trimInt(): Decimal {
		return this.isInt() ? this.trunc(0) : this;
	}

	/** Coefficient of d at BIG_SCALE, inverted when |d| < 1. */
	private scaledAtLeastOne(): { coef: bigint; inverted: boolean } {
		if (this.withinOne()) {
			return { coef: pow10(BIG_SCALE + this.scale) / this.coef, inverted: true };
		}
		return { coef: lsh(this.coef, BIG_SCALE - this.scale), inverted: false };
	}

	private logOf(name: string, kernel: (x: bigint) => bigint): Decimal {
		return withContext(
			() => `computing ${name}(${this})`,
			() => {
				if (!this.isPos()) {
					throw decimalError("invalid-operation", "logarithm of non-positive");
				}
				if (this.isOne()) {
					return Decimal.safe(false, 0n, 0);
				}
				const { coef, inverted } = this.scaledAtLeastOne();
				return Decimal.fromCoef(inverted, kernel(coef), BIG_SCALE, 0);
			},
		);
	}

	/** e^d at BIG_SCALE for |d| < 100. */
	private expBig(): bigint {
		const ecoef = bigExp(lsh(this.coef, BIG_SCALE - this.scale));
		if (!this.isNeg()) {
			return ecoef;
		}
		if (ecoef === 0n) {
			throw unknownOverflowError();
		}
		return pow10(2 * BIG_SCALE) / ecoef;
	}

	private powBig(e: Decimal): Decimal {
		const { coef, inverted } = this.scaledAtLeastOne();
		const power = rshDown(bigLog(coef) * e.coef, e.scale);
		const inv = inverted !== e.isNeg();
		if (hasPrec(power, 3 + BIG_SCALE)) {
			if (!inv) {
				throw unknownOverflowError();
			}
			return Decimal.safe(false, 0n, MAX_SCALE);
		}
		let fcoef = bigExp(power);
		if (inv) {
			fcoef = pow10(2 * BIG_SCALE) / fcoef;
		}
		return Decimal.fromCoef(false, fcoef, BIG_SCALE, 0);
	}

	private powIntBig(power: bigint, inv: boolean): Decimal {
		let dcoef = this.coef;
		let dneg = this.negative;
		let dscale = this.scale;
		let ecoef = 1n;
		let eneg = false;
		let escale = 0;
		let rest = power;

		while (rest > 0n) {
			if (rest % 2n === 1n) {
				rest -= 1n;
				ecoef *= dcoef;
				eneg = eneg !== dneg;
				escale += dscale;
				if (escale > BIG_SCALE) {
					ecoef = rshDown(ecoef, escale - BIG_SCALE);
					escale = BIG_SCALE;
				}
				if (hasPrec(ecoef, MAX_BIG_PREC)) {
					return overflowOrZero(inv);
				}
			}
			if (rest > 0n) {
				rest /= 2n;
				dcoef *= dcoef;
				dneg = false;
				dscale *= 2;
				if (dscale > BIG_SCALE) {
					dcoef = rshDown(dcoef, dscale - BIG_SCALE);
					dscale = BIG_SCALE;
				}
				if (hasPrec(dcoef, MAX_BIG_PREC)) {
					return overflowOrZero(inv);
				}
			}
		}

		if (inv) {
			if (ecoef === 0n) {
				throw unknownOverflowError();
			}
			ecoef = pow10(BIG_SCALE + escale) / ecoef;
			escale = BIG_SCALE;
		}
		return Decimal.fromCoef(eneg, ecoef, escale, 0);
	}
}

function overflowOrZero(inv: boolean): Decimal {
	if (!inv) {
		throw unknownOverflowError();
	}
	return Decimal.of(0n, MAX_SCALE);
}

function checkScale(scale: number): void {
	if (!Number.isInteger(scale) || scale < MIN_SCALE || scale > MAX_SCALE) {
		throw decimalError("scale-range");
	}
}

function isDigit(char: string | undefined): boolean {
	return char !== undefined && char >= "0" && char <= "9";
}

function parseText(text: string, minScale: number): Decimal {
	const width = text.length;
	let pos = 0;

	let neg = false;
	if (text[pos] === "-") {
		neg = true;
		pos++;
	} else if (text[pos] === "+") {
		pos++;
	}

	let digits = "";
	let scale = 0;
	while (isDigit(text[pos])) {
		digits += text[pos];
		pos++;
	}
	if (text[pos] === ".") {
		pos++;
		while (isDigit(text[pos])) {
			digits += text[pos];
			pos++;
			scale++;
		}
	}

	let exp = 0;
	let eneg = false;
	let hasE = false;
	let hasExp = false;
	if (text[pos] === "e" || text[pos] === "E") {
		pos++;
		hasE = true;
		if (text[pos] === "-") {
			eneg = true;
			pos++;
		} else if (text[pos] === "+") {
			pos++;
		}
		while (isDigit(text[pos])) {
			exp = exp * 10 + Number(text[pos]);
			if (exp > MAX_EXPONENT) {
				throw decimalError("invalid-decimal");
			}
			pos++;
			hasExp = true;
		}
	}

	if (pos !== width) {
		throw decimalError("invalid-decimal", `unexpected character '${text[pos]}'`);
	}
	if (digits.length === 0) {
		throw decimalError("invalid-decimal", "no coefficient");
	}
	if (hasE && !hasExp) {
		throw decimalError("invalid-decimal", "no exponent");
	}

	return Decimal.fromCoef(neg, BigInt(digits), eneg ? scale + exp : scale - exp, minScale);
}

export const NEG_ONE = Decimal.of(-1);
export const ZERO = Decimal.of(0);
export const ONE = Decimal.of(1);
export const TWO = Decimal.of(2);
export const TEN = Decimal.of(10);
export const HUNDRED = Decimal.of(100);
export const THOUSAND = Decimal.of(1_000);
/** Euler's number rounded to 18 digits. */
export const E = Decimal.of(2_718_281_828_459_045_235n, 18);
/** Pi rounded to 18 digits. */
export const PI = Decimal.of(3_141_592_653_589_793_238n, 18);
