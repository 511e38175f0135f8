export type DecimalErrorCode =
	| "overflow"
	| "invalid-decimal"
	| "scale-range"
	| "invalid-operation"
	| "division-by-zero"
	| "unsupported";

const BASE_MESSAGES: Record<Exclude<DecimalErrorCode, "unsupported">, string> = {
	overflow: "decimal overflow",
	"invalid-decimal": "invalid decimal",
	"scale-range": "scale out of range",
	"invalid-operation": "invalid operation",
	"division-by-zero": "division by zero",
};

export class DecimalError extends Error {
	constructor(
		readonly code: DecimalErrorCode,
		message: string,
	) {
		super(message);
		this.name = "DecimalError";
	}

	/** Prefixes the message with a context, keeping the code. */
	wrap(context: string): DecimalError {
		return new DecimalError(this.code, `${context}: ${this.message}`);
	}
}

export function decimalError(
	code: Exclude<DecimalErrorCode, "unsupported">,
	detail?: string,
): DecimalError {
	const base = BASE_MESSAGES[code];
	return new DecimalError(code, detail ? `${base}: ${detail}` : base);
}

export function overflowError(gotPrec: number, gotScale: number, wantScale: number): DecimalError {
	const maxDigits = 19 - wantScale;
	const gotDigits = gotPrec - gotScale;
	if (wantScale === 0) {
		return decimalError(
			"overflow",
			`the integer part of a Decimal can have at most ${maxDigits} digits, but it has ${gotDigits} digits`,
		);
	}
	return decimalError(
		"overflow",
		`with ${wantScale} significant digits after the decimal point, the integer part of a Decimal can have at most ${maxDigits} digits, but it has ${gotDigits} digits`,
	);
}

export function unknownOverflowError(): DecimalError {
	return decimalError(
		"overflow",
		"the integer part of a Decimal can have at most 19 digits, but it has significantly more digits",
	);
}

/** Runs fn and rewraps any DecimalError it throws with the given context. */
export function withContext<T>(context: string | (() => string), fn: () => T): T {
	try {
		return fn();
	} catch (error) {
		if (error instanceof DecimalError) {
			throw error.wrap(typeof context === "string" ? context : context());
		}
		throw error;
	}
}
