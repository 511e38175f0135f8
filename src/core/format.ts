import type { Decimal } from "./decimal.js";
import { HUNDRED } from "./decimal.js";
import { withContext } from "./errors.js";
import type { FormatDirective, FormatFlags } from "./types.js";

type Segment = { kind: "text"; text: string } | { kind: "directive"; directive: FormatDirective };

const DECIMAL_VERBS = new Set(["f", "F", "s", "S", "v", "V", "q", "Q", "k", "K"]);

/**
 * Formats a decimal with a printf-like pattern.
 *
 * | Verb       | Example | Description    |
 * | ---------- | ------- | -------------- |
 * | %f, %s, %v | 5.67    | Decimal        |
 * | %q         | "5.67"  | Quoted decimal |
 * | %k         | 567%    | Percentage     |
 *
 * Flags `+`, space, `0` and `-` work with every verb; precision only with
 * %f (default: the scale) and %k (default: the scale minus 2). Only the first
 * directive consumes the decimal.
 */
export function formatDecimal(d: Decimal, pattern: string): string {
	let used = false;
	return parsePattern(pattern)
		.map((segment) => {
			if (segment.kind === "text") {
				return segment.text;
			}
			if (used) {
				return `%!${segment.directive.verb}(MISSING)`;
			}
			used = true;
			return formatDirective(d, segment.directive);
		})
		.join("");
}

export function parsePattern(pattern: string): Segment[] {
	const segments: Segment[] = [];
	let text = "";
	let pos = 0;
	while (pos < pattern.length) {
		const char = pattern[pos];
		if (char !== "%") {
			text += char;
			pos++;
			continue;
		}
		pos++;
		if (pattern[pos] === "%") {
			text += "%";
			pos++;
			continue;
		}
		const flags: FormatFlags = { plus: false, space: false, zero: false, minus: false };
		for (; pos < pattern.length; pos++) {
			const flag = pattern[pos];
			if (flag === "+") {
				flags.plus = true;
			} else if (flag === " ") {
				flags.space = true;
			} else if (flag === "0") {
				flags.zero = true;
			} else if (flag === "-") {
				flags.minus = true;
			} else {
				break;
			}
		}
		const width = readNumber(pattern, pos);
		pos = width.end;
		let precision: number | undefined;
		if (pattern[pos] === ".") {
			const parsed = readNumber(pattern, pos + 1);
			precision = parsed.value ?? 0;
			pos = parsed.end;
		}
		const verb = pattern[pos];
		if (verb === undefined) {
			text += "%!(NOVERB)";
			break;
		}
		pos++;
		if (text) {
			segments.push({ kind: "text", text });
			text = "";
		}
		segments.push({
			kind: "directive",
			directive: { verb, flags, width: width.value, precision },
		});
	}
	if (text) {
		segments.push({ kind: "text", text });
	}
	return segments;
}

function readNumber(pattern: string, start: number): { value?: number; end: number } {
	let end = start;
	while (end < pattern.length && pattern[end] >= "0" && pattern[end] <= "9") {
		end++;
	}
	if (end === start) {
		return { end };
	}
	return { value: Number(pattern.slice(start, end)), end };
}

function formatDirective(d: Decimal, directive: FormatDirective): string {
	const { verb, flags } = directive;
	const percent = verb === "k" || verb === "K";
	const fixed = verb === "f" || verb === "F" || percent;

	let value = d;
	if (percent) {
		try {
			value = withContext("formatting percent", () => d.mul(HUNDRED));
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			return `%!${verb}(PANIC=${message})`;
		}
	}

	let tzeros = 0;
	if (fixed) {
		const defaultScale = percent ? value.scale - 2 : value.scale;
		const scale = Math.max(directive.precision ?? defaultScale, 0);
		if (scale < value.scale) {
			value = value.round(scale);
		} else {
			tzeros = scale - value.scale;
		}
	}

	const fracdigs = value.scale;
	let intdigs = Math.max(value.prec() - fracdigs, 0);
	if (value.withinOne()) {
		intdigs++;
	}
	const digits = value.coef.toString().padStart(intdigs + fracdigs, "0");
	let body = digits.slice(0, intdigs);
	if (fracdigs > 0 || tzeros > 0) {
		body += `.${digits.slice(intdigs)}${"0".repeat(tzeros)}`;
	}
	if (percent) {
		body += "%";
	}

	let sign = "";
	if (value.isNeg()) {
		sign = "-";
	} else if (flags.plus) {
		sign = "+";
	} else if (flags.space) {
		sign = " ";
	}
	const quote = verb === "q" || verb === "Q" ? '"' : "";

	const length = quote.length * 2 + sign.length + body.length;
	const padding = Math.max((directive.width ?? 0) - length, 0);
	let rendered: string;
	if (flags.minus) {
		rendered = `${quote}${sign}${body}${quote}${" ".repeat(padding)}`;
	} else if (flags.zero) {
		rendered = `${quote}${sign}${"0".repeat(padding)}${body}${quote}`;
	} else {
		rendered = `${" ".repeat(padding)}${quote}${sign}${body}${quote}`;
	}

	if (DECIMAL_VERBS.has(verb)) {
		return rendered;
	}
	return `%!${verb}(Decimal=${rendered})`;
}
