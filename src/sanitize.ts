import type { CellValue, SanitizedValue } from "./types.js";

/** Leading marker for approximate values, e.g. "~6". */
export const APPROX_MARKER = "~";

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Normalize one cell to a finite number, or `null` when the cell is blank
 * or not numeric. Never throws.
 */
export function sanitize(raw: CellValue): SanitizedValue {
	switch (typeof raw) {
		case "number":
			return Number.isFinite(raw) ? raw : null;
		case "bigint": {
			const n = Number(raw);
			return Number.isFinite(n) ? n : null;
		}
		case "string":
			return parseDecimal(raw);
		default:
			return null;
	}
}

function parseDecimal(text: string): SanitizedValue {
	let s = text.trim();
	if (s.startsWith(APPROX_MARKER)) {
		s = s.slice(APPROX_MARKER.length).trim();
	}
	if (!DECIMAL.test(s)) return null;
	const n = Number(s);
	return Number.isFinite(n) ? n : null;
}

export function isNumeric(value: SanitizedValue): value is number {
	return value !== null;
}
