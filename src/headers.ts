import type { Bound } from "./types.js";

export interface HeaderToken {
	/** The header exactly as it appears in the table. */
	header: string;
	/** Property name with any bound suffix removed. */
	base: string;
	bound?: Bound;
}

const BOUND_SUFFIXES: [Bound, string][] = [
	["low", " low"],
	["high", " high"],
];

/**
 * Split a header into its property base and optional bound.
 *
 * Only a single space followed by a lowercase `low` or `high` counts as a
 * bound suffix. "Density Low", "Density  low" and "Densitylow" are plain
 * headers whose base is the whole string.
 */
export function parseHeader(header: string): HeaderToken {
	for (const [bound, suffix] of BOUND_SUFFIXES) {
		if (!header.endsWith(suffix)) continue;
		const base = header.slice(0, -suffix.length);
		if (base.length === 0 || base !== base.trimEnd()) break;
		return { header, base, bound };
	}
	return { header, base: header };
}

