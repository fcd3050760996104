import { hsl } from "d3-color";
import { schemeCategory10 } from "d3-scale-chromatic";
import type { CategoryColors, CellValue, LegendEntry } from "./types.js";

export interface ColorOptions {
	/** HSV saturation (0-1). Default: 0.65 */
	saturation?: number;
	/** HSV value (0-1). Default: 0.9 */
	value?: number;
	/** Color for a lone category. Default: d3 category10 blue */
	singleColor?: string;
}

export const DEFAULT_COLOR_OPTIONS: Required<ColorOptions> = {
	saturation: 0.65,
	value: 0.9,
	singleColor: schemeCategory10[0],
};

export function resolveColorOptions(
	options: ColorOptions = {},
): Required<ColorOptions> {
	return {
		saturation: options.saturation ?? DEFAULT_COLOR_OPTIONS.saturation,
		value: options.value ?? DEFAULT_COLOR_OPTIONS.value,
		singleColor: options.singleColor ?? DEFAULT_COLOR_OPTIONS.singleColor,
	};
}

/** Text form of a grouping cell. `1` and `"1"` give the same category. */
export function categoryOf(raw: CellValue): string {
	if (raw === null || raw === undefined) return "";
	return String(raw).trim();
}

/** Distinct categories in first-seen order. */
export function distinctCategories(values: Iterable<CellValue>): string[] {
	const seen = new Set<string>();
	const ordered: string[] = [];
	for (const raw of values) {
		const category = categoryOf(raw);
		if (seen.has(category)) continue;
		seen.add(category);
		ordered.push(category);
	}
	return ordered;
}

/** Convert an HSV triple (hue in degrees, s and v in 0-1) to a hex string. */
export function hsvToHex(h: number, s: number, v: number): string {
	const l = v * (1 - s / 2);
	const sl = l === 0 || l === 1 ? 0 : (v - l) / Math.min(l, 1 - l);
	return hsl(h, sl, l).formatHex();
}

/**
 * Give every distinct category a color, spacing hues evenly around the
 * wheel in order of first appearance.
 */
export function assignColors(
	values: Iterable<CellValue>,
	options: ColorOptions = {},
): CategoryColors {
	const opts = resolveColorOptions(options);
	const categories = distinctCategories(values);
	const n = categories.length;
	const colors: CategoryColors = new Map();
	if (n === 1) {
		colors.set(categories[0], opts.singleColor);
		return colors;
	}
	categories.forEach((category, i) => {
		colors.set(category, hsvToHex((i * 360) / n, opts.saturation, opts.value));
	});
	return colors;
}

export function legendEntries(colors: CategoryColors): LegendEntry[] {
	return Array.from(colors, ([label, color]): LegendEntry => [label, color]);
}
