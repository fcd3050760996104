import { scaleLinear, scaleLog } from "d3-scale";
import type { ScaleLinear, ScaleLogarithmic } from "d3-scale";
import type { PlotEntry, PlotPrimitive } from "./types.js";

export type Axis = "x" | "y";

export type Scale =
	| ScaleLinear<number, number, never>
	| ScaleLogarithmic<number, number, never>;

/** Lowest and highest data coordinate a primitive covers on one axis. */
export function primitiveExtent(
	primitive: PlotPrimitive,
	axis: Axis,
): [number, number] {
	if (primitive.type === "point") {
		const v = axis === "x" ? primitive.x : primitive.y;
		return [v, v];
	}
	const c = axis === "x" ? primitive.xCenter : primitive.yCenter;
	const r = axis === "x" ? primitive.xRadius : primitive.yRadius;
	return [c - r, c + r];
}

/**
 * Fit a rounded axis domain around the built entries.
 *
 * On a log axis, extents at or below zero are left out. A single value is
 * widened by one decade (log) or one unit (linear) each way. Returns
 * `null` when nothing remains to fit.
 */
export function axisDomain(
	entries: readonly PlotEntry[],
	axis: Axis,
	log = false,
): [number, number] | null {
	let min = Infinity;
	let max = -Infinity;
	for (const { primitive } of entries) {
		for (const v of primitiveExtent(primitive, axis)) {
			if (log && v <= 0) continue;
			if (v < min) min = v;
			if (v > max) max = v;
		}
	}
	if (min > max) return null;
	if (min === max) return log ? [min / 10, max * 10] : [min - 1, max + 1];

	const [lo, hi] = log
		? scaleLog().domain([min, max]).nice().domain()
		: scaleLinear().domain([min, max]).nice().domain();
	return [lo, hi];
}

/** Map a data domain onto a pixel range, logarithmically or linearly. */
export function axisScale(
	domain: [number, number],
	range: [number, number],
	log = false,
): Scale {
	return log
		? scaleLog().domain(domain).range(range)
		: scaleLinear().domain(domain).range(range);
}
