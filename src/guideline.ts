export interface Guideline {
	/** Exponent on a log plot, slope on a linear one. */
	power: number;
	xMin: number;
	xMax: number;
	/** Prefactor on a log plot, y-intercept on a linear one. */
	intercept: number;
	/** Number of evenly spaced samples. Default: 5 */
	samples?: number;
}

/**
 * Sample a material-index guideline: `y = c * x^p` on log axes,
 * `y = p * x + c` on linear axes.
 */
export function guidelinePoints(
	guideline: Guideline,
	log = true,
): [number, number][] {
	const { power, xMin, xMax, intercept } = guideline;
	const n = Math.max(2, guideline.samples ?? 5);
	const step = (xMax - xMin) / (n - 1);

	return Array.from({ length: n }, (_, i): [number, number] => {
		const x = i === n - 1 ? xMax : xMin + i * step;
		const y = log ? intercept * x ** power : power * x + intercept;
		return [x, y];
	});
}
