import { describe, expect, it } from "vitest";
import { guidelinePoints } from "../src/guideline.js";

describe("guidelinePoints", () => {
	it("samples a power law on log axes", () => {
		expect(
			guidelinePoints({ power: 2, xMin: 1, xMax: 5, intercept: 3 }),
		).toEqual([
			[1, 3],
			[2, 12],
			[3, 27],
			[4, 48],
			[5, 75],
		]);
	});

	it("samples a straight line on linear axes", () => {
		expect(
			guidelinePoints(
				{ power: -1, xMin: 0, xMax: 10, intercept: 10, samples: 3 },
				false,
			),
		).toEqual([
			[0, 10],
			[5, 5],
			[10, 0],
		]);
	});

	it("always includes both ends", () => {
		const points = guidelinePoints({
			power: 1,
			xMin: 0.1,
			xMax: 0.7,
			intercept: 1,
			samples: 1,
		});
		expect(points).toHaveLength(2);
		expect(points[0][0]).toBe(0.1);
		expect(points[1][0]).toBe(0.7);
	});
});
