import { describe, expect, it } from "vitest";
import { InvalidPlotRequestError } from "../src/errors.js";
import { axisLabel } from "../src/labels.js";
import { parsePlotRequest } from "../src/request.js";

describe("parsePlotRequest", () => {
	it("fills in defaults", () => {
		expect(parsePlotRequest({ x: "Density", y: "Young Modulus" })).toEqual({
			x: "Density",
			y: "Young Modulus",
			xUnit: "",
			yUnit: "",
			mode: "mix",
			log: true,
		});
	});

	it("defaults guideline samples and label", () => {
		const req = parsePlotRequest({
			x: "Density",
			y: "Young Modulus",
			guideline: { power: 1, xMin: 10, xMax: 1000, intercept: 0.01 },
		});
		expect(req.guideline).toEqual({
			power: 1,
			xMin: 10,
			xMax: 1000,
			intercept: 0.01,
			samples: 5,
			label: "",
		});
	});

	it("rejects an unknown mode", () => {
		expect(() =>
			parsePlotRequest({ x: "Density", y: "Cost", mode: "both" }),
		).toThrow(InvalidPlotRequestError);
	});

	it("requires a positive guideline start on log axes", () => {
		const guideline = { power: -1, xMin: 0, xMax: 10, intercept: 1 };
		expect(() =>
			parsePlotRequest({ x: "Density", y: "Cost", guideline }),
		).toThrow(
			"Invalid plot request: guideline.xMin: xMin must be positive on log axes",
		);
		expect(
			parsePlotRequest({ x: "Density", y: "Cost", log: false, guideline })
				.guideline?.xMin,
		).toBe(0);
	});

	it("reports the failing field", () => {
		expect(() =>
			parsePlotRequest({
				x: "Density",
				y: "Cost",
				guideline: { power: 1, xMin: 5, xMax: 1, intercept: 1 },
			}),
		).toThrow(
			"Invalid plot request: guideline.xMax: xMin must be less than xMax",
		);
	});
});

describe("axisLabel", () => {
	it("appends a unit when present", () => {
		expect(axisLabel("Density", "kg/m^3")).toBe("Density, kg/m^3");
		expect(axisLabel("Poisson", "  ")).toBe("Poisson");
		expect(axisLabel("Poisson")).toBe("Poisson");
	});
});
