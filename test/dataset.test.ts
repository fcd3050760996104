import { describe, expect, it, vi } from "vitest";
import { AshbyDataset } from "../src/AshbyDataset.js";
import { hsvToHex } from "../src/colors.js";
import {
	InvalidPlotRequestError,
	MissingCategoryColumnError,
	UnknownPropertyError,
} from "../src/errors.js";
import { tableFromCsv } from "../src/loaders.js";
import { silentLogger } from "../src/logger.js";
import type { Logger } from "../src/logger.js";
import type { RawTable } from "../src/types.js";

const materials: RawTable = {
	columns: [
		"Category",
		"Density low",
		"Density high",
		"Young Modulus",
		"Notes",
	],
	rows: [
		["Metals", 7000, 8000, 200, "steel"],
		["Foams", "~30", "", "0.01", "closed cell"],
		["Polymers", 900, 1400, "", "no modulus"],
		[1, 100, 300, 0.1, "numeric class"],
		["Metals", 2600, 2800, "70", "aluminium"],
	],
};

function dataset(table: RawTable = materials): AshbyDataset {
	return new AshbyDataset(table, { logger: silentLogger });
}

describe("AshbyDataset", () => {
	it("lists numeric properties as axis options", () => {
		expect(dataset().axisOptions).toEqual(["Density", "Young Modulus"]);
	});

	it("assigns colors in first-seen category order", () => {
		const ds = dataset();
		expect(ds.categories).toEqual(["Metals", "Foams", "Polymers", "1"]);
		expect(ds.legend).toEqual([
			["Metals", hsvToHex(0, 0.65, 0.9)],
			["Foams", hsvToHex(90, 0.65, 0.9)],
			["Polymers", hsvToHex(180, 0.65, 0.9)],
			["1", hsvToHex(270, 0.65, 0.9)],
		]);
	});

	it("builds entries in row order, skipping unusable rows", () => {
		const entries = dataset().build("Density", "Young Modulus");
		expect(entries.map((e) => e.row)).toEqual([0, 1, 3, 4]);
		expect(entries[0]).toEqual({
			row: 0,
			category: "Metals",
			color: hsvToHex(0, 0.65, 0.9),
			primitive: {
				type: "ellipse",
				xCenter: 7500,
				yCenter: 200,
				xRadius: 500,
				yRadius: 0,
			},
		});
		expect(entries[1].primitive).toEqual({ type: "point", x: 30, y: 0.01 });
		expect(entries[2].category).toBe("1");
	});

	it("gives every entry its category color", () => {
		const ds = dataset();
		for (const entry of ds.build("Density", "Young Modulus")) {
			expect(entry.color).toBe(ds.colors.get(entry.category));
		}
	});

	it("is deterministic across builds", () => {
		const ds = dataset();
		expect(ds.build("Young Modulus", "Density")).toEqual(
			ds.build("Young Modulus", "Density"),
		);
	});

	it("honours the data mode", () => {
		const entries = dataset().build("Density", "Density", "values");
		expect(entries).toEqual([]);
	});

	it("throws for a property without a descriptor", () => {
		expect(() => dataset().build("Density", "Cost")).toThrow(
			UnknownPropertyError,
		);
	});

	it("requires the category column", () => {
		expect(() =>
			dataset({ columns: ["Density"], rows: [[1]] }),
		).toThrow(MissingCategoryColumnError);
	});

	it("uses a custom category column", () => {
		const ds = new AshbyDataset(
			{ columns: ["Class", "Density"], rows: [["Foams", 30]] },
			{ categoryColumn: "Class", logger: silentLogger },
		);
		expect(ds.axisOptions).toEqual(["Density"]);
		expect(ds.legend).toEqual([["Foams", "#1f77b4"]]);
	});

	it("discards previous state on reload", () => {
		const ds = dataset();
		ds.load({
			columns: ["Category", "Cost"],
			rows: [
				["Woods", "~2"],
				["Woods", "n/a"],
			],
		});
		expect(ds.axisOptions).toEqual(["Cost"]);
		expect(ds.categories).toEqual(["Woods"]);
		expect(() => ds.descriptor("Density")).toThrow(UnknownPropertyError);
		expect(ds.build("Cost", "Cost")).toEqual([
			{
				row: 0,
				category: "Woods",
				color: "#1f77b4",
				primitive: { type: "point", x: 2, y: 2 },
			},
		]);
	});

	it("builds from every offered axis when a CSV header repeats", () => {
		const ds = dataset(
			tableFromCsv(
				"Category,Density,Density,Cost\nMetals,7800,n/a,1\nFoams,30,,2\n",
			),
		);
		expect(ds.axisOptions).toEqual(["Density", "Cost"]);
		expect(ds.build("Density", "Cost").map((e) => e.primitive)).toEqual([
			{ type: "point", x: 7800, y: 1 },
			{ type: "point", x: 30, y: 2 },
		]);
	});

	it("reads the first of repeated columns in a raw table", () => {
		const ds = dataset({
			columns: ["Category", "Density", "Density"],
			rows: [["Metals", 7800, "n/a"]],
		});
		expect(ds.axisOptions).toEqual(["Density"]);
		expect(ds.build("Density", "Density").map((e) => e.primitive)).toEqual([
			{ type: "point", x: 7800, y: 7800 },
		]);
	});

	it("falls back to defaults for options passed as undefined", () => {
		const ds = new AshbyDataset(
			{ columns: ["Category"], rows: [["a"], ["b"]] },
			{
				logger: undefined,
				categoryColumn: undefined,
				saturation: undefined,
				value: undefined,
				singleColor: undefined,
			},
		);
		expect(ds.legend).toEqual([
			["a", hsvToHex(0, 0.65, 0.9)],
			["b", hsvToHex(180, 0.65, 0.9)],
		]);
	});

	it("logs build counts", () => {
		const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
		const ds = new AshbyDataset(materials, { logger });
		ds.build("Density", "Young Modulus");
		expect(logger.debug).toHaveBeenLastCalledWith(
			'Built 4 entries for "Density" vs "Young Modulus" (mix), 1 rows skipped',
		);
	});

	it("warns when a table has no numeric columns", () => {
		const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
		new AshbyDataset(
			{ columns: ["Category", "Notes"], rows: [["Metals", "steel"]] },
			{ logger },
		);
		expect(logger.warn).toHaveBeenCalledWith(
			"Table has no numeric property columns",
		);
	});
});

describe("AshbyDataset.plot", () => {
	it("assembles labels, domains and legend", () => {
		const model = dataset().plot({
			x: "Density",
			y: "Young Modulus",
			xUnit: "kg/m^3",
			yUnit: "GPa",
		});
		expect(model.xLabel).toBe("Density, kg/m^3");
		expect(model.yLabel).toBe("Young Modulus, GPa");
		expect(model.mode).toBe("mix");
		expect(model.log).toBe(true);
		expect(model.entries).toHaveLength(4);
		expect(model.xDomain).toEqual([10, 10000]);
		expect(model.yDomain).toEqual([0.01, 1000]);
		expect(model.legend).toHaveLength(4);
		expect(model.guideline).toBeUndefined();
	});

	it("samples a requested guideline", () => {
		const model = dataset().plot({
			x: "Density",
			y: "Young Modulus",
			log: false,
			guideline: { power: 2, xMin: 0, xMax: 4, intercept: 1, label: "E/ρ" },
		});
		expect(model.guideline).toEqual({
			points: [
				[0, 1],
				[1, 3],
				[2, 5],
				[3, 7],
				[4, 9],
			],
			label: "E/ρ",
		});
	});

	it("rejects malformed requests", () => {
		expect(() => dataset().plot({ x: "", y: "Density" })).toThrow(
			InvalidPlotRequestError,
		);
	});
});
