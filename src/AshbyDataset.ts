import {
	DEFAULT_CATEGORY_COLUMN,
	classify,
	columnCells,
	columnIndex,
	requireDescriptor,
} from "./classify.js";
import {
	assignColors,
	categoryOf,
	legendEntries,
	resolveColorOptions,
} from "./colors.js";
import type { ColorOptions } from "./colors.js";
import { AshbyError } from "./errors.js";
import { guidelinePoints } from "./guideline.js";
import { axisLabel } from "./labels.js";
import { assertCategoryColumn } from "./loaders.js";
import { consoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { parsePlotRequest } from "./request.js";
import type { PlotRequest } from "./request.js";
import { resolveRow } from "./resolve.js";
import type { RowReader } from "./resolve.js";
import { axisDomain } from "./scales.js";
import type {
	CategoryColors,
	ColumnDescriptor,
	DataMode,
	LegendEntry,
	PlotEntry,
	RawTable,
} from "./types.js";

export interface DatasetOptions extends ColorOptions {
	/** Grouping column used for colors and the legend. Default: "Category" */
	categoryColumn?: string;
	/** Receives load and build diagnostics. Default: console */
	logger?: Logger;
}

/** Everything a renderer needs to draw one Ashby plot. */
export interface PlotModel {
	entries: PlotEntry[];
	legend: LegendEntry[];
	xLabel: string;
	yLabel: string;
	/** Rounded data domain, or null when no entry survived. */
	xDomain: [number, number] | null;
	yDomain: [number, number] | null;
	log: boolean;
	mode: DataMode;
	/** Guideline polyline and its label, when requested. */
	guideline?: { points: [number, number][]; label: string };
}

interface InternalOptions extends Required<ColorOptions> {
	categoryColumn: string;
	logger: Logger;
}

/** Per-load state. Rebuilt from scratch whenever a table is loaded. */
interface LoadedState {
	table: RawTable;
	columnIndex: Map<string, number>;
	descriptors: Map<string, ColumnDescriptor>;
	axisOptions: string[];
	colors: CategoryColors;
	rowCategories: string[];
	rowColors: string[];
}

/**
 * A loaded materials table, ready to resolve any pair of properties into
 * plot entries.
 *
 * Column classification and category colors are computed once per
 * `load()` and reused by every `build()` until the next load.
 */
export class AshbyDataset {
	#opts: InternalOptions;
	#state: LoadedState;

	constructor(table: RawTable, options: DatasetOptions = {}) {
		this.#opts = {
			...resolveColorOptions(options),
			categoryColumn: options.categoryColumn ?? DEFAULT_CATEGORY_COLUMN,
			logger: options.logger ?? consoleLogger,
		};
		this.#state = this.#analyze(table);
	}

	/** Replace the loaded table, discarding all derived state. */
	load(table: RawTable): void {
		this.#state = this.#analyze(table);
	}

	get table(): RawTable {
		return this.#state.table;
	}

	get descriptors(): ReadonlyMap<string, ColumnDescriptor> {
		return this.#state.descriptors;
	}

	/** Property names selectable as an axis. */
	get axisOptions(): string[] {
		return this.#state.axisOptions.slice();
	}

	get colors(): ReadonlyMap<string, string> {
		return this.#state.colors;
	}

	get categories(): string[] {
		return Array.from(this.#state.colors.keys());
	}

	get legend(): LegendEntry[] {
		return legendEntries(this.#state.colors);
	}

	descriptor(property: string): ColumnDescriptor {
		return requireDescriptor(this.#state.descriptors, property);
	}

	/**
	 * Resolve every row against the chosen X and Y properties.
	 *
	 * Rows with no usable value on either axis are left out; the rest keep
	 * table order.
	 */
	build(x: string, y: string, mode: DataMode = "mix"): PlotEntry[] {
		const { table, columnIndex, rowCategories, rowColors } = this.#state;
		const xDescriptor = this.descriptor(x);
		const yDescriptor = this.descriptor(y);

		const entries: PlotEntry[] = [];
		table.rows.forEach((cells, i) => {
			const read: RowReader = (column) => {
				const j = columnIndex.get(column);
				return j === undefined ? undefined : cells[j];
			};
			const primitive = resolveRow(read, xDescriptor, yDescriptor, mode);
			if (!primitive) return;
			entries.push({
				row: i,
				category: rowCategories[i],
				color: rowColors[i],
				primitive,
			});
		});

		this.#opts.logger.debug(
			`Built ${entries.length} entries for "${x}" vs "${y}" (${mode}), ` +
				`${table.rows.length - entries.length} rows skipped`,
		);
		return entries;
	}

	/** Validate a plot request and assemble the full plot model. */
	plot(request: PlotRequest): PlotModel {
		const req = parsePlotRequest(request);
		const entries = this.build(req.x, req.y, req.mode);
		const xDomain = axisDomain(entries, "x", req.log);
		const yDomain = axisDomain(entries, "y", req.log);
		if (entries.length > 0 && (!xDomain || !yDomain)) {
			this.#opts.logger.warn(
				`No positive extent for "${req.x}" vs "${req.y}" on log axes`,
			);
		}

		const model: PlotModel = {
			entries,
			legend: this.legend,
			xLabel: axisLabel(req.x, req.xUnit),
			yLabel: axisLabel(req.y, req.yUnit),
			xDomain,
			yDomain,
			log: req.log,
			mode: req.mode,
		};
		if (req.guideline) {
			model.guideline = {
				points: guidelinePoints(req.guideline, req.log),
				label: req.guideline.label,
			};
		}
		return model;
	}

	#analyze(table: RawTable): LoadedState {
		const { categoryColumn, saturation, value, singleColor } = this.#opts;
		assertCategoryColumn(table, categoryColumn);

		const { descriptors, axisOptions } = classify(table, categoryColumn);
		const categoryCells = columnCells(table, categoryColumn);
		const colors = assignColors(categoryCells, {
			saturation,
			value,
			singleColor,
		});
		const rowCategories = categoryCells.map(categoryOf);
		const rowColors = rowCategories.map((category) => {
			const color = colors.get(category);
			if (color === undefined) {
				throw new AshbyError(`Category "${category}" has no color`);
			}
			return color;
		});

		if (axisOptions.length === 0) {
			this.#opts.logger.warn("Table has no numeric property columns");
		}
		this.#opts.logger.debug(
			`Loaded ${table.rows.length} rows: ${descriptors.size} properties, ` +
				`${axisOptions.length} axis options, ${colors.size} categories`,
		);

		return {
			table,
			columnIndex: columnIndex(table.columns),
			descriptors,
			axisOptions,
			colors,
			rowCategories,
			rowColors,
		};
	}
}
