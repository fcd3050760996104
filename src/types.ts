/** A raw spreadsheet cell as handed over by a table loader. */
export type CellValue = string | number | bigint | boolean | null | undefined;

export interface RawTable {
	/** Column headers, in file order. */
	columns: string[];
	/** Row-major cells, each row aligned to `columns`. */
	rows: CellValue[][];
}

/** A cleaned cell: a finite number, or `null` when missing. */
export type SanitizedValue = number | null;

export type ColumnKind = "single" | "range";

export type Bound = "low" | "high";

export interface SingleDescriptor {
	propertyName: string;
	kind: "single";
	sourceColumns: [string];
}

export interface RangeDescriptor {
	propertyName: string;
	kind: "range";
	/** `[low, high]` column names. */
	sourceColumns: [string, string];
	/** Bare `<property>` column, used in mix mode when both bounds are missing. */
	valueColumn?: string;
}

export type ColumnDescriptor = SingleDescriptor | RangeDescriptor;

/**
 * How rows are resolved:
 * - "mix": ranges where present, single values otherwise.
 * - "ranges": only low/high columns.
 * - "values": only single-value columns.
 */
export type DataMode = "mix" | "ranges" | "values";

export type AxisResolution =
	| { type: "point"; value: number }
	| { type: "interval"; low: number; high: number }
	| { type: "unusable" };

export interface PointPrimitive {
	readonly type: "point";
	readonly x: number;
	readonly y: number;
}

export interface EllipsePrimitive {
	readonly type: "ellipse";
	readonly xCenter: number;
	readonly yCenter: number;
	readonly xRadius: number;
	readonly yRadius: number;
}

export type PlotPrimitive = PointPrimitive | EllipsePrimitive;

export interface PlotEntry {
	/** Index of the source row in the loaded table. */
	row: number;
	category: string;
	/** Hex color string. */
	color: string;
	primitive: PlotPrimitive;
}

/** Ordered category to hex color mapping, in first-seen order. */
export type CategoryColors = Map<string, string>;

/** Legend entries: [label, hexColor] */
export type LegendEntry = [string, string];

/** Minimal structural view of an Arrow vector. */
export interface ArrowVector {
	length: number;
	get(index: number): unknown;
}

/** Minimal structural view of an Arrow table (apache-arrow or compatible). */
export interface ArrowTable {
	numRows: number;
	schema: { fields: { name: string }[] };
	getChild(name: string): ArrowVector | null;
}
