import { UnknownPropertyError } from "./errors.js";
import { parseHeader } from "./headers.js";
import { isNumeric, sanitize } from "./sanitize.js";
import type { CellValue, ColumnDescriptor, RawTable } from "./types.js";

export const DEFAULT_CATEGORY_COLUMN = "Category";

export interface Classification {
	/** Descriptors keyed by property name, in first header appearance order. */
	descriptors: Map<string, ColumnDescriptor>;
	/** Properties with at least one numeric cell, in descriptor order. */
	axisOptions: string[];
}

/**
 * Group headers into single-value and low/high range properties.
 *
 * A base name becomes a range only when both `<base> low` and
 * `<base> high` exist; a lone bound header stays a single property under
 * its full name. A bare `<base>` header next to a range pair is kept as
 * that range's `valueColumn`.
 */
export function classifyColumns(
	columnNames: readonly string[],
	categoryColumn: string = DEFAULT_CATEGORY_COLUMN,
): Map<string, ColumnDescriptor> {
	const tokens = columnNames
		.filter((name) => name !== categoryColumn)
		.map(parseHeader);

	const lows = new Map<string, string>();
	const highs = new Map<string, string>();
	for (const t of tokens) {
		if (t.bound === "low" && !lows.has(t.base)) lows.set(t.base, t.header);
		if (t.bound === "high" && !highs.has(t.base)) highs.set(t.base, t.header);
	}

	const descriptors = new Map<string, ColumnDescriptor>();
	for (const t of tokens) {
		const paired =
			t.bound !== undefined && lows.has(t.base) && highs.has(t.base);
		const key = paired ? t.base : t.header;
		const low = lows.get(key);
		const high = highs.get(key);

		if (low === undefined || high === undefined) {
			if (!descriptors.has(key)) {
				descriptors.set(key, {
					propertyName: key,
					kind: "single",
					sourceColumns: [key],
				});
			}
			continue;
		}

		let range = descriptors.get(key);
		if (range?.kind !== "range") {
			range = { propertyName: key, kind: "range", sourceColumns: [low, high] };
			descriptors.set(key, range);
		}
		// A bare header named after the pair's base.
		if (!paired && range.valueColumn === undefined) {
			range.valueColumn = t.header;
		}
	}
	return descriptors;
}

/** All columns a descriptor may read, value fallback included. */
export function descriptorColumns(descriptor: ColumnDescriptor): string[] {
	if (descriptor.kind === "range" && descriptor.valueColumn !== undefined) {
		return [...descriptor.sourceColumns, descriptor.valueColumn];
	}
	return [...descriptor.sourceColumns];
}

/** Column name to position. A repeated header maps to its first column. */
export function columnIndex(columns: readonly string[]): Map<string, number> {
	const index = new Map<string, number>();
	columns.forEach((name, j) => {
		if (!index.has(name)) index.set(name, j);
	});
	return index;
}

/** Cells of one column, in row order. Unknown columns read as all-missing. */
export function columnCells(table: RawTable, name: string): CellValue[] {
	const j = columnIndex(table.columns).get(name);
	if (j === undefined) return table.rows.map(() => undefined);
	return table.rows.map((row) => row[j]);
}

/**
 * Classify a table's headers and derive the axis options.
 *
 * Nothing is cached between calls: each table is scanned in full.
 */
export function classify(
	table: RawTable,
	categoryColumn: string = DEFAULT_CATEGORY_COLUMN,
): Classification {
	const descriptors = classifyColumns(table.columns, categoryColumn);
	const axisOptions: string[] = [];
	for (const descriptor of descriptors.values()) {
		const numeric = descriptorColumns(descriptor).some((name) =>
			columnCells(table, name).some((cell) => isNumeric(sanitize(cell))),
		);
		if (numeric) axisOptions.push(descriptor.propertyName);
	}
	return { descriptors, axisOptions };
}

export function requireDescriptor(
	descriptors: ReadonlyMap<string, ColumnDescriptor>,
	property: string,
): ColumnDescriptor {
	const descriptor = descriptors.get(property);
	if (!descriptor) throw new UnknownPropertyError(property);
	return descriptor;
}
