import { tableFromIPC } from "apache-arrow";
import Papa from "papaparse";
import { DEFAULT_CATEGORY_COLUMN } from "./classify.js";
import { MissingCategoryColumnError } from "./errors.js";
import type { ArrowTable, CellValue, RawTable } from "./types.js";

export interface LoadOptions {
	/** Grouping column that must be present. Default: "Category" */
	categoryColumn?: string;
}

/** Throw unless the table has the grouping column. */
export function assertCategoryColumn(
	table: RawTable,
	categoryColumn: string = DEFAULT_CATEGORY_COLUMN,
): RawTable {
	if (!table.columns.includes(categoryColumn)) {
		throw new MissingCategoryColumnError(categoryColumn);
	}
	return table;
}

/**
 * Make headers unique: the second "Density" becomes "Density.1", the third
 * "Density.2", skipping names already taken.
 */
export function dedupeHeaders(headers: readonly string[]): string[] {
	const taken = new Set(headers);
	const counts = new Map<string, number>();
	return headers.map((name) => {
		const seen = counts.get(name) ?? 0;
		counts.set(name, seen + 1);
		if (seen === 0) return name;
		let n = seen;
		let renamed = `${name}.${n}`;
		while (taken.has(renamed)) renamed = `${name}.${++n}`;
		taken.add(renamed);
		counts.set(name, n + 1);
		return renamed;
	});
}

/**
 * Parse CSV text. The first non-empty line holds the headers; cells stay
 * as text and are sanitized later. Repeated headers get a ".n" suffix.
 */
export function tableFromCsv(
	text: string,
	options: LoadOptions = {},
): RawTable {
	const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true });
	const [header = [], ...body] = parsed.data;
	const columns = dedupeHeaders(
		header.map((h, j) => h.trim() || `Column_${j + 1}`),
	);
	const rows = body.map((cells) =>
		columns.map((_, j): CellValue => cells[j] ?? null),
	);
	return assertCategoryColumn({ columns, rows }, options.categoryColumn);
}

/**
 * Build a table from row objects. Columns default to the keys of all
 * records in first-seen order.
 */
export function tableFromRecords(
	records: readonly Record<string, CellValue>[],
	options: LoadOptions & { columns?: string[] } = {},
): RawTable {
	let columns = options.columns;
	if (!columns) {
		const seen = new Set<string>();
		for (const record of records) {
			for (const key of Object.keys(record)) seen.add(key);
		}
		columns = Array.from(seen);
	}
	const names = columns;
	const rows = records.map((record) => names.map((name) => record[name]));
	return assertCategoryColumn({ columns: names, rows }, options.categoryColumn);
}

function toCell(value: unknown): CellValue {
	switch (typeof value) {
		case "string":
		case "number":
		case "bigint":
		case "boolean":
			return value;
		case "undefined":
			return null;
		default:
			return value === null ? null : String(value);
	}
}

/**
 * Load every column of an Arrow table (apache-arrow or compatible).
 */
export function tableFromArrow(
	table: ArrowTable,
	options: LoadOptions = {},
): RawTable {
	const columns = table.schema.fields.map((f) => f.name);
	const vectors = columns.map((name) => {
		const col = table.getChild(name);
		if (!col) {
			throw new Error(`Column "${name}" not found in Arrow table`);
		}
		return col;
	});
	const rows: CellValue[][] = [];
	for (let i = 0; i < table.numRows; i++) {
		rows.push(vectors.map((v) => toCell(v.get(i))));
	}
	return assertCategoryColumn({ columns, rows }, options.categoryColumn);
}

/** Decode Arrow IPC bytes (file or stream format). */
export function tableFromArrowIPC(
	bytes: Uint8Array,
	options: LoadOptions = {},
): RawTable {
	return tableFromArrow(tableFromIPC(bytes), options);
}
