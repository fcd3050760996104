import { isNumeric, sanitize } from "./sanitize.js";
import type {
	AxisResolution,
	CellValue,
	ColumnDescriptor,
	DataMode,
	EllipsePrimitive,
	PlotPrimitive,
	PointPrimitive,
	SanitizedValue,
} from "./types.js";

/** Read cells by column name from one row. */
export type RowReader = (column: string) => CellValue;

const UNUSABLE: AxisResolution = { type: "unusable" };

function fromBounds(low: SanitizedValue, high: SanitizedValue): AxisResolution {
	if (isNumeric(low) && isNumeric(high)) {
		if (low === high) return { type: "point", value: low };
		return low < high
			? { type: "interval", low, high }
			: { type: "interval", low: high, high: low };
	}
	if (isNumeric(low)) return { type: "point", value: low };
	if (isNumeric(high)) return { type: "point", value: high };
	return UNUSABLE;
}

function fromValue(value: SanitizedValue): AxisResolution {
	return isNumeric(value) ? { type: "point", value } : UNUSABLE;
}

/**
 * Resolve one axis of one row.
 *
 * Equal bounds collapse to a point; reversed bounds are swapped.
 */
export function resolveAxis(
	read: RowReader,
	descriptor: ColumnDescriptor,
	mode: DataMode = "mix",
): AxisResolution {
	if (descriptor.kind === "single") {
		return mode === "ranges"
			? UNUSABLE
			: fromValue(sanitize(read(descriptor.sourceColumns[0])));
	}

	const { sourceColumns, valueColumn } = descriptor;
	const fallback = (): AxisResolution =>
		valueColumn === undefined
			? UNUSABLE
			: fromValue(sanitize(read(valueColumn)));

	switch (mode) {
		case "values":
			return fallback();
		case "ranges":
			return fromBounds(
				sanitize(read(sourceColumns[0])),
				sanitize(read(sourceColumns[1])),
			);
		case "mix": {
			const bounds = fromBounds(
				sanitize(read(sourceColumns[0])),
				sanitize(read(sourceColumns[1])),
			);
			return bounds.type === "unusable" ? fallback() : bounds;
		}
	}
}

function center(axis: Exclude<AxisResolution, { type: "unusable" }>): number {
	return axis.type === "point" ? axis.value : (axis.low + axis.high) / 2;
}

function radius(axis: Exclude<AxisResolution, { type: "unusable" }>): number {
	return axis.type === "point" ? 0 : (axis.high - axis.low) / 2;
}

/** Combine two axis resolutions. `null` means the row is skipped. */
export function combineAxes(
	x: AxisResolution,
	y: AxisResolution,
): PlotPrimitive | null {
	if (x.type === "unusable" || y.type === "unusable") return null;
	if (x.type === "point" && y.type === "point") {
		const point: PointPrimitive = { type: "point", x: x.value, y: y.value };
		return Object.freeze(point);
	}
	const ellipse: EllipsePrimitive = {
		type: "ellipse",
		xCenter: center(x),
		yCenter: center(y),
		xRadius: radius(x),
		yRadius: radius(y),
	};
	return Object.freeze(ellipse);
}

export function resolveRow(
	read: RowReader,
	xDescriptor: ColumnDescriptor,
	yDescriptor: ColumnDescriptor,
	mode: DataMode = "mix",
): PlotPrimitive | null {
	return combineAxes(
		resolveAxis(read, xDescriptor, mode),
		resolveAxis(read, yDescriptor, mode),
	);
}

/**
 * Suggest a mode for an axis pair: "ranges" when both axes have low/high
 * columns, "values" when neither does, "mix" otherwise.
 */
export function detectMode(x: ColumnDescriptor, y: ColumnDescriptor): DataMode {
	if (x.kind === "range" && y.kind === "range") return "ranges";
	if (x.kind === "single" && y.kind === "single") return "values";
	return "mix";
}
