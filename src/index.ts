export type { DatasetOptions, PlotModel } from "./AshbyDataset.js";
export { AshbyDataset } from "./AshbyDataset.js";
export type { Classification } from "./classify.js";
export {
	DEFAULT_CATEGORY_COLUMN,
	classify,
	classifyColumns,
	requireDescriptor,
} from "./classify.js";
export type { ColorOptions } from "./colors.js";
export {
	assignColors,
	categoryOf,
	distinctCategories,
	hsvToHex,
	legendEntries,
} from "./colors.js";
export {
	AshbyError,
	InvalidPlotRequestError,
	MissingCategoryColumnError,
	UnknownPropertyError,
} from "./errors.js";
export type { Guideline } from "./guideline.js";
export { guidelinePoints } from "./guideline.js";
export type { HeaderToken } from "./headers.js";
export { parseHeader } from "./headers.js";
export { axisLabel } from "./labels.js";
export type { LoadOptions } from "./loaders.js";
export {
	tableFromArrow,
	tableFromArrowIPC,
	tableFromCsv,
	tableFromRecords,
} from "./loaders.js";
export type { Logger } from "./logger.js";
export { consoleLogger, silentLogger } from "./logger.js";
export type { ParsedPlotRequest, PlotRequest } from "./request.js";
export { PlotRequestSchema, parsePlotRequest } from "./request.js";
export type { RowReader } from "./resolve.js";
export { combineAxes, detectMode, resolveAxis, resolveRow } from "./resolve.js";
export { isNumeric, sanitize } from "./sanitize.js";
export type { Axis, Scale } from "./scales.js";
export { axisDomain, axisScale, primitiveExtent } from "./scales.js";
export type {
	ArrowTable,
	ArrowVector,
	AxisResolution,
	CategoryColors,
	CellValue,
	ColumnDescriptor,
	DataMode,
	EllipsePrimitive,
	LegendEntry,
	PlotEntry,
	PlotPrimitive,
	PointPrimitive,
	RangeDescriptor,
	RawTable,
	SanitizedValue,
	SingleDescriptor,
} from "./types.js";
