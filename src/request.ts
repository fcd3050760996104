import { z } from "zod";
import { InvalidPlotRequestError } from "./errors.js";

export const DataModeSchema = z.enum(["mix", "ranges", "values"]);

export const GuidelineSchema = z
	.object({
		power: z.number().finite(),
		xMin: z.number().finite(),
		xMax: z.number().finite(),
		intercept: z.number().finite(),
		samples: z.number().int().min(2).max(1000).default(5),
		label: z.string().default(""),
	})
	.refine((g) => g.xMin < g.xMax, {
		message: "xMin must be less than xMax",
		path: ["xMax"],
	});

/** Axis choices and display settings coming from a UI. */
export const PlotRequestSchema = z
	.object({
		x: z.string().min(1),
		y: z.string().min(1),
		/** Free-text units, only used as label suffixes. */
		xUnit: z.string().default(""),
		yUnit: z.string().default(""),
		mode: DataModeSchema.default("mix"),
		log: z.boolean().default(true),
		guideline: GuidelineSchema.optional(),
	})
	.refine((r) => !r.log || !r.guideline || r.guideline.xMin > 0, {
		message: "xMin must be positive on log axes",
		path: ["guideline", "xMin"],
	});

export type PlotRequest = z.input<typeof PlotRequestSchema>;
export type ParsedPlotRequest = z.output<typeof PlotRequestSchema>;

export function parsePlotRequest(input: unknown): ParsedPlotRequest {
	const result = PlotRequestSchema.safeParse(input);
	if (!result.success) throw new InvalidPlotRequestError(result.error.issues);
	return result.data;
}
