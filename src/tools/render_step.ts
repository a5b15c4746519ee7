/**
 * Guide image for one row of a pattern
 */

import { z } from "zod";
import { DEFAULT_COMPOSITE_SPEC, renderComposite, type HighlightRegion } from "../engine/composite.js";
import { generateRowStep, runSpan } from "../engine/steps.js";
import { encodePng } from "../lib/raster.js";
import { resolveImage } from "./image_cache.js";
import {
    gridProperty,
    gridSchema,
    imageRefProperties,
    imageRefShape,
    toolFailure,
    toPatternGrid,
    type ToolFailure,
    type ToolDefinition,
} from "./schemas.js";

export const renderStepSchema = z.object({
    ...imageRefShape,
    grid: gridSchema,
    rowIndex: z.number(),
    runIndex: z.number().optional(),
    highlight: z
        .object({
            startColumn: z.number(),
            endColumn: z.number(),
        })
        .optional(),
});

export type RenderStepInput = z.infer<typeof renderStepSchema>;

export type RenderStepOutput =
    | { ok: true; rowIndex: number; width: number; height: number; pngBase64: string }
    | ToolFailure;

export async function renderStepHandler(input: RenderStepInput): Promise<RenderStepOutput> {
    const { rowIndex, runIndex } = input;

    try {
        const grid = toPatternGrid(input.grid);
        const image = await resolveImage(input);

        let highlightRegion: HighlightRegion | undefined = input.highlight;
        if (runIndex !== undefined) {
            highlightRegion = runSpan(generateRowStep(grid, rowIndex), grid.width, runIndex);
        }

        const composite = await renderComposite(image, grid, rowIndex, { ...DEFAULT_COMPOSITE_SPEC, highlightRegion });
        const png = await encodePng(composite);

        return {
            ok: true,
            rowIndex,
            width: composite.width,
            height: composite.height,
            pngBase64: png.toString("base64"),
        };
    } catch (error) {
        return toolFailure(error);
    }
}

export const renderStepTool: ToolDefinition = {
    name: "render_step",
    description: "Renders the 800x900 guide image for one row: the photo with the row marked and a zoomed grid window with the row (or one run of it) outlined.",
    inputSchema: {
        type: "object",
        properties: {
            ...imageRefProperties,
            grid: gridProperty,
            rowIndex: {
                type: "number",
                description: "Zero-based row to highlight",
            },
            runIndex: {
                type: "number",
                description: "Highlight only this run of the row (zero-based, in reading order)",
            },
            highlight: {
                type: "object",
                description: "Columns [startColumn, endColumn) to highlight instead of the whole row",
                properties: {
                    startColumn: { type: "number" },
                    endColumn: { type: "number" },
                },
                required: ["startColumn", "endColumn"],
            },
        },
        required: ["grid", "rowIndex"],
    },
};
