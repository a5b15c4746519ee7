/**
 * Pattern generation: stitch grid, color swatch and the two preview images
 */

import { z } from "zod";
import { analyze, fitGridToLongestSide } from "../engine/complexity.js";
import { buildPattern } from "../engine/grid.js";
import { SizeError } from "../lib/errors.js";
import { resolvePaletteColors } from "../lib/palette/yarn.js";
import { encodePng, type RasterImage } from "../lib/raster.js";
import { resolveImage } from "./image_cache.js";
import { imageRefProperties, imageRefShape, toolFailure, type GridInput, type ToolFailure, type ToolDefinition } from "./schemas.js";

export const buildPatternSchema = z.object({
    ...imageRefShape,
    gridWidth: z.number().optional(),
    gridHeight: z.number().optional(),
    longestSide: z.number().optional(),
    colorIds: z.array(z.number().int()).min(1).optional(),
    maxColors: z.number().int().positive().optional(),
    method: z.enum(["median-cut", "kmeans"]).optional(),
    seed: z.number().int().optional(),
    includeImages: z.boolean().optional(),
});

export type BuildPatternInput = z.infer<typeof buildPatternSchema>;

export interface SwatchColorOutput {
    id: number;
    name: string;
    hex: string;
    stitchCount: number;
}

export type BuildPatternOutput =
    | {
          ok: true;
          grid: GridInput;
          colors: SwatchColorOutput[];
          gridPngBase64?: string;
          palettePngBase64?: string;
      }
    | ToolFailure;

/**
 * Grid size from explicit sides, a longest side, or the image's recommendation
 */
function chooseSize(image: RasterImage, input: BuildPatternInput): { gridWidth: number; gridHeight: number } {
    const { gridWidth, gridHeight, longestSide } = input;
    if (gridWidth !== undefined && gridHeight !== undefined) {
        return { gridWidth, gridHeight };
    }
    if (gridWidth !== undefined || gridHeight !== undefined) {
        throw new SizeError("Provide both gridWidth and gridHeight, or longestSide");
    }
    if (longestSide !== undefined) {
        return fitGridToLongestSide(image.width, image.height, longestSide);
    }
    const { recommendation } = analyze(image);
    return { gridWidth: recommendation.gridWidth, gridHeight: recommendation.gridHeight };
}

async function toBase64Png(image: RasterImage): Promise<string> {
    return (await encodePng(image)).toString("base64");
}

export async function buildPatternHandler(input: BuildPatternInput): Promise<BuildPatternOutput> {
    const { colorIds, maxColors, method, seed, includeImages = true } = input;

    try {
        const image = await resolveImage(input);
        const { gridWidth, gridHeight } = chooseSize(image, input);

        const result = await buildPattern(image, gridWidth, gridHeight, {
            colors: colorIds ? resolvePaletteColors(colorIds) : undefined,
            maxColors,
            method,
            seed,
        });

        const { grid } = result;
        return {
            ok: true,
            grid: { width: grid.width, height: grid.height, cells: [...grid.cells], paletteIds: [...grid.paletteIds] },
            colors: result.colors.map((entry) => ({
                id: entry.color.id,
                name: entry.color.name,
                hex: entry.color.hex,
                stitchCount: entry.stitchCount,
            })),
            ...(includeImages && {
                gridPngBase64: await toBase64Png(result.gridImage),
                palettePngBase64: await toBase64Png(result.paletteImage),
            }),
        };
    } catch (error) {
        return toolFailure(error);
    }
}

export const buildPatternTool: ToolDefinition = {
    name: "build_pattern",
    description: "Converts an image into a stitch grid of yarn colors. Returns the grid, the color swatch with stitch counts, and PNG previews of the grid and swatch.",
    inputSchema: {
        type: "object",
        properties: {
            ...imageRefProperties,
            gridWidth: {
                type: "number",
                description: "Stitches per row (1-400); requires gridHeight",
            },
            gridHeight: {
                type: "number",
                description: "Number of rows (1-400); requires gridWidth",
            },
            longestSide: {
                type: "number",
                description: "Stitches along the longest side; the other side follows the image's aspect ratio",
            },
            colorIds: {
                type: "array",
                items: { type: "number" },
                description: "Yarn colors to use; suggested from the image when absent",
            },
            maxColors: {
                type: "number",
                description: "Maximum number of suggested colors (default: 10)",
            },
            method: {
                type: "string",
                enum: ["median-cut", "kmeans"],
                description: "Color quantization method (default: median-cut)",
            },
            seed: {
                type: "number",
                description: "Seed for k-means initialization (default: 42)",
            },
            includeImages: {
                type: "boolean",
                description: "Include base64 PNG previews (default: true)",
            },
        },
    },
};
