/**
 * Argument schemas shared by several tools
 */

import { z } from "zod";
import { createPatternGrid, type PatternGrid } from "../engine/grid.js";
import { isStitchError, type StitchErrorCode } from "../lib/errors.js";

/**
 * Tool definition as listed to clients
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties?: Record<string, unknown>;
        required?: string[];
    };
}

export const imageRefShape = {
    imageId: z.string().optional(),
    imageBase64: z.string().optional(),
    maxSize: z.number().int().positive().optional(),
};

export const gridSchema = z.object({
    width: z.number().int(),
    height: z.number().int(),
    cells: z.array(z.number().int()),
    paletteIds: z.array(z.number().int()),
});

export type GridInput = z.infer<typeof gridSchema>;

/**
 * JSON schema fragments for the tool definitions
 */
export const imageRefProperties = {
    imageId: {
        type: "string",
        description: "Image ID from image_register",
    },
    imageBase64: {
        type: "string",
        description: "Base64-encoded image data (alternative to imageId)",
    },
    maxSize: {
        type: "number",
        description: "Maximum dimension for image resize (only used with imageBase64)",
    },
};

export const gridProperty = {
    type: "object",
    description: "Pattern grid as returned by build_pattern",
    properties: {
        width: { type: "number" },
        height: { type: "number" },
        cells: { type: "array", items: { type: "number" }, description: "Palette ids, row-major" },
        paletteIds: { type: "array", items: { type: "number" }, description: "Colors the grid may use" },
    },
    required: ["width", "height", "cells", "paletteIds"],
};

/**
 * Rebuilds a grid from tool arguments, checking its invariants
 */
export function toPatternGrid(input: GridInput): PatternGrid {
    return createPatternGrid(input.width, input.height, input.cells, input.paletteIds);
}

/**
 * Failed tool result for an error raised by the pattern core
 */
export interface ToolFailure {
    ok: false;
    error: string;
    code: StitchErrorCode;
}

/**
 * Converts a core error into a tool result; anything else propagates
 */
export function toolFailure(error: unknown): ToolFailure {
    if (isStitchError(error)) {
        return { ok: false, error: error.message, code: error.code };
    }
    throw error;
}
