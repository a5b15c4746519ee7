/**
 * Cell recoloring without re-quantizing the image
 */

import { z } from "zod";
import { applyColorEdits, editsForRun, type ColorEditOverride } from "../engine/edits.js";
import { generateRowStep, type Step } from "../engine/steps.js";
import { gridProperty, gridSchema, toolFailure, toPatternGrid, type GridInput, type ToolFailure, type ToolDefinition } from "./schemas.js";

const editSchema = z.object({
    rowIndex: z.number(),
    columnIndex: z.number(),
    newColorId: z.number(),
});

export const applyColorEditsSchema = z.object({
    grid: gridSchema,
    edits: z.array(editSchema).optional(),
    run: z
        .object({
            rowIndex: z.number(),
            runIndex: z.number(),
            newColorId: z.number(),
        })
        .optional(),
});

export type ApplyColorEditsInput = z.infer<typeof applyColorEditsSchema>;

export type ApplyColorEditsOutput =
    | { ok: true; grid: GridInput; affectedRows: number[]; steps: Step[] }
    | ToolFailure;

export function applyColorEditsHandler(input: ApplyColorEditsInput): ApplyColorEditsOutput {
    try {
        const grid = toPatternGrid(input.grid);

        const edits: ColorEditOverride[] = [...(input.edits ?? [])];
        if (input.run) {
            edits.push(...editsForRun(grid, input.run.rowIndex, input.run.runIndex, input.run.newColorId));
        }

        const result = applyColorEdits(grid, edits);
        return {
            ok: true,
            grid: {
                width: result.grid.width,
                height: result.grid.height,
                cells: [...result.grid.cells],
                paletteIds: [...result.grid.paletteIds],
            },
            affectedRows: result.affectedRows,
            steps: result.affectedRows.map((row) => generateRowStep(result.grid, row)),
        };
    } catch (error) {
        return toolFailure(error);
    }
}

export const applyColorEditsTool: ToolDefinition = {
    name: "apply_color_edits",
    description: "Recolors individual cells (or one whole run of a row) with a color already in the grid's palette. Returns the new grid, the affected rows and their regenerated steps.",
    inputSchema: {
        type: "object",
        properties: {
            grid: gridProperty,
            edits: {
                type: "array",
                items: {
                    type: "object",
                    properties: {
                        rowIndex: { type: "number" },
                        columnIndex: { type: "number" },
                        newColorId: { type: "number" },
                    },
                    required: ["rowIndex", "columnIndex", "newColorId"],
                },
            },
            run: {
                type: "object",
                description: "Recolor one run: row, run index in reading order, and new color",
                properties: {
                    rowIndex: { type: "number" },
                    runIndex: { type: "number" },
                    newColorId: { type: "number" },
                },
                required: ["rowIndex", "runIndex", "newColorId"],
            },
        },
        required: ["grid"],
    },
};
