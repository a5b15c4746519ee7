/**
 * Row-by-row instructions for a pattern grid
 */

import { z } from "zod";
import { describeStep, flattenInstructions, generateSteps, type Step } from "../engine/steps.js";
import { gridProperty, gridSchema, toolFailure, toPatternGrid, type ToolFailure, type ToolDefinition } from "./schemas.js";

export const generateStepsSchema = z.object({
    grid: gridSchema,
    includeText: z.boolean().optional(),
});

export type GenerateStepsInput = z.infer<typeof generateStepsSchema>;

export type GenerateStepsOutput =
    | { ok: true; steps: Step[]; totalRuns: number; text?: string[] }
    | ToolFailure;

export function generateStepsHandler(input: GenerateStepsInput): GenerateStepsOutput {
    try {
        const grid = toPatternGrid(input.grid);
        const steps = generateSteps(grid);
        return {
            ok: true,
            steps,
            totalRuns: flattenInstructions(steps, grid.width).length,
            ...(input.includeText && { text: steps.map((step) => describeStep(step)) }),
        };
    } catch (error) {
        return toolFailure(error);
    }
}

export const generateStepsTool: ToolDefinition = {
    name: "generate_steps",
    description: "Splits a pattern grid into one step per row: runs of same-colored stitches, alternating left-to-right and right-to-left.",
    inputSchema: {
        type: "object",
        properties: {
            grid: gridProperty,
            includeText: {
                type: "boolean",
                description: "Also return one written instruction per row",
            },
        },
        required: ["grid"],
    },
};
