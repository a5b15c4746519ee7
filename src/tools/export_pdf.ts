/**
 * Printable instructions for a pattern
 */

import { z } from "zod";
import { renderInstructionsPdf } from "../export/pdf.js";
import { gridProperty, gridSchema, toolFailure, toPatternGrid, type ToolFailure, type ToolDefinition } from "./schemas.js";

export const exportPdfSchema = z.object({
    grid: gridSchema,
    title: z.string().optional(),
});

export type ExportPdfInput = z.infer<typeof exportPdfSchema>;

export type ExportPdfOutput =
    | { ok: true; byteLength: number; pdfBase64: string }
    | ToolFailure;

export async function exportPdfHandler(input: ExportPdfInput): Promise<ExportPdfOutput> {
    try {
        const pdf = await renderInstructionsPdf(toPatternGrid(input.grid), { title: input.title });
        return { ok: true, byteLength: pdf.length, pdfBase64: pdf.toString("base64") };
    } catch (error) {
        return toolFailure(error);
    }
}

export const exportPdfTool: ToolDefinition = {
    name: "export_pdf",
    description: "Generates a PDF with the pattern summary, color key and every numbered step grouped by row.",
    inputSchema: {
        type: "object",
        properties: {
            grid: gridProperty,
            title: {
                type: "string",
                description: "Document title (default: 'Stitch Pattern Instructions')",
            },
        },
        required: ["grid"],
    },
};
