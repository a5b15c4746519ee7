/**
 * Printable instructions: project summary, color key and every numbered step, grouped by row
 */

import PDFDocument from "pdfkit";
import { getYarnPalette, type YarnPalette } from "../lib/palette/yarn.js";
import { swatchEntries, type PatternGrid } from "../engine/grid.js";
import { describeInstruction, flattenInstructions, generateSteps, type Step } from "../engine/steps.js";

export interface InstructionsPdfOptions {
    title?: string;
    /** Precomputed steps; generated from the grid when absent */
    steps?: readonly Step[];
    palette?: YarnPalette;
}

const PAGE_BOTTOM = 760;

/**
 * Renders the instructions PDF into memory
 */
export function renderInstructionsPdf(grid: PatternGrid, options: InstructionsPdfOptions = {}): Promise<Buffer> {
    const palette = options.palette ?? getYarnPalette();
    const steps = options.steps ?? generateSteps(grid);
    const instructions = flattenInstructions(steps, grid.width);
    const entries = swatchEntries(grid, palette);

    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({
            size: "A4",
            margins: { top: 50, bottom: 50, left: 50, right: 50 },
            autoFirstPage: true,
        });

        const chunks: Buffer[] = [];
        doc.on("data", (chunk: Buffer) => chunks.push(chunk));
        doc.on("end", () => resolve(Buffer.concat(chunks)));
        doc.on("error", (err: Error) => reject(err));

        // --- Summary ---
        doc.font("Helvetica-Bold")
            .fontSize(22)
            .text(options.title ?? "Stitch Pattern Instructions", 50, 50, { align: "center" });

        doc.moveTo(50, 85).lineTo(545, 85).lineWidth(1).stroke();

        doc.fontSize(10).font("Helvetica-Bold").text("SIZE:", 50, 100);
        doc.font("Helvetica").text(`${grid.width} x ${grid.height} stitches`, 140, 100);
        doc.font("Helvetica-Bold").text("COLORS:", 50, 115);
        doc.font("Helvetica").text(String(entries.length), 140, 115);
        doc.font("Helvetica-Bold").text("STEPS:", 50, 130);
        doc.font("Helvetica").text(String(instructions.length), 140, 130);

        // --- Color key ---
        doc.font("Helvetica-Bold").fontSize(12).text("COLOR KEY", 50, 160);
        let currentY = 180;
        for (const entry of entries) {
            doc.rect(50, currentY - 2, 10, 10).fillAndStroke(entry.color.hex, "#000000");
            doc.fillColor("#000000").fontSize(9).font("Helvetica");
            doc.text(`#${entry.color.id}  ${entry.color.name}`, 70, currentY, { width: 200, lineBreak: false });
            doc.text(`${entry.stitchCount} stitches`, 280, currentY, { width: 100, align: "right" });
            currentY += 16;
        }

        // --- Steps ---
        doc.addPage();
        currentY = 50;
        doc.font("Helvetica-Bold").fontSize(14).text("STEPS", 50, currentY);
        currentY += 25;

        let previousRow = -1;
        for (const instruction of instructions) {
            const needed = instruction.rowIndex !== previousRow ? 34 : 14;
            if (currentY + needed > PAGE_BOTTOM) {
                doc.addPage();
                currentY = 50;
            }

            if (instruction.rowIndex !== previousRow) {
                const way = instruction.direction === "ltr" ? "left to right" : "right to left";
                currentY += 6;
                doc.font("Helvetica-Bold").fontSize(11).fillColor("#000000")
                    .text(`Row ${instruction.rowIndex + 1} (${way})`, 50, currentY);
                currentY += 16;
                previousRow = instruction.rowIndex;
            }

            doc.font("Helvetica").fontSize(9).fillColor("#323232")
                .text(describeInstruction(instruction, palette), 65, currentY, { lineBreak: false });
            currentY += 14;
        }

        doc.end();
    });
}
