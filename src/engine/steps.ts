/**
 * Step Generator
 * Row-by-row run-length instructions in boustrophedon order: even rows left to right, odd rows right to left
 */

import { IndexError } from "../lib/errors.js";
import { getYarnPalette, type YarnPalette } from "../lib/palette/yarn.js";
import type { PatternGrid } from "./grid.js";

export type Direction = "ltr" | "rtl";

export interface Run {
    readonly colorId: number;
    readonly count: number;
}

export interface Step {
    readonly rowIndex: number;
    readonly direction: Direction;
    readonly runs: readonly Run[];
}

/**
 * One run as a numbered instruction with its position on the grid
 */
export interface StitchInstruction {
    /** 1-based, counted across all rows */
    stepNumber: number;
    rowIndex: number;
    runIndex: number;
    colorId: number;
    count: number;
    direction: Direction;
    /** Grid columns covered, half-open */
    startColumn: number;
    endColumn: number;
    isRowStart: boolean;
}

export function directionForRow(rowIndex: number): Direction {
    return rowIndex % 2 === 0 ? "ltr" : "rtl";
}

/**
 * Collapses consecutive identical ids into runs
 */
export function encodeRuns(ids: readonly number[]): Run[] {
    const runs: Run[] = [];
    let current: { colorId: number; count: number } | null = null;

    for (const colorId of ids) {
        if (current !== null && current.colorId === colorId) {
            current.count++;
        } else {
            if (current !== null) runs.push(Object.freeze(current));
            current = { colorId, count: 1 };
        }
    }
    if (current !== null) runs.push(Object.freeze(current));

    return runs;
}

/**
 * Step for a single row
 * @param rowIndex - Zero-based row, counted from the top
 * @returns Runs in working order for the row's direction
 * @throws IndexError when the row is outside the grid
 */
export function generateRowStep(grid: PatternGrid, rowIndex: number): Step {
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= grid.height) {
        throw new IndexError(`Row ${rowIndex} is outside the grid (0-${grid.height - 1})`);
    }

    const direction = directionForRow(rowIndex);
    const row = grid.cells.slice(rowIndex * grid.width, (rowIndex + 1) * grid.width);
    if (direction === "rtl") {
        row.reverse();
    }

    return Object.freeze({
        rowIndex,
        direction,
        runs: Object.freeze(encodeRuns(row)),
    });
}

/**
 * One step per row, top to bottom
 */
export function generateSteps(grid: PatternGrid): Step[] {
    const steps: Step[] = [];
    for (let row = 0; row < grid.height; row++) {
        steps.push(generateRowStep(grid, row));
    }
    return steps;
}

/**
 * Recomputes the given rows against an edited grid; other steps are reused as they are
 * @param steps - Steps for the grid before the edit
 * @param rows - Rows touched by the edit
 */
export function regenerateSteps(steps: readonly Step[], grid: PatternGrid, rows: Iterable<number>): Step[] {
    if (steps.length !== grid.height) {
        throw new IndexError(`Expected ${grid.height} steps for the grid, got ${steps.length}`);
    }
    const next = [...steps];
    for (const row of rows) {
        next[row] = generateRowStep(grid, row);
    }
    return next;
}

/**
 * Grid columns [start, end) covered by a run that begins `offset` stitches into its row
 */
export function runColumns(direction: Direction, width: number, offset: number, count: number): [number, number] {
    return direction === "ltr" ? [offset, offset + count] : [width - offset - count, width - offset];
}

/**
 * Numbers every run across the whole pattern
 */
export function flattenInstructions(steps: readonly Step[], width: number): StitchInstruction[] {
    const instructions: StitchInstruction[] = [];
    let stepNumber = 0;

    for (const step of steps) {
        let offset = 0;
        step.runs.forEach((run, runIndex) => {
            const [startColumn, endColumn] = runColumns(step.direction, width, offset, run.count);
            instructions.push({
                stepNumber: ++stepNumber,
                rowIndex: step.rowIndex,
                runIndex,
                colorId: run.colorId,
                count: run.count,
                direction: step.direction,
                startColumn,
                endColumn,
                isRowStart: runIndex === 0,
            });
            offset += run.count;
        });
    }

    return instructions;
}

/**
 * Grid columns of one run within a step
 * @throws IndexError when the run index is out of range
 */
export function runSpan(step: Step, width: number, runIndex: number): { startColumn: number; endColumn: number } {
    if (!Number.isInteger(runIndex) || runIndex < 0 || runIndex >= step.runs.length) {
        throw new IndexError(`Run ${runIndex} is outside row ${step.rowIndex} (0-${step.runs.length - 1})`);
    }
    let offset = 0;
    for (let i = 0; i < runIndex; i++) {
        offset += step.runs[i].count;
    }
    const [startColumn, endColumn] = runColumns(step.direction, width, offset, step.runs[runIndex].count);
    return { startColumn, endColumn };
}

function colorName(palette: YarnPalette, id: number): string {
    return palette.byId.get(id)?.name ?? `color ${id}`;
}

/**
 * e.g. "Row 2 (right to left): 3 Red, 2 Blue"
 */
export function describeStep(step: Step, palette: YarnPalette = getYarnPalette()): string {
    const way = step.direction === "ltr" ? "left to right" : "right to left";
    const runs = step.runs.map((run) => `${run.count} ${colorName(palette, run.colorId)}`).join(", ");
    return `Row ${step.rowIndex + 1} (${way}): ${runs}`;
}

/**
 * e.g. "Step 4: 3 stitches of Red (row 2)"
 */
export function describeInstruction(instruction: StitchInstruction, palette: YarnPalette = getYarnPalette()): string {
    const noun = instruction.count === 1 ? "stitch" : "stitches";
    return `Step ${instruction.stepNumber}: ${instruction.count} ${noun} of ${colorName(palette, instruction.colorId)} (row ${instruction.rowIndex + 1})`;
}
