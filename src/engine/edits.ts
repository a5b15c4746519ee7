/**
 * Color Edit Service
 * Overrides individual cells without re-running quantization
 */

import { IndexError, PaletteMismatchError } from "../lib/errors.js";
import type { PatternGrid } from "./grid.js";
import { generateRowStep, runSpan } from "./steps.js";

export interface ColorEditOverride {
    rowIndex: number;
    columnIndex: number;
    newColorId: number;
}

export interface ColorEditResult {
    grid: PatternGrid;
    /** Ascending; exactly the rows holding an edited cell */
    affectedRows: number[];
}

function validateEdit(grid: PatternGrid, swatch: ReadonlySet<number>, edit: ColorEditOverride): void {
    const { rowIndex, columnIndex, newColorId } = edit;
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= grid.height) {
        throw new IndexError(`Row ${rowIndex} is outside the grid (0-${grid.height - 1})`);
    }
    if (!Number.isInteger(columnIndex) || columnIndex < 0 || columnIndex >= grid.width) {
        throw new IndexError(`Column ${columnIndex} is outside the grid (0-${grid.width - 1})`);
    }
    if (!swatch.has(newColorId)) {
        throw new PaletteMismatchError(`Color ${newColorId} is not in the grid palette`);
    }
}

/**
 * Applies cell overrides to a copy of the grid
 *
 * Every edit is checked before any is applied, so a failing batch leaves
 * nothing half done. Later edits to the same cell win.
 * @throws IndexError for a row or column outside the grid
 * @throws PaletteMismatchError for a color the grid's palette does not hold
 */
export function applyColorEdits(grid: PatternGrid, edits: readonly ColorEditOverride[]): ColorEditResult {
    const swatch = new Set(grid.paletteIds);
    for (const edit of edits) {
        validateEdit(grid, swatch, edit);
    }

    const cells = [...grid.cells];
    const rows = new Set<number>();
    for (const { rowIndex, columnIndex, newColorId } of edits) {
        cells[rowIndex * grid.width + columnIndex] = newColorId;
        rows.add(rowIndex);
    }

    return {
        grid: Object.freeze({
            width: grid.width,
            height: grid.height,
            cells: Object.freeze(cells),
            paletteIds: grid.paletteIds,
        }),
        affectedRows: [...rows].sort((a, b) => a - b),
    };
}

/**
 * Overrides recoloring one whole run of a row
 * @throws IndexError when the row or run does not exist
 */
export function editsForRun(grid: PatternGrid, rowIndex: number, runIndex: number, newColorId: number): ColorEditOverride[] {
    const step = generateRowStep(grid, rowIndex);
    const { startColumn, endColumn } = runSpan(step, grid.width, runIndex);

    const edits: ColorEditOverride[] = [];
    for (let columnIndex = startColumn; columnIndex < endColumn; columnIndex++) {
        edits.push({ rowIndex, columnIndex, newColorId });
    }
    return edits;
}
