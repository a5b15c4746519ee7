/**
 * Composite Renderer
 * One fixed-size guide image per step: the reference photo with the row marked,
 * a header, and a magnified window of the grid around the active row
 */

import { COMPOSITE_HEIGHT, COMPOSITE_WIDTH, COMPOSITE_ZOOM } from "../config.js";
import { IndexError, SizeError } from "../lib/errors.js";
import type { RGB } from "../lib/color/lab.js";
import { getYarnPalette, type YarnPalette } from "../lib/palette/yarn.js";
import { perfNow, reportPerf } from "../lib/perf.js";
import { assertRaster, Canvas, escapeSvgText, fitInside, overlaySvg, type RasterImage } from "../lib/raster.js";
import type { PatternGrid } from "./grid.js";
import { generateRowStep } from "./steps.js";

export interface HighlightRegion {
    /** Grid columns of the active row, half-open */
    startColumn: number;
    endColumn: number;
}

export interface CompositeSpec {
    canvasWidth: number;
    canvasHeight: number;
    /** Pixels per grid cell in the zoomed window */
    zoomFactor: number;
    /** Defaults to the whole row */
    highlightRegion?: HighlightRegion;
}

export const DEFAULT_COMPOSITE_SPEC: Readonly<CompositeSpec> = Object.freeze({
    canvasWidth: COMPOSITE_WIDTH,
    canvasHeight: COMPOSITE_HEIGHT,
    zoomFactor: COMPOSITE_ZOOM,
});

export interface ZoomWindow {
    firstRow: number;
    rowCount: number;
    firstColumn: number;
    columnCount: number;
}

const BACKGROUND: RGB = { r: 245, g: 245, b: 245 };
const BLACK: RGB = { r: 0, g: 0, b: 0 };
const RED: RGB = { r: 255, g: 0, b: 0 };
const YELLOW: RGB = { r: 255, g: 255, b: 0 };
const GRID_LINE_COLOR: RGB = { r: 200, g: 200, b: 200 };

const REFERENCE_BOX = 150;
const REFERENCE_TOP = 20;
const ZOOM_TOP = 260;
const ZOOM_MARGIN = 20;
const SUMMARY_MAX_LENGTH = 90;

function validateSpec(spec: CompositeSpec): void {
    const { canvasWidth, canvasHeight, zoomFactor } = spec;
    if (!Number.isInteger(canvasWidth) || !Number.isInteger(canvasHeight) || canvasWidth < 1 || canvasHeight < 1) {
        throw new SizeError(`Canvas must have positive integer dimensions, got ${canvasWidth}x${canvasHeight}`);
    }
    if (!Number.isInteger(zoomFactor) || zoomFactor < 1) {
        throw new SizeError(`Zoom factor must be a positive integer, got ${zoomFactor}`);
    }
}

/**
 * @throws IndexError when the row or highlighted span is outside the grid
 */
export function resolveHighlight(grid: PatternGrid, rowIndex: number, region?: HighlightRegion): HighlightRegion {
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= grid.height) {
        throw new IndexError(`Row ${rowIndex} is outside the grid (0-${grid.height - 1})`);
    }
    if (region === undefined) {
        return { startColumn: 0, endColumn: grid.width };
    }
    const { startColumn, endColumn } = region;
    if (
        !Number.isInteger(startColumn) ||
        !Number.isInteger(endColumn) ||
        startColumn < 0 ||
        endColumn > grid.width ||
        startColumn >= endColumn
    ) {
        throw new IndexError(`Highlight columns [${startColumn}, ${endColumn}) are outside the row (0-${grid.width})`);
    }
    return { startColumn, endColumn };
}

function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Grid rows and columns shown in the zoomed area, centered on the highlight and kept inside the grid
 */
export function zoomWindow(grid: PatternGrid, rowIndex: number, highlight: HighlightRegion, spec: CompositeSpec): ZoomWindow {
    const rowCount = Math.min(grid.height, Math.max(1, Math.floor((spec.canvasHeight - ZOOM_TOP - ZOOM_MARGIN) / spec.zoomFactor)));
    const columnCount = Math.min(grid.width, Math.max(1, Math.floor((spec.canvasWidth - 2 * ZOOM_MARGIN) / spec.zoomFactor)));

    const midColumn = Math.floor((highlight.startColumn + highlight.endColumn) / 2);

    return {
        firstRow: clamp(rowIndex - Math.floor(rowCount / 2), 0, grid.height - rowCount),
        rowCount,
        firstColumn: clamp(midColumn - Math.floor(columnCount / 2), 0, grid.width - columnCount),
        columnCount,
    };
}

/**
 * Source image rows [top, bottom) matching a grid row on a reference of the given height
 */
export function rowBand(rowIndex: number, gridHeight: number, referenceHeight: number): [number, number] {
    const top = Math.min(referenceHeight - 1, Math.floor((rowIndex * referenceHeight) / gridHeight));
    const bottom = Math.floor(((rowIndex + 1) * referenceHeight) / gridHeight);
    return [top, Math.max(top + 1, bottom)];
}

function headerSvg(grid: PatternGrid, rowIndex: number, palette: YarnPalette, width: number, height: number): string {
    const step = generateRowStep(grid, rowIndex);
    const way = step.direction === "ltr" ? "left to right" : "right to left";
    const title = `Row ${rowIndex + 1} of ${grid.height} (${way})`;

    let summary = step.runs
        .map((run) => `${run.count} ${palette.byId.get(run.colorId)?.name ?? `color ${run.colorId}`}`)
        .join(", ");
    if (summary.length > SUMMARY_MAX_LENGTH) {
        summary = `${summary.slice(0, SUMMARY_MAX_LENGTH - 3)}...`;
    }

    const center = Math.floor(width / 2);
    return (
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
        `<text x="${center}" y="214" text-anchor="middle" font-family="sans-serif" font-size="26" fill="#000">${escapeSvgText(title)}</text>` +
        `<text x="${center}" y="244" text-anchor="middle" font-family="sans-serif" font-size="18" fill="#323232">${escapeSvgText(summary)}</text>` +
        `</svg>`
    );
}

/**
 * Renders the guide image for one row
 *
 * Arguments are checked before any work, so a bad row throws synchronously
 * instead of rejecting the returned promise.
 * @throws IndexError when the row or highlight is outside the grid
 * @throws SizeError for a malformed canvas or zoom factor
 */
export function renderComposite(
    image: RasterImage,
    grid: PatternGrid,
    rowIndex: number,
    spec: CompositeSpec = DEFAULT_COMPOSITE_SPEC,
    palette: YarnPalette = getYarnPalette()
): Promise<RasterImage> {
    assertRaster(image);
    validateSpec(spec);
    const highlight = resolveHighlight(grid, rowIndex, spec.highlightRegion);
    const window = zoomWindow(grid, rowIndex, highlight, spec);

    const perfStart = perfNow();
    const perfMarks: Record<string, number> = {};
    const { canvasWidth, canvasHeight, zoomFactor } = spec;

    return fitInside(image, REFERENCE_BOX, REFERENCE_BOX).then(async (reference) => {
        perfMarks.referenceResize = perfNow() - perfStart;
        const drawStart = perfNow();

        const canvas = new Canvas(canvasWidth, canvasHeight, BACKGROUND);

        const refX = Math.floor((canvasWidth - reference.width) / 2);
        canvas.drawImage(reference, refX, REFERENCE_TOP);
        const [bandTop, bandBottom] = rowBand(rowIndex, grid.height, reference.height);
        canvas.strokeRect(refX, REFERENCE_TOP + bandTop, reference.width, bandBottom - bandTop, RED, 2);
        canvas.strokeRect(refX, REFERENCE_TOP, reference.width, reference.height, BLACK, 2);

        const zoomX = Math.floor((canvasWidth - window.columnCount * zoomFactor) / 2);
        for (let r = 0; r < window.rowCount; r++) {
            for (let c = 0; c < window.columnCount; c++) {
                const id = grid.cells[(window.firstRow + r) * grid.width + window.firstColumn + c];
                const color = palette.byId.get(id);
                canvas.fillRect(zoomX + c * zoomFactor, ZOOM_TOP + r * zoomFactor, zoomFactor, zoomFactor, color ? color.rgb : BLACK);
            }
        }

        const zoomWidth = window.columnCount * zoomFactor;
        const zoomHeight = window.rowCount * zoomFactor;
        if (zoomFactor >= 4) {
            for (let x = 0; x <= zoomWidth; x += zoomFactor) {
                canvas.fillRect(zoomX + x, ZOOM_TOP, 1, zoomHeight, GRID_LINE_COLOR);
            }
            for (let y = 0; y <= zoomHeight; y += zoomFactor) {
                canvas.fillRect(zoomX, ZOOM_TOP + y, zoomWidth, 1, GRID_LINE_COLOR);
            }
        }

        // The highlight may reach past the visible window
        const start = Math.max(highlight.startColumn, window.firstColumn);
        const end = Math.min(highlight.endColumn, window.firstColumn + window.columnCount);
        if (end > start) {
            canvas.strokeRect(
                zoomX + (start - window.firstColumn) * zoomFactor,
                ZOOM_TOP + (rowIndex - window.firstRow) * zoomFactor,
                (end - start) * zoomFactor,
                zoomFactor,
                YELLOW,
                4
            );
        }
        perfMarks.draw = perfNow() - drawStart;

        const textStart = perfNow();
        const composite = await overlaySvg(canvas.toRaster(), headerSvg(grid, rowIndex, palette, canvasWidth, canvasHeight));
        perfMarks.text = perfNow() - textStart;

        reportPerf(`renderComposite (row=${rowIndex}, grid=${grid.width}x${grid.height})`, perfNow() - perfStart, perfMarks);
        return composite;
    });
}
