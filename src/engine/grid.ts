/**
 * Grid Builder
 * Downsamples an image to a stitch grid of yarn colors and renders the grid and swatch images
 */

import { CELL_SIZE, MAX_GRID_DIMENSION, MAX_GRID_IMAGE_SIDE, MIN_GRID_DIMENSION } from "../config.js";
import { PaletteMismatchError, SizeError } from "../lib/errors.js";
import type { RGB } from "../lib/color/lab.js";
import { getYarnPalette, type PaletteColor, type YarnPalette } from "../lib/palette/yarn.js";
import { perfNow, reportPerf } from "../lib/perf.js";
import { assertRaster, Canvas, escapeSvgText, overlaySvg, type RasterImage } from "../lib/raster.js";
import { nearestPaletteColor, suggestColors, type SuggestColorsOptions } from "./quantize.js";

export interface PatternGrid {
    readonly width: number;
    readonly height: number;
    /** Palette ids, row-major, width × height */
    readonly cells: readonly number[];
    /** Swatch: ids the grid may use, most stitched first */
    readonly paletteIds: readonly number[];
}

export interface SwatchEntry {
    color: PaletteColor;
    stitchCount: number;
}

export interface BuildPatternOptions extends SuggestColorsOptions {
    /** Pre-selected yarn colors; suggested from the image when absent */
    colors?: readonly PaletteColor[];
    /** Pixel size of a cell in the grid image; shrunk for very large grids */
    cellSize?: number;
}

export interface PatternResult {
    grid: PatternGrid;
    gridImage: RasterImage;
    paletteImage: RasterImage;
    colors: SwatchEntry[];
}

const GRID_LINE_COLOR: RGB = { r: 200, g: 200, b: 200 };
const BLACK: RGB = { r: 0, g: 0, b: 0 };
const WHITE: RGB = { r: 255, g: 255, b: 255 };

const SWATCH_TILE_WIDTH = 300;
const SWATCH_TILE_HEIGHT = 80;

/**
 * @throws SizeError unless both sides are integers within the allowed grid range
 */
export function validateGridSize(width: number, height: number): void {
    for (const [label, value] of [["width", width], ["height", height]] as const) {
        if (!Number.isInteger(value) || value < MIN_GRID_DIMENSION || value > MAX_GRID_DIMENSION) {
            throw new SizeError(
                `Grid ${label} must be an integer between ${MIN_GRID_DIMENSION} and ${MAX_GRID_DIMENSION}, got ${value}`
            );
        }
    }
}

/**
 * Builds a frozen grid after checking its invariants
 * @throws SizeError for bad dimensions or cell count
 * @throws PaletteMismatchError when a cell is not in the swatch or the swatch is not in the palette
 */
export function createPatternGrid(
    width: number,
    height: number,
    cells: readonly number[],
    paletteIds: readonly number[],
    palette: YarnPalette = getYarnPalette()
): PatternGrid {
    validateGridSize(width, height);
    if (cells.length !== width * height) {
        throw new SizeError(`Grid ${width}x${height} needs ${width * height} cells, got ${cells.length}`);
    }

    const swatch = new Set(paletteIds);
    for (const id of paletteIds) {
        if (!palette.byId.has(id)) {
            throw new PaletteMismatchError(`Palette has no color with id ${id}`);
        }
    }
    for (let i = 0; i < cells.length; i++) {
        if (!swatch.has(cells[i])) {
            throw new PaletteMismatchError(`Cell ${i} uses color ${cells[i]}, which is not in the grid palette`);
        }
    }

    return Object.freeze({
        width,
        height,
        cells: Object.freeze([...cells]),
        paletteIds: Object.freeze([...paletteIds]),
    });
}

/**
 * Source pixel span [start, end) covered by grid cell `index` of `cells`
 * When the grid is finer than the image the span is the single nearest pixel
 */
export function cellSpan(index: number, cells: number, pixels: number): [number, number] {
    const start = Math.min(pixels - 1, Math.floor((index * pixels) / cells));
    const end = Math.floor(((index + 1) * pixels) / cells);
    return [start, Math.max(start + 1, end)];
}

/**
 * Arithmetic mean color of a pixel rectangle
 */
function meanColor(image: RasterImage, x0: number, x1: number, y0: number, y1: number): RGB {
    let r = 0;
    let g = 0;
    let b = 0;
    for (let y = y0; y < y1; y++) {
        for (let x = x0; x < x1; x++) {
            const offset = (y * image.width + x) * image.channels;
            r += image.data[offset];
            g += image.data[offset + 1];
            b += image.data[offset + 2];
        }
    }
    const n = (x1 - x0) * (y1 - y0);
    return { r: r / n, g: g / n, b: b / n };
}

/**
 * Swatch order: stitch count descending, then id
 */
export function swatchOrder(cells: readonly number[]): { id: number; count: number }[] {
    const counts = new Map<number, number>();
    for (const id of cells) {
        counts.set(id, (counts.get(id) ?? 0) + 1);
    }
    return [...counts.entries()]
        .map(([id, count]) => ({ id, count }))
        .sort((a, b) => b.count - a.count || a.id - b.id);
}

/**
 * Assigns every grid cell the selected color nearest to its mean color
 */
export function buildPatternGrid(
    image: RasterImage,
    gridWidth: number,
    gridHeight: number,
    colors: readonly PaletteColor[],
    palette: YarnPalette = getYarnPalette()
): PatternGrid {
    validateGridSize(gridWidth, gridHeight);
    assertRaster(image);
    if (colors.length === 0) {
        throw new PaletteMismatchError("At least one color is required to build a pattern");
    }

    const cells = new Array<number>(gridWidth * gridHeight);
    // Many cells share a mean color in flat areas
    const matches = new Map<string, number>();

    for (let row = 0; row < gridHeight; row++) {
        const [y0, y1] = cellSpan(row, gridHeight, image.height);
        for (let col = 0; col < gridWidth; col++) {
            const [x0, x1] = cellSpan(col, gridWidth, image.width);
            const mean = meanColor(image, x0, x1, y0, y1);
            const key = `${mean.r},${mean.g},${mean.b}`;
            let id = matches.get(key);
            if (id === undefined) {
                id = nearestPaletteColor(mean, colors).id;
                matches.set(key, id);
            }
            cells[row * gridWidth + col] = id;
        }
    }

    return createPatternGrid(
        gridWidth,
        gridHeight,
        cells,
        swatchOrder(cells).map((entry) => entry.id),
        palette
    );
}

/**
 * Largest cell size up to `preferred` that keeps the grid image within bounds
 */
export function gridCellSize(grid: Pick<PatternGrid, "width" | "height">, preferred: number = CELL_SIZE): number {
    return Math.max(1, Math.min(preferred, Math.floor(MAX_GRID_IMAGE_SIDE / Math.max(grid.width, grid.height))));
}

function colorOf(palette: YarnPalette, id: number): PaletteColor {
    const color = palette.byId.get(id);
    if (!color) {
        throw new PaletteMismatchError(`Palette has no color with id ${id}`);
    }
    return color;
}

/**
 * Flat-colored cells with light-gray cell lines and a 3px black border
 */
export function renderGridImage(grid: PatternGrid, palette: YarnPalette = getYarnPalette(), cellSize: number = gridCellSize(grid)): RasterImage {
    const width = grid.width * cellSize;
    const height = grid.height * cellSize;
    const canvas = new Canvas(width, height, WHITE);

    for (let row = 0; row < grid.height; row++) {
        for (let col = 0; col < grid.width; col++) {
            canvas.fillRect(col * cellSize, row * cellSize, cellSize, cellSize, colorOf(palette, grid.cells[row * grid.width + col]).rgb);
        }
    }

    // Lines would swallow cells this small
    if (cellSize >= 4) {
        for (let x = 0; x < width; x += cellSize) {
            canvas.fillRect(x, 0, 1, height, GRID_LINE_COLOR);
        }
        for (let y = 0; y < height; y += cellSize) {
            canvas.fillRect(0, y, width, 1, GRID_LINE_COLOR);
        }
    }

    canvas.strokeRect(0, 0, width, height, BLACK, 3);
    return canvas.toRaster();
}

/**
 * Swatch table: one 300×80 tile per color with a sample square, name and stitch count
 */
export async function renderPaletteImage(entries: readonly SwatchEntry[]): Promise<RasterImage> {
    const count = Math.max(1, entries.length);
    const rows = Math.ceil(Math.sqrt(count));
    const cols = Math.ceil(count / rows);
    const width = cols * SWATCH_TILE_WIDTH;
    const height = rows * SWATCH_TILE_HEIGHT;

    const canvas = new Canvas(width, height, WHITE);
    const labels: string[] = [];

    entries.forEach((entry, i) => {
        const x = (i % cols) * SWATCH_TILE_WIDTH;
        const y = Math.floor(i / cols) * SWATCH_TILE_HEIGHT;

        canvas.fillRect(x + 10, y + 10, 41, 41, entry.color.rgb);
        canvas.strokeRect(x + 10, y + 10, 41, 41, BLACK, 2);

        labels.push(
            `<text x="${x + 60}" y="${y + 34}" font-family="sans-serif" font-size="16" fill="#000">` +
                `${escapeSvgText(`#${entry.color.id} ${entry.color.name}`)}</text>`,
            `<text x="${x + 60}" y="${y + 56}" font-family="sans-serif" font-size="14" fill="#333">` +
                `${escapeSvgText(`${entry.stitchCount} stitches`)}</text>`
        );
    });

    const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${labels.join("")}</svg>`;
    return overlaySvg(canvas.toRaster(), svg);
}

/**
 * Swatch entries of a grid with their stitch counts, in swatch order
 */
export function swatchEntries(grid: PatternGrid, palette: YarnPalette = getYarnPalette()): SwatchEntry[] {
    const counts = new Map<number, number>();
    for (const id of grid.cells) {
        counts.set(id, (counts.get(id) ?? 0) + 1);
    }
    return grid.paletteIds.map((id) => ({ color: colorOf(palette, id), stitchCount: counts.get(id) ?? 0 }));
}

/**
 * Builds the pattern grid for an image plus its grid and swatch images
 *
 * Sizes are checked before any work, so a bad size throws synchronously
 * instead of rejecting the returned promise.
 * @throws SizeError unless both sides are integers in [1, 400]
 */
export function buildPattern(
    image: RasterImage,
    gridWidth: number,
    gridHeight: number,
    options: BuildPatternOptions = {}
): Promise<PatternResult> {
    validateGridSize(gridWidth, gridHeight);
    assertRaster(image);

    const palette = options.palette ?? getYarnPalette();
    const perfStart = perfNow();
    const perfMarks: Record<string, number> = {};

    const selectStart = perfNow();
    const colors = options.colors ?? suggestColors(image, { ...options, palette }).map((s) => s.color);
    perfMarks.colorSelection = perfNow() - selectStart;

    const gridStart = perfNow();
    const grid = buildPatternGrid(image, gridWidth, gridHeight, colors, palette);
    perfMarks.gridBuild = perfNow() - gridStart;

    const renderStart = perfNow();
    const gridImage = renderGridImage(grid, palette, gridCellSize(grid, options.cellSize ?? CELL_SIZE));
    const entries = swatchEntries(grid, palette);

    return renderPaletteImage(entries).then((paletteImage) => {
        perfMarks.render = perfNow() - renderStart;
        reportPerf(`buildPattern (${gridWidth}x${gridHeight}, colors=${colors.length})`, perfNow() - perfStart, perfMarks);
        return { grid, gridImage, paletteImage, colors: entries };
    });
}
