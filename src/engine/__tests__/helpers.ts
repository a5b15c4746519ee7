/**
 * Raster and grid fixtures shared by the engine tests
 */

import type { RGB } from '../../lib/color/lab.js';
import { createRaster, type RasterImage } from '../../lib/raster.js';
import { createPatternGrid, type PatternGrid } from '../grid.js';

/**
 * Raster whose pixel (x, y) is paint(x, y)
 */
export function paintRaster(width: number, height: number, paint: (x: number, y: number) => RGB): RasterImage {
    const data = new Uint8Array(width * height * 3);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const { r, g, b } = paint(x, y);
            const offset = (y * width + x) * 3;
            data[offset] = r;
            data[offset + 1] = g;
            data[offset + 2] = b;
        }
    }
    return createRaster(width, height, data);
}

export const BLUE_ID = 32;
export const RED_ID = 12;
export const WHITE_ID = 2;

/**
 * 3×2 grid:
 *   row 0: Blue Blue Red
 *   row 1: Blue Red  Red
 */
export function twoRowGrid(): PatternGrid {
    return createPatternGrid(3, 2, [BLUE_ID, BLUE_ID, RED_ID, BLUE_ID, RED_ID, RED_ID], [BLUE_ID, RED_ID]);
}

export function uniformGrid(width: number, height: number, id: number = BLUE_ID): PatternGrid {
    return createPatternGrid(width, height, new Array<number>(width * height).fill(id), [id]);
}
