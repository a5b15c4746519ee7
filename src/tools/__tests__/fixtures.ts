/**
 * Encoded test images for the tool tests
 */

import sharp from 'sharp';

/**
 * 4×4 PNG, left half blue and right half white, as base64
 */
export async function splitPngBase64(): Promise<string> {
    const data = Buffer.alloc(4 * 4 * 3);
    for (let y = 0; y < 4; y++) {
        for (let x = 0; x < 4; x++) {
            const offset = (y * 4 + x) * 3;
            const white = x >= 2;
            data[offset] = white ? 255 : 0;
            data[offset + 1] = white ? 255 : 0;
            data[offset + 2] = 255;
        }
    }
    const png = await sharp(data, { raw: { width: 4, height: 4, channels: 3 } }).png().toBuffer();
    return png.toString('base64');
}

export async function solidPngBase64(width: number, height: number, r: number, g: number, b: number): Promise<string> {
    const png = await sharp({ create: { width, height, channels: 3, background: { r, g, b } } }).png().toBuffer();
    return png.toString('base64');
}

export const SPLIT_GRID = { width: 2, height: 2, cells: [32, 2, 32, 2], paletteIds: [2, 32] };
