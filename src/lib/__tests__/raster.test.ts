/**
 * Unit tests for raster helpers
 */

import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { ImageDecodeError } from '../errors.js';
import { Canvas, createRaster, decodeImage, encodePng, escapeSvgText, fitInside, pixelAt, solidRaster } from '../raster.js';

describe('createRaster', () => {
    it('accepts a buffer matching the dimensions', () => {
        const raster = createRaster(2, 1, new Uint8Array([1, 2, 3, 4, 5, 6]));
        expect(raster.width).toBe(2);
        expect(pixelAt(raster, 1, 0)).toEqual({ r: 4, g: 5, b: 6 });
        expect(Object.isFrozen(raster)).toBe(true);
    });

    it('rejects empty images', () => {
        expect(() => createRaster(0, 5, new Uint8Array(0))).toThrow(ImageDecodeError);
    });

    it('rejects a buffer of the wrong length', () => {
        expect(() => createRaster(2, 2, new Uint8Array(11))).toThrow(/ERROR-ST-01/);
    });

    it('reads RGB from RGBA rasters', () => {
        const raster = createRaster(1, 1, new Uint8Array([9, 8, 7, 255]), 4);
        expect(pixelAt(raster, 0, 0)).toEqual({ r: 9, g: 8, b: 7 });
    });
});

describe('Canvas', () => {
    it('fills, clips and outlines rectangles', () => {
        const canvas = new Canvas(6, 6, { r: 0, g: 0, b: 0 });
        canvas.fillRect(4, 4, 10, 10, { r: 255, g: 0, b: 0 });
        canvas.strokeRect(0, 0, 4, 4, { r: 0, g: 255, b: 0 }, 1);
        const raster = canvas.toRaster();

        expect(pixelAt(raster, 5, 5)).toEqual({ r: 255, g: 0, b: 0 });
        expect(pixelAt(raster, 3, 3)).toEqual({ r: 0, g: 255, b: 0 });
        expect(pixelAt(raster, 0, 2)).toEqual({ r: 0, g: 255, b: 0 });
        expect(pixelAt(raster, 1, 1)).toEqual({ r: 0, g: 0, b: 0 });
    });

    it('copies an image at an offset', () => {
        const canvas = new Canvas(4, 4, { r: 1, g: 1, b: 1 });
        canvas.drawImage(solidRaster(2, 2, { r: 50, g: 60, b: 70 }), 3, 3);
        const raster = canvas.toRaster();
        expect(pixelAt(raster, 3, 3)).toEqual({ r: 50, g: 60, b: 70 });
        expect(pixelAt(raster, 2, 2)).toEqual({ r: 1, g: 1, b: 1 });
    });

    it('hands out a snapshot that later drawing does not change', () => {
        const canvas = new Canvas(1, 1, { r: 0, g: 0, b: 0 });
        const before = canvas.toRaster();
        canvas.fillRect(0, 0, 1, 1, { r: 255, g: 255, b: 255 });
        expect(pixelAt(before, 0, 0)).toEqual({ r: 0, g: 0, b: 0 });
    });
});

describe('sharp-backed decode and encode', () => {
    it('decodes a PNG into RGB samples', async () => {
        const png = await sharp({
            create: { width: 3, height: 2, channels: 4, background: { r: 10, g: 20, b: 30, alpha: 1 } },
        })
            .png()
            .toBuffer();

        const raster = await decodeImage(png);
        expect(raster.width).toBe(3);
        expect(raster.height).toBe(2);
        expect(raster.channels).toBe(3);
        expect(pixelAt(raster, 2, 1)).toEqual({ r: 10, g: 20, b: 30 });
    });

    it('downscales to maxSize keeping the aspect ratio', async () => {
        const png = await sharp({
            create: { width: 40, height: 20, channels: 3, background: { r: 0, g: 0, b: 0 } },
        })
            .png()
            .toBuffer();

        const raster = await decodeImage(png, { maxSize: 10 });
        expect(raster.width).toBe(10);
        expect(raster.height).toBe(5);
    });

    it('wraps unreadable data in ImageDecodeError', async () => {
        await expect(decodeImage(Buffer.from('not an image'))).rejects.toBeInstanceOf(ImageDecodeError);
    });

    it('encodes PNG that decodes back to the same pixels', async () => {
        const raster = solidRaster(4, 3, { r: 200, g: 100, b: 50 });
        const decoded = await decodeImage(await encodePng(raster));
        expect(Buffer.from(decoded.data).equals(Buffer.from(raster.data))).toBe(true);
    });

    it('fits an image inside a box', async () => {
        const fitted = await fitInside(solidRaster(300, 100, { r: 0, g: 0, b: 0 }), 150, 150);
        expect(fitted.width).toBe(150);
        expect(fitted.height).toBe(50);
    });
});

describe('escapeSvgText', () => {
    it('escapes markup characters', () => {
        expect(escapeSvgText('a<b & "c">')).toBe('a&lt;b &amp; &quot;c&quot;&gt;');
    });
});
