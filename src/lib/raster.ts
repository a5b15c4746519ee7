/**
 * Raster image values and sharp-backed decode / encode / resize
 * Rasters are raw interleaved RGB(A) buffers and are never written after creation
 */

import sharp from "sharp";
import { ImageDecodeError } from "./errors.js";
import type { RGB } from "./color/lab.js";

export interface RasterImage {
    readonly width: number;
    readonly height: number;
    readonly channels: 3 | 4;
    readonly data: Uint8Array;
}

/**
 * Wraps raw samples as a raster after checking the buffer matches the dimensions
 * @throws ImageDecodeError for empty images or a mismatched buffer length
 */
export function createRaster(width: number, height: number, data: Uint8Array, channels: 3 | 4 = 3): RasterImage {
    const raster = { width, height, channels, data };
    assertRaster(raster);
    return Object.freeze(raster);
}

/**
 * Rejects rasters that cannot be read (zero pixels, wrong buffer size)
 */
export function assertRaster(image: RasterImage): void {
    if (!Number.isInteger(image.width) || !Number.isInteger(image.height) || image.width <= 0 || image.height <= 0) {
        throw new ImageDecodeError(`Image has no pixels (${image.width}x${image.height})`);
    }
    if (image.channels !== 3 && image.channels !== 4) {
        throw new ImageDecodeError(`Unsupported channel count: ${String(image.channels)}`);
    }
    const expected = image.width * image.height * image.channels;
    if (image.data.length !== expected) {
        throw new ImageDecodeError(`Pixel buffer holds ${image.data.length} bytes, expected ${expected}`);
    }
}

/**
 * Reads one pixel, ignoring alpha
 */
export function pixelAt(image: RasterImage, x: number, y: number): RGB {
    const offset = (y * image.width + x) * image.channels;
    return {
        r: image.data[offset],
        g: image.data[offset + 1],
        b: image.data[offset + 2],
    };
}

/**
 * Builds a solid-color RGB raster
 */
export function solidRaster(width: number, height: number, color: RGB): RasterImage {
    const canvas = new Canvas(width, height, color);
    return canvas.toRaster();
}

export interface DecodeOptions {
    /** Longest side after decoding; larger images are downscaled (aspect preserved) */
    maxSize?: number;
}

/**
 * Decodes an encoded image (PNG, JPEG, WebP, ...) or an image file path into an RGB raster
 * @param input - Encoded bytes or a file path
 * @param options - Decode limits
 * @returns Frozen 3-channel raster
 * @throws ImageDecodeError when sharp cannot read the input or it has no pixels
 */
export async function decodeImage(input: Buffer | string, options: DecodeOptions = {}): Promise<RasterImage> {
    const { maxSize } = options;

    try {
        let image = sharp(input);
        const metadata = await image.metadata();

        if (!metadata.width || !metadata.height) {
            throw new ImageDecodeError("Unable to read image dimensions");
        }

        if (maxSize !== undefined && Math.max(metadata.width, metadata.height) > maxSize) {
            image = image.resize(maxSize, maxSize, {
                fit: "inside",
                withoutEnlargement: true,
            });
        }

        const { data, info } = await image
            .removeAlpha()
            .toColourspace("srgb")
            .raw()
            .toBuffer({ resolveWithObject: true });

        if (info.channels !== 3) {
            throw new ImageDecodeError(`Decoded image has ${info.channels} channels, expected 3`);
        }

        return createRaster(info.width, info.height, data, 3);
    } catch (error) {
        if (error instanceof ImageDecodeError) {
            throw error;
        }
        throw new ImageDecodeError(
            `Failed to decode image: ${error instanceof Error ? error.message : "Unknown error"}`,
            { cause: error }
        );
    }
}

/**
 * Encodes a raster as PNG
 */
export async function encodePng(image: RasterImage): Promise<Buffer> {
    return sharp(image.data, {
        raw: {
            width: image.width,
            height: image.height,
            channels: image.channels,
        },
    })
        .png()
        .toBuffer();
}

/**
 * Lanczos downscale that fits the raster inside a box, keeping its aspect ratio
 * @returns A new raster no larger than maxWidth x maxHeight
 */
export async function fitInside(image: RasterImage, maxWidth: number, maxHeight: number): Promise<RasterImage> {
    const { data, info } = await sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: image.channels },
    })
        .resize(maxWidth, maxHeight, {
            fit: "inside",
            kernel: sharp.kernel.lanczos3,
        })
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

    return createRaster(info.width, info.height, data, 3);
}

/**
 * Composites an SVG document (same size as the raster) over it
 * Used for text, which the pixel canvas does not draw
 */
export async function overlaySvg(image: RasterImage, svg: string): Promise<RasterImage> {
    const { data, info } = await sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: image.channels },
    })
        .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

    return createRaster(info.width, info.height, data, 3);
}

/**
 * Escapes text for use inside SVG markup
 */
export function escapeSvgText(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;");
}

/**
 * Mutable RGB drawing surface used while rendering; frozen into a raster at the end
 * All drawing is clipped to the canvas bounds
 */
export class Canvas {
    readonly width: number;
    readonly height: number;
    private readonly pixels: Uint8Array;

    constructor(width: number, height: number, background: RGB) {
        this.width = width;
        this.height = height;
        this.pixels = new Uint8Array(width * height * 3);
        this.fillRect(0, 0, width, height, background);
    }

    fillRect(x: number, y: number, width: number, height: number, color: RGB): void {
        const x0 = Math.max(0, Math.floor(x));
        const y0 = Math.max(0, Math.floor(y));
        const x1 = Math.min(this.width, Math.floor(x + width));
        const y1 = Math.min(this.height, Math.floor(y + height));

        for (let py = y0; py < y1; py++) {
            for (let px = x0; px < x1; px++) {
                const offset = (py * this.width + px) * 3;
                this.pixels[offset] = color.r;
                this.pixels[offset + 1] = color.g;
                this.pixels[offset + 2] = color.b;
            }
        }
    }

    /**
     * Outline drawn inside the rectangle
     */
    strokeRect(x: number, y: number, width: number, height: number, color: RGB, thickness: number): void {
        const t = Math.max(1, Math.min(thickness, Math.ceil(width / 2), Math.ceil(height / 2)));
        this.fillRect(x, y, width, t, color);
        this.fillRect(x, y + height - t, width, t, color);
        this.fillRect(x, y, t, height, color);
        this.fillRect(x + width - t, y, t, height, color);
    }

    /**
     * Copies a raster onto the canvas with its top-left corner at (x, y)
     */
    drawImage(image: RasterImage, x: number, y: number): void {
        for (let sy = 0; sy < image.height; sy++) {
            const py = y + sy;
            if (py < 0 || py >= this.height) continue;
            for (let sx = 0; sx < image.width; sx++) {
                const px = x + sx;
                if (px < 0 || px >= this.width) continue;
                const src = (sy * image.width + sx) * image.channels;
                const dst = (py * this.width + px) * 3;
                this.pixels[dst] = image.data[src];
                this.pixels[dst + 1] = image.data[src + 1];
                this.pixels[dst + 2] = image.data[src + 2];
            }
        }
    }

    toRaster(): RasterImage {
        return createRaster(this.width, this.height, this.pixels.slice(), 3);
    }
}
