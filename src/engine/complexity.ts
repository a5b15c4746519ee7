/**
 * Complexity Analyzer
 * Scores edge density and color variety of an image and maps the result to a grid size tier
 */

import {
    COLOR_WEIGHT,
    EDGE_SATURATION,
    EDGE_THRESHOLD,
    EDGE_WEIGHT,
    HIGH_TIER_THRESHOLD,
    MAX_GRID_DIMENSION,
    MEDIUM_TIER_THRESHOLD,
    MIN_GRID_DIMENSION,
    RECOMMENDED_SIZE_CEILING,
    RECOMMENDED_SIZE_FLOOR,
    SIZE_RANGE_CEILING,
    SIZE_RANGE_FLOOR,
} from "../config.js";
import { SizeError } from "../lib/errors.js";
import { assertRaster, type RasterImage } from "../lib/raster.js";

export interface ComplexityScore {
    edgeDensity: number;
    colorVariance: number;
    combined: number;
}

export type SizeTier = "low" | "medium" | "high";

export interface PercentRange {
    min: number;
    max: number;
}

export interface SizeRecommendation {
    tier: SizeTier;
    /** Share of the source's linear dimensions allowed for this tier */
    percentRange: PercentRange;
    /** Representative share used for gridWidth / gridHeight */
    percent: number;
    gridWidth: number;
    gridHeight: number;
    /** Suggested longest side in stitches, a multiple of 10 */
    longestSide: number;
    sizeRange: { min: number; max: number };
}

export interface ComplexityAnalysis {
    score: ComplexityScore;
    recommendation: SizeRecommendation;
}

export const TIER_PERCENTAGES: Readonly<Record<SizeTier, { range: PercentRange; percent: number }>> = {
    high: { range: { min: 0.3, max: 0.4 }, percent: 0.35 },
    medium: { range: { min: 0.2, max: 0.25 }, percent: 0.22 },
    low: { range: { min: 0.12, max: 0.15 }, percent: 0.13 },
};

/**
 * ITU-R 601 luma per pixel
 */
export function toGrayscale(image: RasterImage): Float64Array {
    const gray = new Float64Array(image.width * image.height);
    for (let i = 0; i < gray.length; i++) {
        const offset = i * image.channels;
        gray[i] = 0.299 * image.data[offset] + 0.587 * image.data[offset + 1] + 0.114 * image.data[offset + 2];
    }
    return gray;
}

/**
 * Fraction of pixels on an edge, normalized so that 20% edge pixels saturates at 1
 *
 * Sobel magnitude is divided by 4, so a step of height h between two flat
 * areas measures h on both sides of the step. Borders are replicated.
 */
export function edgeDensity(image: RasterImage): number {
    const { width, height } = image;
    const gray = toGrayscale(image);

    const at = (x: number, y: number): number => {
        const cx = x < 0 ? 0 : x >= width ? width - 1 : x;
        const cy = y < 0 ? 0 : y >= height ? height - 1 : y;
        return gray[cy * width + cx];
    };

    let edges = 0;
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const gx =
                at(x + 1, y - 1) + 2 * at(x + 1, y) + at(x + 1, y + 1) -
                at(x - 1, y - 1) - 2 * at(x - 1, y) - at(x - 1, y + 1);
            const gy =
                at(x - 1, y + 1) + 2 * at(x, y + 1) + at(x + 1, y + 1) -
                at(x - 1, y - 1) - 2 * at(x, y - 1) - at(x + 1, y - 1);
            const magnitude = Math.sqrt(gx * gx + gy * gy) / 4;
            if (magnitude > EDGE_THRESHOLD) {
                edges++;
            }
        }
    }

    const fraction = edges / (width * height);
    return Math.min(fraction / EDGE_SATURATION, 1);
}

/**
 * Number of distinct colors once each channel is reduced to 5 bits
 */
export function countDistinctColors(image: RasterImage): number {
    const seen = new Set<number>();
    const pixels = image.width * image.height;
    for (let i = 0; i < pixels; i++) {
        const offset = i * image.channels;
        const key = ((image.data[offset] >> 3) << 10) | ((image.data[offset + 1] >> 3) << 5) | (image.data[offset + 2] >> 3);
        seen.add(key);
    }
    return seen.size;
}

/**
 * Maps a distinct-color count onto [0, 1]
 * @param count - Distinct 5-bit colors in the image
 * @returns 0 for a single color, 1 from 1040 colors up
 */
export function colorVarianceFromCount(count: number): number {
    if (count <= 1) {
        return 0;
    }
    if (count < 100) {
        return count / 300;
    }
    if (count < 500) {
        return 0.33 + (count - 100) / 1000;
    }
    return Math.min(0.73 + (count - 500) / 2000, 1);
}

export function tierForScore(combined: number): SizeTier {
    if (combined > HIGH_TIER_THRESHOLD) return "high";
    if (combined > MEDIUM_TIER_THRESHOLD) return "medium";
    return "low";
}

function scaleDimension(dimension: number, percent: number): number {
    return Math.min(MAX_GRID_DIMENSION, Math.max(1, Math.round(dimension * percent)));
}

/**
 * Grid size suggestion for a tier and source dimensions
 *
 * The longest side is rounded to a multiple of ten half-up (105 -> 110).
 * @param width - Source width in pixels
 * @param height - Source height in pixels
 * @param tier - Complexity tier picking the scale
 */
export function recommendSize(width: number, height: number, tier: SizeTier): SizeRecommendation {
    const { range, percent } = TIER_PERCENTAGES[tier];

    const raw = Math.floor(Math.max(width, height) * percent);
    const clamped = Math.max(RECOMMENDED_SIZE_FLOOR, Math.min(RECOMMENDED_SIZE_CEILING, raw));
    const longestSide = Math.round(clamped / 10) * 10;

    return {
        tier,
        percentRange: { ...range },
        percent,
        gridWidth: scaleDimension(width, percent),
        gridHeight: scaleDimension(height, percent),
        longestSide,
        sizeRange: {
            min: Math.max(SIZE_RANGE_FLOOR, longestSide - 50),
            max: Math.min(SIZE_RANGE_CEILING, longestSide + 100),
        },
    };
}

/**
 * Grid dimensions with the given longest side and the image's aspect ratio
 * The shorter side is rounded half-up and never drops below 1
 * @param longestSide - Stitches along the longer image side
 * @throws SizeError unless longestSide is an integer in [1, 400]
 */
export function fitGridToLongestSide(width: number, height: number, longestSide: number): { gridWidth: number; gridHeight: number } {
    if (!Number.isInteger(longestSide) || longestSide < MIN_GRID_DIMENSION || longestSide > MAX_GRID_DIMENSION) {
        throw new SizeError(
            `Longest side must be an integer between ${MIN_GRID_DIMENSION} and ${MAX_GRID_DIMENSION}, got ${longestSide}`
        );
    }
    if (width >= height) {
        return { gridWidth: longestSide, gridHeight: Math.max(1, Math.round((longestSide * height) / width)) };
    }
    return { gridWidth: Math.max(1, Math.round((longestSide * width) / height)), gridHeight: longestSide };
}

/**
 * Scores an image and recommends a grid size
 * @throws ImageDecodeError for an empty or malformed raster
 */
export function analyze(image: RasterImage): ComplexityAnalysis {
    assertRaster(image);

    const edges = edgeDensity(image);
    const colorVariance = colorVarianceFromCount(countDistinctColors(image));
    const combined = COLOR_WEIGHT * colorVariance + EDGE_WEIGHT * edges;

    return {
        score: { edgeDensity: edges, colorVariance, combined },
        recommendation: recommendSize(image.width, image.height, tierForScore(combined)),
    };
}
