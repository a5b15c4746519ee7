/**
 * Color Quantizer & Matcher
 * Reduces an image to a few representative colors and maps them onto the yarn palette
 */

import { DEFAULT_SEED, MAX_COLORS, QUANTIZE_COLORS } from "../config.js";
import { deltaE76, rgbToLab, type Lab, type RGB } from "../lib/color/lab.js";
import { SizeError } from "../lib/errors.js";
import { getYarnPalette, type PaletteColor, type YarnPalette } from "../lib/palette/yarn.js";
import { assertRaster, type RasterImage } from "../lib/raster.js";
import { SeededRNG } from "../lib/rng.js";

export type QuantizeMethod = "median-cut" | "kmeans";

/**
 * One exact color of the image and how many pixels carry it
 */
export interface HistogramEntry {
    r: number;
    g: number;
    b: number;
    count: number;
}

export interface RepresentativeColor {
    rgb: RGB;
    lab: Lab;
    pixelCount: number;
}

export interface ColorSuggestion {
    color: PaletteColor;
    /** Pixels whose representative matched this color */
    pixelCount: number;
}

export interface SuggestColorsOptions {
    quantizeColors?: number;
    maxColors?: number;
    method?: QuantizeMethod;
    /** Seed for k-means centroid initialization */
    seed?: number;
    palette?: YarnPalette;
}

/**
 * Exact color histogram, entries in order of first appearance
 */
export function buildHistogram(image: RasterImage): HistogramEntry[] {
    const index = new Map<number, HistogramEntry>();
    const pixels = image.width * image.height;

    for (let i = 0; i < pixels; i++) {
        const offset = i * image.channels;
        const r = image.data[offset];
        const g = image.data[offset + 1];
        const b = image.data[offset + 2];
        const key = (r << 16) | (g << 8) | b;
        const entry = index.get(key);
        if (entry) {
            entry.count++;
        } else {
            index.set(key, { r, g, b, count: 1 });
        }
    }

    return [...index.values()];
}

function weightedMean(items: readonly HistogramEntry[]): { rgb: RGB; count: number } {
    let r = 0;
    let g = 0;
    let b = 0;
    let count = 0;
    for (const item of items) {
        r += item.r * item.count;
        g += item.g * item.count;
        b += item.b * item.count;
        count += item.count;
    }
    return {
        rgb: count ? { r: Math.round(r / count), g: Math.round(g / count), b: Math.round(b / count) } : { r: 0, g: 0, b: 0 },
        count,
    };
}

function toRepresentative(items: readonly HistogramEntry[]): RepresentativeColor {
    const { rgb, count } = weightedMean(items);
    return { rgb, lab: rgbToLab(rgb), pixelCount: count };
}

interface Box {
    items: HistogramEntry[];
    rMin: number;
    rMax: number;
    gMin: number;
    gMax: number;
    bMin: number;
    bMax: number;
    count: number;
}

function makeBox(items: HistogramEntry[]): Box {
    let rMin = 255, rMax = 0, gMin = 255, gMax = 0, bMin = 255, bMax = 0, count = 0;
    for (const it of items) {
        if (it.r < rMin) rMin = it.r;
        if (it.r > rMax) rMax = it.r;
        if (it.g < gMin) gMin = it.g;
        if (it.g > gMax) gMax = it.g;
        if (it.b < bMin) bMin = it.b;
        if (it.b > bMax) bMax = it.b;
        count += it.count;
    }
    return { items, rMin, rMax, gMin, gMax, bMin, bMax, count };
}

/**
 * Median cut over the histogram
 *
 * Repeatedly splits the box with the widest channel span along that channel at
 * the pixel-weighted median. Each box yields its count-weighted mean color.
 */
export function medianCut(entries: readonly HistogramEntry[], maxColors: number): RepresentativeColor[] {
    if (entries.length === 0) return [];
    if (entries.length <= maxColors) {
        return entries.map((entry) => toRepresentative([entry]));
    }

    const boxes: Box[] = [makeBox([...entries])];

    while (boxes.length < maxColors) {
        let idx = -1;
        let maxRange = -1;
        for (let i = 0; i < boxes.length; i++) {
            const box = boxes[i];
            const span = Math.max(box.rMax - box.rMin, box.gMax - box.gMin, box.bMax - box.bMin);
            if (span > maxRange && box.items.length > 1) {
                maxRange = span;
                idx = i;
            }
        }
        if (idx === -1) break;

        const box = boxes[idx];
        const rRange = box.rMax - box.rMin;
        const gRange = box.gMax - box.gMin;
        const bRange = box.bMax - box.bMin;
        let channel: "r" | "g" | "b" = "r";
        if (gRange >= rRange && gRange >= bRange) channel = "g";
        else if (bRange >= rRange && bRange >= gRange) channel = "b";

        box.items.sort((a, b) => a[channel] - b[channel]);

        let acc = 0;
        let splitIndex = 1;
        for (let i = 0; i < box.items.length; i++) {
            acc += box.items[i].count;
            if (acc >= box.count / 2) {
                splitIndex = i + 1;
                break;
            }
        }
        splitIndex = Math.max(1, Math.min(box.items.length - 1, splitIndex));

        boxes.splice(idx, 1, makeBox(box.items.slice(0, splitIndex)), makeBox(box.items.slice(splitIndex)));
    }

    return boxes.map((box) => toRepresentative(box.items));
}

/**
 * Count-weighted k-means in Lab over the histogram
 * Uses seeded RNG for deterministic centroid initialization
 * @param k - Cluster count
 * @returns At most k representatives; empty clusters are dropped
 * @throws SizeError when k is not a positive integer
 */
export function kmeansQuantize(
    entries: readonly HistogramEntry[],
    k: number,
    seed: number = DEFAULT_SEED,
    maxIterations: number = 20
): RepresentativeColor[] {
    if (entries.length === 0) return [];
    assertColorCount("k", k);
    if (entries.length <= k) {
        return entries.map((entry) => toRepresentative([entry]));
    }

    const labs = entries.map((entry) => rgbToLab(entry));
    const rng = new SeededRNG(seed);

    // Pick k distinct entries as initial centroids
    const used = new Set<number>();
    let centroids: Lab[] = [];
    while (centroids.length < k) {
        const idx = rng.nextInt(entries.length);
        if (!used.has(idx)) {
            used.add(idx);
            centroids.push({ ...labs[idx] });
        }
    }

    let labels = new Array<number>(entries.length).fill(-1);

    for (let iter = 0; iter < maxIterations; iter++) {
        const newLabels = labs.map((lab) => {
            let best = 0;
            let bestDist = Infinity;
            centroids.forEach((centroid, i) => {
                const dist = deltaE76(lab, centroid);
                if (dist < bestDist) {
                    bestDist = dist;
                    best = i;
                }
            });
            return best;
        });

        const converged = newLabels.every((label, i) => label === labels[i]);
        labels = newLabels;
        if (converged) break;

        const sums = Array.from({ length: k }, () => ({ l: 0, a: 0, b: 0, w: 0 }));
        labs.forEach((lab, i) => {
            const sum = sums[labels[i]];
            const w = entries[i].count;
            sum.l += lab.l * w;
            sum.a += lab.a * w;
            sum.b += lab.b * w;
            sum.w += w;
        });
        centroids = sums.map((sum, i) => (sum.w === 0 ? centroids[i] : { l: sum.l / sum.w, a: sum.a / sum.w, b: sum.b / sum.w }));
    }

    const members: HistogramEntry[][] = Array.from({ length: k }, () => []);
    labels.forEach((label, i) => members[label].push(entries[i]));

    return members.filter((items) => items.length > 0).map((items) => toRepresentative(items));
}

/**
 * Perceptual distance between two palette colors (Delta E 76)
 */
export function colorDistance(a: Pick<PaletteColor, "lab">, b: Pick<PaletteColor, "lab">): number {
    return deltaE76(a.lab, b.lab);
}

/**
 * Closest candidate in Lab; equal distances go to the lowest id
 * @throws Error when there are no candidates
 */
export function nearestPaletteColor(color: RGB | Lab, candidates: readonly PaletteColor[]): PaletteColor {
    const lab = "l" in color ? color : rgbToLab(color);

    let best: PaletteColor | null = null;
    let bestDist = Infinity;
    for (const candidate of candidates) {
        const dist = deltaE76(lab, candidate.lab);
        if (best === null || dist < bestDist || (dist === bestDist && candidate.id < best.id)) {
            best = candidate;
            bestDist = dist;
        }
    }

    if (best === null) {
        throw new Error("Cannot match a color against an empty palette");
    }
    return best;
}

/**
 * @throws SizeError unless the count is a positive integer
 */
function assertColorCount(label: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new SizeError(`${label} must be a positive integer, got ${value}`);
    }
}

/**
 * Representative colors of an image
 * @param colors - Upper bound on representatives
 * @param seed - Only used by k-means
 * @throws SizeError when colors is not a positive integer
 */
export function quantizeImage(
    image: RasterImage,
    colors: number = QUANTIZE_COLORS,
    method: QuantizeMethod = "median-cut",
    seed: number = DEFAULT_SEED
): RepresentativeColor[] {
    assertRaster(image);
    assertColorCount("quantizeColors", colors);
    const histogram = buildHistogram(image);
    return method === "kmeans" ? kmeansQuantize(histogram, colors, seed) : medianCut(histogram, colors);
}

/**
 * Most frequent yarn colors for an image
 *
 * Representatives matching the same yarn color are merged and their pixel
 * counts summed; the result is ordered by that sum (ties keep first
 * appearance) and truncated to maxColors.
 * @throws SizeError when quantizeColors or maxColors is not a positive integer
 */
export function suggestColors(image: RasterImage, options: SuggestColorsOptions = {}): ColorSuggestion[] {
    const {
        quantizeColors = QUANTIZE_COLORS,
        maxColors = MAX_COLORS,
        method = "median-cut",
        seed = DEFAULT_SEED,
        palette = getYarnPalette(),
    } = options;

    assertColorCount("maxColors", maxColors);
    const representatives = quantizeImage(image, quantizeColors, method, seed);

    const totals = new Map<number, ColorSuggestion>();
    for (const representative of representatives) {
        const color = nearestPaletteColor(representative.lab, palette.colors);
        const existing = totals.get(color.id);
        if (existing) {
            existing.pixelCount += representative.pixelCount;
        } else {
            totals.set(color.id, { color, pixelCount: representative.pixelCount });
        }
    }

    return [...totals.values()]
        .sort((a, b) => b.pixelCount - a.pixelCount)
        .slice(0, maxColors);
}
