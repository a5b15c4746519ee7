/**
 * Decoded image cache shared by the image tools
 * Images are registered once (image_register) and referred to by id afterwards
 */

import { createHash } from "crypto";
import { config } from "../config.js";
import { ImageDecodeError } from "../lib/errors.js";
import { decodeImage, type RasterImage } from "../lib/raster.js";

/**
 * Cached image data structure
 */
export interface CachedImage {
    raster: RasterImage;
    lastAccessed: number; // Timestamp for LRU eviction
}

export interface ImageReference {
    imageId?: string;
    imageBase64?: string;
    maxSize?: number;
}

/**
 * Key: hash(imageBase64 + maxSize) -> CachedImage
 */
const imageCache = new Map<string, CachedImage>();
const MAX_CACHE_SIZE = 5;

/**
 * Debug stats for testing
 * Always created - tests can access and reset via beforeEach
 */
export const debugStats: { cacheHits: number; cacheMisses: number } = { cacheHits: 0, cacheMisses: 0 };

/**
 * Clear cache for testing (exported for test use)
 */
export function clearImageCache(): void {
    imageCache.clear();
}

/**
 * Get cache size (exported for health endpoint)
 */
export function getImageCacheSize(): number {
    return imageCache.size;
}

/**
 * Extracts base64 data from data URL if present
 */
export function extractBase64(data: string): string {
    // Handle data URL format: data:image/png;base64,<base64>
    const comma = data.indexOf(",");
    return comma >= 0 ? data.slice(comma + 1) : data;
}

export function generateCacheKey(base64Data: string, maxSize: number): string {
    const hash = createHash("sha256");
    hash.update(base64Data);
    hash.update(String(maxSize));
    return hash.digest("hex");
}

/**
 * Gets cached image or null if not found
 */
export function getCachedImage(key: string): CachedImage | null {
    const cached = imageCache.get(key);
    if (cached) {
        cached.lastAccessed = Date.now();
        debugStats.cacheHits++;
        return cached;
    }
    debugStats.cacheMisses++;
    return null;
}

/**
 * Stores image in cache with LRU eviction
 */
function setCachedImage(key: string, raster: RasterImage): void {
    if (imageCache.size >= MAX_CACHE_SIZE && !imageCache.has(key)) {
        let oldestKey: string | null = null;
        let oldestTime = Infinity;

        for (const [k, v] of imageCache.entries()) {
            if (v.lastAccessed < oldestTime) {
                oldestTime = v.lastAccessed;
                oldestKey = k;
            }
        }

        if (oldestKey !== null) {
            imageCache.delete(oldestKey);
        }
    }

    imageCache.set(key, { raster, lastAccessed: Date.now() });
}

/**
 * Decodes a base64 image (or reuses the cached decode) and returns its id
 * @throws ImageDecodeError when the data is not a readable image
 */
export async function registerImage(imageBase64: string, maxSize: number = config.maxImageSize): Promise<{ imageId: string; raster: RasterImage }> {
    const base64Data = extractBase64(imageBase64);
    const imageId = generateCacheKey(base64Data, maxSize);

    const cached = getCachedImage(imageId);
    if (cached) {
        return { imageId, raster: cached.raster };
    }

    const raster = await decodeImage(Buffer.from(base64Data, "base64"), { maxSize });
    setCachedImage(imageId, raster);
    return { imageId, raster };
}

/**
 * Image for a tool call, by id or from inline base64
 * @throws ImageDecodeError when neither is given, the id is unknown or the data is unreadable
 */
export async function resolveImage(ref: ImageReference): Promise<RasterImage> {
    if (ref.imageId) {
        const cached = getCachedImage(ref.imageId);
        if (!cached) {
            throw new ImageDecodeError(
                `Image with ID '${ref.imageId}' not found in cache. Register the image first using image_register.`
            );
        }
        return cached.raster;
    }

    if (ref.imageBase64) {
        const { raster } = await registerImage(ref.imageBase64, ref.maxSize);
        return raster;
    }

    throw new ImageDecodeError("Either 'imageId' or 'imageBase64' must be provided");
}
