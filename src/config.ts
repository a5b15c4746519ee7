/**
 * Process-wide configuration
 * Fixed pipeline constants plus environment overrides, parsed once at startup
 */

import { resolve } from "path";
import { z } from "zod";

/**
 * Pixel size of one stitch in the grid visualization
 */
export const CELL_SIZE = 20;

/**
 * Largest side (px) of a rendered grid image; big grids get smaller cells
 */
export const MAX_GRID_IMAGE_SIDE = 4096;

/**
 * Grid dimensions accepted by the grid builder (stitches per side)
 */
export const MIN_GRID_DIMENSION = 1;
export const MAX_GRID_DIMENSION = 400;

/**
 * Longest-side recommendation bounds (stitches)
 */
export const RECOMMENDED_SIZE_FLOOR = 100;
export const RECOMMENDED_SIZE_CEILING = 400;
export const SIZE_RANGE_FLOOR = 80;
export const SIZE_RANGE_CEILING = 500;

/**
 * Color extraction: representative colors before palette matching, and the
 * number of yarn colors kept afterwards
 */
export const QUANTIZE_COLORS = 32;
export const MAX_COLORS = 10;
export const DEFAULT_SEED = 42;

/**
 * Complexity scoring
 */
export const EDGE_THRESHOLD = 30;
export const EDGE_SATURATION = 0.2;
export const COLOR_WEIGHT = 0.4;
export const EDGE_WEIGHT = 0.6;
export const HIGH_TIER_THRESHOLD = 0.65;
export const MEDIUM_TIER_THRESHOLD = 0.35;

/**
 * Composite step image
 */
export const COMPOSITE_WIDTH = 800;
export const COMPOSITE_HEIGHT = 900;
export const COMPOSITE_ZOOM = 20;

const envSchema = z.object({
    NODE_ENV: z.string().optional(),
    VITEST: z.string().optional(),
    VERSION: z.string().optional(),
    ENABLE_PERF_LOGS: z.enum(["0", "1"]).optional(),
    STITCHGRID_PALETTE_PATH: z.string().min(1).optional(),
    STITCHGRID_MAX_IMAGE_SIZE: z.coerce.number().int().positive().optional(),
});

export interface StitchGridConfig {
    readonly palettePath: string;
    readonly maxImageSize: number;
    readonly perfLogs: boolean;
    readonly isTest: boolean;
    readonly version?: string;
}

/**
 * Builds the configuration from an environment map
 * @throws Error naming the offending variable when an override is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StitchGridConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid environment variable ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown"}`);
    }

    const vars = parsed.data;
    const isTest = vars.NODE_ENV === "test" || vars.VITEST !== undefined;
    const perfLogs = vars.ENABLE_PERF_LOGS === "1" || (vars.NODE_ENV !== "production" && !isTest);

    return Object.freeze({
        palettePath: resolve(process.cwd(), vars.STITCHGRID_PALETTE_PATH ?? "src/data/yarn.json"),
        maxImageSize: vars.STITCHGRID_MAX_IMAGE_SIZE ?? 2048,
        perfLogs: vars.ENABLE_PERF_LOGS === "0" ? false : perfLogs,
        isTest,
        version: vars.VERSION,
    });
}

export const config: StitchGridConfig = loadConfig();
