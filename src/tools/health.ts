/**
 * Health check tool - Returns server status and metrics
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import type { ToolDefinition } from "./schemas.js";
import { config } from "../config.js";
import { isPaletteLoaded } from "../lib/palette/yarn.js";
import { debugStats, getImageCacheSize } from "./image_cache.js";

export const healthSchema = z.object({});

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    datasets: {
        palette: boolean;
    };
    cache: {
        images: number;
        hits: number;
        misses: number;
    };
}

const startTime = Date.now();

const packageSchema = z.object({ version: z.string().optional() });

/**
 * Get version from the environment or package.json
 */
function getVersion(): string {
    if (config.version) {
        return config.version;
    }

    try {
        const packagePath = resolve(process.cwd(), "package.json");
        const parsed = packageSchema.safeParse(JSON.parse(readFileSync(packagePath, "utf-8")));
        return parsed.success && parsed.data.version ? parsed.data.version : "unknown";
    } catch {
        return "unknown";
    }
}

/**
 * Health check handler - Returns server status and metrics
 * @param toolCount - Number of registered tools, supplied by the registry
 * @returns HealthOutput with server information
 */
export function healthHandler(toolCount: number): HealthOutput {
    return {
        ok: true,
        version: getVersion(),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        datasets: {
            palette: isPaletteLoaded(),
        },
        cache: {
            images: getImageCacheSize(),
            hits: debugStats.cacheHits,
            misses: debugStats.cacheMisses,
        },
    };
}

export const healthTool: ToolDefinition = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count, palette availability, and image cache statistics",
    inputSchema: {
        type: "object",
        properties: {},
    },
};
