/**
 * Yarn color palette
 * Loaded once per process from the JSON dataset, with Lab values precomputed
 */

import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { config } from "../../config.js";
import { PaletteLoadError, PaletteMismatchError } from "../errors.js";
import { hexToRgb, rgbToLab, type Lab, type RGB } from "../color/lab.js";

export interface PaletteColor {
    readonly id: number;
    readonly name: string;
    readonly hex: string;
    readonly rgb: Readonly<RGB>;
    readonly lab: Readonly<Lab>;
}

export interface YarnPalette {
    /** Ascending id */
    readonly colors: readonly PaletteColor[];
    readonly byId: ReadonlyMap<number, PaletteColor>;
}

const datasetSchema = z
    .array(
        z.object({
            id: z.number().int().positive(),
            name: z.string().min(1),
            hex: z.string().regex(/^#?[0-9a-fA-F]{6}$/),
        })
    )
    .min(1);

let cachedPalette: YarnPalette | null = null;

/**
 * Parses a palette dataset (array of {id, name, hex})
 * @throws PaletteLoadError on schema violations or duplicate ids
 */
export function parsePalette(raw: unknown): YarnPalette {
    const parsed = datasetSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new PaletteLoadError(
            `Invalid palette dataset at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`
        );
    }

    const byId = new Map<number, PaletteColor>();
    for (const entry of parsed.data) {
        if (byId.has(entry.id)) {
            throw new PaletteLoadError(`Duplicate palette id ${entry.id}`);
        }
        const rgb = hexToRgb(entry.hex);
        if (!rgb) {
            throw new PaletteLoadError(`Invalid hex color in dataset: ${entry.hex} for ${entry.name}`);
        }
        byId.set(
            entry.id,
            Object.freeze({
                id: entry.id,
                name: entry.name,
                hex: `#${entry.hex.replace(/^#/, "").toUpperCase()}`,
                rgb: Object.freeze(rgb),
                lab: Object.freeze(rgbToLab(rgb)),
            })
        );
    }

    const colors = [...byId.values()].sort((a, b) => a.id - b.id);
    return Object.freeze({ colors: Object.freeze(colors), byId });
}

/**
 * Reads and parses a palette file
 */
export function loadPaletteFile(path: string): YarnPalette {
    if (!existsSync(path)) {
        throw new PaletteLoadError(`Palette dataset not found: ${path}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new PaletteLoadError(
            `Failed to read palette dataset: ${error instanceof Error ? error.message : "Unknown error"}`,
            { cause: error }
        );
    }
    return parsePalette(raw);
}

/**
 * Process-wide palette, read on first use and shared read-only afterwards
 */
export function getYarnPalette(): YarnPalette {
    if (cachedPalette === null) {
        cachedPalette = loadPaletteFile(config.palettePath);
    }
    return cachedPalette;
}

/**
 * Check if the palette dataset has been loaded (exported for health endpoint)
 */
export function isPaletteLoaded(): boolean {
    return cachedPalette !== null;
}

/**
 * Looks up colors by id, preserving the order of `ids`
 * @throws PaletteMismatchError when an id is not in the palette
 */
export function resolvePaletteColors(ids: readonly number[], palette: YarnPalette = getYarnPalette()): PaletteColor[] {
    return ids.map((id) => {
        const color = palette.byId.get(id);
        if (!color) {
            throw new PaletteMismatchError(`Palette has no color with id ${id}`);
        }
        return color;
    });
}
