/**
 * Unit tests for the yarn palette dataset
 */

import { describe, it, expect } from 'vitest';
import { PaletteLoadError, PaletteMismatchError } from '../../errors.js';
import { getYarnPalette, loadPaletteFile, parsePalette, resolvePaletteColors } from '../yarn.js';

describe('getYarnPalette', () => {
    it('loads 38 colors in ascending id order', () => {
        const palette = getYarnPalette();
        expect(palette.colors).toHaveLength(38);
        expect(palette.colors[0].name).toBe('Black');
        expect(palette.colors[37].name).toBe('Lavender');
        const ids = palette.colors.map((c) => c.id);
        expect(ids).toEqual([...ids].sort((a, b) => a - b));
    });

    it('returns the same frozen instance on every call', () => {
        const palette = getYarnPalette();
        expect(getYarnPalette()).toBe(palette);
        expect(Object.isFrozen(palette.colors)).toBe(true);
        expect(Object.isFrozen(palette.colors[0])).toBe(true);
    });

    it('precomputes rgb and Lab for each color', () => {
        const blue = getYarnPalette().byId.get(32);
        expect(blue?.name).toBe('Blue');
        expect(blue?.rgb).toEqual({ r: 0, g: 0, b: 255 });
        expect(blue?.lab.b).toBeLessThan(-100);
    });
});

describe('parsePalette', () => {
    it('normalizes hex to uppercase with a hash', () => {
        const palette = parsePalette([{ id: 3, name: 'Teal', hex: '008080' }]);
        expect(palette.byId.get(3)?.hex).toBe('#008080');
    });

    it('rejects duplicate ids', () => {
        expect(() =>
            parsePalette([
                { id: 1, name: 'A', hex: '#000000' },
                { id: 1, name: 'B', hex: '#FFFFFF' },
            ])
        ).toThrow(PaletteLoadError);
    });

    it('rejects malformed entries', () => {
        expect(() => parsePalette([{ id: 1, name: 'A', hex: 'red' }])).toThrow(/ERROR-ST-05/);
        expect(() => parsePalette([])).toThrow(PaletteLoadError);
    });

    it('reports a missing file', () => {
        expect(() => loadPaletteFile('/nonexistent/yarn.json')).toThrow(PaletteLoadError);
    });
});

describe('resolvePaletteColors', () => {
    it('keeps the requested order', () => {
        expect(resolvePaletteColors([2, 1]).map((c) => c.name)).toEqual(['White', 'Black']);
    });

    it('rejects unknown ids', () => {
        expect(() => resolvePaletteColors([999])).toThrow(PaletteMismatchError);
    });
});
