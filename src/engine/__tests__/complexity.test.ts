/**
 * Unit tests for the complexity analyzer
 */

import { describe, it, expect } from 'vitest';
import { ImageDecodeError, SizeError } from '../../lib/errors.js';
import {
    analyze,
    colorVarianceFromCount,
    countDistinctColors,
    edgeDensity,
    fitGridToLongestSide,
    recommendSize,
    tierForScore,
} from '../complexity.js';
import { paintRaster } from './helpers.js';

const uniform = () => paintRaster(10, 10, () => ({ r: 100, g: 150, b: 200 }));
const split = () =>
    paintRaster(10, 10, (x) => (x < 5 ? { r: 0, g: 0, b: 0 } : { r: 255, g: 255, b: 255 }));

describe('analyze', () => {
    it('should put a uniform image in the low tier without error', () => {
        const { score, recommendation } = analyze(uniform());

        expect(score.edgeDensity).toBe(0);
        expect(score.colorVariance).toBe(0);
        expect(score.combined).toBe(0);
        expect(recommendation.tier).toBe('low');
        expect(recommendation.gridWidth).toBe(1);
        expect(recommendation.gridHeight).toBe(1);
        expect(recommendation.longestSide).toBe(100);
        expect(recommendation.sizeRange).toEqual({ min: 80, max: 200 });
    });

    it('should score a hard vertical edge as saturated edge density', () => {
        const { score, recommendation } = analyze(split());

        // Columns 4 and 5 straddle the edge: 20 of 100 pixels
        expect(score.edgeDensity).toBe(1);
        expect(score.combined).toBeCloseTo(0.6 + 0.4 * (2 / 300), 10);
        expect(recommendation.tier).toBe('medium');
        expect(recommendation.gridWidth).toBe(2);
        expect(recommendation.percentRange).toEqual({ min: 0.2, max: 0.25 });
    });

    it('should keep every score within [0, 1]', () => {
        const noisy = paintRaster(16, 16, (x, y) => ({ r: (x * 37 + y * 11) % 256, g: (x * y * 13) % 256, b: (y * 53) % 256 }));
        const { score } = analyze(noisy);

        for (const value of [score.edgeDensity, score.colorVariance, score.combined]) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(1);
        }
    });

    it('should be deterministic', () => {
        expect(analyze(split())).toEqual(analyze(split()));
    });

    it('should reject an image with no pixels', () => {
        expect(() => analyze({ width: 0, height: 0, channels: 3, data: new Uint8Array(0) })).toThrow(ImageDecodeError);
    });
});

describe('edgeDensity and countDistinctColors', () => {
    it('should find no edges in a flat image', () => {
        expect(edgeDensity(uniform())).toBe(0);
    });

    it('should merge colors that agree in their top five bits', () => {
        const near = paintRaster(2, 1, (x) => (x === 0 ? { r: 8, g: 8, b: 8 } : { r: 15, g: 15, b: 15 }));
        expect(countDistinctColors(near)).toBe(1);
        expect(countDistinctColors(split())).toBe(2);
    });
});

describe('colorVarianceFromCount', () => {
    it('should give a single color zero variance', () => {
        expect(colorVarianceFromCount(0)).toBe(0);
        expect(colorVarianceFromCount(1)).toBe(0);
        expect(colorVarianceFromCount(2)).toBeCloseTo(2 / 300, 10);
    });

    it('should follow the piecewise mapping', () => {
        expect(colorVarianceFromCount(99)).toBeCloseTo(0.33, 10);
        expect(colorVarianceFromCount(300)).toBeCloseTo(0.53, 10);
        expect(colorVarianceFromCount(500)).toBeCloseTo(0.73, 10);
        expect(colorVarianceFromCount(1000)).toBeCloseTo(0.98, 10);
        expect(colorVarianceFromCount(2000)).toBe(1);
    });
});

describe('tierForScore', () => {
    it('should use strict thresholds', () => {
        expect(tierForScore(0.66)).toBe('high');
        expect(tierForScore(0.65)).toBe('medium');
        expect(tierForScore(0.36)).toBe('medium');
        expect(tierForScore(0.35)).toBe('low');
    });
});

describe('recommendSize', () => {
    it('should scale a landscape image for the high tier', () => {
        const rec = recommendSize(1000, 500, 'high');
        expect(rec.gridWidth).toBe(350);
        expect(rec.gridHeight).toBe(175);
        expect(rec.longestSide).toBe(350);
        expect(rec.sizeRange).toEqual({ min: 300, max: 450 });
    });

    it('should cap grid sides and the longest side at 400', () => {
        const rec = recommendSize(4000, 3000, 'high');
        expect(rec.gridWidth).toBe(400);
        expect(rec.gridHeight).toBe(400);
        expect(rec.longestSide).toBe(400);
        expect(rec.sizeRange).toEqual({ min: 350, max: 500 });
    });

    it('should round the longest side to a multiple of ten', () => {
        const rec = recommendSize(900, 600, 'medium');
        expect(rec.gridWidth).toBe(198);
        expect(rec.gridHeight).toBe(132);
        expect(rec.longestSide).toBe(200);
        expect(rec.sizeRange).toEqual({ min: 150, max: 300 });
    });

    it('should round a longest side ending in five up', () => {
        // floor(808 * 0.13) = 105
        const rec = recommendSize(808, 100, 'low');
        expect(rec.gridWidth).toBe(105);
        expect(rec.longestSide).toBe(110);
        expect(rec.sizeRange).toEqual({ min: 80, max: 210 });
    });

    it('should floor the size range at 80', () => {
        const rec = recommendSize(1000, 1000, 'low');
        expect(rec.longestSide).toBe(130);
        expect(rec.sizeRange).toEqual({ min: 80, max: 230 });
    });
});

describe('fitGridToLongestSide', () => {
    it('should keep the aspect ratio', () => {
        expect(fitGridToLongestSide(200, 100, 50)).toEqual({ gridWidth: 50, gridHeight: 25 });
        expect(fitGridToLongestSide(100, 300, 150)).toEqual({ gridWidth: 50, gridHeight: 150 });
    });

    it('should accept the inclusive bounds', () => {
        expect(fitGridToLongestSide(10, 10, 400)).toEqual({ gridWidth: 400, gridHeight: 400 });
        expect(fitGridToLongestSide(300, 10, 1)).toEqual({ gridWidth: 1, gridHeight: 1 });
    });

    it('should reject a longest side outside the grid range', () => {
        expect(() => fitGridToLongestSide(20, 10, 0)).toThrow(SizeError);
        expect(() => fitGridToLongestSide(20, 10, -5)).toThrow(SizeError);
        expect(() => fitGridToLongestSide(20, 10, 1000)).toThrow(/ERROR-ST-02/);
        expect(() => fitGridToLongestSide(20, 10, 12.5)).toThrow(SizeError);
    });
});
