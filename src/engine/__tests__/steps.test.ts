/**
 * Unit tests for the step generator
 */

import { describe, it, expect } from 'vitest';
import { IndexError } from '../../lib/errors.js';
import {
    describeInstruction,
    describeStep,
    directionForRow,
    encodeRuns,
    flattenInstructions,
    generateRowStep,
    generateSteps,
    regenerateSteps,
    runSpan,
} from '../steps.js';
import { BLUE_ID, RED_ID, twoRowGrid, uniformGrid } from './helpers.js';

describe('generateSteps', () => {
    it('should alternate direction and read odd rows right to left', () => {
        const steps = generateSteps(twoRowGrid());

        expect(steps).toEqual([
            {
                rowIndex: 0,
                direction: 'ltr',
                runs: [
                    { colorId: BLUE_ID, count: 2 },
                    { colorId: RED_ID, count: 1 },
                ],
            },
            {
                rowIndex: 1,
                direction: 'rtl',
                runs: [
                    { colorId: RED_ID, count: 2 },
                    { colorId: BLUE_ID, count: 1 },
                ],
            },
        ]);
    });

    it('should make run counts add up to the row width', () => {
        const grid = uniformGrid(7, 4);
        for (const step of generateSteps(grid)) {
            expect(step.runs.reduce((sum, run) => sum + run.count, 0)).toBe(7);
        }
    });

    it('should return frozen steps', () => {
        const [step] = generateSteps(twoRowGrid());
        expect(Object.isFrozen(step)).toBe(true);
        expect(Object.isFrozen(step.runs)).toBe(true);
    });
});

describe('directionForRow and encodeRuns', () => {
    it('should start every even row on the left', () => {
        expect([0, 1, 2, 3].map(directionForRow)).toEqual(['ltr', 'rtl', 'ltr', 'rtl']);
    });

    it('should never emit adjacent runs of the same color', () => {
        expect(encodeRuns([1, 1, 2, 1, 1, 1])).toEqual([
            { colorId: 1, count: 2 },
            { colorId: 2, count: 1 },
            { colorId: 1, count: 3 },
        ]);
        expect(encodeRuns([])).toEqual([]);
    });
});

describe('generateRowStep', () => {
    it('should reject rows outside the grid', () => {
        expect(() => generateRowStep(twoRowGrid(), 2)).toThrow(IndexError);
        expect(() => generateRowStep(twoRowGrid(), -1)).toThrow(/ERROR-ST-03/);
    });
});

describe('regenerateSteps', () => {
    it('should reuse steps for untouched rows', () => {
        const grid = twoRowGrid();
        const steps = generateSteps(grid);
        const next = regenerateSteps(steps, grid, [1]);
        expect(next[0]).toBe(steps[0]);
        expect(next[1]).not.toBe(steps[1]);
        expect(next[1]).toEqual(steps[1]);
    });

    it('should reject a step list that does not match the grid', () => {
        const grid = twoRowGrid();
        expect(() => regenerateSteps([], grid, [0])).toThrow(IndexError);
    });
});

describe('flattenInstructions', () => {
    it('should number runs across rows with their grid columns', () => {
        const grid = twoRowGrid();
        const instructions = flattenInstructions(generateSteps(grid), grid.width);

        expect(instructions.map((i) => [i.stepNumber, i.rowIndex, i.runIndex, i.startColumn, i.endColumn, i.isRowStart])).toEqual([
            [1, 0, 0, 0, 2, true],
            [2, 0, 1, 2, 3, false],
            [3, 1, 0, 1, 3, true],
            [4, 1, 1, 0, 1, false],
        ]);
    });
});

describe('runSpan', () => {
    it('should map a right-to-left run back to grid columns', () => {
        const grid = twoRowGrid();
        const step = generateRowStep(grid, 1);
        expect(runSpan(step, grid.width, 0)).toEqual({ startColumn: 1, endColumn: 3 });
        expect(runSpan(step, grid.width, 1)).toEqual({ startColumn: 0, endColumn: 1 });
    });

    it('should reject a run index past the last run', () => {
        const grid = twoRowGrid();
        expect(() => runSpan(generateRowStep(grid, 0), grid.width, 2)).toThrow(IndexError);
    });
});

describe('text descriptions', () => {
    it('should describe a row with its direction and runs', () => {
        const step = generateRowStep(twoRowGrid(), 1);
        expect(describeStep(step)).toBe('Row 2 (right to left): 2 Red, 1 Blue');
    });

    it('should describe single instructions', () => {
        const grid = twoRowGrid();
        const instructions = flattenInstructions(generateSteps(grid), grid.width);
        expect(describeInstruction(instructions[0])).toBe('Step 1: 2 stitches of Blue (row 1)');
        expect(describeInstruction(instructions[3])).toBe('Step 4: 1 stitch of Blue (row 2)');
    });
});
