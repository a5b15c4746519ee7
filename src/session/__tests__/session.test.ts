/**
 * Unit tests for the pattern session state machine
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IndexError, SessionStateError } from '../../lib/errors.js';
import { defaultCore, PatternSession, type PatternCore } from '../session.js';
import { paintRaster } from '../../engine/__tests__/helpers.js';

const BLUE = { r: 0, g: 0, b: 255 };
const WHITE = { r: 255, g: 255, b: 255 };

// Left half blue, right half white
const image = () => paintRaster(4, 4, (x) => (x < 2 ? BLUE : WHITE));

function countingCore() {
    return {
        analyze: vi.fn(defaultCore.analyze),
        buildPattern: vi.fn(defaultCore.buildPattern),
        generateSteps: vi.fn(defaultCore.generateSteps),
        renderComposite: vi.fn(defaultCore.renderComposite),
        applyColorEdits: vi.fn(defaultCore.applyColorEdits),
    } satisfies PatternCore;
}

async function steppingSession(core: PatternCore = defaultCore): Promise<PatternSession> {
    const session = new PatternSession(core);
    await session.dispatch({ type: 'imageReceived', image: image() });
    await session.dispatch({ type: 'sizeChosen', gridWidth: 2, gridHeight: 2 });
    return session;
}

describe('PatternSession', () => {
    let session: PatternSession;

    beforeEach(() => {
        session = new PatternSession();
    });

    describe('happy path', () => {
        it('should analyze an image and wait for a size', async () => {
            const result = await session.dispatch({ type: 'imageReceived', image: image() });
            expect(result.state).toBe('awaitingSize');
            expect(result.analysis?.recommendation.tier).toBe('medium');
            expect(session.state).toBe('awaitingSize');
        });

        it('should build the pattern and its steps when the size is chosen', async () => {
            await session.dispatch({ type: 'imageReceived', image: image() });
            const result = await session.dispatch({ type: 'sizeChosen', gridWidth: 2, gridHeight: 2 });

            expect(result.state).toBe('stepping');
            expect(result.rowIndex).toBe(0);
            expect(session.currentGrid?.cells).toEqual([32, 2, 32, 2]);
            expect(session.currentGrid?.paletteIds).toEqual([2, 32]);
            expect(session.currentSteps.map((s) => s.direction)).toEqual(['ltr', 'rtl']);
        });

        it('should render the composite for the row it moves to', async () => {
            const stepping = await steppingSession();
            const result = await stepping.dispatch({ type: 'navigate', to: 'next' });

            expect(result.rowIndex).toBe(1);
            expect(result.composite?.width).toBe(800);
            expect(stepping.rowIndex).toBe(1);
        });

        it('should apply edits and refresh the affected steps', async () => {
            const stepping = await steppingSession();
            await stepping.dispatch({ type: 'editRequested' });
            expect(stepping.state).toBe('editing');

            const result = await stepping.dispatch({
                type: 'editSubmitted',
                edits: [{ rowIndex: 1, columnIndex: 0, newColorId: 2 }],
            });

            expect(result.state).toBe('stepping');
            expect(result.affectedRows).toEqual([1]);
            expect(stepping.currentGrid?.cells).toEqual([32, 2, 2, 2]);
            expect(stepping.currentSteps[1].runs).toEqual([{ colorId: 2, count: 2 }]);
        });

        it('should finish and accept a new image afterwards', async () => {
            const stepping = await steppingSession();
            await stepping.dispatch({ type: 'finish' });
            expect(stepping.state).toBe('finished');

            await stepping.dispatch({ type: 'imageReceived', image: image() });
            expect(stepping.state).toBe('awaitingSize');
            expect(stepping.currentGrid).toBeNull();
        });
    });

    describe('rejected actions', () => {
        it('should refuse actions the state does not accept', async () => {
            await expect(session.dispatch({ type: 'navigate', to: 'next' })).rejects.toBeInstanceOf(SessionStateError);
            await expect(session.dispatch({ type: 'finish' })).rejects.toThrow(/ERROR-ST-06/);
            expect(session.state).toBe('idle');
        });

        it('should refuse navigation while editing', async () => {
            const stepping = await steppingSession();
            await stepping.dispatch({ type: 'editRequested' });
            await expect(stepping.dispatch({ type: 'navigate', to: 'prev' })).rejects.toBeInstanceOf(SessionStateError);
            expect(stepping.state).toBe('editing');
        });

        it('should keep the current row when navigating past the grid', async () => {
            const stepping = await steppingSession();
            await expect(stepping.dispatch({ type: 'navigate', to: 'prev' })).rejects.toBeInstanceOf(IndexError);
            await expect(stepping.dispatch({ type: 'navigate', to: { row: 2 } })).rejects.toBeInstanceOf(IndexError);
            expect(stepping.rowIndex).toBe(0);
            expect(stepping.state).toBe('stepping');
        });

        it('should stay in editing when an edit is invalid', async () => {
            const stepping = await steppingSession();
            await stepping.dispatch({ type: 'editRequested' });
            await expect(
                stepping.dispatch({ type: 'editSubmitted', edits: [{ rowIndex: 0, columnIndex: 0, newColorId: 12 }] })
            ).rejects.toThrow(/ERROR-ST-04/);
            expect(stepping.state).toBe('editing');
            expect(stepping.currentGrid?.cells).toEqual([32, 2, 32, 2]);
        });
    });

    describe('cancel and reset', () => {
        it('should return to stepping without changes on cancel', async () => {
            const stepping = await steppingSession();
            await stepping.dispatch({ type: 'editRequested' });
            await stepping.dispatch({ type: 'editCancelled' });
            expect(stepping.state).toBe('stepping');
            expect(stepping.currentGrid?.cells).toEqual([32, 2, 32, 2]);
        });

        it('should clear everything on reset', async () => {
            const stepping = await steppingSession();
            await stepping.dispatch({ type: 'reset' });
            expect(stepping.snapshot()).toEqual({ state: 'idle', analysis: null, pattern: null, rowIndex: 0 });
        });
    });

    describe('core usage', () => {
        it('should run one image operation per transition', async () => {
            const core = countingCore();
            const stepping = await steppingSession(core);

            expect(core.analyze).toHaveBeenCalledTimes(1);
            expect(core.buildPattern).toHaveBeenCalledTimes(1);
            expect(core.renderComposite).not.toHaveBeenCalled();

            await stepping.dispatch({ type: 'navigate', to: { row: 1 } });
            expect(core.renderComposite).toHaveBeenCalledTimes(1);
            expect(core.buildPattern).toHaveBeenCalledTimes(1);
        });

        it('should pass the selected run as the highlight', async () => {
            const core = countingCore();
            const stepping = await steppingSession(core);

            await stepping.dispatch({ type: 'navigate', to: { row: 0 }, highlightRun: 1 });

            const spec = core.renderComposite.mock.calls[0][3];
            expect(spec?.highlightRegion).toEqual({ startColumn: 1, endColumn: 2 });
        });
    });
});
