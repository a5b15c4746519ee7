/**
 * Pattern session state machine
 *
 * Models the interactive flow around the pattern core for a single caller:
 * idle -> awaitingSize -> stepping <-> editing -> finished. Nothing is persisted;
 * callers keep the session object for as long as they need it.
 */

import { analyze, type ComplexityAnalysis } from "../engine/complexity.js";
import { applyColorEdits, type ColorEditOverride, type ColorEditResult } from "../engine/edits.js";
import { buildPattern, type BuildPatternOptions, type PatternGrid, type PatternResult } from "../engine/grid.js";
import { DEFAULT_COMPOSITE_SPEC, renderComposite, type CompositeSpec } from "../engine/composite.js";
import { generateSteps, regenerateSteps, runSpan, type Step } from "../engine/steps.js";
import { IndexError, SessionStateError } from "../lib/errors.js";
import type { RasterImage } from "../lib/raster.js";

export type SessionState = "idle" | "awaitingSize" | "stepping" | "editing" | "finished";

export type NavigateTarget = "next" | "prev" | { row: number };

export type SessionAction =
    | { type: "imageReceived"; image: RasterImage }
    | { type: "sizeChosen"; gridWidth: number; gridHeight: number; options?: BuildPatternOptions }
    | { type: "navigate"; to: NavigateTarget; highlightRun?: number }
    | { type: "editRequested" }
    | { type: "editSubmitted"; edits: readonly ColorEditOverride[] }
    | { type: "editCancelled" }
    | { type: "finish" }
    | { type: "reset" };

export type SessionActionType = SessionAction["type"];

/**
 * Core operations the session drives; swapped out in tests
 */
export interface PatternCore {
    analyze(image: RasterImage): ComplexityAnalysis;
    buildPattern(image: RasterImage, gridWidth: number, gridHeight: number, options?: BuildPatternOptions): Promise<PatternResult>;
    generateSteps(grid: PatternGrid): Step[];
    renderComposite(image: RasterImage, grid: PatternGrid, rowIndex: number, spec?: CompositeSpec): Promise<RasterImage>;
    applyColorEdits(grid: PatternGrid, edits: readonly ColorEditOverride[]): ColorEditResult;
}

export const defaultCore: PatternCore = {
    analyze,
    buildPattern,
    generateSteps,
    renderComposite,
    applyColorEdits,
};

export interface TransitionResult {
    state: SessionState;
    analysis?: ComplexityAnalysis;
    pattern?: PatternResult;
    rowIndex?: number;
    composite?: RasterImage;
    affectedRows?: number[];
}

const ACCEPTED: Readonly<Record<SessionState, readonly SessionActionType[]>> = {
    idle: ["imageReceived", "reset"],
    awaitingSize: ["imageReceived", "sizeChosen", "reset"],
    stepping: ["navigate", "editRequested", "finish", "reset"],
    editing: ["editSubmitted", "editCancelled", "reset"],
    finished: ["imageReceived", "reset"],
};

export class PatternSession {
    private current: SessionState = "idle";
    private image: RasterImage | null = null;
    private analysis: ComplexityAnalysis | null = null;
    private pattern: PatternResult | null = null;
    private grid: PatternGrid | null = null;
    private steps: Step[] = [];
    private row = 0;

    constructor(
        private readonly core: PatternCore = defaultCore,
        private readonly compositeSpec?: CompositeSpec
    ) {}

    get state(): SessionState {
        return this.current;
    }

    get rowIndex(): number {
        return this.row;
    }

    get currentGrid(): PatternGrid | null {
        return this.grid;
    }

    get currentSteps(): readonly Step[] {
        return this.steps;
    }

    accepts(type: SessionActionType): boolean {
        return ACCEPTED[this.current].includes(type);
    }

    /**
     * Applies one action
     * @throws SessionStateError when the action is not accepted in the current state
     */
    async dispatch(action: SessionAction): Promise<TransitionResult> {
        if (!this.accepts(action.type)) {
            throw new SessionStateError(`Action '${action.type}' is not accepted in state '${this.current}'`);
        }

        switch (action.type) {
            case "imageReceived": {
                const analysis = this.core.analyze(action.image);
                this.clear();
                this.image = action.image;
                this.analysis = analysis;
                this.current = "awaitingSize";
                return { state: this.current, analysis };
            }

            case "sizeChosen": {
                const image = this.requireImage();
                const pattern = await this.core.buildPattern(image, action.gridWidth, action.gridHeight, action.options);
                this.pattern = pattern;
                this.grid = pattern.grid;
                this.steps = this.core.generateSteps(pattern.grid);
                this.row = 0;
                this.current = "stepping";
                return { state: this.current, pattern, rowIndex: this.row };
            }

            case "navigate": {
                const grid = this.requireGrid();
                const target = this.resolveTarget(action.to, grid);
                const spec = this.specFor(grid, target, action.highlightRun);
                const composite = await this.core.renderComposite(this.requireImage(), grid, target, spec);
                this.row = target;
                return { state: this.current, rowIndex: target, composite };
            }

            case "editRequested":
                this.current = "editing";
                return { state: this.current, rowIndex: this.row };

            case "editSubmitted": {
                const result = this.core.applyColorEdits(this.requireGrid(), action.edits);
                this.grid = result.grid;
                this.steps = regenerateSteps(this.steps, result.grid, result.affectedRows);
                this.current = "stepping";
                return { state: this.current, rowIndex: this.row, affectedRows: result.affectedRows };
            }

            case "editCancelled":
                this.current = "stepping";
                return { state: this.current, rowIndex: this.row };

            case "finish":
                this.current = "finished";
                return { state: this.current };

            case "reset":
                this.clear();
                this.current = "idle";
                return { state: this.current };
        }
    }

    private clear(): void {
        this.image = null;
        this.analysis = null;
        this.pattern = null;
        this.grid = null;
        this.steps = [];
        this.row = 0;
    }

    private resolveTarget(to: NavigateTarget, grid: PatternGrid): number {
        const target = to === "next" ? this.row + 1 : to === "prev" ? this.row - 1 : to.row;
        if (!Number.isInteger(target) || target < 0 || target >= grid.height) {
            throw new IndexError(`Row ${target} is outside the grid (0-${grid.height - 1})`);
        }
        return target;
    }

    private specFor(grid: PatternGrid, rowIndex: number, runIndex: number | undefined): CompositeSpec | undefined {
        if (runIndex === undefined) {
            return this.compositeSpec;
        }
        const highlightRegion = runSpan(this.steps[rowIndex], grid.width, runIndex);
        return { ...(this.compositeSpec ?? DEFAULT_COMPOSITE_SPEC), highlightRegion };
    }

    private requireImage(): RasterImage {
        if (this.image === null) {
            throw new SessionStateError(`No image in state '${this.current}'`);
        }
        return this.image;
    }

    private requireGrid(): PatternGrid {
        if (this.grid === null) {
            throw new SessionStateError(`No pattern in state '${this.current}'`);
        }
        return this.grid;
    }

    /**
     * Analysis and pattern from the most recent image, if any
     */
    snapshot(): { state: SessionState; analysis: ComplexityAnalysis | null; pattern: PatternResult | null; rowIndex: number } {
        return { state: this.current, analysis: this.analysis, pattern: this.pattern, rowIndex: this.row };
    }
}
