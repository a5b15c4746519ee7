/**
 * Pattern core: image in, stitch grid, steps and guide images out
 */

export { analyze, fitGridToLongestSide, recommendSize, tierForScore, TIER_PERCENTAGES } from "./complexity.js";
export type { ComplexityAnalysis, ComplexityScore, SizeRecommendation, SizeTier } from "./complexity.js";

export { colorDistance, nearestPaletteColor, quantizeImage, suggestColors } from "./quantize.js";
export type { ColorSuggestion, QuantizeMethod, RepresentativeColor, SuggestColorsOptions } from "./quantize.js";

export { buildPattern, buildPatternGrid, createPatternGrid, renderGridImage, renderPaletteImage, swatchEntries } from "./grid.js";
export type { BuildPatternOptions, PatternGrid, PatternResult, SwatchEntry } from "./grid.js";

export {
    describeInstruction,
    describeStep,
    flattenInstructions,
    generateRowStep,
    generateSteps,
    regenerateSteps,
    runSpan,
} from "./steps.js";
export type { Direction, Run, Step, StitchInstruction } from "./steps.js";

export { DEFAULT_COMPOSITE_SPEC, renderComposite } from "./composite.js";
export type { CompositeSpec, HighlightRegion } from "./composite.js";

export { applyColorEdits, editsForRun } from "./edits.js";
export type { ColorEditOverride, ColorEditResult } from "./edits.js";

export { renderInstructionsPdf } from "../export/pdf.js";
export { createRaster, decodeImage, encodePng, type RasterImage } from "../lib/raster.js";
export { getYarnPalette, type PaletteColor, type YarnPalette } from "../lib/palette/yarn.js";
export * from "../lib/errors.js";

export { PatternSession } from "../session/session.js";
export type { NavigateTarget, PatternCore, SessionAction, SessionState, TransitionResult } from "../session/session.js";
