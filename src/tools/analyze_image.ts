/**
 * Complexity analysis and grid size recommendation for an image
 */

import { z } from "zod";
import { analyze, type ComplexityScore, type SizeRecommendation } from "../engine/complexity.js";
import { resolveImage } from "./image_cache.js";
import { imageRefProperties, imageRefShape, toolFailure, type ToolFailure, type ToolDefinition } from "./schemas.js";

export const analyzeImageSchema = z.object(imageRefShape);

export type AnalyzeImageInput = z.infer<typeof analyzeImageSchema>;

export type AnalyzeImageOutput =
    | { ok: true; width: number; height: number; score: ComplexityScore; recommendation: SizeRecommendation }
    | ToolFailure;

export async function analyzeImageHandler(input: AnalyzeImageInput): Promise<AnalyzeImageOutput> {
    try {
        const image = await resolveImage(input);
        const { score, recommendation } = analyze(image);
        return { ok: true, width: image.width, height: image.height, score, recommendation };
    } catch (error) {
        return toolFailure(error);
    }
}

export const analyzeImageTool: ToolDefinition = {
    name: "analyze_image",
    description: "Scores an image's edge density and color variety and recommends a stitch grid size.",
    inputSchema: {
        type: "object",
        properties: imageRefProperties,
    },
};
