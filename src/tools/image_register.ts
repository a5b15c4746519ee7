/**
 * Image registration - decode once, refer to the image by id in later calls
 */

import { z } from "zod";
import { registerImage } from "./image_cache.js";
import { toolFailure, type ToolFailure, type ToolDefinition } from "./schemas.js";

export const imageRegisterSchema = z.object({
    imageBase64: z.string().min(1),
    maxSize: z.number().int().positive().optional(),
});

export type ImageRegisterInput = z.infer<typeof imageRegisterSchema>;

export type ImageRegisterOutput =
    | { ok: true; imageId: string; width: number; height: number }
    | ToolFailure;

export async function imageRegisterHandler(input: ImageRegisterInput): Promise<ImageRegisterOutput> {
    try {
        const { imageId, raster } = await registerImage(input.imageBase64, input.maxSize);
        return { ok: true, imageId, width: raster.width, height: raster.height };
    } catch (error) {
        return toolFailure(error);
    }
}

export const imageRegisterTool: ToolDefinition = {
    name: "image_register",
    description: "Registers a base64-encoded image and returns an imageId, so later pattern tools can refer to it without resending the data.",
    inputSchema: {
        type: "object",
        properties: {
            imageBase64: {
                type: "string",
                description: "Base64-encoded image data (with or without data URL prefix)",
            },
            maxSize: {
                type: "number",
                description: "Maximum dimension for image resize (default: 2048)",
            },
        },
        required: ["imageBase64"],
    },
};
