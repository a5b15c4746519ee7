/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { pingTool, pingHandler, pingSchema } from "./ping.js";
import { healthTool, healthHandler, healthSchema } from "./health.js";
import { imageRegisterTool, imageRegisterHandler, imageRegisterSchema } from "./image_register.js";
import { analyzeImageTool, analyzeImageHandler, analyzeImageSchema } from "./analyze_image.js";
import { buildPatternTool, buildPatternHandler, buildPatternSchema } from "./build_pattern.js";
import { generateStepsTool, generateStepsHandler, generateStepsSchema } from "./generate_steps.js";
import { renderStepTool, renderStepHandler, renderStepSchema } from "./render_step.js";
import { applyColorEditsTool, applyColorEditsHandler, applyColorEditsSchema } from "./apply_color_edits.js";
import { exportPdfTool, exportPdfHandler, exportPdfSchema } from "./export_pdf.js";
import type { ToolDefinition } from "./schemas.js";

export type { ToolDefinition };

/**
 * Tool handler function type; arguments are validated before the tool runs
 */
export type ToolHandler = (args: unknown) => Promise<unknown>;

interface ToolEntry {
    definition: ToolDefinition;
    handler: ToolHandler;
}

/**
 * Pairs a definition with its argument schema and handler
 * Invalid arguments are rejected as InvalidParams before the handler runs
 */
function defineTool<T>(
    definition: ToolDefinition,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    handler: (input: T) => unknown
): ToolEntry {
    return {
        definition,
        handler: async (args: unknown) => {
            const parseResult = schema.safeParse(args ?? {});
            if (!parseResult.success) {
                throw new McpError(
                    ErrorCode.InvalidParams,
                    `Invalid parameters for ${definition.name}`
                );
            }
            return await handler(parseResult.data);
        },
    };
}

const entries: ToolEntry[] = [
    defineTool(pingTool, pingSchema, pingHandler),
    defineTool(healthTool, healthSchema, () => healthHandler(tools.length)),
    defineTool(imageRegisterTool, imageRegisterSchema, imageRegisterHandler),
    defineTool(analyzeImageTool, analyzeImageSchema, analyzeImageHandler),
    defineTool(buildPatternTool, buildPatternSchema, buildPatternHandler),
    defineTool(generateStepsTool, generateStepsSchema, generateStepsHandler),
    defineTool(renderStepTool, renderStepSchema, renderStepHandler),
    defineTool(applyColorEditsTool, applyColorEditsSchema, applyColorEditsHandler),
    defineTool(exportPdfTool, exportPdfSchema, exportPdfHandler),
];

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = entries.map((entry) => entry.definition);

/**
 * Map of tool names to their handlers
 */
export const toolHandlers: Record<string, ToolHandler> = Object.fromEntries(
    entries.map((entry) => [entry.definition.name, entry.handler])
);
