/**
 * Ping tool - liveness check and echo utility
 */

import { z } from "zod";
import type { ToolDefinition } from "./schemas.js";

export const pingSchema = z.object({
    message: z.string().optional(),
});

export type PingInput = z.infer<typeof pingSchema>;

export interface PingOutput {
    ok: true;
    echo: string;
    timestamp: string;
}

/**
 * Returns the message (default "pong") with the current time
 */
export function pingHandler(input: PingInput = {}): PingOutput {
    return {
        ok: true,
        echo: input.message || "pong",
        timestamp: new Date().toISOString(),
    };
}

export const pingTool: ToolDefinition = {
    name: "ping",
    description: "Liveness check that echoes a message with a timestamp",
    inputSchema: {
        type: "object",
        properties: {
            message: {
                type: "string",
                description: "Optional message to echo (default: 'pong')",
            },
        },
    },
};
