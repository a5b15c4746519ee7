import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { config } from "./config.js";
import { tools, toolHandlers } from "./tools/index.js";

/**
 * StitchGrid MCP Server
 * Image to stitch pattern pipeline exposed as tools
 */
export class StitchGridServer {
    private server: Server;

    constructor() {
        this.server = new Server(
            {
                name: "stitchgrid-mcp",
                version: config.version ?? "1.0.0",
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);

        // Only set up SIGINT handler if not in test environment
        if (!config.isTest) {
            process.on("SIGINT", () => {
                this.server
                    .close()
                    .catch((error: unknown) => console.error("[MCP Error]", error))
                    .finally(() => process.exit(0));
            });
        }
    }

    private setupToolHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;
            const handler = toolHandlers[toolName];

            if (!handler) {
                throw new McpError(
                    ErrorCode.MethodNotFound,
                    `Unknown tool: ${toolName}`
                );
            }

            try {
                const result = await handler(request.params.arguments);
                return {
                    content: [
                        {
                            type: "text",
                            text: JSON.stringify(result, null, 2),
                        },
                    ],
                };
            } catch (error) {
                if (error instanceof McpError) {
                    throw error;
                }
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }
        });
    }

    async run(transport?: Transport): Promise<void> {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !config.isTest) {
            console.error("StitchGrid MCP server running on stdio");
        }
    }

    getServer(): Server {
        return this.server;
    }
}
