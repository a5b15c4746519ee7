#!/usr/bin/env node
import { StitchGridServer } from "./server.js";

const server = new StitchGridServer();
server.run().catch((error: unknown) => {
    console.error("[MCP Error]", error);
    process.exit(1);
});
