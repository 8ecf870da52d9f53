#!/usr/bin/env node
import { IdenticonServer } from "./server.js";

const server = new IdenticonServer();
server.run().catch((error: unknown) => {
    console.error("[MCP Error]", error);
    process.exit(1);
});
