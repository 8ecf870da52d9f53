import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { ZodError } from "zod";
import { tools, toolHandlers, toolSchemas } from "./tools/index.js";
import { loadConfig } from "./lib/config.js";

const isTestEnv = () => process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";

function invalidParams(toolName: string, error: ZodError): McpError {
    return new McpError(
        ErrorCode.InvalidParams,
        error.issues[0]?.message || `Invalid parameters for ${toolName}`
    );
}

function jsonContent(result: unknown) {
    return {
        content: [
            {
                type: "text" as const,
                text: JSON.stringify(result, null, 2),
            },
        ],
    };
}

/**
 * Identicon MCP Server
 * Exposes the identicon pipeline as tools
 */
export class IdenticonServer {
    private server: Server;

    constructor() {
        this.server = new Server(
            {
                name: "identicon-forge",
                version: loadConfig().version,
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        this.server.onerror = (error) => console.error("[MCP Error]", error);

        if (!isTestEnv()) {
            process.on("SIGINT", () => {
                this.server
                    .close()
                    .catch((error: unknown) => console.error("[MCP Error]", error))
                    .finally(() => process.exit(0));
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;
            const args = request.params.arguments ?? {};

            try {
                switch (toolName) {
                    case "health": {
                        const parseResult = toolSchemas.health.safeParse(args);
                        if (!parseResult.success) {
                            throw invalidParams(toolName, parseResult.error);
                        }
                        return jsonContent(toolHandlers.health(parseResult.data));
                    }
                    case "generate_identicon": {
                        const parseResult = toolSchemas.generate_identicon.safeParse(args);
                        if (!parseResult.success) {
                            throw invalidParams(toolName, parseResult.error);
                        }
                        return jsonContent(await toolHandlers.generate_identicon(parseResult.data));
                    }
                    case "render_identicon": {
                        const parseResult = toolSchemas.render_identicon.safeParse(args);
                        if (!parseResult.success) {
                            throw invalidParams(toolName, parseResult.error);
                        }
                        return jsonContent(await toolHandlers.render_identicon(parseResult.data));
                    }
                }
            } catch (error) {
                if (error instanceof McpError) {
                    throw error;
                }
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }

            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !isTestEnv()) {
            console.error("Identicon MCP server running on stdio");
        }
    }

    getServer(): Server {
        return this.server;
    }
}
