/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import { z } from "zod";
import type { ToolDefinition } from "./types.js";
import { healthTool, healthHandler } from "./health.js";
import { generateIdenticonTool, generateIdenticonHandler } from "./generate_identicon.js";
import { renderIdenticonTool, renderIdenticonHandler } from "./render_identicon.js";

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = [healthTool, generateIdenticonTool, renderIdenticonTool];

/**
 * Argument schemas, checked before a handler runs
 */
export const toolSchemas = {
    health: z.object({}).passthrough(),
    generate_identicon: z.object({
        input: z.string(),
        name: z.string().min(1).optional(),
        outputDir: z.string().min(1).optional(),
    }),
    render_identicon: z.object({
        input: z.string(),
    }),
};

export type ToolName = keyof typeof toolSchemas;

/**
 * Map of tool names to their handlers
 */
export const toolHandlers: {
    [K in ToolName]: (args: z.infer<(typeof toolSchemas)[K]>) => Promise<unknown> | unknown;
} = {
    health: () => healthHandler(tools.length),
    generate_identicon: (args) => generateIdenticonHandler(args),
    render_identicon: (args) => renderIdenticonHandler(args),
};

export type { ToolDefinition };
