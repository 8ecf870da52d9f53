/**
 * Health check tool - Returns server status
 */

import { loadConfig } from "../lib/config.js";
import type { ToolDefinition } from "./types.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    outputDir: string;
}

// Track server start time
const startTime = Date.now();

/**
 * Health check handler
 * @param toolCount - Number of tools the server exposes
 */
export function healthHandler(toolCount: number): HealthOutput {
    const config = loadConfig();
    return {
        ok: true,
        version: config.version,
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        outputDir: config.outputDir,
    };
}

/**
 * Health tool definition for MCP
 */
export const healthTool: ToolDefinition = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count and output directory",
    inputSchema: {
        type: "object",
        properties: {},
    },
};
