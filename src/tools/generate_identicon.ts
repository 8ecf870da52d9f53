/**
 * generate_identicon tool
 * Renders the identicon for an input string and saves it as `<name>.png`
 */

import { createIdenticon, type CreateIdenticonOutput } from "../lib/identicon/index.js";
import { rgbToHex } from "../lib/color/rgb.js";
import type { ToolDefinition } from "./types.js";

export interface GenerateIdenticonInput {
    input: string;
    name?: string; // File name without extension (default: input)
    outputDir?: string; // Overrides IDENTICON_OUTPUT_DIR
}

export type GenerateIdenticonOutput =
    | (Extract<CreateIdenticonOutput, { ok: true }> & { colorHex: string })
    | Extract<CreateIdenticonOutput, { ok: false }>;

export async function generateIdenticonHandler(input: GenerateIdenticonInput): Promise<GenerateIdenticonOutput> {
    const result = await createIdenticon(input.input, {
        name: input.name,
        outputDir: input.outputDir,
    });

    if (!result.ok) {
        return result;
    }
    return { ...result, colorHex: rgbToHex(result.color) };
}

/**
 * generate_identicon tool definition for MCP
 */
export const generateIdenticonTool: ToolDefinition = {
    name: "generate_identicon",
    description: "Generates a deterministic 250x250 identicon PNG from an input string and writes it to <name>.png. Returns the file path, hash bytes and fill color.",
    inputSchema: {
        type: "object",
        properties: {
            input: {
                type: "string",
                description: "String to derive the identicon from",
            },
            name: {
                type: "string",
                description: "Output file name without extension (default: the input string)",
            },
            outputDir: {
                type: "string",
                description: "Directory to write into (default: IDENTICON_OUTPUT_DIR or the working directory)",
            },
        },
        required: ["input"],
    },
};
