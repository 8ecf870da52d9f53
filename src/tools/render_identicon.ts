/**
 * render_identicon tool
 * Runs the pipeline in memory and returns every stage's output plus the PNG as base64
 */

import { renderIdenticon } from "../lib/identicon/index.js";
import { rgbToHex, type RGB } from "../lib/color/rgb.js";
import type { GridCell, PixelRect } from "../lib/identicon/image.js";
import type { ToolDefinition } from "./types.js";

export interface RenderIdenticonInput {
    input: string;
}

export interface RenderIdenticonOutput {
    ok: true;
    hex: readonly number[];
    color: Readonly<RGB>;
    colorHex: string;
    grid: readonly GridCell[];
    pixelMap: readonly PixelRect[];
    pngBase64: string;
}

export async function renderIdenticonHandler(input: RenderIdenticonInput): Promise<RenderIdenticonOutput> {
    const { hex, color, grid, pixelMap, png } = await renderIdenticon(input.input);
    return {
        ok: true,
        hex,
        color,
        colorHex: rgbToHex(color),
        grid,
        pixelMap,
        pngBase64: png.toString("base64"),
    };
}

/**
 * render_identicon tool definition for MCP
 */
export const renderIdenticonTool: ToolDefinition = {
    name: "render_identicon",
    description: "Computes the identicon for an input string without writing a file. Returns hash bytes, color, filtered grid, pixel map and the PNG as base64.",
    inputSchema: {
        type: "object",
        properties: {
            input: {
                type: "string",
                description: "String to derive the identicon from",
            },
        },
        required: ["input"],
    },
};
