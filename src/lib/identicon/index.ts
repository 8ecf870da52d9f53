/**
 * Identicon entry points
 * Runs the full pipeline: hash -> color -> grid -> filter -> pixel map -> PNG -> file
 */

import { loadConfig } from "../config.js";
import { IOError } from "../errors.js";
import type { RGB } from "../color/rgb.js";
import type { GridCell, PixelRect } from "./image.js";
import {
    buildGrid,
    buildPixelMap,
    filterOddSquares,
    hashInput,
    pickColor,
    type Hasher,
} from "./pipeline.js";
import { drawImage } from "./draw.js";
import { saveImage } from "./save.js";

export interface RenderIdenticonOptions {
    hasher?: Hasher; // Digest function (default: MD5)
}

export interface RenderedIdenticon {
    hex: readonly number[];
    color: Readonly<RGB>;
    grid: readonly GridCell[]; // Filtered grid (even cells only)
    pixelMap: readonly PixelRect[];
    png: Buffer;
}

export interface CreateIdenticonOptions extends RenderIdenticonOptions {
    name?: string; // File name without extension (default: the input itself)
    outputDir?: string; // Overrides IDENTICON_OUTPUT_DIR
}

export type CreateIdenticonOutput =
    | {
          ok: true;
          path: string;
          hex: readonly number[];
          color: Readonly<RGB>;
          cellCount: number; // Number of painted cells
      }
    | {
          ok: false;
          error: string;
      };

const perfNow = () => performance.now();

type StageTimings = Record<string, number>;

async function renderTimed(
    input: string,
    options: RenderIdenticonOptions,
    timings: StageTimings
): Promise<RenderedIdenticon> {
    let mark = perfNow();
    const lap = (stage: string) => {
        const now = perfNow();
        timings[stage] = now - mark;
        mark = now;
    };

    const hashed = hashInput(input, options.hasher);
    lap("hash");
    const colored = pickColor(hashed);
    lap("color");
    const gridded = buildGrid(colored);
    lap("grid");
    const filtered = filterOddSquares(gridded);
    lap("filter");
    const mapped = buildPixelMap(filtered);
    lap("pixelMap");
    const png = await drawImage(mapped);
    lap("draw");

    return { ...mapped, png };
}

/**
 * Runs every in-memory stage and returns the encoded PNG with all intermediate values
 */
export async function renderIdenticon(
    input: string,
    options: RenderIdenticonOptions = {}
): Promise<RenderedIdenticon> {
    return await renderTimed(input, options, {});
}

/**
 * Generates the identicon for `input` and writes it to `<name>.png`.
 * Write failures become `{ ok: false }`; InsufficientDataError and encoder errors are thrown.
 */
export async function createIdenticon(
    input: string,
    options: CreateIdenticonOptions = {}
): Promise<CreateIdenticonOutput> {
    const config = loadConfig();
    const perfStart = perfNow();
    const perfMarks: StageTimings = {};

    const rendered = await renderTimed(input, options, perfMarks);

    let path: string;
    const saveStart = perfNow();
    try {
        path = await saveImage(rendered.png, options.name ?? input, {
            outputDir: options.outputDir ?? config.outputDir,
        });
    } catch (error) {
        if (error instanceof IOError) {
            return { ok: false, error: error.message };
        }
        throw error;
    }
    perfMarks.save = perfNow() - saveStart;

    if (config.perfLogs) {
        const totalTime = perfNow() - perfStart;
        console.error(`[PERF] createIdenticon (cells=${rendered.pixelMap.length}):`);
        console.error(`  Total: ${totalTime.toFixed(2)}ms`);
        Object.entries(perfMarks).forEach(([key, value]) => {
            console.error(`  ${key}: ${value.toFixed(2)}ms (${((value / totalTime) * 100).toFixed(1)}%)`);
        });
    }

    return {
        ok: true,
        path,
        hex: rendered.hex,
        color: rendered.color,
        cellCount: rendered.pixelMap.length,
    };
}
