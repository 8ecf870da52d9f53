/**
 * Persister: writes the encoded PNG to disk
 */

import { writeFile } from "fs/promises";
import { resolve } from "path";
import { IOError } from "../errors.js";

export const IMAGE_EXTENSION = "png";

export interface SaveImageOptions {
    outputDir?: string; // Base directory for relative names (default: process.cwd())
}

/**
 * Resolves the output path `<name>.png`
 */
export function imagePath(name: string, outputDir: string = process.cwd()): string {
    return resolve(outputDir, `${name}.${IMAGE_EXTENSION}`);
}

/**
 * Writes the PNG as `<name>.png`, replacing any existing file of that name
 * @returns Absolute path of the written file
 * @throws IOError if the write fails
 */
export async function saveImage(png: Uint8Array, name: string, options: SaveImageOptions = {}): Promise<string> {
    const path = imagePath(name, options.outputDir);
    try {
        await writeFile(path, png);
    } catch (error) {
        throw new IOError(path, error);
    }
    return path;
}
