/**
 * Pure pipeline stages: digest -> color -> mirrored grid -> even cells -> pixel rectangles
 */

import { createHash } from "crypto";
import { InsufficientDataError } from "../errors.js";
import {
    CELL_SIZE,
    GRID_WIDTH,
    type ColoredImage,
    type GridCell,
    type GriddedImage,
    type HashedImage,
    type MappedImage,
    type PixelRect,
} from "./image.js";

/**
 * Digest function turning the UTF-8 bytes of the input into hash bytes
 */
export type Hasher = (data: Buffer) => Uint8Array;

/**
 * Default hasher: 128-bit MD5
 */
export const md5Hasher: Hasher = (data) => createHash("md5").update(data).digest();

/**
 * Hashes the input string into the byte list every later stage reads
 */
export function hashInput(input: string, hasher: Hasher = md5Hasher): HashedImage {
    const digest = hasher(Buffer.from(input, "utf-8"));
    return { hex: Object.freeze(Array.from(digest)) };
}

/**
 * Takes the first three hash bytes as red, green and blue
 * @throws InsufficientDataError if the hash has fewer than 3 bytes
 */
export function pickColor(image: HashedImage): ColoredImage {
    const { hex } = image;
    if (hex.length < 3) {
        throw new InsufficientDataError("Color selection", 3, hex.length);
    }
    return {
        ...image,
        color: Object.freeze({ r: hex[0], g: hex[1], b: hex[2] }),
    };
}

/**
 * Mirrors a 3-value row around its middle element: [a, b, c] -> [a, b, c, b, a]
 */
export function mirrorRow(row: readonly [number, number, number]): number[] {
    const [first, second, third] = row;
    return [first, second, third, second, first];
}

/**
 * Builds the horizontally mirrored 5x5 grid.
 * Bytes are taken in groups of three; an incomplete trailing group (the 16th MD5 byte) is dropped.
 */
export function buildGrid(image: ColoredImage): GriddedImage {
    const { hex } = image;
    const values: number[] = [];

    for (let start = 0; start + 3 <= hex.length; start += 3) {
        values.push(...mirrorRow([hex[start], hex[start + 1], hex[start + 2]]));
    }

    const grid: GridCell[] = values.map((value, index) => Object.freeze({ value, index }));
    return { ...image, grid: Object.freeze(grid) };
}

/**
 * Keeps the cells whose value is even. Order and original indices are preserved.
 */
export function filterOddSquares(image: GriddedImage): GriddedImage {
    const grid = image.grid.filter((cell) => cell.value % 2 === 0);
    return { ...image, grid: Object.freeze(grid) };
}

/**
 * Converts a grid index into the pixel rectangle of its cell
 */
export function cellRect(index: number): PixelRect {
    const x = (index % GRID_WIDTH) * CELL_SIZE;
    const y = Math.floor(index / GRID_WIDTH) * CELL_SIZE;
    return Object.freeze({
        topLeft: Object.freeze({ x, y }),
        bottomRight: Object.freeze({ x: x + CELL_SIZE, y: y + CELL_SIZE }),
    });
}

/**
 * Maps every surviving cell to its rectangle, in grid order
 */
export function buildPixelMap(image: GriddedImage): MappedImage {
    const pixelMap = image.grid.map((cell) => cellRect(cell.index));
    return { ...image, pixelMap: Object.freeze(pixelMap) };
}
