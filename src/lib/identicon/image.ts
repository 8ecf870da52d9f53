/**
 * Staged records threaded through the identicon pipeline.
 * Each stage adds one required field; nothing is ever optional or mutated.
 */

import type { RGB } from "../color/rgb.js";

/**
 * Side of one grid cell in pixels
 */
export const CELL_SIZE = 50;

/**
 * Cells per grid row (and rows per grid)
 */
export const GRID_WIDTH = 5;

/**
 * Side of the square canvas in pixels
 */
export const IMAGE_SIZE = GRID_WIDTH * CELL_SIZE;

/**
 * One grid position: the hash byte that decides it and its row-major index in the 5x5 layout
 */
export interface GridCell {
    readonly value: number;
    readonly index: number;
}

export interface Point {
    readonly x: number;
    readonly y: number;
}

/**
 * Rectangle to paint, given by its top-left and bottom-right corners
 */
export interface PixelRect {
    readonly topLeft: Point;
    readonly bottomRight: Point;
}

export interface HashedImage {
    readonly hex: readonly number[];
}

export interface ColoredImage extends HashedImage {
    readonly color: Readonly<RGB>;
}

export interface GriddedImage extends ColoredImage {
    readonly grid: readonly GridCell[];
}

export interface MappedImage extends GriddedImage {
    readonly pixelMap: readonly PixelRect[];
}
