/**
 * Rasterizer: paints the pixel map onto a white canvas and encodes it as PNG with sharp
 */

import sharp from "sharp";
import { WHITE, type RGB } from "../color/rgb.js";
import { IMAGE_SIZE, type PixelRect } from "./image.js";

const CHANNELS = 3;

/**
 * Fills a rectangle in a raw RGB buffer.
 * Both corners are inclusive; anything outside the canvas is clipped.
 */
export function fillRect(pixels: Uint8Array, size: number, rect: PixelRect, color: RGB): void {
    const left = Math.max(0, rect.topLeft.x);
    const top = Math.max(0, rect.topLeft.y);
    const right = Math.min(size - 1, rect.bottomRight.x);
    const bottom = Math.min(size - 1, rect.bottomRight.y);

    for (let y = top; y <= bottom; y++) {
        for (let x = left; x <= right; x++) {
            const idx = (y * size + x) * CHANNELS;
            pixels[idx] = color.r;
            pixels[idx + 1] = color.g;
            pixels[idx + 2] = color.b;
        }
    }
}

/**
 * Allocates the raw canvas and paints every rectangle
 */
export function rasterize(color: RGB, pixelMap: readonly PixelRect[]): Uint8Array {
    const pixels = new Uint8Array(IMAGE_SIZE * IMAGE_SIZE * CHANNELS);
    for (let i = 0; i < pixels.length; i += CHANNELS) {
        pixels[i] = WHITE.r;
        pixels[i + 1] = WHITE.g;
        pixels[i + 2] = WHITE.b;
    }

    for (const rect of pixelMap) {
        fillRect(pixels, IMAGE_SIZE, rect, color);
    }

    return pixels;
}

/**
 * Renders the image record to an encoded PNG
 */
export async function drawImage(image: { color: RGB; pixelMap: readonly PixelRect[] }): Promise<Buffer> {
    const pixels = rasterize(image.color, image.pixelMap);

    return await sharp(pixels, {
        raw: {
            width: IMAGE_SIZE,
            height: IMAGE_SIZE,
            channels: CHANNELS,
        },
    })
        .png()
        .toBuffer();
}
