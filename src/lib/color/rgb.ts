/**
 * RGB color helpers
 */

/**
 * RGB color (0-255 range)
 */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

/**
 * Background of every identicon canvas
 */
export const WHITE: Readonly<RGB> = Object.freeze({ r: 255, g: 255, b: 255 });

/**
 * Converts RGB to an upper-case hex string, clamping each channel to 0-255
 */
export function rgbToHex(rgb: RGB): string {
    return `#${[rgb.r, rgb.g, rgb.b]
        .map((val) => Math.max(0, Math.min(255, val)).toString(16).padStart(2, "0"))
        .join("")
        .toUpperCase()}`;
}
