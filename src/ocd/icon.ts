import type { IconImage } from './types.js';
import { ICON_SIZE } from './format.js';
import { grayOf, paletteMatch125, paletteMatch16, rgbToHsv } from './palette.js';
import type { Rgb } from './palette.js';

/** OCD 8: 22 rows of 11 data bytes plus one padding byte. */
export const ICON_BYTES_V6 = ICON_SIZE * 12;
/** OCD 9+: one byte per pixel. */
export const ICON_BYTES_V9 = ICON_SIZE * ICON_SIZE;

// 2x2 ordered dithering, adjusted for map halftones
const THRESHOLD = [24, 192, 136, 80];

export function blankIcon(size = ICON_SIZE): IconImage {
    return { width: size, height: size, data: new Uint8Array(size * size * 4) };
}

/** Composites a premultiplied pixel onto white. Pixels outside the image are white. */
function pixelOnWhite(image: IconImage, x: number, y: number): Rgb {
    if (x >= image.width || y >= image.height) return { r: 255, g: 255, b: 255 };
    const i = 4 * (y * image.width + x);
    const alpha = image.data[i + 3];
    return {
        r: Math.min(255, 255 - alpha + image.data[i]),
        g: Math.min(255, 255 - alpha + image.data[i + 1]),
        b: Math.min(255, 255 - alpha + image.data[i + 2]),
    };
}

function ditheredPixelV6(image: IconImage, x: number, y: number): number {
    const pixel = pixelOnWhite(image, x, y);
    const threshold = THRESHOLD[x % 2 + 2 * (y % 2)];
    const paletteColor = paletteMatch16(pixel);
    switch (paletteColor) {
        case 0:
            // black to gray
            return grayOf(pixel) < 128 - Math.trunc(threshold / 2) ? 0 : 7;
        case 7:
            // gray to light gray
            return grayOf(pixel) < 192 - Math.trunc(threshold / 4) ? 7 : 8;
        case 8:
            // light gray to white
            return grayOf(pixel) < 256 - Math.trunc(threshold / 4) ? 8 : 15;
        case 15:
            return 15;
        default:
            // color to white
            return rgbToHsv(pixel).s >= threshold ? paletteColor : 15;
    }
}

/**
 * 4 bit palette icon, bottom row first. The first pixel of each pair goes
 * into the high nibble.
 */
export function encodeIconV6(image: IconImage): Uint8Array {
    const bits = new Uint8Array(ICON_BYTES_V6);
    let pos = 0;
    for (let y = ICON_SIZE - 1; y >= 0; --y) {
        for (let x = 0; x < ICON_SIZE; x += 2) {
            const first = ditheredPixelV6(image, x, y);
            const second = ditheredPixelV6(image, x + 1, y);
            bits[pos++] = (first << 4) + second;
        }
        pos++;
    }
    return bits;
}

/** 8 bit palette icon, bottom row first. */
export function encodeIconV9(image: IconImage): Uint8Array {
    const bits = new Uint8Array(ICON_BYTES_V9);
    let pos = 0;
    for (let y = ICON_SIZE - 1; y >= 0; --y) {
        for (let x = 0; x < ICON_SIZE; ++x) {
            bits[pos++] = paletteMatch125(pixelOnWhite(image, x, y));
        }
    }
    return bits;
}
