/**
 * Palette matching for symbol icons.
 *
 * OCD 8 icons use a 16 color palette, OCD 9 and later a 125 color cube.
 * The weights below are tuned for typical orienteering colors; they are
 * not a perceptual metric.
 */

export interface Rgb {
    r: number;
    g: number;
    b: number;
}

export interface Hsv {
    /** 0 - 359, or -1 for achromatic colors */
    h: number;
    s: number;
    v: number;
}

function div257(x: number): number {
    return (x - (x >> 8) + 0x80) >> 8;
}

/** Integer HSV with 8 bit saturation and value. */
export function rgbToHsv({ r, g, b }: Rgb): Hsv {
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const delta = max - min;
    const v = max;
    if (delta === 0) return { h: -1, s: 0, v };

    const s = div257(Math.round(delta / max * 65535));
    let hue: number;
    if (r === max) hue = (g - b) / delta;
    else if (g === max) hue = 2 + (b - r) / delta;
    else hue = 4 + (r - g) / delta;
    hue *= 60;
    if (hue < 0) hue += 360;
    return { h: Math.trunc(Math.round(hue * 100) / 100), s, v };
}

/** Luminance weighted 11:16:5. */
export function grayOf({ r, g, b }: Rgb): number {
    return (r * 11 + g * 16 + b * 5) >> 5;
}

export function isWhite({ r, g, b }: Rgb): boolean {
    return r === 255 && g === 255 && b === 255;
}

const PALETTE_16: readonly Hsv[] = [
    { h: -1, s: 0, v: 0 },
    { h: 0, s: 255, v: 128 },
    { h: 120, s: 255, v: 128 },
    { h: 60, s: 255, v: 128 },
    { h: 240, s: 255, v: 128 },
    { h: 300, s: 255, v: 128 },
    { h: 180, s: 255, v: 128 },
    { h: -1, s: 0, v: 128 },
    { h: -1, s: 0, v: 192 },
    { h: 0, s: 255, v: 255 },
    { h: 120, s: 255, v: 255 },
    { h: 60, s: 255, v: 255 },
    { h: 240, s: 255, v: 255 },
    { h: 300, s: 255, v: 255 },
    { h: 180, s: 255, v: 255 },
    { h: -1, s: 0, v: 255 },
];

const CHROMATIC_16 = [1, 2, 3, 4, 5, 6, 9, 10, 11, 12, 13, 14];

function weight16(index: number): number {
    switch (index) {
        case 1: return 3; // dark red
        case 3: return 4; // olive
        case 11: return 4; // yellow
        case 9: return 6; // red is unlikely
        default: return 2;
    }
}

/** Index into the 16 color palette of OCD 8 icons. */
export function paletteMatch16(rgb: Rgb): number {
    if (isWhite(rgb)) return 15;

    const color = rgbToHsv(rgb);
    if (color.h === -1 || color.s < 32) {
        const gray = grayOf(rgb);
        if (gray >= 192) return 8;
        if (gray >= 128) return 7;
        return 0;
    }

    const sq = (n: number) => n * n;
    let bestIndex = 0;
    let bestDistance = 2100000;
    for (const i of CHROMATIC_16) {
        const entry = PALETTE_16[i];
        const hueDist = Math.abs(color.h - entry.h);
        const distance = weight16(i) * (
            10 * sq(Math.min(hueDist, 360 - hueDist))
            + sq(color.s - entry.s)
            + sq(color.v - entry.v)
        );
        if (distance < bestDistance) {
            bestDistance = distance;
            bestIndex = i;
        }
    }
    return bestIndex;
}

const CUBE_LEVELS = [0x00, 0x40, 0x80, 0xc0, 0xff];

/** 5 x 5 x 5 color cube, red major. */
export const PALETTE_125: readonly Rgb[] = CUBE_LEVELS.flatMap(r =>
    CUBE_LEVELS.flatMap(g => CUBE_LEVELS.map(b => ({ r, g, b })))
);

/** Index into the 125 color cube of OCD 9+ icons. */
export function paletteMatch125(rgb: Rgb): number {
    if (isWhite(rgb)) return 124;

    const sq = (n: number) => n * n;
    let bestIndex = 0;
    let bestDistance = 10000;
    PALETTE_125.forEach((entry, i) => {
        const distance = 2 * sq(rgb.r - entry.r) + 4 * sq(rgb.g - entry.g) + 3 * sq(rgb.b - entry.b);
        if (distance < bestDistance) {
            bestDistance = distance;
            bestIndex = i;
        }
    });
    return bestIndex;
}
