/**
 * Fixed-point conversion from native map units (1/1000 mm) to OCD units
 * (1/100 mm).
 */

import type { OcdPoint32 } from './records.js';

/** Round to nearest, ties towards +∞. */
export function qRound(value: number): number {
    return Math.floor(value + 0.5);
}

/**
 * Converts one coordinate member to the 24.8 layout of OCD points: the
 * value occupies the upper 24 bits, the lower 8 bits are left for flags.
 */
export function convertPointMember(value: number): number {
    if (value < -5) {
        return (0x80000000 | ((0x7fffff & Math.trunc((value - 4) / 10)) << 8)) | 0;
    }
    return ((0x7fffff & Math.trunc((value + 5) / 10)) << 8) | 0;
}

/** OCD y axis points upwards. */
export function convertPoint(x: number, y: number): OcdPoint32 {
    return { x: convertPointMember(x), y: convertPointMember(-y) };
}

export function convertSize(size: number): number {
    return Math.trunc((size + 5) / 10);
}

/** Radians to tenths of a degree. */
export function convertRotation(angle: number): number {
    return qRound(10 * angle * 180 / Math.PI);
}
