import { ICON_BYTES_V6, ICON_BYTES_V9, blankIcon, encodeIconV6, encodeIconV9 } from '../src/ocd/icon.js';
import type { IconImage } from '../src/ocd/types.js';

function solidIcon(r: number, g: number, b: number): IconImage {
    const image = blankIcon();
    for (let i = 0; i < image.data.length; i += 4) {
        image.data[i] = r;
        image.data[i + 1] = g;
        image.data[i + 2] = b;
        image.data[i + 3] = 255;
    }
    return image;
}

describe('symbol icons', () => {
    it('encodes a blank icon as white with row padding (OCD 8)', () => {
        const bits = encodeIconV6(blankIcon());
        expect(bits).toHaveLength(ICON_BYTES_V6);
        for (let row = 0; row < 22; row++) {
            const rowBytes = Array.from(bits.subarray(row * 12, row * 12 + 12));
            expect(rowBytes).toEqual([...Array(11).fill(0xff), 0]);
        }
    });

    it('encodes a blank icon as white (OCD 9)', () => {
        const bits = encodeIconV9(blankIcon());
        expect(bits).toHaveLength(ICON_BYTES_V9);
        expect(bits.every(b => b === 124)).toBe(true);
    });

    it('keeps black and pure red undithered', () => {
        expect(encodeIconV6(solidIcon(0, 0, 0)).subarray(0, 11).every(b => b === 0)).toBe(true);
        expect(encodeIconV6(solidIcon(255, 0, 0)).subarray(0, 11).every(b => b === 0x99)).toBe(true);
        expect(encodeIconV9(solidIcon(255, 0, 0)).every(b => b === 100)).toBe(true);
    });

    it('writes the bottom row first', () => {
        const image = blankIcon();
        // opaque black in the top left pixel
        image.data[3] = 255;
        const v9 = encodeIconV9(image);
        expect(v9[21 * 22]).toBe(0);
        expect(v9[0]).toBe(124);

        const v6 = encodeIconV6(image);
        expect(v6[21 * 12]).toBe(0x0f);
    });
});
