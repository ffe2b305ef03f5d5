import type { HorizontalAlignment, MapColor, MapCoord, MapSymbol, OcdMap, TextSymbol } from '../map-types.js';
import { REGISTRATION_COLOR } from '../map-types.js';
import { isColorUsedByASymbol } from '../map-utils.js';
import type { Diagnostics } from './diagnostics.js';
import type { OcdFormat } from './versions.js';
import type { StringCodec } from './text-codec.js';
import type { IconRenderer } from './types.js';
import { NAME_CAPACITY } from './format.js';

/**
 * State of one export run: symbol numbers, text alignment variants, the
 * area offset and the warning list. A new session is created per export.
 */
export class ExportSession {
    /** Export number per symbol, including duplicates made for combined symbols. */
    readonly symbolNumbers = new Map<MapSymbol, number>();
    private readonly takenNumbers = new Set<number>();
    /** Export number per text symbol and horizontal alignment. */
    readonly textFormats = new Map<TextSymbol, Map<HorizontalAlignment, number>>();
    readonly usesRegistrationColor: boolean;
    /** Subtracted from every exported coordinate. Native map units. */
    areaOffset: MapCoord = { x: 0, y: 0 };

    constructor(
        readonly map: OcdMap,
        readonly format: OcdFormat,
        readonly diagnostics: Diagnostics,
        readonly codec: StringCodec,
        readonly iconRenderer: IconRenderer | null
    ) {
        this.usesRegistrationColor = isColorUsedByASymbol(map, REGISTRATION_COLOR);
    }

    warn(message: string): void {
        this.diagnostics.add(message);
    }

    /** Exported colors in file order. */
    exportedColors(): MapColor[] {
        return this.usesRegistrationColor ? [REGISTRATION_COLOR, ...this.map.colors] : [...this.map.colors];
    }

    /** Color number in the file; unknown colors and no color map to 0. */
    convertColor(color: MapColor | null): number {
        if (!color) return 0;
        const index = this.map.colors.indexOf(color);
        if (index < 0) return 0;
        return this.usesRegistrationColor ? index + 1 : index;
    }

    /**
     * Assigns a new unique export number derived from the symbol's number
     * components. The latest number is remembered for the symbol.
     */
    assignNumber(symbol: MapSymbol): number {
        const factor = this.format.symbolNumberFactor;
        const major = symbol.number[0] ?? 0;
        const minor = symbol.number[1] ?? -1;
        let number = Math.max(0, major) * factor;
        if (minor >= 0) number += minor % factor;
        number = this.storedNumber(number);
        while (this.takenNumbers.has(number)) number = this.storedNumber(number + 1);

        this.takenNumbers.add(number);
        this.symbolNumbers.set(symbol, number);
        return number;
    }

    /** The number as the format's symbol number fields keep it. 0 is not a valid symbol number. */
    private storedNumber(number: number): number {
        const mask = this.format.symbolNumberMask;
        const stored = mask === null ? number : number & mask;
        return stored === 0 ? 1 : stored;
    }

    numberOf(symbol: MapSymbol): number | undefined {
        return this.symbolNumbers.get(symbol);
    }

    recordTextFormat(symbol: TextSymbol, alignment: HorizontalAlignment, number: number): void {
        let formats = this.textFormats.get(symbol);
        if (!formats) {
            formats = new Map();
            this.textFormats.set(symbol, formats);
        }
        formats.set(alignment, number);
    }

    textFormatNumber(symbol: TextSymbol, alignment: HorizontalAlignment): number | undefined {
        return this.textFormats.get(symbol)?.get(alignment);
    }

    /** Encodes a short name field; the result fits the Pascal string capacity. */
    encodeName(text: string, capacity = NAME_CAPACITY): Uint8Array {
        return this.codec.encodeTruncated(text, capacity);
    }
}
