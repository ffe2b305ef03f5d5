import iconv from 'iconv-lite';

/** Used when the configured 8-bit encoding is unknown. */
export const FALLBACK_8BIT_ENCODING = 'windows-1252';

export interface StringCodec {
    /** Canonical name as given to the codec. */
    readonly name: string;
    encode(text: string): Uint8Array;
    /** Encodes at most `maxBytes` bytes, never splitting a character. */
    encodeTruncated(text: string, maxBytes: number): Uint8Array;
}

class IconvCodec implements StringCodec {
    constructor(public readonly name: string) { }

    encode(text: string): Uint8Array {
        return iconv.encode(text, this.name);
    }

    encodeTruncated(text: string, maxBytes: number): Uint8Array {
        const encoded = this.encode(text);
        if (encoded.length <= maxBytes) return encoded;

        let size = 0;
        let end = 0;
        for (const ch of text) {
            const n = this.encode(ch).length;
            if (size + n > maxBytes) break;
            size += n;
            end += ch.length;
        }
        return this.encode(text.slice(0, end));
    }
}

export const UTF8_CODEC: StringCodec = new IconvCodec('utf8');
export const UTF16LE_CODEC: StringCodec = new IconvCodec('utf16le');

export function encodingExists(name: string): boolean {
    return iconv.encodingExists(name);
}

/**
 * Resolves the codec for narrow strings. `null` selects UTF-8. Unknown
 * encodings are reported through `onUnavailable` and replaced by
 * {@link FALLBACK_8BIT_ENCODING}.
 */
export function resolveCodec(name: string | null, onUnavailable: (name: string) => void): StringCodec {
    if (name === null) return UTF8_CODEC;
    if (encodingExists(name)) return new IconvCodec(name);
    onUnavailable(name);
    return new IconvCodec(FALLBACK_8BIT_ENCODING);
}

/** Length in UTF-16 code units of the longest prefix fitting into `maxBytes` of UTF-16. */
export function utf16PrefixLength(text: string, maxBytes: number): number {
    let units = Math.min(text.length, Math.floor(maxBytes / 2));
    if (units > 0 && units < text.length) {
        const last = text.charCodeAt(units - 1);
        if (last >= 0xd800 && last <= 0xdbff) units -= 1;
    }
    return units;
}
