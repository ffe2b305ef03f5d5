import { ByteWriter } from './byte-writer.js';
import { INDEX_BLOCK_ENTRIES, OCD_ALIGNMENT, OCD_VENDOR_MARK } from './format.js';
import {
    INDEX_BLOCK_HEADER, STRING_INDEX_ENTRY, SYMBOL_INDEX_ENTRY, recordSize, writeRecord,
} from './records.js';
import type { RecordLayout, RecordValues } from './records.js';
import type { OcdFormat } from './versions.js';

export interface StringEntry {
    type: number;
    /** Encoded string without terminator. */
    data: Uint8Array;
}

export interface ObjectEntry {
    data: Uint8Array;
    /** Index entry values; `pos` is filled in when the file is serialized. */
    entry: RecordValues;
}

/**
 * In-memory OCD file. Sections are collected first and laid out in one
 * pass: header, OCD 8 setup and notes, strings, symbols, objects.
 */
export class OcdFile {
    /** OCD 8 symbol header with the color table; follows the file header. */
    symbolHeader: Uint8Array | null = null;
    /** OCD 8 setup record. */
    setup: Uint8Array | null = null;
    /** OCD 8 notes, NUL-terminated. */
    info: Uint8Array | null = null;

    readonly strings: StringEntry[] = [];
    readonly symbols: Uint8Array[] = [];
    readonly objects: ObjectEntry[] = [];

    constructor(readonly format: OcdFormat) { }

    addString(type: number, data: Uint8Array): void {
        this.strings.push({ type, data });
    }

    addSymbol(data: Uint8Array): void {
        this.symbols.push(data);
    }

    addObject(data: Uint8Array, entry: RecordValues): void {
        this.objects.push({ data, entry });
    }

    serialize(): Uint8Array {
        const format = this.format;
        const out = new ByteWriter();
        const header: RecordValues = {
            vendor_mark: OCD_VENDOR_MARK,
            file_type: format.fileType,
            version: format.version,
        };
        const headerPos = out.reserve(recordSize(format.fileHeader));

        if (this.symbolHeader) out.writeBytes(this.symbolHeader);
        if (this.setup) {
            out.align(OCD_ALIGNMENT);
            header.setup_pos = out.writeBytes(this.setup);
            header.setup_size = this.setup.length;
        }
        if (this.info) {
            out.align(OCD_ALIGNMENT);
            header.info_pos = out.writeBytes(this.info);
            header.info_size = this.info.length;
        }

        header.first_string_block = writeIndexed(out, this.strings, STRING_INDEX_ENTRY, string => {
            const pos = out.writeBytes(string.data);
            out.reserve(1);
            out.align(OCD_ALIGNMENT);
            return { pos, size: out.length - pos, type: string.type, obj_index: 0 };
        });
        header.first_symbol_block = writeIndexed(out, this.symbols, SYMBOL_INDEX_ENTRY, symbol => {
            const pos = out.writeBytes(symbol);
            out.align(OCD_ALIGNMENT);
            return { pos };
        });
        header.first_object_block = writeIndexed(out, this.objects, format.indexEntry, object => {
            const pos = out.writeBytes(object.data);
            out.align(OCD_ALIGNMENT);
            return { ...object.entry, pos };
        });

        out.patchBytes(headerPos, writeRecord(format.fileHeader, header));
        return out.toBytes();
    }
}

/**
 * Writes a chain of index blocks of 256 entries, each followed by the
 * data of its items. Returns the position of the first block, or 0.
 */
function writeIndexed<T>(
    out: ByteWriter,
    items: readonly T[],
    entryLayout: RecordLayout,
    writeItem: (item: T) => RecordValues
): number {
    const entrySize = recordSize(entryLayout);
    const blockSize = recordSize(INDEX_BLOCK_HEADER) + INDEX_BLOCK_ENTRIES * entrySize;
    let firstBlock = 0;
    let previousBlock = -1;
    for (let start = 0; start < items.length; start += INDEX_BLOCK_ENTRIES) {
        out.align(OCD_ALIGNMENT);
        const block = out.reserve(blockSize);
        if (previousBlock < 0) firstBlock = block;
        else out.patchUint32(previousBlock, block);
        previousBlock = block;

        const chunk = items.slice(start, start + INDEX_BLOCK_ENTRIES);
        chunk.forEach((item, i) => {
            const entry = writeItem(item);
            out.patchBytes(block + 4 + i * entrySize, writeRecord(entryLayout, entry));
        });
    }
    return firstBlock;
}
