import {
    AREA_SYMBOL_BODY_V8, AREA_SYMBOL_BODY_V9, BASE_SYMBOL_V8, BASE_SYMBOL_V9, FILE_HEADER_V8, FILE_HEADER_V9,
    INDEX_ENTRY_V8, INDEX_ENTRY_V9, LINE_SYMBOL_BODY, OBJECT_V12, OBJECT_V8, OBJECT_V9, TEXT_SYMBOL_BODY,
    pascal, recordSize, writeRecord,
} from '../src/ocd/records.js';
import type { RecordLayout } from '../src/ocd/records.js';
import { readRecord } from './helpers/ocd-reader.js';
import { ByteWriter, concatBytes } from '../src/ocd/byte-writer.js';

describe('record layouts', () => {
    it('have the sizes of the file format', () => {
        expect(recordSize(FILE_HEADER_V8)).toBe(48);
        expect(recordSize(FILE_HEADER_V9)).toBe(48);
        expect(recordSize(BASE_SYMBOL_V8)).toBe(348);
        expect(recordSize(BASE_SYMBOL_V9)).toBe(700);
        expect(recordSize(LINE_SYMBOL_BODY)).toBe(76);
        expect(recordSize(AREA_SYMBOL_BODY_V8)).toBe(28);
        expect(recordSize(AREA_SYMBOL_BODY_V9)).toBe(36);
        expect(recordSize(TEXT_SYMBOL_BODY)).toBe(204);
        expect(recordSize(OBJECT_V8)).toBe(32);
        expect(recordSize(OBJECT_V9)).toBe(56);
        expect(recordSize(OBJECT_V12)).toBe(64);
        expect(recordSize(INDEX_ENTRY_V8)).toBe(24);
        expect(recordSize(INDEX_ENTRY_V9)).toBe(40);
    });

    it('keeps symbol bodies 8 byte aligned', () => {
        for (const base of [BASE_SYMBOL_V8, BASE_SYMBOL_V9]) {
            expect((recordSize(base) + recordSize(LINE_SYMBOL_BODY)) % 8).toBe(0);
            expect((recordSize(base) + recordSize(TEXT_SYMBOL_BODY)) % 8).toBe(0);
        }
    });
});

describe('writeRecord', () => {
    const layout: RecordLayout = [
        ['a', 'u8'],
        ['b', 'i16'],
        ['c', 'u32'],
        ['name', pascal(3)],
        ['p', 'point'],
    ];

    it('writes little-endian fields and zero-fills missing ones', () => {
        const bytes = writeRecord(layout, { b: -2, c: 0x01020304 });
        expect(Array.from(bytes)).toEqual([
            0,
            0xfe, 0xff,
            0x04, 0x03, 0x02, 0x01,
            0, 0, 0, 0,
            0, 0, 0, 0, 0, 0, 0, 0,
        ]);
    });

    it('truncates pascal strings to their capacity', () => {
        const bytes = writeRecord(layout, { name: new Uint8Array([65, 66, 67, 68, 69]) });
        expect(Array.from(bytes.subarray(7, 11))).toEqual([3, 65, 66, 67]);
    });

    it('rejects unknown fields and mismatched values', () => {
        expect(() => writeRecord(layout, { d: 1 })).toThrow('Unknown record field: d');
        expect(() => writeRecord(layout, { a: new Uint8Array(1) })).toThrow('Field a expects a number');
        expect(() => writeRecord(layout, { p: 5 })).toThrow('Field p expects a point');
    });

    it('reads back what it wrote', () => {
        const values = { a: 7, b: -300, c: 123456, name: new Uint8Array([88]), p: { x: -256, y: 512 } };
        expect(readRecord(layout, writeRecord(layout, values))).toEqual(values);
    });
});

describe('ByteWriter', () => {
    it('grows, aligns and patches', () => {
        const out = new ByteWriter(2);
        out.writeBytes(new Uint8Array([1, 2, 3]));
        out.align(8);
        expect(out.length).toBe(8);
        const pos = out.reserve(4);
        out.patchUint32(pos, 0xdeadbeef);
        expect(Array.from(out.toBytes().subarray(8))).toEqual([0xef, 0xbe, 0xad, 0xde]);
        expect(() => out.patchUint32(10, 1)).toThrow(RangeError);
    });

    it('concatenates byte arrays', () => {
        expect(Array.from(concatBytes([new Uint8Array([1]), new Uint8Array(0), new Uint8Array([2, 3])]))).toEqual([1, 2, 3]);
    });
});
