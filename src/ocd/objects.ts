import type { MapCoord, MapObject, OcdMap, TextObject } from '../map-types.js';
import { containedTypes, mapExtent, objectExtent, translatedObject } from '../map-utils.js';
import {
    rectCenter, rectContains, rectHeight, rectIntersects, rectWidth, toMapCoordF, toProjectedCoords,
} from './geometry.js';
import type { Rect } from './geometry.js';
import {
    AREA_OFFSET_UNIT_M, OCD_BOUNDS_MM, OCD_POINT_SIZE, ObjectStatus, ObjectType, TEXT_CHUNK_SIZE, TEXT_MAX_CHUNKS,
    addPadding,
} from './format.js';
import { concatBytes } from './byte-writer.js';
import { convertRotation, qRound } from './numeric.js';
import {
    convertCoordinates, convertPointF, encodePoints, textCoordinatesBox, textCoordinatesSingle,
} from './coordinates.js';
import { recordSize, writeRecord } from './records.js';
import type { RecordValues } from './records.js';
import { UTF16LE_CODEC, utf16PrefixLength } from './text-codec.js';
import type { Diagnostics } from './diagnostics.js';
import type { OcdFile } from './file.js';
import type { ExportSession } from './session.js';

const OFFSET_WARNING = 'Coordinates are adjusted to fit into the OCAD 8 drawing area (-2 m ... 2 m).';
const OUTSIDE_WARNING = 'Some coordinates remain outside of the OCAD 8 drawing area. They might be unreachable in OCAD.';

/**
 * Translation that moves the objects into the OCD 8 drawing area, in native
 * map units. Zero when the objects already fit.
 *
 * An extent smaller than the area is centered. A larger extent is moved
 * only when it lies completely outside, to the average object center.
 */
export function calculateAreaOffset(map: OcdMap, diagnostics: Diagnostics): MapCoord {
    const extent = mapExtent(map);
    if (!extent || rectContains(OCD_BOUNDS_MM, extent)) return { x: 0, y: 0 };

    let offset = { x: 0, y: 0 };
    if (rectWidth(extent) < rectWidth(OCD_BOUNDS_MM) && rectHeight(extent) < rectHeight(OCD_BOUNDS_MM)) {
        diagnostics.add(OFFSET_WARNING);
        offset = rectCenter(extent);
    } else {
        if (!rectIntersects(extent, OCD_BOUNDS_MM)) {
            diagnostics.add(OFFSET_WARNING);
            offset = averageObjectCenter(map);
        }
        diagnostics.add(OUTSIDE_WARNING);
    }

    if (offset.x === 0 && offset.y === 0) return { x: 0, y: 0 };

    // Round to full 100 m in projected coordinates to keep the grid aligned.
    const georef = map.georeferencing;
    const projected = toProjectedCoords(georef, offset);
    const rounded = toMapCoordF(georef, {
        x: qRound(projected.x / AREA_OFFSET_UNIT_M) * AREA_OFFSET_UNIT_M,
        y: qRound(projected.y / AREA_OFFSET_UNIT_M) * AREA_OFFSET_UNIT_M,
    });
    return { x: qRound(rounded.x * 1000), y: qRound(rounded.y * 1000) };
}

function averageObjectCenter(map: OcdMap): { x: number; y: number } {
    const average = { x: 0, y: 0 };
    let count = 0;
    for (const part of map.parts) {
        for (const object of part.objects) {
            const extent = objectExtent(object);
            if (!extent) continue;
            const center = rectCenter(extent);
            ++count;
            average.x += (center.x - average.x) / count;
            average.y += (center.y - average.y) / count;
        }
    }
    return average;
}

/**
 * Text content as stored after the text object coordinates: CRLF line
 * breaks, UTF-16LE, padded to whole chunks.
 */
export function encodeTextData(object: TextObject, diagnostics: Diagnostics): Uint8Array {
    const maxSize = TEXT_CHUNK_SIZE * TEXT_MAX_CHUNKS;
    let text = object.text;
    if (text.startsWith('\n')) text = '\n' + text;
    text = text.replace(/\n/g, '\r\n');

    let encoded = UTF16LE_CODEC.encode(text);
    if (encoded.length >= maxSize) {
        const cut = utf16PrefixLength(text, maxSize - 1);
        diagnostics.add(`Text truncated at '|': ${text.slice(0, cut)}|${text.slice(cut)}`);
        encoded = UTF16LE_CODEC.encode(text.slice(0, cut));
    }

    const size = encoded.length;
    const padded = new Uint8Array(size + (maxSize - size) % TEXT_CHUNK_SIZE);
    padded.set(encoded);
    return padded;
}

/** Encodes the objects of all parts into object records and index entries. */
export class ObjectEncoder {
    constructor(
        private readonly session: ExportSession,
        private readonly file: OcdFile
    ) { }

    exportObjects(): void {
        const offset = this.session.areaOffset;
        for (const part of this.session.map.parts) {
            for (const source of part.objects) {
                const object = translatedObject(source, -offset.x, -offset.y);
                const encoded = this.encodeObject(object);
                if (encoded) this.file.addObject(encoded.data, encoded.entry);
            }
        }
    }

    /** Returns null for objects whose symbol was not exported. */
    encodeObject(object: MapObject): { data: Uint8Array; entry: RecordValues } | null {
        const session = this.session;
        const header: RecordValues = {};
        let items: Uint8Array;
        let symbolNumber: number | undefined;

        switch (object.type) {
            case 'point': {
                symbolNumber = session.numberOf(object.symbol);
                header.type = ObjectType.POINT;
                header.angle = convertRotation(object.rotation);
                const points = convertCoordinates([object.coord], object.symbol);
                header.num_items = points.length;
                items = encodePoints(points);
                break;
            }
            case 'path': {
                symbolNumber = session.numberOf(object.symbol);
                header.type = containedTypes(object.symbol).has('area') ? ObjectType.AREA : ObjectType.LINE;
                const points = convertCoordinates(object.coords, object.symbol);
                header.num_items = points.length;
                items = encodePoints(points);
                break;
            }
            case 'text': {
                symbolNumber = session.textFormatNumber(object.symbol, object.horizontalAlignment);
                header.type = object.hasSingleAnchor ? ObjectType.UNFORMATTED_TEXT : ObjectType.FORMATTED_TEXT;
                header.angle = convertRotation(object.rotation);
                items = this.encodeTextItems(object, header);
                break;
            }
        }
        if (symbolNumber === undefined) return null;
        header.symbol = symbolNumber;

        const format = session.format;
        const entry: RecordValues = {
            symbol: symbolNumber,
            ...this.indexBounds(object),
        };
        const type = header.type;
        if (format.indexEntryExtras) {
            entry.type = type;
            entry.status = ObjectStatus.NORMAL;
        }
        if (format.objectUnicodeFlag && (type === ObjectType.UNFORMATTED_TEXT || type === ObjectType.FORMATTED_TEXT)) {
            header.unicode = 1;
        }

        const headerSize = recordSize(format.objectHeader);
        const data = concatBytes([writeRecord(format.objectHeader, header), items]);
        const size = addPadding(data.length);
        entry.size = format.indexSizeInBytes ? size : (size - headerSize) / OCD_POINT_SIZE;
        return { data, entry };
    }

    private encodeTextItems(object: TextObject, header: RecordValues): Uint8Array {
        if (object.lines.length === 0) {
            header.num_items = 0;
            return new Uint8Array(0);
        }
        const points = object.hasSingleAnchor ? textCoordinatesSingle(object) : textCoordinatesBox(object);
        const text = encodeTextData(object, this.session.diagnostics);
        header.num_items = points.length;
        header.num_text = text.length / OCD_POINT_SIZE;
        return concatBytes([encodePoints(points), text]);
    }

    private indexBounds(object: MapObject): RecordValues {
        const extent: Rect | null = objectExtent(object);
        if (!extent) return {};
        return {
            bottom_left: convertPointF({ x: extent.left, y: extent.bottom }),
            top_right: convertPointF({ x: extent.right, y: extent.top }),
        };
    }
}
