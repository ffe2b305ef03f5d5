import type { MapCoord, MapSymbol, PointSymbol } from '../map-types.js';
import { elementExtent } from '../map-utils.js';
import { rectUnite, rectWidth, rectHeight } from './geometry.js';
import type { Rect } from './geometry.js';
import { ELEMENT_FLAGS, ElementType } from './format.js';
import { convertSize, qRound } from './numeric.js';
import { PATTERN_ELEMENT, writeRecord } from './records.js';
import { convertCoordinates, encodePoints } from './coordinates.js';
import type { ExportSession } from './session.js';
import { concatBytes } from './byte-writer.js';

const ORIGIN: MapCoord[] = [{ x: 0, y: 0 }];

function element(values: {
    type: ElementType;
    flags?: number;
    color: number;
    lineWidth?: number;
    diameter?: number;
    coords: Uint8Array;
    numCoords: number;
}): Uint8Array[] {
    const header = writeRecord(PATTERN_ELEMENT, {
        type: values.type,
        flags: values.flags ?? 0,
        color: values.color,
        line_width: values.lineWidth ?? 0,
        diameter: values.diameter ?? 0,
        num_coords: values.numCoords,
    });
    return [header, values.coords];
}

/**
 * Elements for one symbol placed at `coords`: dot then circle for point
 * symbols, a single element for lines and areas.
 */
function subPattern(session: ExportSession, coords: readonly MapCoord[], symbol: MapSymbol): Uint8Array[] {
    const points = convertCoordinates(coords, symbol);
    const data = encodePoints(points);
    const parts: Uint8Array[] = [];

    switch (symbol.type) {
        case 'point':
            if (symbol.innerRadius > 0 && symbol.innerColor) {
                parts.push(...element({
                    type: ElementType.DOT,
                    color: session.convertColor(symbol.innerColor),
                    diameter: convertSize(2 * symbol.innerRadius),
                    coords: data,
                    numCoords: points.length,
                }));
            }
            if (symbol.outerWidth > 0 && symbol.outerColor) {
                const diameter = session.format.circleDiameterIsOuter
                    ? convertSize(2 * symbol.innerRadius + 2 * symbol.outerWidth)
                    : convertSize(2 * symbol.innerRadius + symbol.outerWidth);
                parts.push(...element({
                    type: ElementType.CIRCLE,
                    color: session.convertColor(symbol.outerColor),
                    lineWidth: convertSize(symbol.outerWidth),
                    diameter,
                    coords: data,
                    numCoords: points.length,
                }));
            }
            break;
        case 'line': {
            let flags = 0;
            if (symbol.capStyle === 'round') flags |= ELEMENT_FLAGS.ROUND_CAP;
            else if (symbol.joinStyle === 'miter') flags |= ELEMENT_FLAGS.MITER_JOIN;
            parts.push(...element({
                type: ElementType.LINE,
                flags,
                color: session.convertColor(symbol.color),
                lineWidth: convertSize(symbol.lineWidth),
                coords: data,
                numCoords: points.length,
            }));
            break;
        }
        case 'area':
            parts.push(...element({
                type: ElementType.AREA,
                color: session.convertColor(symbol.color),
                coords: data,
                numCoords: points.length,
            }));
            break;
        case 'text':
        case 'combined':
            // not valid as point symbol elements
            break;
    }
    return parts;
}

/**
 * The pattern of a point symbol: the symbol's own dot and circle at the
 * origin, then one sub-pattern per element. Empty for no symbol.
 */
export function encodePattern(session: ExportSession, point: PointSymbol | null): Uint8Array {
    if (!point) return new Uint8Array(0);
    const parts = subPattern(session, ORIGIN, point);
    for (const el of point.elements) {
        parts.push(...subPattern(session, el.coords, el.symbol));
    }
    return concatBytes(parts);
}

/** Half the larger side of the point symbol's extent, in OCD units; 0 for no symbol. */
export function pointSymbolExtent(symbol: PointSymbol | null): number {
    if (!symbol) return 0;

    let extent: Rect | null = null;
    for (const el of symbol.elements) {
        extent = rectUnite(extent, elementExtent(el.symbol, el.coords));
    }
    let half = extent ? 0.5 * Math.max(rectWidth(extent), rectHeight(extent)) : 0;
    if (symbol.innerColor) half = Math.max(half, symbol.innerRadius);
    if (symbol.outerColor) half = Math.max(half, symbol.innerRadius + symbol.outerWidth);
    return convertSize(qRound(Math.max(0, half)));
}
