import type { MapCoord, MapPointF, MapSymbol, TextObject } from '../map-types.js';
import { isDashedLineWithoutDashSymbol, textBoxPoints, textSingleAnchorPoints } from '../map-utils.js';
import { POINT_FLAGS_X, POINT_FLAGS_Y, OCD_POINT_SIZE } from './format.js';
import { convertPoint, qRound } from './numeric.js';
import type { OcdPoint32 } from './records.js';

export function encodePoints(points: OcdPoint32[]): Uint8Array {
    const buffer = new Uint8Array(points.length * OCD_POINT_SIZE);
    const view = new DataView(buffer.buffer);
    let pos = 0;
    for (const p of points) {
        view.setInt32(pos, p.x, true); pos += 4;
        view.setInt32(pos, p.y, true); pos += 4;
    }
    return buffer;
}

function dashPointFlag(symbol: MapSymbol | null): number {
    if (symbol?.type === 'line' && isDashedLineWithoutDashSymbol(symbol)) return POINT_FLAGS_Y.DASH;
    return POINT_FLAGS_Y.CORNER;
}

/**
 * Converts a coordinate sequence, packing point flags into the low bits.
 *
 * The curve and hole flags describe the following point: a curve start
 * marks the next point as first control point, and the point after that
 * as second control point.
 */
export function convertCoordinates(coords: readonly MapCoord[], symbol: MapSymbol | null): OcdPoint32[] {
    const points: OcdPoint32[] = [];
    let curveStart = false;
    let holePoint = false;
    let curveContinue = false;
    for (const coord of coords) {
        const p = convertPoint(coord.x, coord.y);
        if (coord.dashPoint) p.y |= dashPointFlag(symbol);
        if (curveStart) p.x |= POINT_FLAGS_X.CTL1;
        if (holePoint) p.y |= POINT_FLAGS_Y.HOLE;
        if (curveContinue) p.x |= POINT_FLAGS_X.CTL2;

        curveContinue = curveStart;
        curveStart = coord.curveStart === true;
        holePoint = coord.holePoint === true;
        points.push(p);
    }
    return points;
}

/** Millimetres to a packed point. */
export function convertPointF(p: MapPointF): OcdPoint32 {
    return convertPoint(qRound(p.x * 1000), qRound(p.y * 1000));
}

/** Baseline anchor followed by the four corners of the text's bounding box. */
export function textCoordinatesSingle(object: TextObject): OcdPoint32[] {
    return textSingleAnchorPoints(object).map(convertPointF);
}

/** The four corners of the text box. */
export function textCoordinatesBox(object: TextObject): OcdPoint32[] {
    return textBoxPoints(object).map(convertPointF);
}
