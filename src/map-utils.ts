/**
 * Read-only queries on the map model.
 *
 * @module ocd-map-export
 */

import type {
    LineBorder, LineSymbol, MapColor, MapCoord, MapObject, MapPointF,
    MapSymbol, OcdMap, PointSymbol, SymbolType, TextObject,
} from './map-types.js';
import { Transform, Rect, rectInclude, rectUnite, rectGrow } from './ocd/geometry.js';

// --- SYMBOLS ---

export function isPointSymbolEmpty(symbol: PointSymbol | null): boolean {
    if (!symbol) return true;
    return symbol.elements.length === 0
        && (symbol.innerColor === null || symbol.innerRadius === 0)
        && (symbol.outerColor === null || symbol.outerWidth === 0);
}

export function isBorderVisible(border: LineBorder): boolean {
    return border.width > 0 && border.color !== null;
}

function collectColors(symbol: MapSymbol | null, out: Set<MapColor>): void {
    if (!symbol) return;
    const add = (color: MapColor | null) => { if (color) out.add(color); };
    switch (symbol.type) {
        case 'point':
            add(symbol.innerColor);
            add(symbol.outerColor);
            for (const element of symbol.elements) collectColors(element.symbol, out);
            break;
        case 'line':
            add(symbol.color);
            if (symbol.hasBorder) {
                add(symbol.border.color);
                add(symbol.rightBorder.color);
            }
            collectColors(symbol.midSymbol, out);
            collectColors(symbol.startSymbol, out);
            collectColors(symbol.endSymbol, out);
            collectColors(symbol.dashSymbol, out);
            break;
        case 'area':
            add(symbol.color);
            for (const pattern of symbol.patterns) {
                if (pattern.type === 'line') add(pattern.lineColor);
                else collectColors(pattern.point, out);
            }
            break;
        case 'text':
            add(symbol.color);
            if (symbol.framing.mode !== 'none') add(symbol.framing.color);
            if (symbol.lineBelow) add(symbol.lineBelowColor);
            break;
        case 'combined':
            for (const part of symbol.parts) collectColors(part.symbol, out);
            break;
    }
}

/** All colors a symbol draws with, including those of nested symbols. */
export function symbolColors(symbol: MapSymbol): Set<MapColor> {
    const colors = new Set<MapColor>();
    collectColors(symbol, colors);
    return colors;
}

export function containsColor(symbol: MapSymbol, color: MapColor): boolean {
    return symbolColors(symbol).has(color);
}

export function isColorUsedByASymbol(map: OcdMap, color: MapColor): boolean {
    return map.symbols.some(symbol => containsColor(symbol, color));
}

export function containedTypes(symbol: MapSymbol): Set<SymbolType> {
    const types = new Set<SymbolType>([symbol.type]);
    if (symbol.type === 'combined') {
        for (const part of symbol.parts) {
            if (part.symbol) {
                for (const t of containedTypes(part.symbol)) types.add(t);
            }
        }
    }
    return types;
}

export function plainTextName(symbol: MapSymbol): string {
    return symbol.name.replace(/<[^>]*>/g, '');
}

// --- TEXT LAYOUT ---

function toMm(coord: MapCoord): MapPointF {
    return { x: coord.x / 1000, y: coord.y / 1000 };
}

/** Maps internally scaled text coordinates to map millimetres. */
export function textToMapTransform(object: TextObject): Transform {
    const anchor = toMm(object.anchor);
    const scaling = object.symbol.internalScaling;
    return new Transform()
        .translate(anchor.x, anchor.y)
        .rotate(-object.rotation * 180 / Math.PI)
        .scale(1 / scaling, 1 / scaling);
}

export function mapToTextTransform(object: TextObject): Transform {
    return textToMapTransform(object).inverted();
}

/**
 * Anchor on the first baseline, then the bounding box corners in the order
 * bottom left, bottom right, top right, top left. Millimetres.
 */
export function textSingleAnchorPoints(object: TextObject): MapPointF[] {
    if (object.lines.length === 0) return [];

    const textToMap = textToMapTransform(object);
    const anchorText = mapToTextTransform(object).map(toMm(object.anchor));
    const points = [textToMap.map({ x: anchorText.x, y: object.lines[0].lineY })];

    let box: Rect | null = null;
    for (const line of object.lines) {
        box = rectInclude(box, line.lineX, line.lineY - line.ascent);
        box = rectInclude(box, line.lineX + line.width, line.lineY + line.descent);
    }
    if (box) {
        points.push(
            textToMap.map({ x: box.left, y: box.bottom }),
            textToMap.map({ x: box.right, y: box.bottom }),
            textToMap.map({ x: box.right, y: box.top }),
            textToMap.map({ x: box.left, y: box.top })
        );
    }
    return points;
}

/**
 * Box corners: bottom left, bottom right, top right, top left. Millimetres.
 *
 * The top edge is moved to the top of the first line unless the text is
 * top-aligned.
 */
export function textBoxPoints(object: TextObject): MapPointF[] {
    if (object.lines.length === 0) return [];

    const symbol = object.symbol;
    const metrics = symbol.fontMetrics;
    const scaling = symbol.internalScaling;
    const line0 = object.lines[0];

    let newTop = object.verticalAlignment === 'top'
        ? -object.boxHeight / 2
        : (line0.lineY - line0.ascent) / scaling;
    // Extra internal leading
    const topAdjust = -symbol.fontSize + (metrics.ascent + metrics.descent + 0.5) / scaling;
    newTop -= topAdjust;

    const anchor = toMm(object.anchor);
    const rotation = new Transform().rotate(-object.rotation * 180 / Math.PI);
    const halfWidth = object.boxWidth / 2;
    const halfHeight = object.boxHeight / 2;
    return [
        { x: -halfWidth, y: halfHeight },
        { x: halfWidth, y: halfHeight },
        { x: halfWidth, y: newTop },
        { x: -halfWidth, y: newTop },
    ].map(p => {
        const q = rotation.map(p);
        return { x: q.x + anchor.x, y: q.y + anchor.y };
    });
}

// --- OBJECTS ---

/** Millimetres; null for objects without coordinates. */
export function objectExtent(object: MapObject): Rect | null {
    let extent: Rect | null = null;
    switch (object.type) {
        case 'point':
            extent = rectInclude(null, object.coord.x / 1000, object.coord.y / 1000);
            break;
        case 'path':
            for (const c of object.coords) extent = rectInclude(extent, c.x / 1000, c.y / 1000);
            break;
        case 'text': {
            const points = object.hasSingleAnchor ? textSingleAnchorPoints(object) : textBoxPoints(object);
            extent = rectInclude(null, object.anchor.x / 1000, object.anchor.y / 1000);
            for (const p of points) extent = rectInclude(extent, p.x, p.y);
            break;
        }
    }
    return extent;
}

/** Extent of all objects in all parts, in millimetres. */
export function mapExtent(map: OcdMap): Rect | null {
    let extent: Rect | null = null;
    for (const part of map.parts) {
        for (const object of part.objects) extent = rectUnite(extent, objectExtent(object));
    }
    return extent;
}

/**
 * Extent of the coordinates of a point symbol element, widened by the
 * element's own stroke. Native map units.
 */
export function elementExtent(symbol: MapSymbol, coords: MapCoord[]): Rect | null {
    let extent: Rect | null = null;
    for (const c of coords) extent = rectInclude(extent, c.x, c.y);
    if (!extent) return null;
    switch (symbol.type) {
        case 'point': {
            let radius = 0;
            if (symbol.innerColor) radius = Math.max(radius, symbol.innerRadius);
            if (symbol.outerColor) radius = Math.max(radius, symbol.innerRadius + symbol.outerWidth);
            return rectGrow(extent, radius);
        }
        case 'line':
            return rectGrow(extent, symbol.lineWidth / 2);
        default:
            return extent;
    }
}

function translateCoord(coord: MapCoord, dx: number, dy: number): MapCoord {
    return { ...coord, x: coord.x + dx, y: coord.y + dy };
}

/** Returns a moved copy; the source object is left untouched. */
export function translatedObject(object: MapObject, dx: number, dy: number): MapObject {
    if (dx === 0 && dy === 0) return object;
    switch (object.type) {
        case 'point':
            return { ...object, coord: translateCoord(object.coord, dx, dy) };
        case 'path':
            return { ...object, coords: object.coords.map(c => translateCoord(c, dx, dy)) };
        case 'text':
            return { ...object, anchor: translateCoord(object.anchor, dx, dy) };
    }
}

export function isDashedLineWithoutDashSymbol(symbol: LineSymbol): boolean {
    return symbol.dashed && isPointSymbolEmpty(symbol.dashSymbol);
}
