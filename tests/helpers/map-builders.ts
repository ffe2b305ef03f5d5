import type {
    AreaSymbol, CombinedSymbol, LineBorder, LineSymbol, MapColor, MapCoord, MapObject, OcdMap, PathObject,
    PointObject, PointSymbol, TextObject, TextSymbol,
} from '../../src/map-types.js';

export function makeColor(name: string, cmyk: Partial<MapColor['cmyk']> = {}, extra: Partial<MapColor> = {}): MapColor {
    return {
        name,
        cmyk: { c: 0, m: 0, y: 0, k: 0, ...cmyk },
        opacity: 1,
        knockout: false,
        ...extra,
    };
}

export function makeBorder(overrides: Partial<LineBorder> = {}): LineBorder {
    return {
        color: null,
        width: 0,
        shift: 0,
        dashed: false,
        dashLength: 2000,
        breakLength: 1000,
        ...overrides,
    };
}

export function makePointSymbol(overrides: Partial<PointSymbol> = {}): PointSymbol {
    return {
        type: 'point',
        name: 'Point',
        number: [1, -1],
        rotatable: false,
        innerRadius: 0,
        innerColor: null,
        outerWidth: 0,
        outerColor: null,
        elements: [],
        ...overrides,
    };
}

export function makeLineSymbol(overrides: Partial<LineSymbol> = {}): LineSymbol {
    return {
        type: 'line',
        name: 'Line',
        number: [2, -1],
        color: null,
        lineWidth: 0,
        capStyle: 'flat',
        joinStyle: 'bevel',
        pointedCapLength: 1000,
        dashed: false,
        segmentLength: 4000,
        endLength: 0,
        dashLength: 4000,
        breakLength: 1000,
        dashesInGroup: 1,
        inGroupBreakLength: 500,
        halfOuterDashes: false,
        midSymbol: null,
        startSymbol: null,
        endSymbol: null,
        dashSymbol: null,
        midSymbolsPerSpot: 1,
        midSymbolDistance: 0,
        showAtLeastOneSymbol: true,
        hasBorder: false,
        border: makeBorder(),
        rightBorder: makeBorder(),
        ...overrides,
    };
}

export function makeAreaSymbol(overrides: Partial<AreaSymbol> = {}): AreaSymbol {
    return {
        type: 'area',
        name: 'Area',
        number: [3, -1],
        color: null,
        patterns: [],
        ...overrides,
    };
}

export function makeTextSymbol(overrides: Partial<TextSymbol> = {}): TextSymbol {
    return {
        type: 'text',
        name: 'Text',
        number: [4, -1],
        fontFamily: 'Arial',
        fontSize: 4,
        color: null,
        bold: false,
        italic: false,
        underline: false,
        kerning: false,
        characterSpacing: 0,
        lineSpacing: 1,
        paragraphSpacing: 0,
        lineBelow: false,
        lineBelowColor: null,
        lineBelowWidth: 0,
        lineBelowDistance: 0,
        customTabs: [],
        framing: { mode: 'none', color: null, lineHalfWidth: 0, shadowXOffset: 0, shadowYOffset: 0 },
        fontMetrics: { ascent: 300, descent: 100, lineSpacing: 460 },
        internalScaling: 100,
        ...overrides,
    };
}

export function makeCombinedSymbol(parts: CombinedSymbol['parts'], overrides: Partial<CombinedSymbol> = {}): CombinedSymbol {
    return {
        type: 'combined',
        name: 'Combined',
        number: [5, -1],
        parts,
        ...overrides,
    };
}

export function pointAt(symbol: PointSymbol, x: number, y: number, rotation = 0): PointObject {
    return { type: 'point', symbol, coord: { x, y }, rotation };
}

export function pathOf(symbol: PathObject['symbol'], coords: MapCoord[]): PathObject {
    return { type: 'path', symbol, coords };
}

export function makeText(symbol: TextSymbol, overrides: Partial<TextObject> = {}): TextObject {
    return {
        type: 'text',
        symbol,
        text: 'Hello',
        anchor: { x: 0, y: 0 },
        rotation: 0,
        hasSingleAnchor: true,
        boxWidth: 0,
        boxHeight: 0,
        horizontalAlignment: 'left',
        verticalAlignment: 'baseline',
        lines: [{ lineX: 0, lineY: 0, width: 500, ascent: 300, descent: 100 }],
        ...overrides,
    };
}

export function makeMap(overrides: Partial<OcdMap> = {}, objects: MapObject[] = []): OcdMap {
    return {
        colors: [],
        symbols: [],
        parts: [{ name: 'default part', objects }],
        georeferencing: {
            scaleDenominator: 10000,
            grivation: 0,
            projectedRefPoint: { x: 0, y: 0 },
        },
        grid: { unit: 'mm-on-map', horizontalSpacing: 50, verticalSpacing: 50 },
        notes: '',
        ...overrides,
    };
}
