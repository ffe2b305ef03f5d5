/**
 * Map model consumed by the exporter.
 *
 * The exporter only reads these structures. All lengths and coordinates are
 * native map units (micrometres on the map) unless a field says otherwise.
 *
 * @module ocd-map-export
 */

export interface Cmyk {
    c: number;
    m: number;
    y: number;
    k: number;
}

export interface MapColor {
    name: string;
    /** Components in the range 0.0 - 1.0. */
    cmyk: Cmyk;
    /** 0.0 - 1.0 */
    opacity: number;
    knockout: boolean;
    /** Spot color separation name; not representable in OCD files. */
    spotColorName?: string;
}

/**
 * Synthetic registration color. When a symbol uses it, it is exported as the
 * first color and every map color moves up by one index.
 */
export const REGISTRATION_COLOR: Readonly<MapColor> = Object.freeze({
    name: 'Registration black (all printed colors)',
    cmyk: Object.freeze({ c: 1, m: 1, y: 1, k: 1 }),
    opacity: 1,
    knockout: false,
});

export interface MapCoord {
    x: number;
    y: number;
    curveStart?: boolean;
    dashPoint?: boolean;
    holePoint?: boolean;
}

/** A coordinate in millimetres. */
export interface MapPointF {
    x: number;
    y: number;
}

// --- SYMBOLS ---

interface SymbolCommon {
    name: string;
    /** Number components, e.g. [102, 1] for "102.1". -1 marks an unset component. */
    number: number[];
    isProtected?: boolean;
    isHidden?: boolean;
}

export interface PointElement {
    symbol: PointSymbol | LineSymbol | AreaSymbol;
    coords: MapCoord[];
}

export interface PointSymbol extends SymbolCommon {
    type: 'point';
    rotatable: boolean;
    innerRadius: number;
    innerColor: MapColor | null;
    outerWidth: number;
    outerColor: MapColor | null;
    elements: PointElement[];
}

export type CapStyle = 'flat' | 'round' | 'square' | 'pointed';
export type JoinStyle = 'bevel' | 'miter' | 'round';

export interface LineBorder {
    color: MapColor | null;
    width: number;
    shift: number;
    dashed: boolean;
    dashLength: number;
    breakLength: number;
}

export interface LineSymbol extends SymbolCommon {
    type: 'line';
    color: MapColor | null;
    lineWidth: number;
    capStyle: CapStyle;
    joinStyle: JoinStyle;
    pointedCapLength: number;
    dashed: boolean;
    segmentLength: number;
    endLength: number;
    dashLength: number;
    breakLength: number;
    dashesInGroup: number;
    inGroupBreakLength: number;
    halfOuterDashes: boolean;
    midSymbol: PointSymbol | null;
    startSymbol: PointSymbol | null;
    endSymbol: PointSymbol | null;
    dashSymbol: PointSymbol | null;
    midSymbolsPerSpot: number;
    midSymbolDistance: number;
    showAtLeastOneSymbol: boolean;
    hasBorder: boolean;
    border: LineBorder;
    rightBorder: LineBorder;
}

export interface LineFillPattern {
    type: 'line';
    /** Radians */
    angle: number;
    rotatable: boolean;
    lineSpacing: number;
    lineOffset: number;
    offsetAlongLine: number;
    lineColor: MapColor | null;
    lineWidth: number;
}

export interface PointFillPattern {
    type: 'point';
    /** Radians */
    angle: number;
    rotatable: boolean;
    lineSpacing: number;
    lineOffset: number;
    offsetAlongLine: number;
    pointDistance: number;
    point: PointSymbol | null;
}

export type FillPattern = LineFillPattern | PointFillPattern;

export interface AreaSymbol extends SymbolCommon {
    type: 'area';
    color: MapColor | null;
    patterns: FillPattern[];
}

export type FramingMode = 'none' | 'shadow' | 'line';

export interface TextFraming {
    mode: FramingMode;
    color: MapColor | null;
    lineHalfWidth: number;
    shadowXOffset: number;
    shadowYOffset: number;
}

/** Font metrics in the symbol's internally scaled text units. */
export interface FontMetrics {
    ascent: number;
    descent: number;
    lineSpacing: number;
}

export interface TextSymbol extends SymbolCommon {
    type: 'text';
    fontFamily: string;
    /** Millimetres */
    fontSize: number;
    color: MapColor | null;
    bold: boolean;
    italic: boolean;
    underline: boolean;
    kerning: boolean;
    /** Fraction of the font size. */
    characterSpacing: number;
    /** Factor of the font's line spacing. */
    lineSpacing: number;
    /** Millimetres */
    paragraphSpacing: number;
    lineBelow: boolean;
    lineBelowColor: MapColor | null;
    /** Millimetres */
    lineBelowWidth: number;
    /** Millimetres */
    lineBelowDistance: number;
    customTabs: number[];
    framing: TextFraming;
    fontMetrics: FontMetrics;
    internalScaling: number;
}

export interface CombinedSymbolPart {
    symbol: MapSymbol | null;
    isPrivate: boolean;
}

export interface CombinedSymbol extends SymbolCommon {
    type: 'combined';
    parts: CombinedSymbolPart[];
}

export type MapSymbol = PointSymbol | LineSymbol | AreaSymbol | TextSymbol | CombinedSymbol;
export type SymbolType = MapSymbol['type'];

// --- OBJECTS ---

export interface PointObject {
    type: 'point';
    symbol: MapSymbol;
    coord: MapCoord;
    /** Radians */
    rotation: number;
}

export interface PathObject {
    type: 'path';
    symbol: MapSymbol;
    coords: MapCoord[];
}

export type HorizontalAlignment = 'left' | 'center' | 'right';
export type VerticalAlignment = 'baseline' | 'top' | 'center' | 'bottom';

/** Layout of one text line, in the symbol's internally scaled text units. */
export interface TextLineInfo {
    lineX: number;
    lineY: number;
    width: number;
    ascent: number;
    descent: number;
}

export interface TextObject {
    type: 'text';
    symbol: TextSymbol;
    text: string;
    /** Native map units */
    anchor: MapCoord;
    /** Radians */
    rotation: number;
    hasSingleAnchor: boolean;
    /** Millimetres */
    boxWidth: number;
    /** Millimetres */
    boxHeight: number;
    horizontalAlignment: HorizontalAlignment;
    verticalAlignment: VerticalAlignment;
    lines: TextLineInfo[];
}

export type MapObject = PointObject | PathObject | TextObject;

// --- MAP ---

export interface Georeferencing {
    scaleDenominator: number;
    /** Degrees */
    grivation: number;
    /** Projected (real world) coordinates of the map reference point, in metres. */
    projectedRefPoint: { x: number; y: number };
    /** Map reference point, in millimetres. */
    mapRefPoint?: MapPointF;
}

export type GridUnit = 'mm-on-map' | 'm-in-terrain';

export interface MapGrid {
    unit: GridUnit;
    horizontalSpacing: number;
    verticalSpacing: number;
}

export interface MapPart {
    name: string;
    objects: MapObject[];
}

export interface OcdMap {
    colors: MapColor[];
    symbols: MapSymbol[];
    parts: MapPart[];
    georeferencing: Georeferencing;
    grid: MapGrid;
    notes: string;
}

export interface MapView {
    /** Native map units */
    center: MapCoord;
    zoom: number;
}
