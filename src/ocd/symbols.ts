import type {
    AreaSymbol, CombinedSymbol, HorizontalAlignment, LineBorder, LineSymbol, MapSymbol, PointSymbol, TextSymbol,
} from '../map-types.js';
import { isPointSymbolEmpty, isBorderVisible, plainTextName, symbolColors } from '../map-utils.js';
import { concatBytes } from './byte-writer.js';
import {
    HatchMode, ICON_SIZE, LINE_ACTIVE_SYMBOLS, StructureMode, SYMBOL_FLAGS, SYMBOL_STATUS, SymbolType, V8_MAX_TABS,
} from './format.js';
import { blankIcon } from './icon.js';
import { convertRotation, convertSize, qRound } from './numeric.js';
import { encodePattern, pointSymbolExtent } from './patterns.js';
import {
    LINE_SYMBOL_BODY, POINT_SYMBOL_BODY, TEXT_SYMBOL_BODY, recordSize, writeRecord,
} from './records.js';
import type { RecordLayout, RecordValues } from './records.js';
import type { OcdFile } from './file.js';
import type { ExportSession } from './session.js';

const MAX_COLOR_LIST = 14;
const BITMASK_BYTES = 32;

export const ALIGNMENT_CODES: Readonly<Record<HorizontalAlignment, number>> = {
    left: 0,
    center: 1,
    right: 2,
};

/** Extra line attributes taken from the other parts of a combined symbol. */
interface LineDecoration {
    framing: LineSymbol;
    doubleLine: LineSymbol | null;
}

function lineStyle(symbol: LineSymbol): number | null {
    const cap = symbol.capStyle;
    const join = symbol.joinStyle;
    if (cap === 'flat' && join === 'bevel') return 0;
    if (cap === 'round' && join === 'round') return 1;
    if (cap === 'pointed' && join === 'bevel') return 2;
    if (cap === 'pointed' && join === 'round') return 3;
    if (cap === 'flat' && join === 'miter') return 4;
    return null;
}

function lineStyleForCap(symbol: LineSymbol): number {
    switch (symbol.capStyle) {
        case 'flat': return 0;
        case 'round': return 1;
        case 'pointed': return 3;
        case 'square': return 0;
    }
}

function framingStyle(symbol: LineSymbol): number | null {
    const cap = symbol.capStyle;
    const join = symbol.joinStyle;
    if (cap === 'flat' && join === 'bevel') return 0;
    if (cap === 'round' && join === 'round') return 1;
    if (cap === 'flat' && join === 'miter') return 4;
    return null;
}

function hasNoPointSymbols(line: LineSymbol): boolean {
    return isPointSymbolEmpty(line.dashSymbol)
        && isPointSymbolEmpty(line.midSymbol)
        && isPointSymbolEmpty(line.startSymbol)
        && isPointSymbolEmpty(line.endSymbol);
}

/** A plain solid line that can become the framing of another line. */
export function maybeFraming(line: LineSymbol): boolean {
    return !line.hasBorder
        && !line.dashed
        && line.capStyle !== 'pointed'
        && hasNoPointSymbols(line);
}

/** A bordered filled line that can become the double line of another line. */
export function maybeDoubleFilling(line: LineSymbol): boolean {
    return line.hasBorder
        && line.lineWidth > 0 && line.color !== null
        && line.capStyle !== 'pointed'
        && hasNoPointSymbols(line);
}

/** Copy of a part, carrying the identity of the combined symbol. */
function duplicateAs<T extends MapSymbol>(symbol: T, combined: CombinedSymbol): T {
    return {
        ...symbol,
        number: [...combined.number],
        name: combined.name,
        isHidden: combined.isHidden,
        isProtected: combined.isProtected,
    };
}

/**
 * Encodes map symbols into OCD symbol records. Combined symbols are reduced
 * to a single representable record where possible.
 */
export class SymbolEncoder {
    constructor(
        private readonly session: ExportSession,
        private readonly file: OcdFile
    ) { }

    exportSymbols(): void {
        for (const symbol of this.session.map.symbols) {
            // already exported as part of a combined symbol
            if (this.session.symbolNumbers.has(symbol)) continue;

            switch (symbol.type) {
                case 'point':
                    this.file.addSymbol(this.encodePointSymbol(symbol));
                    break;
                case 'area':
                    this.file.addSymbol(this.encodeAreaSymbol(symbol));
                    break;
                case 'line':
                    this.file.addSymbol(this.encodeLineSymbol(symbol));
                    break;
                case 'text':
                    this.exportTextSymbol(symbol);
                    break;
                case 'combined':
                    this.exportCombinedSymbol(symbol);
                    break;
            }
        }
    }

    // --- BASE SYMBOL ---

    private colorUsage(symbol: MapSymbol): RecordValues {
        const used = symbolColors(symbol);
        const indices: number[] = [];
        this.session.exportedColors().forEach((color, i) => {
            if (used.has(color)) indices.push(i);
        });

        if (this.session.format.colorUsage === 'bitmask') {
            const bits = new Uint8Array(BITMASK_BYTES);
            for (const i of indices) {
                if (i < BITMASK_BYTES * 8) bits[i >> 3] |= 1 << (i & 7);
            }
            return { colors: bits };
        }
        const list = indices.slice(0, MAX_COLOR_LIST);
        return { colors: list, num_colors: list.length };
    }

    private icon(symbol: MapSymbol): Uint8Array {
        const format = this.session.format;
        const renderer = this.session.iconRenderer;
        const image = renderer
            ? renderer.renderIcon(symbol, ICON_SIZE, format.iconAntialiasing)
            : blankIcon();
        return format.encodeIcon(image);
    }

    /** Numbers the symbol and fills the fields shared by all symbol types. */
    private setupBaseSymbol(symbol: MapSymbol, type: SymbolType): { base: RecordValues; number: number } {
        const number = this.session.assignNumber(symbol);
        let status = 0;
        if (symbol.isProtected) status |= SYMBOL_STATUS.PROTECTED;
        if (symbol.isHidden) status |= SYMBOL_STATUS.HIDDEN;

        const base: RecordValues = {
            number,
            type,
            status,
            description: this.session.encodeName(plainTextName(symbol)),
            icon: this.icon(symbol),
            ...this.colorUsage(symbol),
        };
        return { base, number };
    }

    private assemble(base: RecordValues, bodyLayout: RecordLayout, body: RecordValues, pattern: Uint8Array): Uint8Array {
        const baseLayout = this.session.format.baseSymbol;
        base.size = recordSize(baseLayout) + recordSize(bodyLayout) + pattern.length;
        return concatBytes([writeRecord(baseLayout, base), writeRecord(bodyLayout, body), pattern]);
    }

    // --- POINT ---

    encodePointSymbol(symbol: PointSymbol): Uint8Array {
        const { base } = this.setupBaseSymbol(symbol, SymbolType.POINT);
        const extent = pointSymbolExtent(symbol);
        base.extent = extent > 0 ? extent : 100;
        base.flags = symbol.rotatable ? SYMBOL_FLAGS.ROTATABLE : 0;

        const pattern = encodePattern(this.session, symbol);
        return this.assemble(base, POINT_SYMBOL_BODY, { data_size: pattern.length / 8 }, pattern);
    }

    // --- AREA ---

    private hatchDistance(lineSpacing: number, lineWidth: number): number {
        return this.session.format.hatchDistanceIsGap
            ? convertSize(lineSpacing - lineWidth)
            : convertSize(lineSpacing);
    }

    /**
     * @param borderNumber export number of the border line symbol, for
     *   area symbols with border
     */
    encodeAreaSymbol(symbol: AreaSymbol, borderNumber: number | null = null): Uint8Array {
        const session = this.session;
        const name = plainTextName(symbol);
        const { base } = this.setupBaseSymbol(symbol, SymbolType.AREA);
        const body: RecordValues = {};
        let flags = 0;
        let hatchMode = HatchMode.NONE;
        let hatchColor = 0;
        let hatchLineWidth = 0;
        let hatchDist = 0;
        let structureMode = StructureMode.NONE;
        let structureWidth = 0;
        let structureHeight = 0;
        let patternSymbol: PointSymbol | null = null;

        if (symbol.color) {
            body.fill_on = 1;
            body.fill_color = session.convertColor(symbol.color);
        }

        const skipWarning = `In area symbol "${name}", skipping a fill pattern.`;
        for (const pattern of symbol.patterns) {
            if (pattern.type === 'line') {
                if (hatchMode === HatchMode.NONE) {
                    hatchMode = HatchMode.SINGLE;
                    hatchColor = session.convertColor(pattern.lineColor);
                    hatchLineWidth = convertSize(pattern.lineWidth);
                    hatchDist = this.hatchDistance(pattern.lineSpacing, pattern.lineWidth);
                    body.hatch_angle_1 = convertRotation(pattern.angle);
                    if (pattern.rotatable) flags |= SYMBOL_FLAGS.ROTATABLE;
                } else if (hatchMode === HatchMode.SINGLE && hatchColor === session.convertColor(pattern.lineColor)) {
                    hatchMode = HatchMode.CROSS;
                    hatchLineWidth = Math.trunc((hatchLineWidth + convertSize(pattern.lineWidth)) / 2);
                    // The second line always counts its gap, whatever the version.
                    hatchDist = Math.trunc((hatchDist + convertSize(pattern.lineSpacing - pattern.lineWidth)) / 2);
                    body.hatch_angle_2 = convertRotation(pattern.angle);
                    if (pattern.rotatable) flags |= SYMBOL_FLAGS.ROTATABLE;
                } else {
                    session.warn(skipWarning);
                }
            } else {
                if (structureMode === StructureMode.NONE) {
                    structureMode = StructureMode.ALIGNED_ROWS;
                    structureWidth = convertSize(pattern.pointDistance);
                    structureHeight = convertSize(pattern.lineSpacing);
                    body.structure_angle = convertRotation(pattern.angle);
                    patternSymbol = pattern.point;
                    if (pattern.rotatable) flags |= SYMBOL_FLAGS.ROTATABLE;
                } else if (structureMode === StructureMode.ALIGNED_ROWS) {
                    // Works for the common orienteering symbol sets only.
                    structureMode = StructureMode.SHIFTED_ROWS;
                    session.warn(`In area symbol "${name}", assuming a "shifted rows" point pattern. This might be correct as well as incorrect.`);
                    if (pattern.lineOffset !== 0) structureHeight = Math.trunc(structureHeight / 2);
                    else structureWidth = Math.trunc(structureWidth / 2);
                } else {
                    session.warn(skipWarning);
                }
            }
        }

        if (hatchMode !== HatchMode.NONE) {
            Object.assign(body, {
                hatch_mode: hatchMode,
                hatch_color: hatchColor,
                hatch_line_width: hatchLineWidth,
                hatch_dist: hatchDist,
            });
        }
        if (structureMode !== StructureMode.NONE) {
            Object.assign(body, {
                structure_mode: structureMode,
                structure_width: structureWidth,
                structure_height: structureHeight,
            });
        }
        if (borderNumber !== null) {
            body.border_on = 1;
            body.border_symbol = borderNumber;
        }
        base.flags = flags;

        const pattern = encodePattern(session, patternSymbol);
        body.data_size = pattern.length / 8;
        return this.assemble(base, session.format.areaBody, body, pattern);
    }

    // --- LINE ---

    encodeLineSymbol(symbol: LineSymbol, decoration: LineDecoration | null = null): Uint8Array {
        const session = this.session;
        const { base } = this.setupBaseSymbol(symbol, SymbolType.LINE);

        let extent = convertSize(Math.trunc(symbol.lineWidth / 2));
        if (symbol.hasBorder) {
            extent += convertSize(Math.max(0, symbol.border.shift + Math.trunc(symbol.border.width / 2)));
        }
        extent = Math.max(
            extent,
            pointSymbolExtent(symbol.startSymbol),
            pointSymbolExtent(symbol.endSymbol),
            pointSymbolExtent(symbol.midSymbol),
            pointSymbolExtent(symbol.dashSymbol)
        );
        base.extent = extent;

        const mid = encodePattern(session, symbol.midSymbol);
        const corner = encodePattern(session, symbol.dashSymbol);
        const start = encodePattern(session, symbol.startSymbol);
        const end = encodePattern(session, symbol.endSymbol);

        const body = this.lineSymbolCommon(symbol);
        body.primary_data_size = mid.length / 8;
        body.secondary_data_size = 0;
        body.corner_data_size = corner.length / 8;
        body.start_data_size = start.length / 8;
        body.end_data_size = end.length / 8;
        if (session.format.lineActiveSymbols) {
            let active = 0;
            if (corner.length) active |= LINE_ACTIVE_SYMBOLS.CORNER;
            if (start.length) active |= LINE_ACTIVE_SYMBOLS.START;
            if (end.length) active |= LINE_ACTIVE_SYMBOLS.END;
            body.active_symbols = active;
        }
        if (decoration) this.applyDecoration(symbol, body, decoration);

        return this.assemble(base, LINE_SYMBOL_BODY, body, concatBytes([mid, corner, start, end]));
    }

    private lineSymbolCommon(symbol: LineSymbol): RecordValues {
        const session = this.session;
        const name = plainTextName(symbol);
        const body: RecordValues = {};

        if (symbol.color) {
            body.line_color = session.convertColor(symbol.color);
            body.line_width = convertSize(symbol.lineWidth);
        }

        let style = lineStyle(symbol);
        if (style === null) {
            session.warn(`In line symbol "${name}", cannot represent cap/join combination.`);
            style = lineStyleForCap(symbol);
        }
        body.line_style = style;

        if (symbol.capStyle === 'pointed') {
            body.dist_from_start = convertSize(symbol.pointedCapLength);
            body.dist_from_end = convertSize(symbol.pointedCapLength);
        }

        if (symbol.dashed) {
            if (!isPointSymbolEmpty(symbol.midSymbol)) {
                if (symbol.dashesInGroup > 1) {
                    session.warn(`In line symbol "${name}", neglecting the dash grouping.`);
                }
                const mainLength = convertSize(symbol.dashLength + symbol.breakLength);
                body.main_length = mainLength;
                body.end_length = Math.trunc(mainLength / 2);
                body.main_gap = convertSize(symbol.breakLength);
            } else if (symbol.dashesInGroup > 1) {
                if (symbol.dashesInGroup > 2) {
                    session.warn(`In line symbol "${name}", the number of dashes in a group has been reduced to 2.`);
                }
                const groupLength = convertSize(2 * symbol.dashLength + symbol.inGroupBreakLength);
                const inGroupGap = convertSize(symbol.inGroupBreakLength);
                body.main_length = groupLength;
                body.end_length = groupLength;
                body.main_gap = convertSize(symbol.breakLength);
                body.sec_gap = inGroupGap;
                body.end_gap = inGroupGap;
            } else {
                const mainLength = convertSize(symbol.dashLength);
                body.main_length = mainLength;
                body.end_length = Math.trunc(mainLength / (symbol.halfOuterDashes ? 2 : 1));
                body.main_gap = convertSize(symbol.breakLength);
            }
        } else {
            body.main_length = convertSize(symbol.segmentLength);
            body.end_length = convertSize(symbol.endLength);
        }

        if (symbol.hasBorder && (isBorderVisible(symbol.border) || isBorderVisible(symbol.rightBorder))) {
            body.double_width = convertSize(symbol.lineWidth - symbol.border.width + 2 * symbol.border.shift);
            this.applyDoubleBorders(body, symbol, name);
        }

        body.min_sym = symbol.showAtLeastOneSymbol ? 0 : -1;
        body.num_prim_sym = symbol.midSymbolsPerSpot;
        body.prim_sym_dist = convertSize(symbol.midSymbolDistance);
        return body;
    }

    /** Double line mode, border widths, colors and dash timing. */
    private applyDoubleBorders(body: RecordValues, line: LineSymbol, name: string): void {
        const left: LineBorder = line.border;
        const right: LineBorder = line.rightBorder;
        if (left.dashed && !right.dashed) body.double_mode = 2;
        else body.double_mode = left.dashed ? 3 : 1;

        body.double_left_width = convertSize(left.width);
        body.double_right_width = convertSize(right.width);
        body.double_left_color = this.session.convertColor(left.color);
        body.double_right_color = this.session.convertColor(right.color);

        if (left.dashed) {
            body.double_length = convertSize(left.dashLength);
            body.double_gap = convertSize(left.breakLength);
        } else if (right.dashed) {
            body.double_length = convertSize(right.dashLength);
            body.double_gap = convertSize(right.breakLength);
        }

        const differentDashes = left.dashed && right.dashed
            && (left.dashLength !== right.dashLength || left.breakLength !== right.breakLength);
        if (differentDashes || (!left.dashed && right.dashed)) {
            this.session.warn(`In line symbol "${name}", cannot export the borders correctly.`);
        }
    }

    private applyDecoration(mainLine: LineSymbol, body: RecordValues, { framing, doubleLine }: LineDecoration): void {
        const session = this.session;
        const name = plainTextName(mainLine);

        body.framing_color = session.convertColor(framing.color);
        body.framing_width = convertSize(framing.lineWidth);
        let style = framingStyle(framing);
        if (style === null) {
            session.warn(`In line symbol "${name}", cannot represent cap/join combination.`);
            style = framing.capStyle === 'round' ? 1 : 0;
        }
        body.framing_style = style;

        if (doubleLine) {
            body.double_width = convertSize(doubleLine.lineWidth - doubleLine.border.width + 2 * doubleLine.border.shift);
            body.double_color = session.convertColor(doubleLine.color);
            if (doubleLine.hasBorder && (isBorderVisible(doubleLine.border) || isBorderVisible(doubleLine.rightBorder))) {
                this.applyDoubleBorders(body, doubleLine, name);
            }
        }
    }

    // --- TEXT ---

    /**
     * Exports one record per horizontal alignment used by text objects with
     * this symbol, or a single left-aligned record if no object uses it.
     */
    exportTextSymbol(symbol: TextSymbol): void {
        let exported = false;
        for (const part of this.session.map.parts) {
            for (const object of part.objects) {
                if (object.type !== 'text' || object.symbol !== symbol) continue;
                const alignment = object.horizontalAlignment;
                if (this.session.textFormatNumber(symbol, alignment) !== undefined) continue;

                const { data, number } = this.encodeTextSymbol(symbol, ALIGNMENT_CODES[alignment]);
                this.file.addSymbol(data);
                this.session.recordTextFormat(symbol, alignment, number);
                exported = true;
            }
        }
        if (!exported) {
            this.file.addSymbol(this.encodeTextSymbol(symbol, ALIGNMENT_CODES.left).data);
        }
    }

    encodeTextSymbol(symbol: TextSymbol, alignment: number): { data: Uint8Array; number: number } {
        const session = this.session;
        const name = plainTextName(symbol);
        const { base, number } = this.setupBaseSymbol(symbol, SymbolType.TEXT);
        if (session.format.textSymbolType2) base.type2 = 1;

        const charSpacing = convertSize(qRound(1000 * symbol.characterSpacing));
        if (charSpacing !== 0) {
            session.warn(`In text symbol ${name}: custom character spacing is set, its implementation does not match OCAD's behavior yet`);
        }
        const absoluteLineSpacing = symbol.lineSpacing * (symbol.fontMetrics.lineSpacing / symbol.internalScaling);
        if (symbol.underline) session.warn(`In text symbol ${name}: ignoring underlining`);
        if (symbol.kerning) session.warn(`In text symbol ${name}: ignoring kerning`);

        const tabs = symbol.customTabs.slice(0, V8_MAX_TABS).map(convertSize);
        const body: RecordValues = {
            font_name: session.encodeName(symbol.fontFamily),
            font_color: session.convertColor(symbol.color),
            font_size: qRound(10 * symbol.fontSize / 25.4 * 72),
            font_weight: symbol.bold ? 700 : 400,
            font_italic: symbol.italic ? 1 : 0,
            char_spacing: charSpacing,
            word_spacing: 100,
            alignment,
            line_spacing: qRound(absoluteLineSpacing / (symbol.fontSize * 0.01)),
            para_spacing: convertSize(qRound(1000 * symbol.paragraphSpacing)),
            line_below_on: symbol.lineBelow ? 1 : 0,
            line_below_color: session.convertColor(symbol.lineBelowColor),
            line_below_width: convertSize(qRound(1000 * symbol.lineBelowWidth)),
            line_below_offset: convertSize(qRound(1000 * symbol.lineBelowDistance)),
            num_tabs: tabs.length,
            tab_pos: tabs,
            ...this.textFraming(symbol),
        };

        return { data: this.assemble(base, TEXT_SYMBOL_BODY, body, new Uint8Array(0)), number };
    }

    private textFraming(symbol: TextSymbol): RecordValues {
        const framing = symbol.framing;
        if (!framing.color) return {};
        switch (framing.mode) {
            case 'none':
                return { framing_mode: 0, framing_color: 0 };
            case 'shadow':
                return {
                    framing_mode: 1,
                    framing_color: this.session.convertColor(framing.color),
                    framing_offset_x: convertSize(framing.shadowXOffset),
                    framing_offset_y: -convertSize(framing.shadowYOffset),
                };
            case 'line':
                return {
                    framing_mode: 2,
                    framing_color: this.session.convertColor(framing.color),
                    framing_width: convertSize(framing.lineHalfWidth),
                };
        }
    }

    // --- COMBINED ---

    /**
     * Reduces a combined symbol to one record: a single part, an area with
     * border line (OCD 9+), or a line with framing and double line.
     * Anything else is reported and skipped.
     */
    exportCombinedSymbol(combined: CombinedSymbol): void {
        if (!this.tryExportCombined(combined)) {
            this.session.warn(`Unhandled combined symbol: ${plainTextName(combined)}`);
        }
    }

    private tryExportCombined(combined: CombinedSymbol): boolean {
        const session = this.session;
        const parts: MapSymbol[] = [];
        for (const part of combined.parts) {
            if (part.symbol) parts.push(part.symbol);
        }

        if (parts.length === 1) {
            const part = parts[0];
            let data: Uint8Array;
            let duplicate: MapSymbol;
            if (part.type === 'area') {
                const area = duplicateAs(part, combined);
                data = this.encodeAreaSymbol(area);
                duplicate = area;
            } else if (part.type === 'line') {
                const line = duplicateAs(part, combined);
                data = this.encodeLineSymbol(line);
                duplicate = line;
            } else {
                return false;
            }
            this.file.addSymbol(data);
            return this.aliasNumber(combined, duplicate);
        }
        if (parts.length !== 2 && parts.length !== 3) return false;

        let [first, second] = parts;
        const third: MapSymbol | null = parts.length === 3 ? parts[2] : null;
        if (first.type !== 'line' && second.type !== 'line') return false;
        if (second.type === 'area') [first, second] = [second, first];

        if (first.type === 'area') {
            // Area symbol with border
            if (!session.format.areaBorders || parts.length !== 2) return false;
            if (second.type !== 'line') return false;

            let border: LineSymbol = second;
            if (!session.symbolNumbers.has(border)) {
                const borderPart = combined.parts.find(part => part.symbol === second);
                if (borderPart?.isPrivate) {
                    const number = [...combined.number];
                    number[1] = (number[1] ?? -1) + 1;
                    border = { ...duplicateAs(border, combined), name: `Border of ${combined.name}`, number };
                }
                this.file.addSymbol(this.encodeLineSymbol(border));
            }
            const borderNumber = session.numberOf(border) ?? 0;
            const area = duplicateAs(first, combined);
            this.file.addSymbol(this.encodeAreaSymbol(area, borderNumber));
            return this.aliasNumber(combined, area);
        }

        if (first.type !== 'line' || second.type !== 'line') return false;
        let main: LineSymbol = first;
        let framing: LineSymbol = second;
        let doubleLine: LineSymbol | null = null;
        if (third) {
            if (third.type !== 'line') return false;
            doubleLine = third;
            if (!maybeDoubleFilling(doubleLine)) {
                // Move a candidate double line to the third position.
                if (maybeDoubleFilling(main)) [main, doubleLine] = [doubleLine, main];
                else if (maybeDoubleFilling(framing)) [framing, doubleLine] = [doubleLine, framing];
                else return false;
            }
        }
        if (!maybeFraming(framing)) [main, framing] = [framing, main];
        if (!maybeFraming(framing)) return false;

        const line = duplicateAs(main, combined);
        if (doubleLine && line.hasBorder) return false;
        this.file.addSymbol(this.encodeLineSymbol(line, { framing, doubleLine }));
        return this.aliasNumber(combined, line);
    }

    private aliasNumber(combined: CombinedSymbol, exported: MapSymbol): boolean {
        const number = this.session.numberOf(exported);
        if (number === undefined) return false;
        this.session.symbolNumbers.set(combined, number);
        return true;
    }
}
