import type { MapColor, MapView, OcdMap } from '../map-types.js';
import { convertPoint, qRound } from './numeric.js';
import { toProjectedCoords } from './geometry.js';
import {
    COLOR_INFO_V8, COLOR_SEPARATION_V8, SETUP_V8, SYMBOL_HEADER_V8, recordSize, writeRecord,
} from './records.js';
import { StringType, V8_COLOR_SEPARATIONS, V8_MAX_COLORS, V8_MAX_NOTES_BYTES } from './format.js';
import { concatBytes } from './byte-writer.js';
import { ColorLimitError } from './errors.js';
import type { OcdFormat } from './versions.js';
import type { OcdFile } from './file.js';
import type { ExportSession } from './session.js';

const REGISTRATION_WARNING = 'Registration black is exported as a regular color.';
const SPOT_COLOR_WARNING = 'Spot color information was ignored.';

/** String 9: one color definition. */
export function stringForColor(index: number, color: MapColor): string {
    const { c, m, y, k } = color.cmyk;
    return color.name
        + `\tn${index}`
        + `\tc${qRound(c * 100)}`
        + `\tm${qRound(m * 100)}`
        + `\ty${qRound(y * 100)}`
        + `\tk${qRound(k * 100)}`
        + `\to${color.knockout ? '0' : '1'}`
        + `\tt${qRound(color.opacity * 100)}`;
}

/** String 1039: scale, grid and georeferencing. */
export function stringForScalePar(map: OcdMap, format: OcdFormat): string {
    const georef = map.georeferencing;
    const refPoint = toProjectedCoords(georef, { x: 0, y: 0 });

    const grid = map.grid;
    const spacing = Math.min(grid.horizontalSpacing, grid.verticalSpacing);
    const onMap = grid.unit === 'mm-on-map';
    const gridSpacingMap = onMap ? spacing : spacing * 1000 / georef.scaleDenominator;
    const gridSpacingReal = onMap ? spacing * georef.scaleDenominator / 1000 : spacing;

    let result = `\tm${Math.trunc(georef.scaleDenominator)}`
        + `\tg${gridSpacingMap.toFixed(4)}`
        + '\tr1'
        + `\tx${qRound(refPoint.x)}`
        + `\ty${qRound(refPoint.y)}`
        + `\ta${georef.grivation.toFixed(8)}`
        + `\td${gridSpacingReal.toFixed(6)}`
        + '\ti0';
    if (format.extendedScaleString) {
        result += `\tb${(0).toFixed(2)}\tc${(0).toFixed(2)}`;
    }
    return result;
}

/** Rejects maps with more colors than the target version can store. */
export function checkColorLimit(session: ExportSession): void {
    const format = session.format;
    const limit = session.usesRegistrationColor ? format.maxColors - 1 : format.maxColors;
    if (session.map.colors.length > limit) {
        throw new ColorLimitError(limit, format.version);
    }
}

function warnSpotColors(session: ExportSession): void {
    if (session.map.colors.some(color => color.spotColorName)) {
        session.warn(SPOT_COLOR_WARNING);
    }
}

/** Georeferencing, notes and colors as parameter strings (OCD 9 and later). */
export function exportParameterStrings(session: ExportSession, file: OcdFile): void {
    const { map, format, codec } = session;
    file.addString(StringType.SCALE_PAR, codec.encode(stringForScalePar(map, format)));

    if (format.notesStringType !== null && map.notes) {
        file.addString(format.notesStringType, codec.encode(map.notes));
    }

    if (session.usesRegistrationColor) session.warn(REGISTRATION_WARNING);
    session.exportedColors().forEach((color, i) => {
        file.addString(StringType.COLOR, codec.encode(stringForColor(i, color)));
    });
    warnSpotColors(session);
}

/** OCD 8 setup record, notes block and the color table of the symbol header. */
export function exportSetupV8(session: ExportSession, file: OcdFile, view: MapView | null): void {
    const { map, codec } = session;
    const georef = map.georeferencing;

    const setup = {
        map_scale: georef.scaleDenominator,
        real_offset_x: georef.projectedRefPoint.x,
        real_offset_y: georef.projectedRefPoint.y,
        real_angle: georef.grivation !== 0 ? georef.grivation : undefined,
        center: view
            ? convertPoint(view.center.x - session.areaOffset.x, view.center.y - session.areaOffset.y)
            : undefined,
        zoom: view ? view.zoom : 1,
    };
    file.setup = writeRecord(SETUP_V8, setup);

    if (map.notes) {
        let notes = codec.encode(map.notes);
        if (notes.length + 1 > V8_MAX_NOTES_BYTES) {
            session.warn('The map notes have been truncated.');
            notes = codec.encodeTruncated(map.notes, V8_MAX_NOTES_BYTES - 1);
        }
        file.info = concatBytes([notes, new Uint8Array(1)]);
    }

    const colors = session.exportedColors();
    if (session.usesRegistrationColor) session.warn(REGISTRATION_WARNING);

    const colorSize = recordSize(COLOR_INFO_V8);
    const table = new Uint8Array(V8_MAX_COLORS * colorSize);
    colors.forEach((color, i) => {
        table.set(writeRecord(COLOR_INFO_V8, {
            number: i,
            cyan: qRound(200 * color.cmyk.c),
            magenta: qRound(200 * color.cmyk.m),
            yellow: qRound(200 * color.cmyk.y),
            black: qRound(200 * color.cmyk.k),
            name: session.encodeName(color.name),
        }), i * colorSize);
    });
    const separations = new Uint8Array(V8_COLOR_SEPARATIONS * recordSize(COLOR_SEPARATION_V8));
    const header = writeRecord(SYMBOL_HEADER_V8, { num_colors: colors.length });
    file.symbolHeader = concatBytes([header, table, separations]);

    warnSpotColors(session);
}
