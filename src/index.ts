/**
 * OCD map export public API
 *
 * @module ocd-map-export
 */

import { OcdFileExporter, exportMap } from './ocd/encode.js';
import { FORMATS } from './ocd/versions.js';
import { LEGACY_VERSION, MODERN_VERSIONS } from './ocd/format.js';
import { paletteMatch16, paletteMatch125 } from './ocd/palette.js';
import { convertPoint, convertRotation, convertSize } from './ocd/numeric.js';

export type {
    Cmyk, MapColor, MapCoord, MapPointF, PointElement, PointSymbol, CapStyle, JoinStyle, LineBorder,
    LineSymbol, LineFillPattern, PointFillPattern, FillPattern, AreaSymbol, FramingMode, TextFraming,
    FontMetrics, TextSymbol, CombinedSymbolPart, CombinedSymbol, MapSymbol, SymbolType, PointObject,
    PathObject, HorizontalAlignment, VerticalAlignment, TextLineInfo, TextObject, MapObject,
    Georeferencing, GridUnit, MapGrid, MapPart, OcdMap, MapView,
} from './map-types.js';
export { REGISTRATION_COLOR } from './map-types.js';
export type {
    OcdExportOptions as ExportOptions,
    OcdExportResult as ExportResult,
    OcdLogger as Logger,
    IconImage,
    IconRenderer,
    LegacyEncoder,
    LegacyExportResult,
    EncodingResolver,
    WarningSink,
    ByteSink,
} from './ocd/types.js';
export { DEFAULT_VERSION, ExportOptionsSchema } from './ocd/types.js';
export type { OcdVersion, ModernVersion } from './ocd/format.js';
export type { OcdFormat } from './ocd/versions.js';
export { OcdExportError, UnsupportedVersionError, ColorLimitError, InvalidOptionsError } from './ocd/errors.js';
export { OcdFileExporter, exportMap };

// The OCD Namespace Object
export const OCD = {
    /**
     * Encodes a map as an OCD file. Warnings are returned with the data.
     */
    exportMap,

    /**
     * Exporter class for repeated exports of the same map.
     */
    Exporter: OcdFileExporter,

    /**
     * Versions accepted by the exporter; 0 needs a legacy encoder.
     */
    versions: [LEGACY_VERSION, ...MODERN_VERSIONS] as const,

    /**
     * Per-version format descriptions.
     */
    formats: FORMATS,

    /**
     * Fixed-point conversions from native map units.
     */
    convert: {
        point: convertPoint,
        size: convertSize,
        rotation: convertRotation,
    },

    /**
     * Icon palette matching.
     */
    palette: {
        match16: paletteMatch16,
        match125: paletteMatch125,
    },
};

export default OCD;
