import { FileType, StringType } from './format.js';
import type { ModernVersion } from './format.js';
import {
    AREA_SYMBOL_BODY_V8, AREA_SYMBOL_BODY_V9, BASE_SYMBOL_V8, BASE_SYMBOL_V9,
    FILE_HEADER_V8, FILE_HEADER_V9, INDEX_ENTRY_V8, INDEX_ENTRY_V9, OBJECT_V12, OBJECT_V8, OBJECT_V9,
} from './records.js';
import type { RecordLayout } from './records.js';
import { encodeIconV6, encodeIconV9, ICON_BYTES_V6, ICON_BYTES_V9 } from './icon.js';
import type { IconImage } from './types.js';
import { UnsupportedVersionError } from './errors.js';

/**
 * Everything that differs between the modern OCD versions. One instance is
 * selected per export run.
 */
export interface OcdFormat {
    /** Version number written to the file header. */
    readonly version: ModernVersion;
    readonly fileType: FileType;
    readonly fileHeader: RecordLayout;
    readonly baseSymbol: RecordLayout;
    readonly areaBody: RecordLayout;
    readonly objectHeader: RecordLayout;
    readonly indexEntry: RecordLayout;
    /** Multiplier for the major symbol number component. */
    readonly symbolNumberFactor: number;
    /** Bits kept by the stored symbol number fields, or null when they hold any assigned number. */
    readonly symbolNumberMask: number | null;
    readonly iconBytes: number;
    readonly iconAntialiasing: boolean;
    readonly encodeIcon: (image: IconImage) => Uint8Array;
    /** `bitmask`: one bit per color; `list`: up to 14 color numbers. */
    readonly colorUsage: 'bitmask' | 'list';
    readonly maxColors: number;
    /** Narrow strings use a configurable 8-bit encoding instead of UTF-8. */
    readonly custom8BitEncoding: boolean;
    /** Setup, notes and colors live in binary records instead of parameter strings. */
    readonly binarySetup: boolean;
    readonly notesStringType: StringType | null;
    /** Version 10 and later append the combined grid zone fields to the scale string. */
    readonly extendedScaleString: boolean;
    readonly areaBorders: boolean;
    /** Hatch distance excludes the hatch line width. */
    readonly hatchDistanceIsGap: boolean;
    /** Circle diameters span the full outer line width on both sides. */
    readonly circleDiameterIsOuter: boolean;
    /** Text symbols set the secondary type field. */
    readonly textSymbolType2: boolean;
    /** Index entries carry sizes in bytes instead of coordinate slots. */
    readonly indexSizeInBytes: boolean;
    /** Line symbols declare which point symbol slots are used. */
    readonly lineActiveSymbols: boolean;
    /** Index entries carry object type and status. */
    readonly indexEntryExtras: boolean;
    /** Objects flag unicode text. */
    readonly objectUnicodeFlag: boolean;
}

const V8: OcdFormat = {
    version: 8,
    fileType: FileType.MAP_V8,
    fileHeader: FILE_HEADER_V8,
    baseSymbol: BASE_SYMBOL_V8,
    areaBody: AREA_SYMBOL_BODY_V8,
    objectHeader: OBJECT_V8,
    indexEntry: INDEX_ENTRY_V8,
    symbolNumberFactor: 10,
    symbolNumberMask: 0xffff,
    iconBytes: ICON_BYTES_V6,
    iconAntialiasing: false,
    encodeIcon: encodeIconV6,
    colorUsage: 'bitmask',
    maxColors: 256,
    custom8BitEncoding: true,
    binarySetup: true,
    notesStringType: null,
    extendedScaleString: false,
    areaBorders: false,
    hatchDistanceIsGap: true,
    circleDiameterIsOuter: true,
    textSymbolType2: true,
    indexSizeInBytes: false,
    lineActiveSymbols: false,
    indexEntryExtras: false,
    objectUnicodeFlag: true,
};

const V9: OcdFormat = {
    ...V8,
    version: 9,
    fileType: FileType.MAP,
    fileHeader: FILE_HEADER_V9,
    baseSymbol: BASE_SYMBOL_V9,
    areaBody: AREA_SYMBOL_BODY_V9,
    objectHeader: OBJECT_V9,
    indexEntry: INDEX_ENTRY_V9,
    symbolNumberFactor: 1000,
    symbolNumberMask: null,
    iconBytes: ICON_BYTES_V9,
    iconAntialiasing: true,
    encodeIcon: encodeIconV9,
    colorUsage: 'list',
    binarySetup: false,
    notesStringType: StringType.MAP_NOTES_V9,
    areaBorders: true,
    hatchDistanceIsGap: false,
    circleDiameterIsOuter: false,
    textSymbolType2: false,
    indexEntryExtras: true,
    objectUnicodeFlag: false,
};

const V10: OcdFormat = {
    ...V9,
    version: 10,
    extendedScaleString: true,
};

const V11: OcdFormat = {
    ...V10,
    version: 11,
    maxColors: 1024,
    custom8BitEncoding: false,
    notesStringType: StringType.MAP_NOTES,
    indexSizeInBytes: true,
    lineActiveSymbols: true,
};

const V12: OcdFormat = {
    ...V11,
    version: 12,
    objectHeader: OBJECT_V12,
};

export const FORMATS: Readonly<Record<ModernVersion, OcdFormat>> = {
    8: V8,
    9: V9,
    10: V10,
    11: V11,
    12: V12,
};

export function getFormat(version: number): OcdFormat {
    switch (version) {
        case 8: return FORMATS[8];
        case 9: return FORMATS[9];
        case 10: return FORMATS[10];
        case 11: return FORMATS[11];
        case 12: return FORMATS[12];
        default: throw new UnsupportedVersionError(version);
    }
}
