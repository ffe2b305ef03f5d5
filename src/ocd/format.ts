export const OCD_VENDOR_MARK = 0x0cad;

/** Version 0 selects the separate legacy encoder. */
export const LEGACY_VERSION = 0;
export const MODERN_VERSIONS = [8, 9, 10, 11, 12] as const;
export type ModernVersion = typeof MODERN_VERSIONS[number];
export type OcdVersion = typeof LEGACY_VERSION | ModernVersion;

export enum FileType {
    MAP = 0,
    COURSE_SETTING = 1,
    MAP_V8 = 2,
}

export enum SymbolType {
    POINT = 1,
    LINE = 2,
    AREA = 3,
    TEXT = 4,
}

export const SYMBOL_STATUS = {
    PROTECTED: 1,
    HIDDEN: 2,
};

export const SYMBOL_FLAGS = {
    ROTATABLE: 1,
};

export enum ElementType {
    LINE = 1,
    AREA = 2,
    CIRCLE = 3,
    DOT = 4,
}

export const ELEMENT_FLAGS = {
    ROUND_CAP: 1,
    MITER_JOIN: 4,
};

export enum HatchMode {
    NONE = 0,
    SINGLE = 1,
    CROSS = 2,
}

export enum StructureMode {
    NONE = 0,
    ALIGNED_ROWS = 1,
    SHIFTED_ROWS = 2,
}

export enum ObjectType {
    POINT = 1,
    LINE = 2,
    AREA = 3,
    UNFORMATTED_TEXT = 4,
    FORMATTED_TEXT = 5,
}

export enum ObjectStatus {
    DELETED = 0,
    NORMAL = 1,
    HIDDEN = 2,
}

/**
 * Flags in the 8 low bits of an OcdPoint32 member.
 */
export const POINT_FLAGS_X = {
    CTL1: 0x01,
    CTL2: 0x02,
    LEFT: 0x04,
};

export const POINT_FLAGS_Y = {
    CORNER: 0x01,
    HOLE: 0x02,
    RIGHT: 0x04,
    DASH: 0x08,
};

export const LINE_ACTIVE_SYMBOLS = {
    END: 0x01,
    START: 0x02,
    CORNER: 0x04,
    SECONDARY: 0x08,
};

/** Parameter string types. */
export enum StringType {
    COLOR = 9,
    MAP_NOTES_V9 = 11,
    SCALE_PAR = 1039,
    MAP_NOTES = 1061,
}

/** All records and data chunks are aligned to this size. */
export const OCD_ALIGNMENT = 8;
export const OCD_POINT_SIZE = 8;

/** Entries per symbol, object or string index block. */
export const INDEX_BLOCK_ENTRIES = 256;

export const ICON_SIZE = 22;

/** Drawing area of OCD 8 files, in millimetres. */
export const OCD_BOUNDS_MM = { left: -2000, top: -2000, right: 2000, bottom: 2000 };

/** Area offsets are rounded to this many metres in projected coordinates. */
export const AREA_OFFSET_UNIT_M = 100;

export const TEXT_CHUNK_SIZE = OCD_POINT_SIZE * 8;
export const TEXT_MAX_CHUNKS = 1024 / 8;

export const V8_MAX_TABS = 32;
export const V8_MAX_NOTES_BYTES = 32768;
export const V8_MAX_COLORS = 256;
export const V8_COLOR_SEPARATIONS = 32;

export const NAME_CAPACITY = 31;

export function addPadding(size: number): number {
    return Math.ceil(size / OCD_ALIGNMENT) * OCD_ALIGNMENT;
}
