/**
 * Declarative little-endian record layouts.
 *
 * Every fixed-size structure of the file format is described as an ordered
 * list of fields. Records are serialized field by field; fields without a
 * value are written as zeros.
 */

export type ScalarField = 'u8' | 'i8' | 'u16' | 'i16' | 'u32' | 'i32' | 'f64' | 'point';

export type FieldType =
    | ScalarField
    | { kind: 'pascal'; capacity: number }
    | { kind: 'bytes'; size: number }
    | { kind: 'u16[]'; count: number }
    | { kind: 'i32[]'; count: number }
    | { kind: 'reserved'; size: number };

export type Field = readonly [name: string, type: FieldType];
export type RecordLayout = readonly Field[];

/** Packed coordinate pair as stored in the file: 24 bit value, 8 bit flags. */
export interface OcdPoint32 {
    x: number;
    y: number;
}

/** Pascal string fields take already encoded bytes. */
export type FieldValue = number | Uint8Array | number[] | OcdPoint32;
export type RecordValues = { [name: string]: FieldValue | undefined };

export const pascal = (capacity: number): FieldType => ({ kind: 'pascal', capacity });
export const bytes = (size: number): FieldType => ({ kind: 'bytes', size });
export const reserved = (size: number): FieldType => ({ kind: 'reserved', size });
export const u16Array = (count: number): FieldType => ({ kind: 'u16[]', count });
export const i32Array = (count: number): FieldType => ({ kind: 'i32[]', count });

export function fieldSize(type: FieldType): number {
    if (typeof type === 'string') {
        switch (type) {
            case 'u8':
            case 'i8':
                return 1;
            case 'u16':
            case 'i16':
                return 2;
            case 'u32':
            case 'i32':
                return 4;
            case 'f64':
            case 'point':
                return 8;
        }
    }
    switch (type.kind) {
        case 'pascal':
            return type.capacity + 1;
        case 'bytes':
        case 'reserved':
            return type.size;
        case 'u16[]':
            return type.count * 2;
        case 'i32[]':
            return type.count * 4;
    }
}

export function recordSize(layout: RecordLayout): number {
    let size = 0;
    for (const [, type] of layout) size += fieldSize(type);
    return size;
}

function isPoint(value: FieldValue): value is OcdPoint32 {
    return typeof value === 'object' && !(value instanceof Uint8Array) && !Array.isArray(value);
}

function expectNumber(name: string, value: FieldValue): number {
    if (typeof value !== 'number') throw new TypeError(`Field ${name} expects a number`);
    return value;
}

function expectBytes(name: string, value: FieldValue): Uint8Array {
    if (!(value instanceof Uint8Array)) throw new TypeError(`Field ${name} expects bytes`);
    return value;
}

function expectArray(name: string, value: FieldValue): number[] {
    if (!Array.isArray(value)) throw new TypeError(`Field ${name} expects an array`);
    return value;
}

function writeField(view: DataView, target: Uint8Array, pos: number, name: string, type: FieldType, value: FieldValue): void {
    if (typeof type === 'string') {
        switch (type) {
            case 'u8': view.setUint8(pos, expectNumber(name, value)); return;
            case 'i8': view.setInt8(pos, expectNumber(name, value)); return;
            case 'u16': view.setUint16(pos, expectNumber(name, value), true); return;
            case 'i16': view.setInt16(pos, expectNumber(name, value), true); return;
            case 'u32': view.setUint32(pos, expectNumber(name, value), true); return;
            case 'i32': view.setInt32(pos, expectNumber(name, value), true); return;
            case 'f64': view.setFloat64(pos, expectNumber(name, value), true); return;
            case 'point':
                if (!isPoint(value)) throw new TypeError(`Field ${name} expects a point`);
                view.setInt32(pos, value.x, true);
                view.setInt32(pos + 4, value.y, true);
                return;
        }
    }
    switch (type.kind) {
        case 'pascal': {
            const data = expectBytes(name, value);
            const length = Math.min(data.length, type.capacity);
            view.setUint8(pos, length);
            target.set(data.subarray(0, length), pos + 1);
            return;
        }
        case 'bytes': {
            const data = expectBytes(name, value);
            target.set(data.subarray(0, type.size), pos);
            return;
        }
        case 'u16[]': {
            const items = expectArray(name, value);
            for (let i = 0; i < Math.min(items.length, type.count); i++) {
                view.setUint16(pos + 2 * i, items[i], true);
            }
            return;
        }
        case 'i32[]': {
            const items = expectArray(name, value);
            for (let i = 0; i < Math.min(items.length, type.count); i++) {
                view.setInt32(pos + 4 * i, items[i], true);
            }
            return;
        }
        case 'reserved':
            throw new Error(`Field ${name} is reserved`);
    }
}

/** Serializes a record. Unknown field names are rejected. */
export function writeRecord(layout: RecordLayout, values: RecordValues): Uint8Array {
    const buffer = new Uint8Array(recordSize(layout));
    const view = new DataView(buffer.buffer);
    const known = new Set(layout.map(([name]) => name));
    for (const name of Object.keys(values)) {
        if (!known.has(name)) throw new Error(`Unknown record field: ${name}`);
    }

    let pos = 0;
    for (const [name, type] of layout) {
        const value = values[name];
        if (value !== undefined) writeField(view, buffer, pos, name, type, value);
        pos += fieldSize(type);
    }
    return buffer;
}

// --- FILE HEADERS ---

export const FILE_HEADER_V8: RecordLayout = [
    ['vendor_mark', 'u16'],
    ['file_type', 'u8'],
    ['file_status', 'u8'],
    ['version', 'u16'],
    ['subversion', 'u16'],
    ['first_symbol_block', 'u32'],
    ['first_object_block', 'u32'],
    ['setup_pos', 'u32'],
    ['setup_size', 'u32'],
    ['info_pos', 'u32'],
    ['info_size', 'u32'],
    ['first_string_block', 'u32'],
    ['file_name_pos', 'u32'],
    ['file_name_size', 'u32'],
    ['reserved', reserved(4)],
];

/** Follows the OCD 8 file header directly. Color records are appended separately. */
export const SYMBOL_HEADER_V8: RecordLayout = [
    ['num_colors', 'u16'],
    ['num_color_sep', 'u16'],
    ['cyan_freq', 'u16'],
    ['cyan_angle', 'u16'],
    ['magenta_freq', 'u16'],
    ['magenta_angle', 'u16'],
    ['yellow_freq', 'u16'],
    ['yellow_angle', 'u16'],
    ['black_freq', 'u16'],
    ['black_angle', 'u16'],
    ['reserved', reserved(4)],
];

export const COLOR_INFO_V8: RecordLayout = [
    ['number', 'u16'],
    ['reserved', reserved(2)],
    ['cyan', 'u8'],
    ['magenta', 'u8'],
    ['yellow', 'u8'],
    ['black', 'u8'],
    ['name', pascal(31)],
    ['separations', bytes(32)],
];

export const COLOR_SEPARATION_V8: RecordLayout = [
    ['name', pascal(15)],
    ['cyan', 'u8'],
    ['magenta', 'u8'],
    ['yellow', 'u8'],
    ['black', 'u8'],
    ['raster_freq', 'u16'],
    ['raster_angle', 'u16'],
];

export const SETUP_V8: RecordLayout = [
    ['center', 'point'],
    ['grid_dist', 'f64'],
    ['work_mode', 'i16'],
    ['line_mode', 'i16'],
    ['edit_mode', 'i16'],
    ['selected_symbol', 'i16'],
    ['map_scale', 'f64'],
    ['real_offset_x', 'f64'],
    ['real_offset_y', 'f64'],
    ['real_angle', 'f64'],
    ['real_grid', 'f64'],
    ['gps_angle', 'f64'],
    ['gps_adjust', bytes(480)],
    ['num_gps_adjust', 'i32'],
    ['reserved', reserved(4)],
    ['draft_scale', 'f64'],
    ['template_offset', 'point'],
    ['template_file_name', pascal(255)],
    ['zoom', 'f64'],
];

export const FILE_HEADER_V9: RecordLayout = [
    ['vendor_mark', 'u16'],
    ['file_type', 'u8'],
    ['reserved_0', reserved(1)],
    ['version', 'u16'],
    ['subversion', 'u8'],
    ['subsubversion', 'u8'],
    ['first_symbol_block', 'u32'],
    ['first_object_block', 'u32'],
    ['offline_sync_serial', 'u32'],
    ['current_file_version', 'u32'],
    ['reserved_1', reserved(8)],
    ['first_string_block', 'u32'],
    ['file_name_pos', 'u32'],
    ['file_name_size', 'u32'],
    ['reserved_2', reserved(4)],
];

// --- SYMBOLS ---

export const BASE_SYMBOL_V8: RecordLayout = [
    ['size', 'i16'],
    ['number', 'i16'],
    ['type', 'i16'],
    ['type2', 'u8'],
    ['flags', 'u8'],
    ['extent', 'i16'],
    ['selected', 'u8'],
    ['status', 'u8'],
    ['reserved', reserved(4)],
    ['file_pos', 'i32'],
    ['colors', bytes(32)],
    ['description', pascal(31)],
    ['icon', bytes(264)],
];

export const BASE_SYMBOL_V9: RecordLayout = [
    ['size', 'i32'],
    ['number', 'i32'],
    ['type', 'u8'],
    ['flags', 'u8'],
    ['selected', 'u8'],
    ['status', 'u8'],
    ['tool', 'u8'],
    ['cs_mode', 'u8'],
    ['cs_type', 'u8'],
    ['cs_cd_flags', 'u8'],
    ['extent', 'i32'],
    ['file_pos', 'u32'],
    ['group', 'i16'],
    ['num_colors', 'u16'],
    ['colors', u16Array(14)],
    ['description', pascal(31)],
    ['icon', bytes(484)],
    ['symbol_tree_group', u16Array(64)],
];

export const POINT_SYMBOL_BODY: RecordLayout = [
    ['data_size', 'u16'],
    ['reserved', reserved(2)],
];

/** Header of one pattern element; its coordinates follow. */
export const PATTERN_ELEMENT: RecordLayout = [
    ['type', 'i16'],
    ['flags', 'u16'],
    ['color', 'u16'],
    ['line_width', 'i16'],
    ['diameter', 'i16'],
    ['num_coords', 'i16'],
    ['reserved', reserved(4)],
];

export const LINE_SYMBOL_BODY: RecordLayout = [
    ['line_color', 'u16'],
    ['line_width', 'i16'],
    ['line_style', 'u16'],
    ['dist_from_start', 'i16'],
    ['dist_from_end', 'i16'],
    ['main_length', 'i16'],
    ['end_length', 'i16'],
    ['main_gap', 'i16'],
    ['sec_gap', 'i16'],
    ['end_gap', 'i16'],
    ['min_sym', 'i16'],
    ['num_prim_sym', 'i16'],
    ['prim_sym_dist', 'i16'],
    ['double_mode', 'u16'],
    ['double_flags', 'u16'],
    ['double_color', 'u16'],
    ['double_left_color', 'u16'],
    ['double_right_color', 'u16'],
    ['double_width', 'i16'],
    ['double_left_width', 'i16'],
    ['double_right_width', 'i16'],
    ['double_length', 'i16'],
    ['double_gap', 'i16'],
    ['dec_mode', 'u16'],
    ['dec_last', 'u16'],
    ['reserved_0', reserved(2)],
    ['framing_color', 'u16'],
    ['framing_width', 'i16'],
    ['framing_style', 'u16'],
    ['primary_data_size', 'u16'],
    ['secondary_data_size', 'u16'],
    ['corner_data_size', 'u16'],
    ['start_data_size', 'u16'],
    ['end_data_size', 'u16'],
    ['active_symbols', 'u8'],
    ['reserved_1', reserved(7)],
];

export const AREA_SYMBOL_BODY_V8: RecordLayout = [
    ['fill_color', 'u16'],
    ['hatch_mode', 'u16'],
    ['hatch_color', 'u16'],
    ['hatch_line_width', 'i16'],
    ['hatch_dist', 'i16'],
    ['hatch_angle_1', 'i16'],
    ['hatch_angle_2', 'i16'],
    ['fill_on', 'u8'],
    ['reserved_0', reserved(1)],
    ['structure_mode', 'u16'],
    ['structure_width', 'i16'],
    ['structure_height', 'i16'],
    ['structure_angle', 'i16'],
    ['data_size', 'u16'],
    ['reserved_1', reserved(2)],
];

export const AREA_SYMBOL_BODY_V9: RecordLayout = [
    ['border_symbol', 'i32'],
    ['fill_color', 'u16'],
    ['hatch_mode', 'u16'],
    ['hatch_color', 'u16'],
    ['hatch_line_width', 'i16'],
    ['hatch_dist', 'i16'],
    ['hatch_angle_1', 'i16'],
    ['hatch_angle_2', 'i16'],
    ['fill_on', 'u8'],
    ['border_on', 'u8'],
    ['structure_mode', 'u16'],
    ['structure_width', 'i16'],
    ['structure_height', 'i16'],
    ['structure_angle', 'i16'],
    ['data_size', 'u16'],
    ['reserved_0', reserved(2)],
    ['reserved_1', reserved(4)],
];

export const TEXT_SYMBOL_BODY: RecordLayout = [
    ['font_name', pascal(31)],
    ['font_color', 'u16'],
    ['font_size', 'i16'],
    ['font_weight', 'i16'],
    ['font_italic', 'u8'],
    ['reserved_0', reserved(1)],
    ['char_spacing', 'i16'],
    ['word_spacing', 'i16'],
    ['alignment', 'i16'],
    ['line_spacing', 'i16'],
    ['para_spacing', 'i16'],
    ['indent_first', 'i16'],
    ['indent_other', 'i16'],
    ['num_tabs', 'i16'],
    ['line_below_on', 'u16'],
    ['line_below_color', 'u16'],
    ['line_below_width', 'i16'],
    ['line_below_offset', 'i16'],
    ['reserved_1', reserved(2)],
    ['tab_pos', i32Array(32)],
    ['framing_mode', 'u8'],
    ['reserved_2', reserved(1)],
    ['framing_color', 'u16'],
    ['framing_width', 'i16'],
    ['framing_offset_x', 'i16'],
    ['framing_offset_y', 'i16'],
];

// --- OBJECTS ---

export const OBJECT_V8: RecordLayout = [
    ['symbol', 'i16'],
    ['type', 'u8'],
    ['unicode', 'u8'],
    ['num_items', 'u16'],
    ['num_text', 'u16'],
    ['angle', 'i16'],
    ['reserved', reserved(2)],
    ['res_height', 'u32'],
    ['res_id', bytes(16)],
];

export const INDEX_ENTRY_V8: RecordLayout = [
    ['bottom_left', 'point'],
    ['top_right', 'point'],
    ['pos', 'u32'],
    ['size', 'u16'],
    ['symbol', 'i16'],
];

export const OBJECT_V9: RecordLayout = [
    ['symbol', 'i32'],
    ['type', 'u8'],
    ['customer', 'u8'],
    ['angle', 'i16'],
    ['num_items', 'u32'],
    ['num_text', 'u16'],
    ['mark', 'u8'],
    ['snapping_mark', 'u8'],
    ['color', 'i32'],
    ['line_width', 'i16'],
    ['diam_flags', 'i16'],
    ['server_object_id', 'i32'],
    ['height', 'i32'],
    ['creation_date', 'f64'],
    ['multi_rep_id', 'u32'],
    ['modification_date', 'f64'],
    ['reserved', reserved(4)],
];

export const OBJECT_V12: RecordLayout = [
    ...OBJECT_V9,
    ['object_string_length', 'u32'],
    ['object_string_type', 'u8'],
    ['reserved_v12', reserved(3)],
];

export const INDEX_ENTRY_V9: RecordLayout = [
    ['bottom_left', 'point'],
    ['top_right', 'point'],
    ['pos', 'u32'],
    ['size', 'u32'],
    ['symbol', 'i32'],
    ['type', 'u8'],
    ['encrypted_mode', 'u8'],
    ['status', 'u8'],
    ['view_type', 'u8'],
    ['color', 'u16'],
    ['group', 'u16'],
    ['layer', 'u16'],
    ['reserved', reserved(2)],
];

// --- INDEX BLOCKS ---

/** Each index block starts with the file position of the next block, or 0. */
export const INDEX_BLOCK_HEADER: RecordLayout = [
    ['next_block', 'u32'],
];

export const SYMBOL_INDEX_ENTRY: RecordLayout = [
    ['pos', 'u32'],
];

export const STRING_INDEX_ENTRY: RecordLayout = [
    ['pos', 'u32'],
    ['size', 'u32'],
    ['type', 'i32'],
    ['obj_index', 'i32'],
];
