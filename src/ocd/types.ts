import { z } from 'zod';
import type { MapSymbol, MapView, OcdMap } from '../map-types.js';
import { LEGACY_VERSION, MODERN_VERSIONS } from './format.js';
import type { OcdVersion } from './format.js';

export type OcdLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** Premultiplied RGBA pixels, row by row from the top. */
export interface IconImage {
    width: number;
    height: number;
    data: Uint8Array | Uint8ClampedArray;
}

/** Renders a symbol preview over the application's icon background. */
export interface IconRenderer {
    renderIcon(symbol: MapSymbol, size: number, antialiasing: boolean): IconImage;
}

export interface OcdExportResult {
    data: Uint8Array;
    /** Every warning of the run, in order. */
    warnings: string[];
}

export type LegacyExportResult = OcdExportResult;

/** The separate encoder for version 0 files. */
export interface LegacyEncoder {
    encode(map: OcdMap, view: MapView | null): LegacyExportResult;
}

/**
 * Returns the name of the 8-bit encoding for narrow strings, or null for
 * UTF-8.
 */
export type EncodingResolver = () => string | null;

export type WarningSink = (message: string) => void;

/** Receives the finished file in one piece. */
export type ByteSink = (data: Uint8Array) => void;

export type OcdExportOptions = {
    /** 0 (legacy encoder), 8, 9, 10, 11 or 12. Default: 9. Other values are rejected. */
    version?: number;
    /** Current view; OCD 8 stores it in the setup record. Later versions do not store it. */
    view?: MapView | null;
    /** Encoding for narrow strings in OCD 8 - 10. */
    determineEncoding?: EncodingResolver | null;
    /** Called for every warning, in order. */
    onWarning?: WarningSink | null;
    /** Optional logger hook; src/ never writes to the console. */
    logger?: OcdLogger | null;
    /** Symbol icon source. Without it, icons are blank. */
    iconRenderer?: IconRenderer | null;
    /** Required for version 0. */
    legacyEncoder?: LegacyEncoder | null;
};

export const DEFAULT_VERSION: OcdVersion = 9;

const SUPPORTED_VERSIONS: readonly number[] = [LEGACY_VERSION, ...MODERN_VERSIONS];

const functionSchema = z.custom<(...args: never[]) => unknown>(value => typeof value === 'function', {
    message: 'Expected a function',
});

const coordSchema = z.object({ x: z.number(), y: z.number() }).passthrough();

export const ExportOptionsSchema = z.object({
    version: z.number().int().refine(v => SUPPORTED_VERSIONS.includes(v), {
        message: 'Unsupported OCD version',
    }).optional(),
    view: z.object({
        center: coordSchema,
        zoom: z.number().positive(),
    }).nullable().optional(),
    determineEncoding: functionSchema.nullable().optional(),
    onWarning: functionSchema.nullable().optional(),
    logger: z.object({
        info: functionSchema.optional(),
        warn: functionSchema.optional(),
        error: functionSchema.optional(),
    }).nullable().optional(),
    iconRenderer: z.object({ renderIcon: functionSchema }).passthrough().nullable().optional(),
    legacyEncoder: z.object({ encode: functionSchema }).passthrough().nullable().optional(),
});
