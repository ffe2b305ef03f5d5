import type { OcdMap } from '../map-types.js';
import { LEGACY_VERSION } from './format.js';
import { getFormat } from './versions.js';
import type { OcdFormat } from './versions.js';
import { DEFAULT_VERSION, ExportOptionsSchema } from './types.js';
import type { ByteSink, OcdExportOptions, OcdExportResult } from './types.js';
import { Diagnostics } from './diagnostics.js';
import { InvalidOptionsError, OcdExportError, UnsupportedVersionError } from './errors.js';
import { UTF8_CODEC, resolveCodec } from './text-codec.js';
import type { StringCodec } from './text-codec.js';
import { ExportSession } from './session.js';
import { OcdFile } from './file.js';
import { checkColorLimit, exportParameterStrings, exportSetupV8 } from './parameters.js';
import { SymbolEncoder } from './symbols.js';
import { ObjectEncoder, calculateAreaOffset } from './objects.js';

/**
 * Writes a map as an OCD file of one version.
 *
 * Every export run starts from a fresh session, so one exporter can be
 * used repeatedly. The sink receives the file only when the run succeeds.
 */
export class OcdFileExporter {
    private readonly options: Required<OcdExportOptions>;

    constructor(private readonly map: OcdMap, options: OcdExportOptions = {}) {
        const defaults: Required<OcdExportOptions> = {
            version: DEFAULT_VERSION,
            view: null,
            determineEncoding: null,
            onWarning: null,
            logger: null,
            iconRenderer: null,
            legacyEncoder: null,
        };
        // An option given as undefined keeps its default.
        this.options = {
            version: options.version ?? defaults.version,
            view: options.view ?? defaults.view,
            determineEncoding: options.determineEncoding ?? defaults.determineEncoding,
            onWarning: options.onWarning ?? defaults.onWarning,
            logger: options.logger ?? defaults.logger,
            iconRenderer: options.iconRenderer ?? defaults.iconRenderer,
            legacyEncoder: options.legacyEncoder ?? defaults.legacyEncoder,
        };
    }

    export(sink?: ByteSink): OcdExportResult {
        this.validateOptions();
        const { version, logger } = this.options;
        const diagnostics = new Diagnostics(this.options.onWarning, logger);

        logger?.info?.(`[OCD] Exporting version ${version}`);
        const data = version === LEGACY_VERSION
            ? this.exportLegacy(diagnostics)
            : this.exportModern(getFormat(version), diagnostics);

        sink?.(data);
        return { data, warnings: [...diagnostics.warnings] };
    }

    private validateOptions(): void {
        const result = ExportOptionsSchema.safeParse(this.options);
        if (result.success) return;

        if (result.error.issues.some(issue => issue.path[0] === 'version')) {
            throw new UnsupportedVersionError(this.options.version);
        }
        const details = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new InvalidOptionsError(`Invalid export options: ${details}`, result.error);
    }

    private exportLegacy(diagnostics: Diagnostics): Uint8Array {
        const encoder = this.options.legacyEncoder;
        if (!encoder) {
            throw new OcdExportError('Could not write file: no encoder for OCD version 0 is configured.');
        }
        const result = encoder.encode(this.map, this.options.view);
        for (const warning of result.warnings) diagnostics.add(warning);
        return result.data;
    }

    private selectCodec(format: OcdFormat, diagnostics: Diagnostics): StringCodec {
        if (!format.custom8BitEncoding) return UTF8_CODEC;
        const name = this.options.determineEncoding?.() ?? null;
        return resolveCodec(name, unavailable => {
            diagnostics.add(`Encoding '${unavailable}' is not available. Check the settings.`);
        });
    }

    private exportModern(format: OcdFormat, diagnostics: Diagnostics): Uint8Array {
        const { logger, view } = this.options;
        const codec = this.selectCodec(format, diagnostics);
        const session = new ExportSession(this.map, format, diagnostics, codec, this.options.iconRenderer);
        checkColorLimit(session);
        session.areaOffset = calculateAreaOffset(this.map, diagnostics);

        const file = new OcdFile(format);
        if (format.binarySetup) exportSetupV8(session, file, view);
        else exportParameterStrings(session, file);

        new SymbolEncoder(session, file).exportSymbols();
        new ObjectEncoder(session, file).exportObjects();

        const data = file.serialize();
        logger?.info?.(
            `[OCD] Wrote ${file.symbols.length} symbols, ${file.objects.length} objects, ${data.length} bytes`
        );
        return data;
    }
}

/** Exports `map` in one call. */
export function exportMap(map: OcdMap, options: OcdExportOptions = {}, sink?: ByteSink): OcdExportResult {
    return new OcdFileExporter(map, options).export(sink);
}
