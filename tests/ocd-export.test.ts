import OCD, {
    ColorLimitError, InvalidOptionsError, OcdExportError, OcdFileExporter, UnsupportedVersionError, exportMap,
} from '../src/index.js';
import type { MapView, OcdMap } from '../src/index.js';
import { stringForScalePar } from '../src/ocd/parameters.js';
import { getFormat } from '../src/ocd/versions.js';
import { FILE_HEADER_V8, SYMBOL_HEADER_V8, recordSize } from '../src/ocd/records.js';
import { OcdReader, bytesOf, num, readPoints, readRecord } from './helpers/ocd-reader.js';
import {
    makeAreaSymbol, makeColor, makeLineSymbol, makeMap, makePointSymbol, makeText, makeTextSymbol, pathOf, pointAt,
} from './helpers/map-builders.js';

const black = makeColor('Black', { k: 1 });
const blue = makeColor('Blue', { c: 1 });

function sampleMap(): OcdMap {
    const point = makePointSymbol({ innerRadius: 300, innerColor: black });
    const line = makeLineSymbol({ color: black, lineWidth: 200 });
    const area = makeAreaSymbol({ color: blue });
    const text = makeTextSymbol({ color: black });
    return makeMap({ colors: [black, blue], symbols: [point, line, area, text] }, [
        pointAt(point, 1000, 2000),
        pathOf(line, [{ x: 0, y: 0 }, { x: 1000, y: 0 }]),
        pathOf(area, [{ x: 0, y: 0 }, { x: 1000, y: 0 }, { x: 1000, y: 1000 }]),
        makeText(text),
    ]);
}

describe('exportMap', () => {
    it('writes OCD 9 by default', () => {
        const { data, warnings } = exportMap(sampleMap());
        const reader = new OcdReader(data, 9);
        expect(num(reader.header, 'vendor_mark')).toBe(0x0cad);
        expect(num(reader.header, 'version')).toBe(9);
        expect(num(reader.header, 'file_type')).toBe(0);
        expect(warnings).toEqual([]);
    });

    it('keeps the default version when the option is undefined', () => {
        const { data } = exportMap(sampleMap(), { version: undefined, view: undefined });
        expect(num(new OcdReader(data, 9).header, 'version')).toBe(9);
    });

    it.each([8, 9, 10, 11, 12])('writes the version number of OCD %i', version => {
        const reader = new OcdReader(exportMap(sampleMap(), { version }).data, version);
        expect(num(reader.header, 'version')).toBe(version);
        expect(num(reader.header, 'file_type')).toBe(version === 8 ? 2 : 0);
    });

    it('indexes symbols and objects', () => {
        const reader = new OcdReader(exportMap(sampleMap()).data, 9);
        expect(reader.symbols().map(s => num(s.base, 'number'))).toEqual([1000, 2000, 3000, 4000]);

        const objects = reader.objects();
        expect(objects.map(o => num(o.entry, 'symbol'))).toEqual([1000, 2000, 3000, 4000]);
        expect(objects.map(o => num(o.header, 'symbol'))).toEqual([1000, 2000, 3000, 4000]);
        expect(objects.map(o => num(o.entry, 'type'))).toEqual([1, 2, 3, 4]);
        expect(objects.map(o => num(o.entry, 'size'))).toEqual([1, 2, 3, 13]);
        expect(readPoints(objects[0].items, 1)).toEqual([{ x: 100 << 8, y: -200 * 256 }]);
    });

    it('declares object sizes in bytes from OCD 11', () => {
        const reader = new OcdReader(exportMap(sampleMap(), { version: 11 }).data, 11);
        expect(reader.objects().map(o => num(o.entry, 'size'))).toEqual([64, 72, 80, 160]);
    });

    it('chains index blocks', () => {
        const symbols = Array.from({ length: 300 }, () => makeLineSymbol({ number: [1, -1] }));
        const reader = new OcdReader(exportMap(makeMap({ symbols })).data, 9);
        const numbers = reader.symbols().map(s => num(s.base, 'number'));
        expect(numbers).toHaveLength(300);
        expect(numbers[0]).toBe(1000);
        expect(numbers[299]).toBe(1299);
    });

    it('writes scale and color strings', () => {
        const map = sampleMap();
        const reader = new OcdReader(exportMap(map).data, 9);
        expect(reader.stringsOfType(1039)).toEqual([stringForScalePar(map, getFormat(9))]);
        expect(reader.stringsOfType(9)).toEqual([
            'Black\tn0\tc0\tm0\ty0\tk100\to1\tt100',
            'Blue\tn1\tc100\tm0\ty0\tk0\to1\tt100',
        ]);
        expect(reader.stringsOfType(1030)).toEqual([]);
    });

    it('keeps the view out of the parameter strings', () => {
        const view: MapView = { center: { x: 21000, y: -8000 }, zoom: 2 };
        const reader = new OcdReader(exportMap(sampleMap(), { version: 10, view }).data, 10);
        expect(reader.strings().map(s => s.type)).toEqual([1039, 9, 9]);
    });

    it('keeps OCD 8 settings in binary records', () => {
        const reader = new OcdReader(exportMap(sampleMap(), { version: 8 }).data, 8);
        expect(reader.strings()).toEqual([]);
        expect(num(reader.header, 'setup_pos')).toBeGreaterThan(0);
        expect(num(reader.header, 'setup_size')).toBe(840);
        expect(num(reader.header, 'info_pos')).toBe(0);
        expect(reader.symbols()).toHaveLength(4);
    });

    it('exports two colors and a plain area symbol to OCD 8', () => {
        const map = makeMap({ colors: [black, blue], symbols: [makeAreaSymbol({ color: blue })] });
        const { data, warnings } = exportMap(map, { version: 8 });
        const reader = new OcdReader(data, 8);

        const symbolHeader = readRecord(SYMBOL_HEADER_V8, data, recordSize(FILE_HEADER_V8));
        expect(num(symbolHeader, 'num_colors')).toBe(2);
        const symbols = reader.symbols();
        expect(symbols).toHaveLength(1);
        const body = reader.areaBody(symbols[0]);
        expect(num(body, 'fill_on')).toBe(1);
        expect(num(body, 'fill_color')).toBe(1);
        expect(num(body, 'data_size')).toBe(0);
        expect(symbols[0].data.length).toBe(348 + 28);
        expect(warnings).toEqual([]);
    });

    it('moves far away objects into the drawing area', () => {
        const point = makePointSymbol({ innerRadius: 300, innerColor: black });
        const map = makeMap({ colors: [black], symbols: [point] }, [pointAt(point, 5_049_000, 0)]);
        const { data, warnings } = exportMap(map);
        const reader = new OcdReader(data, 9);

        expect(readPoints(reader.objects()[0].items, 1)).toEqual([{ x: -25600, y: 0 }]);
        expect(warnings).toEqual(['Coordinates are adjusted to fit into the OCAD 8 drawing area (-2 m ... 2 m).']);
    });

    it('produces the same bytes on repeated runs', () => {
        const exporter = new OcdFileExporter(sampleMap(), { version: 12 });
        const first = exporter.export();
        const second = exporter.export();
        expect(Array.from(second.data)).toEqual(Array.from(first.data));
    });
});

describe('narrow string encoding', () => {
    const mapWithName = (name: string) => makeMap({ symbols: [makeAreaSymbol({ name })] });
    const description = (data: Uint8Array, version: number) =>
        Array.from(bytesOf(new OcdReader(data, version).symbols()[0].base, 'description'));

    it('uses the configured 8-bit encoding up to OCD 10', () => {
        const { data, warnings } = exportMap(mapWithName('Café'), { version: 9, determineEncoding: () => 'latin1' });
        expect(description(data, 9)).toEqual([67, 97, 102, 0xe9]);
        expect(warnings).toEqual([]);
    });

    it('defaults to UTF-8', () => {
        const { data } = exportMap(mapWithName('Café'), { version: 10 });
        expect(description(data, 10)).toEqual([67, 97, 102, 0xc3, 0xa9]);
    });

    it('always uses UTF-8 from OCD 11', () => {
        const determineEncoding = vi.fn(() => 'latin1');
        const { data } = exportMap(mapWithName('Café'), { version: 11, determineEncoding });
        expect(description(data, 11)).toEqual([67, 97, 102, 0xc3, 0xa9]);
        expect(determineEncoding).not.toHaveBeenCalled();
    });

    it('falls back to Windows-1252 for unknown encodings', () => {
        const { data, warnings } = exportMap(mapWithName('Café'), { version: 8, determineEncoding: () => 'no-such-encoding' });
        expect(description(data, 8)).toEqual([67, 97, 102, 0xe9]);
        expect(warnings).toEqual(["Encoding 'no-such-encoding' is not available. Check the settings."]);
    });
});

describe('export errors', () => {
    it.each([7, 13, 9.5, -1])('rejects version %s', version => {
        expect(() => exportMap(sampleMap(), { version })).toThrow(UnsupportedVersionError);
    });

    it('names the rejected version', () => {
        expect(() => exportMap(sampleMap(), { version: 7 }))
            .toThrow('Could not write file: OCD files of version 7 are not supported!');
    });

    it('validates the other options', () => {
        const view: MapView = { center: { x: 0, y: 0 }, zoom: 0 };
        expect(() => exportMap(sampleMap(), { view })).toThrow(InvalidOptionsError);
        expect(() => exportMap(sampleMap(), { view })).toThrow(/^Invalid export options: view\.zoom: /);
    });

    it('rejects too many colors without writing', () => {
        const colors = Array.from({ length: 257 }, (_, i) => makeColor(`Color ${i}`));
        const sink = vi.fn();
        expect(() => exportMap(makeMap({ colors }), { version: 8 }, sink)).toThrow(ColorLimitError);
        expect(sink).not.toHaveBeenCalled();
    });

    it('requires an encoder for version 0', () => {
        expect(() => exportMap(sampleMap(), { version: 0 }))
            .toThrow(new OcdExportError('Could not write file: no encoder for OCD version 0 is configured.'));
    });
});

describe('export hooks', () => {
    it('passes the file to the sink once', () => {
        const sink = vi.fn();
        const result = exportMap(sampleMap(), {}, sink);
        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink).toHaveBeenCalledWith(result.data);
    });

    it('reports warnings in order', () => {
        const spot = makeColor('Spot', { c: 1 }, { spotColorName: 'PMS 300' });
        const line = makeLineSymbol({ name: 'Cliff', capStyle: 'pointed', joinStyle: 'miter' });
        const onWarning = vi.fn();
        const { warnings } = exportMap(makeMap({ colors: [spot], symbols: [line] }), { onWarning });
        expect(warnings).toEqual([
            'Spot color information was ignored.',
            'In line symbol "Cliff", cannot represent cap/join combination.',
        ]);
        expect(onWarning.mock.calls.map(call => call[0])).toEqual(warnings);
    });

    it('logs progress and warnings', () => {
        const logger = { info: vi.fn(), warn: vi.fn() };
        const spot = makeColor('Spot', { c: 1 }, { spotColorName: 'PMS 300' });
        const { data } = exportMap(makeMap({ colors: [spot], symbols: [makeAreaSymbol()] }), { logger });
        expect(logger.info.mock.calls).toEqual([
            ['[OCD] Exporting version 9'],
            [`[OCD] Wrote 1 symbols, 0 objects, ${data.length} bytes`],
        ]);
        expect(logger.warn).toHaveBeenCalledWith('[OCD] Spot color information was ignored.');
    });

    it('delegates version 0 to the legacy encoder', () => {
        const encode = vi.fn((_map: OcdMap, _view: MapView | null) => ({
            data: new Uint8Array([1, 2, 3]),
            warnings: ['Legacy warning'],
        }));
        const onWarning = vi.fn();
        const map = sampleMap();
        const result = exportMap(map, { version: 0, legacyEncoder: { encode }, onWarning });
        expect(Array.from(result.data)).toEqual([1, 2, 3]);
        expect(result.warnings).toEqual(['Legacy warning']);
        expect(onWarning).toHaveBeenCalledWith('Legacy warning');
        expect(encode).toHaveBeenCalledWith(map, null);
    });
});

describe('OCD namespace', () => {
    it('exposes the exporter', () => {
        expect(OCD.exportMap).toBe(exportMap);
        expect(OCD.Exporter).toBe(OcdFileExporter);
        expect(OCD.versions).toEqual([0, 8, 9, 10, 11, 12]);
        expect(OCD.convert.size(1234)).toBe(123);
    });
});
