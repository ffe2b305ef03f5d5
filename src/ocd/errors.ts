export class OcdExportError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'OcdExportError';
    }
}

export class UnsupportedVersionError extends OcdExportError {
    constructor(public readonly version: unknown) {
        super(`Could not write file: OCD files of version ${String(version)} are not supported!`);
        this.name = 'UnsupportedVersionError';
    }
}

export class ColorLimitError extends OcdExportError {
    constructor(public readonly limit: number, version: number) {
        super(`The map contains more than ${limit} colors which is not supported by OCD version ${version}.`);
        this.name = 'ColorLimitError';
    }
}

export class InvalidOptionsError extends OcdExportError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'InvalidOptionsError';
    }
}
