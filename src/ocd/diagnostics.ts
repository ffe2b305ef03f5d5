import type { OcdLogger, WarningSink } from './types.js';

/**
 * Ordered warning list of one export run. Every warning is also passed to
 * the caller's sink and the logger hook as it is added.
 */
export class Diagnostics {
    private readonly list: string[] = [];

    constructor(
        private readonly sink: WarningSink | null = null,
        private readonly logger: OcdLogger | null = null
    ) { }

    add(message: string): void {
        this.list.push(message);
        this.sink?.(message);
        this.logger?.warn?.(`[OCD] ${message}`);
    }

    get warnings(): readonly string[] {
        return this.list;
    }

    get count(): number {
        return this.list.length;
    }
}
