/**
 * Growable little-endian buffer. Positions written earlier can be patched
 * once later offsets are known.
 */
export class ByteWriter {
    private buffer: Uint8Array;
    private view: DataView;
    private pos = 0;

    constructor(initialCapacity = 4096) {
        this.buffer = new Uint8Array(initialCapacity);
        this.view = new DataView(this.buffer.buffer);
    }

    get length(): number {
        return this.pos;
    }

    private ensure(extra: number): void {
        const needed = this.pos + extra;
        if (needed <= this.buffer.length) return;
        let capacity = this.buffer.length * 2;
        while (capacity < needed) capacity *= 2;
        const next = new Uint8Array(capacity);
        next.set(this.buffer.subarray(0, this.pos));
        this.buffer = next;
        this.view = new DataView(next.buffer);
    }

    /** Appends `size` zero bytes and returns their offset. */
    reserve(size: number): number {
        this.ensure(size);
        const offset = this.pos;
        this.buffer.fill(0, offset, offset + size);
        this.pos += size;
        return offset;
    }

    writeBytes(bytes: Uint8Array): number {
        this.ensure(bytes.length);
        const offset = this.pos;
        this.buffer.set(bytes, offset);
        this.pos += bytes.length;
        return offset;
    }

    /** Pads with zeros up to the next multiple of `alignment`. */
    align(alignment: number): void {
        const rest = this.pos % alignment;
        if (rest !== 0) this.reserve(alignment - rest);
    }

    patchBytes(offset: number, bytes: Uint8Array): void {
        if (offset + bytes.length > this.pos) {
            throw new RangeError(`Patch at ${offset} exceeds written length ${this.pos}`);
        }
        this.buffer.set(bytes, offset);
    }

    patchUint32(offset: number, value: number): void {
        if (offset + 4 > this.pos) {
            throw new RangeError(`Patch at ${offset} exceeds written length ${this.pos}`);
        }
        this.view.setUint32(offset, value >>> 0, true);
    }

    toBytes(): Uint8Array {
        return this.buffer.slice(0, this.pos);
    }
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
    let size = 0;
    for (const part of parts) size += part.length;
    const out = new Uint8Array(size);
    let pos = 0;
    for (const part of parts) {
        out.set(part, pos);
        pos += part.length;
    }
    return out;
}
