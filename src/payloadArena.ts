/**
 * Growable byte arena holding the concatenated compressed payloads.
 *
 * The write cursor only ever moves forward: bytes are appended, never
 * edited in place. Replacing or removing an entry changes the index only,
 * so the bytes it pointed at stay here until the arena is compacted.
 */
export class PayloadArena {
    private chunks: Buffer[] = [];
    private flattened: Buffer | null = null;
    private cursor = 0;

    constructor(initial?: Buffer) {
        if (initial && initial.length) {
            this.chunks.push(initial);
            this.cursor = initial.length;
        }
    }

    /** Current write cursor, i.e. the total number of bytes held. */
    get length() {
        return this.cursor;
    }

    /** Appends the bytes and returns the offset they were written at. */
    append(bytes: Buffer): number {
        let offset = this.cursor;

        this.chunks.push(bytes);
        this.cursor += bytes.length;
        this.flattened = null;

        return offset;
    }

    slice(offset: number, length: number): Buffer {
        if (offset < 0 || offset + length > this.cursor)
            throw new RangeError(`Slice ${offset}+${length} is outside the arena (${this.cursor} bytes)`);

        return this.toBuffer().subarray(offset, offset + length);
    }

    toBuffer(): Buffer {
        if (!this.flattened) {
            this.flattened = Buffer.concat(this.chunks, this.cursor);
            this.chunks = [this.flattened];
        }

        return this.flattened;
    }
}
