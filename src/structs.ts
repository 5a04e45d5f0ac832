/** Little-endian unsigned integer widths, in bytes. */
export type FieldWidth = 1 | 2 | 4;

export interface FieldSpec<T extends string> {
    readonly name: T;
    readonly width: FieldWidth;
}

/** The magic tag precedes the header and is compared as raw bytes, not as an integer. */
export const MAGIC_LENGTH = 8;

export type HeaderField = 'formatVersion' | 'indexLength';

// u32 caps the index block at 4 GiB
export const HEADER_LAYOUT: ReadonlyArray<FieldSpec<HeaderField>> = [
    { name: 'formatVersion', width: 2 },
    { name: 'indexLength',   width: 4 },
];

export function layoutLength(layout: ReadonlyArray<FieldSpec<string>>) {
    return layout.reduce((sum, field) => sum + field.width, 0);
}

/**
 * Fixed-size record of unsigned little-endian fields, read from or
 * written to a buffer at a given offset.
 */
export class FixedStruct<T extends string> {
    protected readonly layout: ReadonlyArray<FieldSpec<T>>;
    protected readonly values = new Map<T, number>();

    protected constructor(layout: ReadonlyArray<FieldSpec<T>>, bytes: Buffer | null, offset = 0) {
        this.layout = layout;

        for (let field of layout) {
            this.values.set(field.name, bytes === null ? 0 : bytes.readUIntLE(offset, field.width));
            offset += field.width;
        }
    }

    get byteLength() {
        return layoutLength(this.layout);
    }

    getField(field: T) {
        return this.values.get(field) ?? 0;
    }

    setField(field: T, value: number) {
        let slot = this.layout.find(entry => entry.name === field);
        let max = slot ? 2 ** (slot.width * 8) - 1 : 0;

        if (!Number.isInteger(value) || value < 0 || value > max)
            throw new RangeError(`Value ${value} does not fit field '${field}'`);

        this.values.set(field, value);
    }

    /** Writes every field in layout order, returns the number of bytes written. */
    saveToBuffer(output: Buffer, offset = 0): number {
        let written = 0;

        for (let field of this.layout) {
            output.writeUIntLE(this.getField(field.name), offset + written, field.width);
            written += field.width;
        }

        return written;
    }
}

export class HeaderStruct extends FixedStruct<HeaderField> {
    constructor(bytes: Buffer | null, offset?: number) {
        super(HEADER_LAYOUT, bytes, offset);
    }

    static get totalLength() { return layoutLength(HEADER_LAYOUT) }
}

/** Magic tag + header; the index starts right after it. */
export const PREAMBLE_LENGTH = MAGIC_LENGTH + HeaderStruct.totalLength; // 14 bytes
