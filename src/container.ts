import { HeaderStruct, MAGIC_LENGTH, PREAMBLE_LENGTH } from './structs';
import { ContainerKind, EntryByKind, FORMAT_VERSION, kindForMagic, magicFor } from './entry';
import { EntryIndex } from './entryIndex';
import { FormatError, UnsupportedVersionError } from './errors/containerError';
import * as BufferUtils from './bufferUtils';

/*
 * Container layout (little-endian):
 *
 *   0   magic tag       8 bytes
 *   8   format version  u16
 *   10  index length    u32
 *   14  index           JSON, `index length` bytes
 *   ..  payload region  concatenated zlib streams, addressed by entry offset
 */

export interface ContainerContext<K extends ContainerKind> {
    readonly path: string;
    readonly kind: K;
    listKeys(): string[];
    getMetadata(key: string): EntryByKind[K] | undefined;
}

export interface ParsedContainer<K extends ContainerKind> {
    header: HeaderStruct;
    index: EntryIndex<K>;
    createdAt: string;
    /** Absolute file position of the payload region */
    payloadStart: number;
}

export function encodePreamble(kind: ContainerKind, indexLength: number): Buffer {
    let preamble = Buffer.alloc(PREAMBLE_LENGTH);
    magicFor(kind).copy(preamble, 0);

    let header = new HeaderStruct(null);
    header.setField('formatVersion', FORMAT_VERSION);
    header.setField('indexLength', indexLength);
    header.saveToBuffer(preamble, MAGIC_LENGTH);

    return preamble;
}

/** Checks magic and version; the caller reads the index using the returned header. */
export function parsePreamble(preamble: Buffer, kind: ContainerKind): HeaderStruct {
    if (preamble.length < PREAMBLE_LENGTH)
        throw FormatError.truncated('header', PREAMBLE_LENGTH, preamble.length);

    let expectedMagic = magicFor(kind);
    let magic = preamble.subarray(0, MAGIC_LENGTH);

    if (!magic.equals(expectedMagic))
        throw FormatError.invalidMagic(expectedMagic, magic);

    let header = new HeaderStruct(preamble, MAGIC_LENGTH);

    if (header.getField('formatVersion') !== FORMAT_VERSION)
        throw new UnsupportedVersionError(FORMAT_VERSION, header.getField('formatVersion'));

    return header;
}

export function detectKind(preamble: Buffer): ContainerKind {
    if (preamble.length < MAGIC_LENGTH)
        throw FormatError.truncated('magic tag', MAGIC_LENGTH, preamble.length);

    let kind = kindForMagic(preamble.subarray(0, MAGIC_LENGTH));

    if (kind === null)
        throw new FormatError(`Unknown container magic: 0x${preamble.subarray(0, MAGIC_LENGTH).toString('hex')}`);

    return kind;
}

/** Every entry must address bytes inside the payload region, otherwise the file was cut short. */
export function validateSlices<K extends ContainerKind>(index: EntryIndex<K>, payloadLength: number) {
    index.values().forEach(entry => {
        let end = entry.offset + entry.compressedSize;

        if (end > payloadLength)
            throw FormatError.truncated(`payload of '${entry.key}'`, end, payloadLength);
    });
}

/** Parses a whole container held in memory. */
export function parseContainer<K extends ContainerKind>(file: Buffer, kind: K): ParsedContainer<K> {
    let header = parsePreamble(file.subarray(0, PREAMBLE_LENGTH), kind);
    let indexBytes = BufferUtils.loadBuffer(file, PREAMBLE_LENGTH, header.getField('indexLength'), 'index');
    let { index, createdAt } = EntryIndex.parse(indexBytes, kind);
    let payloadStart = PREAMBLE_LENGTH + header.getField('indexLength');

    validateSlices(index, file.length - payloadStart);

    return { header, index, createdAt, payloadStart };
}
