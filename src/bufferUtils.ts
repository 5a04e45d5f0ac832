import * as Crypto from 'crypto';
import * as Fs from 'fs';
import { FormatError } from './errors/containerError';

/** SHA-256 of the given bytes, hex encoded. This is the value stored as an entry checksum. */
export function calcChecksum(buffer: Buffer): string {
    return Crypto.createHash('sha256').update(buffer).digest('hex');
}

export function loadBuffer(source: Buffer, srcOffset: number, srcLength: number, what: string) {
    if (srcOffset + srcLength > source.length)
        throw FormatError.truncated(what, srcOffset + srcLength, source.length);

    return source.subarray(srcOffset, srcOffset + srcLength);
}

/**
 * Reads exactly `length` bytes at `position` of the file.
 * A short read means the file is smaller than its index claims.
 */
export async function readFileSlice(path: string, position: number, length: number): Promise<Buffer> {
    let handle = await Fs.promises.open(path, 'r');

    try {
        let buffer = Buffer.alloc(length);
        let written = 0;

        while (written < length) {
            let { bytesRead } = await handle.read(buffer, written, length - written, position + written);

            if (bytesRead === 0)
                throw FormatError.truncated(`slice at ${position}`, length, written);

            written += bytesRead;
        }

        return buffer;
    }
    finally {
        await handle.close();
    }
}

export function formatBytes(size: number) {
    return size.toLocaleString('en-US');
}

export function compressionRatio(size: number, compressedSize: number) {
    return compressedSize > 0 ? size / compressedSize : 0;
}
