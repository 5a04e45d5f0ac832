import * as pako from 'pako';
import { CompressionError, describeError } from './errors/containerError';

export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const DEFAULT_COMPRESSION_LEVEL: CompressionLevel = 6;

export function isCompressionLevel(value: number): value is CompressionLevel {
    return Number.isInteger(value) && value >= 0 && value <= 9;
}

export function decompressZLib(source: Buffer) {
    let output: Uint8Array | undefined;

    try {
        output = pako.inflate(source);
    }
    catch (err) {
        // pako reports failures as plain strings
        throw new CompressionError(`Malformed zlib stream: ${describeError(err)}`, { cause: err });
    }

    // a stream that ends before its trailer yields no result instead of an error
    if (!(output instanceof Uint8Array))
        throw new CompressionError('Malformed zlib stream: unexpected end of data');

    return Buffer.from(output.buffer, output.byteOffset, output.byteLength);
}

export function compressZLib(source: Buffer, level: CompressionLevel = DEFAULT_COMPRESSION_LEVEL) {
    let output = pako.deflate(source, { level });
    return Buffer.from(output.buffer, output.byteOffset, output.byteLength);
}
