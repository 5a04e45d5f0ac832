import * as Path from 'path';
import * as Fs from 'fs';
import del from 'del';
import * as JestHelpers from '../test/jestHelpers';
import * as BufferUtils from './bufferUtils';
import { compressZLib, decompressZLib, isCompressionLevel } from './compression';
import { CompressionError, FormatError } from './errors/containerError';

const TEST_PATH = Path.join(process.cwd(), 'test');
const TEMP_PATH = Path.join(TEST_PATH, 'temp', 'compression.test.ts');

const SAMPLE = Buffer.from('the quick brown fox jumps over the lazy dog\n'.repeat(64));

beforeAll(async () => {
    await del(TEMP_PATH);
    JestHelpers.mkdirpSync(TEMP_PATH);
});

afterAll(async () => {
    await del(TEMP_PATH);
});

test('zlib output inflates back to the input', () => {
    let compressed = compressZLib(SAMPLE);

    expect(compressed.length).toBeLessThan(SAMPLE.length);
    expect(decompressZLib(compressed).equals(SAMPLE)).toBe(true);
});

test('compression is deterministic per level', () => {
    expect(compressZLib(SAMPLE, 9).equals(compressZLib(SAMPLE, 9))).toBe(true);
    expect(compressZLib(SAMPLE, 0).length).toBeGreaterThan(SAMPLE.length);
});

test('garbage input raises CompressionError', () => {
    expect(() => decompressZLib(Buffer.from('definitely not zlib'))).toThrow(CompressionError);
});

test('a cut-off stream raises CompressionError', () => {
    let compressed = compressZLib(SAMPLE);
    expect(() => decompressZLib(compressed.subarray(0, compressed.length - 8))).toThrow(CompressionError);
});

test('#isCompressionLevel', () => {
    expect(isCompressionLevel(0)).toBe(true);
    expect(isCompressionLevel(9)).toBe(true);
    expect(isCompressionLevel(10)).toBe(false);
    expect(isCompressionLevel(2.5)).toBe(false);
});

test('checksums are SHA-256 hex digests', () => {
    expect(BufferUtils.calcChecksum(Buffer.from('abc')))
        .toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
});

test('#readFileSlice reads at a position and rejects short reads', async () => {
    let path = Path.join(TEMP_PATH, 'slice.bin');
    Fs.writeFileSync(path, Buffer.from('0123456789'));

    expect((await BufferUtils.readFileSlice(path, 3, 4)).toString()).toBe('3456');
    await expect(BufferUtils.readFileSlice(path, 8, 4)).rejects.toThrow(FormatError);
});

test('#loadBuffer rejects slices past the end', () => {
    let source = Buffer.from('abcdef');

    expect(BufferUtils.loadBuffer(source, 2, 3, 'index').toString()).toBe('cde');
    expect(() => BufferUtils.loadBuffer(source, 4, 3, 'index')).toThrow('Truncated container: index needs 7 bytes; Got: 6 bytes');
});

test('size formatting and ratios', () => {
    expect(BufferUtils.formatBytes(1234567)).toBe('1,234,567');
    expect(BufferUtils.compressionRatio(10, 4)).toBe(2.5);
    expect(BufferUtils.compressionRatio(10, 0)).toBe(0);
});
