import * as Fs from 'fs';
import * as Path from 'path';
import del from 'del';
import * as JestHelpers from '../test/jestHelpers';
import { packDirectory, packEntries, readArchive, unpackArchive, normalizeEntryPath } from './archive';
import { ArchiveError } from './errors/containerError';

const TEST_PATH = Path.join(process.cwd(), 'test');
const TEMP_PATH = Path.join(TEST_PATH, 'temp', 'archive.test.ts');
const SOURCE_PATH = Path.join(TEMP_PATH, 'source');

beforeAll(async () => {
    await del(TEMP_PATH);
    JestHelpers.mkdirpSync(TEMP_PATH);

    JestHelpers.writeTree(SOURCE_PATH, {
        'a.txt': 'hello',
        'bin/run.sh': { data: '#!/bin/sh\necho run\n', mode: 0o755 },
        'nested/deep/c.txt': 'c'.repeat(1500),
    });
});

afterAll(async () => {
    await del(TEMP_PATH);
});

test('unpacking a packed tree reproduces paths, contents and executable bits', async () => {
    let dest = Path.join(TEMP_PATH, 'roundtrip');
    await unpackArchive(await packDirectory(SOURCE_PATH), dest);

    let expected = await JestHelpers.readTree(SOURCE_PATH);
    let actual = await JestHelpers.readTree(dest);

    expect(actual).toEqual(expected);
    expect(actual.get('bin/run.sh')?.mode).toBe(0o755);
    expect(actual.get('a.txt')?.mode).toBe(0o644);
});

test('packing the same tree twice yields identical bytes', async () => {
    let first = await packDirectory(SOURCE_PATH);
    let second = await packDirectory(SOURCE_PATH);

    expect(first.equals(second)).toBe(true);
    expect(first.length % 512).toBe(0);
});

test('entries are rooted at . and sorted by name', async () => {
    let entries = readArchive(await packDirectory(SOURCE_PATH));

    expect(entries.map(entry => entry.path)).toEqual([
        '.',
        './a.txt',
        './bin',
        './bin/run.sh',
        './nested',
        './nested/deep',
        './nested/deep/c.txt',
    ]);
    expect(entries.find(entry => entry.path === './nested/deep/c.txt')?.data.toString()).toBe('c'.repeat(1500));
});

test('a single file is archived as ./<basename>', async () => {
    let entries = readArchive(await packDirectory(Path.join(SOURCE_PATH, 'a.txt')));

    expect(entries).toHaveLength(1);
    expect(entries[0].path).toBe('./a.txt');
    expect(entries[0].type).toBe('file');
    expect(entries[0].data.toString()).toBe('hello');
});

test('paths longer than the name field go through the ustar prefix', () => {
    let longPath = `./${'d'.repeat(60)}/${'e'.repeat(60)}/f.txt`;
    let bytes = packEntries([{ path: longPath, type: 'file', mode: 0o600, data: Buffer.from('deep') }]);
    let entries = readArchive(bytes);

    expect(entries[0].path).toBe(longPath);
    expect(entries[0].mode).toBe(0o600);
    expect(entries[0].data.toString()).toBe('deep');
});

test('a name segment that cannot fit the header is rejected', () => {
    let entry = { path: `./${'x'.repeat(120)}`, type: 'file' as const, mode: 0o644, data: Buffer.alloc(0) };
    expect(() => packEntries([entry])).toThrow(ArchiveError);
});

test('a corrupted header fails its checksum', async () => {
    let bytes = Buffer.from(await packDirectory(SOURCE_PATH));
    bytes[0] ^= 0xff;

    expect(() => readArchive(bytes)).toThrow(/Bad header checksum at offset 0/);
});

test('a truncated stream is rejected', async () => {
    let bytes = await packDirectory(SOURCE_PATH);
    expect(() => readArchive(bytes.subarray(0, 600))).toThrow(/Truncated archive/);
});

test('a malformed stream leaves the destination untouched', async () => {
    let dest = Path.join(TEMP_PATH, 'never-created');
    let bytes = await packDirectory(SOURCE_PATH);

    await expect(unpackArchive(bytes.subarray(0, 600), dest)).rejects.toThrow(ArchiveError);
    expect(Fs.existsSync(dest)).toBe(false);
});

test('entries escaping the root are rejected', () => {
    let bytes = packEntries([{ path: './../evil.txt', type: 'file', mode: 0o644, data: Buffer.from('x') }]);
    expect(() => readArchive(bytes)).toThrow(/escapes the archive root/);
});

test('missing sources cannot be packed', async () => {
    await expect(packDirectory(Path.join(TEMP_PATH, 'nope'))).rejects.toThrow(ArchiveError);
});

test('#normalizeEntryPath', () => {
    expect(normalizeEntryPath('./')).toBe('.');
    expect(normalizeEntryPath('./bin/')).toBe('./bin');
    expect(normalizeEntryPath('bin//tool')).toBe('./bin/tool');
    expect(() => normalizeEntryPath('/etc/passwd')).toThrow(/Absolute path/);
});
