import * as Fs from 'fs';
import * as Path from 'path';
import del from 'del';
import * as JestHelpers from '../test/jestHelpers';
import * as BufferUtils from './bufferUtils';
import { ContainerReader } from './containerReader';
import { NotFoundError, DuplicateKeyError, SourceNotFoundError } from './errors/containerError';
import { silentLogger } from './logger';
import { checkpointPath, UserDataStore } from './userDataStore';

const TEST_PATH = Path.join(process.cwd(), 'test');
const TEMP_PATH = Path.join(TEST_PATH, 'temp', 'userDataStore.test.ts');
const SOURCES = Path.join(TEMP_PATH, 'sources');

const options = { logger: silentLogger };

let caseIndex = 0;

/** A fresh store with alice and bob, already built to disk. */
async function seededStore() {
    let path = Path.join(TEMP_PATH, `store-${caseIndex++}.blob`);
    let store = UserDataStore.create(path, options);

    await store.add('alice', Path.join(SOURCES, 'alice-v1'), { description: 'Alice', quotaMb: 100 });
    await store.add('bob', Path.join(SOURCES, 'bob'), {});
    await store.build();

    return UserDataStore.open(path, options);
}

beforeAll(async () => {
    await del(TEMP_PATH);
    JestHelpers.mkdirpSync(TEMP_PATH);

    JestHelpers.writeTree(Path.join(SOURCES, 'alice-v1'), { 'notes.txt': 'first draft', 'docs/plan.md': '# plan' });
    JestHelpers.writeTree(Path.join(SOURCES, 'alice-v2'), { 'notes.txt': 'second draft', 'photos/cat.txt': 'meow' });
    JestHelpers.writeTree(Path.join(SOURCES, 'bob'), { 'todo.txt': 'buy milk\n'.repeat(50) });
});

afterAll(async () => {
    await del(TEMP_PATH);
});

test('new users start at version 1 with their metadata', async () => {
    let store = await seededStore();

    expect(store.listKeys()).toEqual(['alice', 'bob']);
    expect(store.getMetadata('alice')).toMatchObject({ kind: 'userdata', version: 1, quotaMb: 100, description: 'Alice', fileCount: 2 });
    expect(store.getMetadata('bob')).toMatchObject({ version: 1, quotaMb: null, description: '', fileCount: 1 });
    await expect(store.add('bob', Path.join(SOURCES, 'bob'))).rejects.toThrow(DuplicateKeyError);
});

test('merge replaces the data and bumps the version by exactly one', async () => {
    let store = await seededStore();
    let before = store.getMetadata('alice');
    let record = await store.update('alice', Path.join(SOURCES, 'alice-v2'), 'merge');
    await store.build();

    expect(record.version).toBe(2);
    expect(record.description).toBe('Alice');
    expect(record.quotaMb).toBe(100);
    expect(record.createdAt).toBe(before?.createdAt);

    let reader = await ContainerReader.open(store.path, 'userdata', options);
    let archive = await reader.extractToMemory('alice');
    expect(BufferUtils.calcChecksum(archive)).toBe(reader.getMetadata('alice')?.checksum);

    let dest = Path.join(TEMP_PATH, 'merged');
    await reader.extract('alice', dest);
    expect(Array.from((await JestHelpers.readTree(Path.join(dest, 'alice'))).keys())).toEqual(['notes.txt', 'photos/cat.txt']);
});

test('replace swaps the data without touching the version', async () => {
    let store = await seededStore();
    let record = await store.update('alice', Path.join(SOURCES, 'alice-v2'), 'replace');

    expect(record.version).toBe(1);
    expect(record.files.map(file => file.path)).toEqual(['notes.txt', 'photos/cat.txt']);
    expect(store.orphanedBytes).toBeGreaterThan(0);
});

test('updates append after the existing payloads and orphan the old bytes', async () => {
    let store = await seededStore();
    let old = store.getMetadata('alice');
    let bob = store.getMetadata('bob');

    if (!old || !bob)
        throw new Error('seeded users missing');

    let record = await store.update('alice', Path.join(SOURCES, 'alice-v2'));

    expect(record.offset).toBe(bob.offset + bob.compressedSize);
    expect(store.orphanedBytes).toBe(old.compressedSize);
});

test('a failed update leaves the old entry in place', async () => {
    let store = await seededStore();
    let before = store.getMetadata('alice');

    await expect(store.update('alice', Path.join(SOURCES, 'nobody'), 'merge')).rejects.toThrow(SourceNotFoundError);
    await expect(store.update('carol', Path.join(SOURCES, 'bob'))).rejects.toThrow(NotFoundError);
    expect(store.getMetadata('alice')).toEqual(before);
});

test('removal drops the key but keeps the bytes', async () => {
    let store = await seededStore();
    let payloadBefore = (await ContainerReader.open(store.path, 'userdata', options)).payloadLength;

    let removed = store.remove('bob');
    let summary = await store.build();

    expect(removed.key).toBe('bob');
    expect(store.listKeys()).toEqual(['alice']);
    expect(summary.dataSize).toBe(payloadBefore);
    expect((await ContainerReader.open(store.path, 'userdata', options)).listKeys()).toEqual(['alice']);
    expect(summary.orphanedBytes).toBe(removed.compressedSize);
    expect(summary.dataSize).toBe(summary.orphanedBytes + (store.getMetadata('alice')?.compressedSize ?? 0));
    expect(() => store.remove('bob')).toThrow(NotFoundError);
});

test('compact reclaims orphaned bytes and keeps entries readable', async () => {
    let store = await seededStore();
    let removed = store.remove('alice');

    expect(store.compact()).toBe(removed.compressedSize);
    expect(store.orphanedBytes).toBe(0);
    expect(store.getMetadata('bob')?.offset).toBe(0);

    await store.build();
    let reader = await ContainerReader.open(store.path, 'userdata', options);
    expect((await reader.verify()).success).toBe(true);
});

test('checkpoints copy the file on disk, not pending edits', async () => {
    let store = await seededStore();
    let onDisk = Fs.readFileSync(store.path);
    store.remove('alice');

    let target = await store.checkpoint(Path.join(TEMP_PATH, 'checkpoints', 'snap.blob'));

    expect(Fs.readFileSync(target).equals(onDisk)).toBe(true);
    expect((await ContainerReader.open(target, 'userdata', options)).listKeys()).toEqual(['alice', 'bob']);
});

test('checkpoints get a timestamped name by default', async () => {
    let store = await seededStore();
    let target = await store.checkpoint();

    expect(Path.dirname(target)).toBe(TEMP_PATH);
    expect(Path.basename(target)).toMatch(/^store-\d+-checkpoint-\d{8}-\d{6}\.blob$/);
    expect(Fs.existsSync(target)).toBe(true);
});

test('a store that was never built has nothing to checkpoint', async () => {
    let store = UserDataStore.create(Path.join(TEMP_PATH, 'never-built.blob'), options);
    await expect(store.checkpoint()).rejects.toThrow(SourceNotFoundError);
});

test('#checkpointPath', () => {
    let date = new Date(2024, 0, 2, 3, 4, 5);

    expect(checkpointPath('/data/users.blob', date)).toBe('/data/users-checkpoint-20240102-030405.blob');
    expect(checkpointPath('/data/users', date)).toBe('/data/users-checkpoint-20240102-030405.blob');
});
