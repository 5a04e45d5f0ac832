import { ApplicationEntry, isValidKey } from './entry';
import { EntryIndex } from './entryIndex';
import { IndexParseError } from './errors/containerError';

const CHECKSUM = 'a'.repeat(64);
const CREATED_AT = '2024-01-02T03:04:05.000Z';

function makeEntry(key: string, dependencies: string[] = []): ApplicationEntry {
    return {
        kind: 'application',
        key: key,
        name: key.toUpperCase(),
        version: '1.0.0',
        description: '',
        size: 1024,
        compressedSize: 100,
        offset: 0,
        checksum: CHECKSUM,
        dependencies: dependencies,
        files: [{ path: 'main.js', size: 12 }],
        createdAt: CREATED_AT,
    };
}

function indexOf(...entries: ApplicationEntry[]) {
    let index = new EntryIndex('application');
    entries.forEach(entry => index.set(entry));
    return index;
}

function parseJson(document: unknown) {
    return EntryIndex.parse(Buffer.from(JSON.stringify(document)), 'application');
}

test('serialized indexes parse back to the same entries in insertion order', () => {
    let index = indexOf(makeEntry('zeta'), makeEntry('alpha', ['zeta']));
    let { index: parsed, createdAt } = EntryIndex.parse(index.serialize(CREATED_AT), 'application');

    expect(createdAt).toBe(CREATED_AT);
    expect(parsed.keys()).toEqual(['zeta', 'alpha']);
    expect(parsed.get('alpha')).toEqual(makeEntry('alpha', ['zeta']));
});

test('the document carries version, kind and entry count', () => {
    let document = indexOf(makeEntry('one')).toDocument(CREATED_AT);

    expect(document.formatVersion).toBe(1);
    expect(document.kind).toBe('application');
    expect(document.entryCount).toBe(1);
    expect(Object.keys(document.entries)).toEqual(['one']);
});

test('invalid JSON raises IndexParseError', () => {
    expect(() => EntryIndex.parse(Buffer.from('{"entries": '), 'application')).toThrow(/Index is not valid JSON/);
});

test('an index for another kind is rejected', () => {
    let document = indexOf(makeEntry('one')).toDocument(CREATED_AT);
    expect(() => EntryIndex.parse(Buffer.from(JSON.stringify(document)), 'binary'))
        .toThrow("Index describes a 'application' container, expected 'binary'");
});

test('a wrong entry count is rejected', () => {
    let document = { ...indexOf(makeEntry('one')).toDocument(CREATED_AT), entryCount: 2 };
    expect(() => parseJson(document)).toThrow('Index declares 2 entries but contains 1');
});

test('an entry stored under another key is rejected', () => {
    let document = { ...indexOf().toDocument(CREATED_AT), entryCount: 1, entries: { other: makeEntry('one') } };
    expect(() => parseJson(document)).toThrow("Index entry 'other' carries mismatched key 'one'");
});

test('entries failing the schema name the offending field', () => {
    let broken = { ...makeEntry('one'), checksum: 'nope' };
    let document = { ...indexOf().toDocument(CREATED_AT), entryCount: 1, entries: { one: broken } };

    let error = captureError(() => parseJson(document));

    expect(error).toBeInstanceOf(IndexParseError);
    expect(error).toMatchObject({ key: 'one', message: "Malformed index entry 'one': checksum: expected a SHA-256 hex digest" });
});

test('keys that are not a single path segment are rejected', () => {
    let document = { ...indexOf().toDocument(CREATED_AT), entryCount: 1, entries: { '../up': makeEntry('../up') } };
    expect(() => parseJson(document)).toThrow(IndexParseError);
});

test('a mismatched format version is rejected', () => {
    let document = { ...indexOf().toDocument(CREATED_AT), formatVersion: 7 };
    expect(() => parseJson(document)).toThrow('Index format version 7 does not match header version 1');
});

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    }
    catch (err) {
        return err;
    }

    throw new Error('Expected the call to throw');
}

test('#isValidKey', () => {
    expect(['web-app', 'libssl.so.3', '.hidden', 'a..b'].every(isValidKey)).toBe(true);
    expect(['', '.', '..', 'a/b', 'a\\b', 'a\0b', '__proto__'].some(isValidKey)).toBe(false);
});

test('every key is written as its own property of the index document', () => {
    let index = indexOf(makeEntry('constructor'), makeEntry('toString'));
    let { index: parsed } = EntryIndex.parse(index.serialize(CREATED_AT), 'application');

    expect(parsed.keys()).toEqual(['constructor', 'toString']);
});
