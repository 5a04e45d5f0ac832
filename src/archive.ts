import * as Fs from 'fs';
import * as Path from 'path';
import { ArchiveError } from './errors/containerError';

/*
 * POSIX ustar codec. Only what a packed source tree needs is written:
 * directories and regular files with their permission bits. Owners are
 * zeroed and mtimes are 0, so packing the same tree twice yields the
 * same bytes (and the same checksum).
 */

const BLOCK_SIZE = 512;
const USTAR_MAGIC = 'ustar';

const TYPE_FILE = '0';
const TYPE_FILE_OLD = '\0';
const TYPE_DIRECTORY = '5';

export const ROOT_PATH = '.';

export type ArchiveEntryType = 'file' | 'directory';

export interface ArchiveEntry {
    /** Relative path inside the archive, always `.` or starting with `./` */
    path: string;
    type: ArchiveEntryType;
    /** Permission bits (`mode & 0o7777`) */
    mode: number;
    data: Buffer;
}

interface HeaderLayout {
    offset: number;
    length: number;
}

const NAME: HeaderLayout        = { offset: 0,   length: 100 };
const MODE: HeaderLayout        = { offset: 100, length: 8 };
const UID: HeaderLayout         = { offset: 108, length: 8 };
const GID: HeaderLayout         = { offset: 116, length: 8 };
const SIZE: HeaderLayout        = { offset: 124, length: 12 };
const MTIME: HeaderLayout       = { offset: 136, length: 12 };
const CHECKSUM: HeaderLayout    = { offset: 148, length: 8 };
const TYPEFLAG: HeaderLayout    = { offset: 156, length: 1 };
const MAGIC: HeaderLayout       = { offset: 257, length: 6 };
const VERSION: HeaderLayout     = { offset: 263, length: 2 };
const PREFIX: HeaderLayout      = { offset: 345, length: 155 };

//:: Packing ---------------------------------------------

/**
 * Archives a directory tree with its root stored as `.`.
 * A single file is archived as `./<basename>`.
 */
export async function packDirectory(sourcePath: string): Promise<Buffer> {
    let stats = await statOrNull(sourcePath);

    if (!stats)
        throw new ArchiveError(`Cannot archive '${sourcePath}': path does not exist`);

    let entries: ArchiveEntry[] = [];

    if (stats.isDirectory()) {
        entries.push({ path: ROOT_PATH, type: 'directory', mode: stats.mode & 0o7777, data: Buffer.alloc(0) });
        await collectEntries(sourcePath, ROOT_PATH, entries);
    }
    else if (stats.isFile()) {
        let data = await Fs.promises.readFile(sourcePath);
        entries.push({ path: `./${Path.basename(sourcePath)}`, type: 'file', mode: stats.mode & 0o7777, data });
    }
    else {
        throw new ArchiveError(`Cannot archive '${sourcePath}': not a file or directory`);
    }

    return packEntries(entries);
}

export function packEntries(entries: ArchiveEntry[]): Buffer {
    let blocks: Buffer[] = [];

    entries.forEach(entry => {
        let size = entry.type === 'file' ? entry.data.length : 0;
        blocks.push(createHeader(entry, size));

        if (size > 0) {
            blocks.push(entry.data);

            let remainder = size % BLOCK_SIZE;
            if (remainder > 0)
                blocks.push(Buffer.alloc(BLOCK_SIZE - remainder));
        }
    });

    // end-of-archive marker
    blocks.push(Buffer.alloc(BLOCK_SIZE * 2));
    return Buffer.concat(blocks);
}

async function collectEntries(realPath: string, archivePath: string, entries: ArchiveEntry[]) {
    let children = await Fs.promises.readdir(realPath, { withFileTypes: true });
    children.sort((a, b) => compareNames(a.name, b.name));

    for (let child of children) {
        let childRealPath = Path.join(realPath, child.name);
        let childArchivePath = `${archivePath}/${child.name}`;

        // symlinks, sockets and devices are not carried
        if (child.isDirectory()) {
            let stats = await Fs.promises.stat(childRealPath);
            entries.push({ path: childArchivePath, type: 'directory', mode: stats.mode & 0o7777, data: Buffer.alloc(0) });
            await collectEntries(childRealPath, childArchivePath, entries);
        }
        else if (child.isFile()) {
            let stats = await Fs.promises.stat(childRealPath);
            let data = await Fs.promises.readFile(childRealPath);
            entries.push({ path: childArchivePath, type: 'file', mode: stats.mode & 0o7777, data });
        }
    }
}

function createHeader(entry: ArchiveEntry, size: number): Buffer {
    let header = Buffer.alloc(BLOCK_SIZE);
    let fullName = entry.type === 'directory' ? entry.path + '/' : entry.path;
    let [prefix, name] = splitName(fullName);

    writeString(header, NAME, name);
    writeOctal(header, MODE, entry.mode);
    writeOctal(header, UID, 0);
    writeOctal(header, GID, 0);
    writeOctal(header, SIZE, size);
    writeOctal(header, MTIME, 0);
    writeString(header, TYPEFLAG, entry.type === 'directory' ? TYPE_DIRECTORY : TYPE_FILE);
    writeString(header, MAGIC, USTAR_MAGIC + '\0');
    writeString(header, VERSION, '00');
    writeString(header, PREFIX, prefix);

    let checksum = headerChecksum(header);
    header.write(checksum.toString(8).padStart(6, '0') + '\0 ', CHECKSUM.offset, CHECKSUM.length, 'ascii');

    return header;
}

/** Splits a path over the ustar `prefix` and `name` fields. */
function splitName(fullName: string): [string, string] {
    if (Buffer.byteLength(fullName) <= NAME.length)
        return ['', fullName];

    // the separator between prefix and name is implied, so it belongs to neither field
    let searchFrom = fullName.endsWith('/') ? fullName.length - 2 : fullName.length - 1;

    for (let slash = fullName.lastIndexOf('/', searchFrom); slash > 0; slash = fullName.lastIndexOf('/', slash - 1)) {
        let prefix = fullName.slice(0, slash);
        let name = fullName.slice(slash + 1);

        if (Buffer.byteLength(name) > NAME.length)
            break;

        if (Buffer.byteLength(prefix) <= PREFIX.length)
            return [prefix, name];
    }

    throw new ArchiveError(`Path is too long for a ustar header: ${fullName}`);
}

//:: Reading ---------------------------------------------

/** Parses the whole stream; nothing is returned unless every header is valid. */
export function readArchive(bytes: Buffer): ArchiveEntry[] {
    let entries: ArchiveEntry[] = [];
    let offset = 0;

    while (true) {
        if (offset + BLOCK_SIZE > bytes.length)
            throw new ArchiveError(`Truncated archive: missing header at offset ${offset}`);

        let header = bytes.subarray(offset, offset + BLOCK_SIZE);
        offset += BLOCK_SIZE;

        if (isZeroBlock(header))
            break;

        let expected = readOctal(header, CHECKSUM, offset - BLOCK_SIZE);
        let actual = headerChecksum(header);
        if (expected !== actual)
            throw new ArchiveError(`Bad header checksum at offset ${offset - BLOCK_SIZE}. Expected: ${expected} Got: ${actual}`);

        if (!readString(header, MAGIC).startsWith(USTAR_MAGIC))
            throw new ArchiveError(`Not a ustar header at offset ${offset - BLOCK_SIZE}`);

        let size = readOctal(header, SIZE, offset - BLOCK_SIZE);
        let typeflag = String.fromCharCode(header[TYPEFLAG.offset]);
        let prefix = readString(header, PREFIX);
        let name = readString(header, NAME);
        let fullName = prefix ? `${prefix}/${name}` : name;

        if (offset + size > bytes.length)
            throw new ArchiveError(`Truncated archive: '${fullName}' needs ${size} bytes`);

        let data = bytes.subarray(offset, offset + size);
        offset += Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;

        // links and extended headers are never written by packDirectory; their data is skipped
        if (typeflag !== TYPE_FILE && typeflag !== TYPE_FILE_OLD && typeflag !== TYPE_DIRECTORY)
            continue;

        entries.push({
            path: normalizeEntryPath(fullName),
            type: typeflag === TYPE_DIRECTORY ? 'directory' : 'file',
            mode: readOctal(header, MODE, offset),
            data: Buffer.from(data),
        });
    }

    return entries;
}

/**
 * Recreates the archived tree under `destDir`. The archive is fully
 * parsed before the first write, so a malformed stream leaves no files behind.
 */
export async function unpackArchive(bytes: Buffer, destDir: string): Promise<ArchiveEntry[]> {
    let entries = readArchive(bytes);
    let directories: ArchiveEntry[] = [];

    await Fs.promises.mkdir(destDir, { recursive: true });

    for (let entry of entries) {
        let target = resolveTarget(destDir, entry.path);

        if (entry.type === 'directory') {
            await Fs.promises.mkdir(target, { recursive: true });
            directories.push(entry);
        }
        else {
            await Fs.promises.mkdir(Path.dirname(target), { recursive: true });
            await Fs.promises.writeFile(target, entry.data);
            await Fs.promises.chmod(target, entry.mode);
        }
    }

    // deepest first, so a read-only directory doesn't block writing its children
    for (let entry of directories.reverse())
        await Fs.promises.chmod(resolveTarget(destDir, entry.path), entry.mode);

    return entries;
}

export function normalizeEntryPath(rawPath: string): string {
    let path = rawPath.replace(/\/+$/, '');

    if (path === '' || path === ROOT_PATH)
        return ROOT_PATH;

    if (path.startsWith('/') || /^[a-zA-Z]:/.test(path))
        throw new ArchiveError(`Absolute path in archive: ${rawPath}`);

    let segments = path.split('/').filter(segment => segment !== '' && segment !== '.');

    if (segments.includes('..'))
        throw new ArchiveError(`Path escapes the archive root: ${rawPath}`);

    return segments.length ? './' + segments.join('/') : ROOT_PATH;
}

function resolveTarget(destDir: string, entryPath: string) {
    return entryPath === ROOT_PATH ? destDir : Path.join(destDir, ...entryPath.slice(2).split('/'));
}

//:: Header helpers --------------------------------------

function headerChecksum(header: Buffer): number {
    let sum = 0;

    for (let i = 0; i < BLOCK_SIZE; i++) {
        let inChecksumField = i >= CHECKSUM.offset && i < CHECKSUM.offset + CHECKSUM.length;
        sum += inChecksumField ? 0x20 : header[i];
    }

    return sum;
}

function writeString(header: Buffer, field: HeaderLayout, value: string) {
    header.write(value, field.offset, field.length, 'utf8');
}

function writeOctal(header: Buffer, field: HeaderLayout, value: number) {
    let digits = value.toString(8);

    if (digits.length > field.length - 1)
        throw new ArchiveError(`Value ${value} does not fit a ${field.length}-byte header field`);

    header.write(digits.padStart(field.length - 1, '0') + '\0', field.offset, field.length, 'ascii');
}

function readString(header: Buffer, field: HeaderLayout) {
    let raw = header.subarray(field.offset, field.offset + field.length);
    let end = raw.indexOf(0);
    return raw.toString('utf8', 0, end === -1 ? raw.length : end);
}

function readOctal(header: Buffer, field: HeaderLayout, position: number) {
    let text = header.toString('ascii', field.offset, field.offset + field.length).replace(/[\0 ]+/g, ' ').trim();

    if (text === '')
        return 0;

    if (!/^[0-7]+$/.test(text))
        throw new ArchiveError(`Malformed numeric header field near offset ${position}: '${text}'`);

    return parseInt(text, 8);
}

function isZeroBlock(block: Buffer) {
    for (let i = 0; i < block.length; i++) {
        if (block[i] !== 0)
            return false;
    }

    return true;
}

function compareNames(a: string, b: string) {
    return a < b ? -1 : a > b ? 1 : 0;
}

async function statOrNull(path: string) {
    try {
        return await Fs.promises.stat(path);
    }
    catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT')
            return null;

        throw err;
    }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
