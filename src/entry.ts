import { MAGIC_LENGTH } from './structs';

export type ContainerKind = 'application' | 'binary' | 'userdata';

export const CONTAINER_KINDS: ReadonlyArray<ContainerKind> = ['application', 'binary', 'userdata'];

export const FORMAT_VERSION = 1;

const MAGIC_TAGS: { [K in ContainerKind]: string } = {
    application: 'APPBLOB1',
    binary: 'BINBLOB1',
    userdata: 'USERBLOB',
};

export function isContainerKind(value: string): value is ContainerKind {
    return CONTAINER_KINDS.some(kind => kind === value);
}

const RESERVED_KEYS = ['.', '..', '__proto__'];

/**
 * Keys name the directory an entry is extracted into, so they must be one plain path segment.
 * They are also property names of the index document, hence no `__proto__`.
 */
export function isValidKey(key: string) {
    return key.length > 0 && !RESERVED_KEYS.includes(key) && !/[/\\\0]/.test(key);
}

export function magicFor(kind: ContainerKind): Buffer {
    let magic = Buffer.from(MAGIC_TAGS[kind], 'ascii');

    if (magic.length !== MAGIC_LENGTH)
        throw new Error(`Magic tag for '${kind}' must be ${MAGIC_LENGTH} bytes`);

    return magic;
}

export function kindForMagic(magic: Buffer): ContainerKind | null {
    return CONTAINER_KINDS.find(kind => magicFor(kind).equals(magic)) ?? null;
}

export interface ManifestFile {
    /** Path relative to the packed source root, `/`-separated */
    path: string;
    size: number;
}

/** The part of an entry every container kind shares: where its payload lives and how to trust it. */
export interface PayloadSlice {
    readonly key: string;
    /** Uncompressed archive length */
    readonly size: number;
    readonly compressedSize: number;
    /** Relative to the start of the payload region */
    readonly offset: number;
    /** SHA-256 hex digest of the uncompressed archive */
    readonly checksum: string;
    readonly dependencies: ReadonlyArray<string>;
}

interface EntryBase extends PayloadSlice {
    readonly description: string;
    readonly files: ReadonlyArray<ManifestFile>;
    readonly createdAt: string;
}

export interface ApplicationEntry extends EntryBase {
    readonly kind: 'application';
    readonly name: string;
    readonly version: string;
}

export interface BinaryEntry extends EntryBase {
    readonly kind: 'binary';
    readonly version: string;
    /** Capability (command) names the package makes available */
    readonly provides: ReadonlyArray<string>;
    readonly envVars: Readonly<Record<string, string>>;
    readonly architecture: string;
    readonly osType: string;
    readonly executables: ReadonlyArray<string>;
    readonly libraries: ReadonlyArray<string>;
}

export interface UserRecord extends EntryBase {
    readonly kind: 'userdata';
    /** Advisory only, never enforced */
    readonly quotaMb: number | null;
    readonly updatedAt: string;
    /** Incremented by a `merge` update */
    readonly version: number;
    readonly fileCount: number;
}

export type ContainerEntry = ApplicationEntry | BinaryEntry | UserRecord;

export interface EntryByKind {
    application: ApplicationEntry;
    binary: BinaryEntry;
    userdata: UserRecord;
}

//:: Metadata accepted by ContainerWriter.addEntry

export interface CommonMetadata {
    description?: string;
    dependencies?: string[];
}

export interface ApplicationMetadata extends CommonMetadata {
    name?: string;
    version?: string;
}

export interface BinaryMetadata extends CommonMetadata {
    version?: string;
    provides?: string[];
    envVars?: Record<string, string>;
    architecture?: string;
    osType?: string;
}

export interface UserMetadata extends CommonMetadata {
    quotaMb?: number | null;
}

export interface MetadataByKind {
    application: ApplicationMetadata;
    binary: BinaryMetadata;
    userdata: UserMetadata;
}

export const DEFAULT_ENTRY_VERSION = '1.0.0';
export const DEFAULT_ARCHITECTURE = 'x86_64';
export const DEFAULT_OS_TYPE = 'linux';
