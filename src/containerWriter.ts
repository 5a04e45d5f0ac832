import * as Fs from 'fs';
import * as Path from 'path';
import { packDirectory } from './archive';
import * as BufferUtils from './bufferUtils';
import { compressZLib, CompressionLevel, DEFAULT_COMPRESSION_LEVEL } from './compression';
import { ContainerContext, encodePreamble, parseContainer } from './container';
import {
    ContainerKind, DEFAULT_ARCHITECTURE, DEFAULT_ENTRY_VERSION, DEFAULT_OS_TYPE,
    EntryByKind, isValidKey, ManifestFile, MetadataByKind,
} from './entry';
import { EntryIndex } from './entryIndex';
import { DuplicateKeyError, InvalidKeyError, NotFoundError, SourceNotFoundError } from './errors/containerError';
import { consoleLogger, Logger } from './logger';
import { PayloadArena } from './payloadArena';
import { collectManifest, detectBinaryLayout } from './sourceTree';

export interface ContainerWriterOptions {
    compressionLevel?: CompressionLevel;
    /** Write to a sibling temp file and rename it over the output (default: true) */
    atomic?: boolean;
    logger?: Logger;
}

export interface EntrySummary {
    key: string;
    size: number;
    compressedSize: number;
    dependencies: ReadonlyArray<string>;
}

export interface BuildSummary {
    path: string;
    kind: ContainerKind;
    totalSize: number;
    indexSize: number;
    /** Length of the payload region, live and orphaned bytes alike */
    dataSize: number;
    orphanedBytes: number;
    entries: EntrySummary[];
}

/** Everything an entry factory needs from packing a source tree. */
interface PackedSource {
    key: string;
    size: number;
    compressedSize: number;
    offset: number;
    checksum: string;
    files: ManifestFile[];
    sourcePath: string;
    timestamp: string;
}

interface CompressedSource {
    payload: Buffer;
    size: number;
    checksum: string;
    files: ManifestFile[];
}

type EntryFactories = {
    [K in ContainerKind]: (packed: PackedSource, metadata: MetadataByKind[K]) => Promise<EntryByKind[K]>;
};

const ENTRY_FACTORIES: EntryFactories = {
    application: async (packed, metadata) => ({
        kind: 'application',
        key: packed.key,
        name: metadata.name ?? packed.key,
        version: metadata.version ?? DEFAULT_ENTRY_VERSION,
        description: metadata.description ?? '',
        size: packed.size,
        compressedSize: packed.compressedSize,
        offset: packed.offset,
        checksum: packed.checksum,
        dependencies: metadata.dependencies ?? [],
        files: packed.files,
        createdAt: packed.timestamp,
    }),
    binary: async (packed, metadata) => {
        let layout = await detectBinaryLayout(packed.sourcePath, packed.files);

        return {
            kind: 'binary',
            key: packed.key,
            version: metadata.version ?? DEFAULT_ENTRY_VERSION,
            description: metadata.description ?? '',
            size: packed.size,
            compressedSize: packed.compressedSize,
            offset: packed.offset,
            checksum: packed.checksum,
            dependencies: metadata.dependencies ?? [],
            files: packed.files,
            createdAt: packed.timestamp,
            provides: metadata.provides ?? [],
            envVars: metadata.envVars ?? {},
            architecture: metadata.architecture ?? DEFAULT_ARCHITECTURE,
            osType: metadata.osType ?? DEFAULT_OS_TYPE,
            executables: layout.executables,
            libraries: layout.libraries,
        };
    },
    userdata: async (packed, metadata) => ({
        kind: 'userdata',
        key: packed.key,
        description: metadata.description ?? '',
        size: packed.size,
        compressedSize: packed.compressedSize,
        offset: packed.offset,
        checksum: packed.checksum,
        dependencies: metadata.dependencies ?? [],
        files: packed.files,
        fileCount: packed.files.length,
        quotaMb: metadata.quotaMb ?? null,
        createdAt: packed.timestamp,
        updatedAt: packed.timestamp,
        version: 1,
    }),
};

/**
 * Accumulates entries in memory and writes the container in one go.
 *
 * Nothing touches the output path until build(). Entries are packed as
 * ustar, compressed with zlib and appended to the payload arena at the
 * current cursor; the checksum covers the uncompressed archive.
 */
export class ContainerWriter<K extends ContainerKind> implements ContainerContext<K> {
    readonly path: string;
    readonly kind: K;

    protected index: EntryIndex<K>;
    protected arena: PayloadArena;
    protected createdAt: string;
    protected readonly compressionLevel: CompressionLevel;
    protected readonly atomic: boolean;
    protected readonly logger: Logger;

    constructor(outputPath: string, kind: K, options: ContainerWriterOptions = {}) {
        this.path = outputPath;
        this.kind = kind;
        this.index = new EntryIndex(kind);
        this.arena = new PayloadArena();
        this.createdAt = new Date().toISOString();
        this.compressionLevel = options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
        this.atomic = options.atomic ?? true;
        this.logger = options.logger ?? consoleLogger;
    }

    /** Re-opens a container for further edits; the payload region is loaded into the arena as is. */
    static async loadExisting<K extends ContainerKind>(path: string, kind: K, options: ContainerWriterOptions = {}): Promise<ContainerWriter<K>> {
        let writer = new ContainerWriter(path, kind, options);
        await writer.hydrate();
        return writer;
    }

    protected async hydrate() {
        let file = await Fs.promises.readFile(this.path);
        let parsed = parseContainer(file, this.kind);

        this.index = parsed.index;
        this.createdAt = parsed.createdAt;
        this.arena = new PayloadArena(Buffer.from(file.subarray(parsed.payloadStart)));

        this.logger.debug(`Loaded ${this.index.size} entries from ${this.path}`);
    }

    get payloadLength() {
        return this.arena.length;
    }

    listKeys(): string[] {
        return this.index.keys();
    }

    getMetadata(key: string): EntryByKind[K] | undefined {
        return this.index.get(key);
    }

    /** Bytes of the payload region no index entry points at. */
    get orphanedBytes() {
        let live = this.index.values().reduce((sum, entry) => sum + entry.compressedSize, 0);
        return Math.max(0, this.arena.length - live);
    }

    async addEntry(key: string, sourcePath: string, metadata: MetadataByKind[K]): Promise<EntryByKind[K]> {
        if (!isValidKey(key))
            throw new InvalidKeyError(key);
        if (this.index.has(key))
            throw new DuplicateKeyError(key);

        let compressed = await this.compressSource(key, sourcePath);
        let entry = await this.appendEntry(key, sourcePath, compressed, metadata);

        this.logger.info(`Added ${key}: ${BufferUtils.formatBytes(entry.size)} -> ${BufferUtils.formatBytes(entry.compressedSize)} bytes, ${entry.files.length} files`);
        return entry;
    }

    /**
     * Swaps the entry for a freshly packed one appended at the end of the arena.
     * The old payload bytes stay where they are. The source is packed before the
     * old entry is dropped, so a failed pack leaves the index unchanged.
     */
    async replaceEntry(
        key: string,
        sourcePath: string,
        metadata: MetadataByKind[K],
        finalize?: (fresh: EntryByKind[K], previous: EntryByKind[K]) => EntryByKind[K],
    ): Promise<EntryByKind[K]> {
        let previous = this.index.get(key);

        if (!previous)
            throw new NotFoundError(key);

        let compressed = await this.compressSource(key, sourcePath);

        this.index.delete(key);
        let entry = await this.appendEntry(key, sourcePath, compressed, metadata);

        if (finalize) {
            entry = finalize(entry, previous);
            this.index.set(entry);
        }

        this.logger.info(`Replaced ${key}: ${BufferUtils.formatBytes(previous.compressedSize)} orphaned bytes left in the payload region`);
        return entry;
    }

    /** Drops the index entry only; its payload bytes become orphaned. */
    removeEntry(key: string): EntryByKind[K] {
        let entry = this.index.get(key);

        if (!entry)
            throw new NotFoundError(key);

        this.index.delete(key);
        return entry;
    }

    /**
     * Rewrites the arena with only the bytes live entries point at.
     * Offsets are reassigned in index order. Returns the number of bytes reclaimed.
     */
    compact(): number {
        let before = this.arena.length;
        let live = this.index.values().map(entry => ({
            entry: entry,
            payload: this.arena.slice(entry.offset, entry.compressedSize),
        }));

        this.arena = new PayloadArena();
        this.index = new EntryIndex(this.kind);
        live.forEach(({ entry, payload }) => this.putEntry(entry, payload));

        return before - this.arena.length;
    }

    /** Re-adds an already compressed payload; the entry's offset is reassigned to the arena cursor. */
    putEntry(entry: EntryByKind[K], payload: Buffer): EntryByKind[K] {
        if (this.index.has(entry.key))
            throw new DuplicateKeyError(entry.key);

        let offset = this.arena.append(payload);
        let placed = { ...entry, offset, compressedSize: payload.length };

        this.index.set(placed);
        return placed;
    }

    async build(): Promise<BuildSummary> {
        let indexBytes = this.index.serialize(this.createdAt);
        let preamble = encodePreamble(this.kind, indexBytes.length);
        let payload = this.arena.toBuffer();
        let file = Buffer.concat([preamble, indexBytes, payload]);

        await Fs.promises.mkdir(Path.dirname(Path.resolve(this.path)), { recursive: true });

        if (this.atomic) {
            let tempPath = `${this.path}.${process.pid}.tmp`;

            try {
                await Fs.promises.writeFile(tempPath, file);
                await Fs.promises.rename(tempPath, this.path);
            }
            catch (err) {
                await Fs.promises.rm(tempPath, { force: true });
                throw err;
            }
        }
        else {
            await Fs.promises.writeFile(this.path, file);
        }

        this.logger.info(`Built ${this.path}: ${BufferUtils.formatBytes(file.length)} bytes, ${this.index.size} entries`);

        return {
            path: this.path,
            kind: this.kind,
            totalSize: file.length,
            indexSize: indexBytes.length,
            dataSize: payload.length,
            orphanedBytes: this.orphanedBytes,
            entries: this.index.values().map(entry => ({
                key: entry.key,
                size: entry.size,
                compressedSize: entry.compressedSize,
                dependencies: entry.dependencies,
            })),
        };
    }

    private async compressSource(key: string, sourcePath: string): Promise<CompressedSource> {
        if (!Fs.existsSync(sourcePath))
            throw new SourceNotFoundError(sourcePath, key);

        let archive = await packDirectory(sourcePath);
        let files = await collectManifest(sourcePath);

        return {
            payload: compressZLib(archive, this.compressionLevel),
            size: archive.length,
            checksum: BufferUtils.calcChecksum(archive),
            files: files,
        };
    }

    private async appendEntry(key: string, sourcePath: string, compressed: CompressedSource, metadata: MetadataByKind[K]) {
        let packed: PackedSource = {
            key: key,
            size: compressed.size,
            compressedSize: compressed.payload.length,
            offset: this.arena.length,
            checksum: compressed.checksum,
            files: compressed.files,
            sourcePath: sourcePath,
            timestamp: new Date().toISOString(),
        };

        let factory = ENTRY_FACTORIES[this.kind];
        let entry = await factory(packed, metadata);

        this.arena.append(compressed.payload);
        this.index.set(entry);

        return entry;
    }
}
