import * as Fs from 'fs';
import * as Path from 'path';
import { unpackArchive } from './archive';
import * as BufferUtils from './bufferUtils';
import { decompressZLib } from './compression';
import { ContainerContext, detectKind, parsePreamble, validateSlices } from './container';
import { ContainerKind, EntryByKind } from './entry';
import { EntryIndex } from './entryIndex';
import { CompressionError, describeError, FormatError, IntegrityError, NotFoundError } from './errors/containerError';
import { buildDependencyTree, DependencyNode, resolveDependencies, Resolution } from './dependencyResolver';
import { consoleLogger, Logger } from './logger';
import { HeaderStruct, PREAMBLE_LENGTH } from './structs';

export interface ContainerReaderOptions {
    logger?: Logger;
}

export interface ExtractManyOptions {
    /** Expand the requested keys with their transitive dependencies (default: true) */
    resolveDeps?: boolean;
    verify?: boolean;
}

export interface ExtractionReport {
    results: Map<string, boolean>;
    errors: Map<string, Error>;
    /** Missing dependencies, reported but not counted as failures */
    missing: string[];
    success: boolean;
}

export interface VerificationReport {
    results: Map<string, boolean>;
    errors: Map<string, Error>;
    success: boolean;
}

/**
 * Read-only view of a built container.
 *
 * open() reads the preamble and index only; payloads are fetched with one
 * positioned read per extraction.
 */
export class ContainerReader<K extends ContainerKind> implements ContainerContext<K> {
    readonly path: string;
    readonly kind: K;
    readonly header: HeaderStruct;
    readonly createdAt: string;
    /** Absolute file position of the payload region */
    readonly payloadStart: number;
    readonly payloadLength: number;

    protected readonly index: EntryIndex<K>;
    protected readonly logger: Logger;

    protected constructor(path: string, kind: K, header: HeaderStruct, index: EntryIndex<K>, createdAt: string, payloadLength: number, logger: Logger) {
        this.path = path;
        this.kind = kind;
        this.header = header;
        this.index = index;
        this.createdAt = createdAt;
        this.payloadStart = PREAMBLE_LENGTH + header.getField('indexLength');
        this.payloadLength = payloadLength;
        this.logger = logger;
    }

    static async open<K extends ContainerKind>(path: string, kind: K, options: ContainerReaderOptions = {}): Promise<ContainerReader<K>> {
        let stats = await Fs.promises.stat(path);
        let preamble = await BufferUtils.readFileSlice(path, 0, Math.min(PREAMBLE_LENGTH, stats.size));
        let header = parsePreamble(preamble, kind);

        let indexLength = header.getField('indexLength');
        if (PREAMBLE_LENGTH + indexLength > stats.size)
            throw FormatError.truncated('index', PREAMBLE_LENGTH + indexLength, stats.size);

        let indexBytes = await BufferUtils.readFileSlice(path, PREAMBLE_LENGTH, indexLength);
        let { index, createdAt } = EntryIndex.parse(indexBytes, kind);
        let payloadLength = stats.size - PREAMBLE_LENGTH - indexLength;

        validateSlices(index, payloadLength);

        return new ContainerReader(path, kind, header, index, createdAt, payloadLength, options.logger ?? consoleLogger);
    }

    /** Kind of the container at `path`, judging by its magic tag. */
    static async detectKind(path: string): Promise<ContainerKind> {
        let stats = await Fs.promises.stat(path);
        let preamble = await BufferUtils.readFileSlice(path, 0, Math.min(PREAMBLE_LENGTH, stats.size));
        return detectKind(preamble);
    }

    listKeys(): string[] {
        return this.index.keys();
    }

    getMetadata(key: string): EntryByKind[K] | undefined {
        return this.index.get(key);
    }

    entries(): EntryByKind[K][] {
        return this.index.values();
    }

    /** Decompressed archive bytes of the entry, always checked against the stored checksum. */
    async extractToMemory(key: string): Promise<Buffer> {
        return this.loadArchive(key, true);
    }

    /** Unpacks the entry into `destDir/key`. Nothing is written when verification or parsing fails. */
    async extract(key: string, destDir: string, verify = true): Promise<string> {
        let archive = await this.loadArchive(key, verify);
        let targetDir = Path.join(destDir, key);

        await unpackArchive(archive, targetDir);

        this.logger.debug(`Extracted ${key} to ${targetDir}`);
        return targetDir;
    }

    async extractMany(keys: ReadonlyArray<string>, destDir: string, options: ExtractManyOptions = {}): Promise<ExtractionReport> {
        let resolveDeps = options.resolveDeps ?? true;
        let verify = options.verify ?? true;
        let targets = [...keys];
        let missing: string[] = [];

        if (resolveDeps) {
            let resolution = this.resolveDependencies(keys);
            missing = resolution.missing.filter(key => !keys.includes(key));
            targets = [...keys, ...resolution.keys.filter(key => !keys.includes(key))];
        }

        let report: ExtractionReport = { results: new Map(), errors: new Map(), missing, success: true };

        for (let key of targets) {
            if (report.results.has(key))
                continue;

            try {
                await this.extract(key, destDir, verify);
                report.results.set(key, true);
            }
            catch (err) {
                let error = err instanceof Error ? err : new Error(describeError(err));

                this.logger.error(`Failed to extract ${key}: ${error.message}`);
                report.results.set(key, false);
                report.errors.set(key, error);
                report.success = false;
            }
        }

        return report;
    }

    resolveDependencies(keys: ReadonlyArray<string>): Resolution {
        return resolveDependencies(this, keys, this.logger);
    }

    dependencyTree(key: string): DependencyNode {
        if (!this.index.has(key))
            throw new NotFoundError(key);

        return buildDependencyTree(this, key);
    }

    /** Decompresses and checksums every entry; one bad entry does not stop the sweep. */
    async verify(): Promise<VerificationReport> {
        let report: VerificationReport = { results: new Map(), errors: new Map(), success: true };

        for (let key of this.listKeys()) {
            try {
                await this.loadArchive(key, true);
                report.results.set(key, true);
            }
            catch (err) {
                report.results.set(key, false);
                report.errors.set(key, err instanceof Error ? err : new Error(describeError(err)));
                report.success = false;
            }
        }

        return report;
    }

    protected async loadArchive(key: string, verify: boolean): Promise<Buffer> {
        let entry = this.index.get(key);

        if (!entry)
            throw new NotFoundError(key);

        let compressed = await BufferUtils.readFileSlice(this.path, this.payloadStart + entry.offset, entry.compressedSize);
        let archive: Buffer;

        try {
            archive = decompressZLib(compressed);
        }
        catch (err) {
            if (verify && err instanceof CompressionError)
                throw IntegrityError.undecodable(key, entry.checksum, err);

            throw err;
        }

        if (verify) {
            let checksum = BufferUtils.calcChecksum(archive);

            if (checksum !== entry.checksum)
                throw new IntegrityError(key, entry.checksum, checksum);
        }

        return archive;
    }
}
