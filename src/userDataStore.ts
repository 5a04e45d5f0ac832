import * as Fs from 'fs';
import * as Path from 'path';
import { BuildSummary, ContainerWriter, ContainerWriterOptions } from './containerWriter';
import { ContainerContext } from './container';
import { UserMetadata, UserRecord } from './entry';
import { NotFoundError, SourceNotFoundError } from './errors/containerError';
import { consoleLogger, Logger } from './logger';

export type UpdateMode = 'replace' | 'merge';

export const UPDATE_MODES: ReadonlyArray<UpdateMode> = ['replace', 'merge'];

export function isUpdateMode(value: string): value is UpdateMode {
    return UPDATE_MODES.some(mode => mode === value);
}

/** `<base>-checkpoint-YYYYMMDD-HHMMSS<ext>` next to the container. */
export function checkpointPath(containerPath: string, date = new Date()) {
    let pad = (value: number) => value.toString().padStart(2, '0');
    let stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

    let ext = Path.extname(containerPath) || '.blob';
    let base = Path.basename(containerPath, Path.extname(containerPath));

    return Path.join(Path.dirname(containerPath), `${base}-checkpoint-${stamp}${ext}`);
}

/**
 * Mutable store of per-user data trees.
 *
 * Edits are held in memory until build(). Updates and removals only touch
 * the index; superseded payload bytes stay in the file until compact().
 */
export class UserDataStore implements ContainerContext<'userdata'> {
    protected writer: ContainerWriter<'userdata'>;
    protected logger: Logger;

    protected constructor(writer: ContainerWriter<'userdata'>, logger: Logger) {
        this.writer = writer;
        this.logger = logger;
    }

    get path() {
        return this.writer.path;
    }

    get kind(): 'userdata' {
        return 'userdata';
    }

    /** Empty store; the file appears on the first build(). */
    static create(path: string, options: ContainerWriterOptions = {}) {
        return new UserDataStore(new ContainerWriter(path, 'userdata', options), options.logger ?? consoleLogger);
    }

    static async open(path: string, options: ContainerWriterOptions = {}) {
        let writer = await ContainerWriter.loadExisting(path, 'userdata', options);
        return new UserDataStore(writer, options.logger ?? consoleLogger);
    }

    get orphanedBytes() {
        return this.writer.orphanedBytes;
    }

    listKeys() {
        return this.writer.listKeys();
    }

    getMetadata(key: string): UserRecord | undefined {
        return this.writer.getMetadata(key);
    }

    add(key: string, sourcePath: string, metadata: UserMetadata = {}) {
        return this.writer.addEntry(key, sourcePath, metadata);
    }

    /**
     * Swaps the user's data for a fresh pack of `sourcePath`.
     * `merge` is `replace` with the version counter bumped by one; the contents
     * are not merged. Description, quota and creation time carry over.
     */
    async update(key: string, sourcePath: string, mode: UpdateMode = 'replace'): Promise<UserRecord> {
        let previous = this.writer.getMetadata(key);

        if (!previous)
            throw new NotFoundError(key);

        let metadata: UserMetadata = { description: previous.description, quotaMb: previous.quotaMb };

        return this.writer.replaceEntry(key, sourcePath, metadata, (fresh, old) => ({
            ...fresh,
            createdAt: old.createdAt,
            version: mode === 'merge' ? old.version + 1 : old.version,
        }));
    }

    remove(key: string): UserRecord {
        let removed = this.writer.removeEntry(key);
        this.logger.info(`Removed ${key}; ${removed.compressedSize} bytes stay in the payload region until compacted`);
        return removed;
    }

    /** Copies the container as it is on disk; pending edits are not included. */
    async checkpoint(destPath?: string): Promise<string> {
        let target = destPath ?? checkpointPath(this.path);

        if (!Fs.existsSync(this.path))
            throw new SourceNotFoundError(this.path);

        await Fs.promises.mkdir(Path.dirname(Path.resolve(target)), { recursive: true });
        await Fs.promises.copyFile(this.path, target);

        this.logger.info(`Checkpoint written to ${target}`);
        return target;
    }

    compact() {
        return this.writer.compact();
    }

    build(): Promise<BuildSummary> {
        return this.writer.build();
    }
}
