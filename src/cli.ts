#!/usr/bin/env node
/**
 * blobpack command line interface.
 *
 * One command group per container kind: `app`, `bin` and `user`.
 */

import * as Fs from 'fs';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { CompressionLevel, isCompressionLevel } from './compression';
import { buildFromConfig, writeSampleConfig } from './config';
import { ContainerReader } from './containerReader';
import { ContainerWriter, ContainerWriterOptions } from './containerWriter';
import { ContainerKind, MetadataByKind } from './entry';
import { describeError, NotFoundError } from './errors/containerError';
import { consoleLogger, Logger } from './logger';
import * as Report from './report';
import { detectProvides } from './sourceTree';
import { isUpdateMode, UPDATE_MODES, UserDataStore } from './userDataStore';

const VERSION = '1.0.0';

export interface CliIO {
    /** Report output (stdout) */
    out: (text: string) => void;
    /** Progress and diagnostics; errors go to `logger.error` */
    logger: Logger;
}

const DEFAULT_IO: CliIO = {
    out: text => console.log(text),
    logger: consoleLogger,
};

interface GroupSpec {
    kind: ContainerKind;
    name: string;
    description: string;
    defaultOutput: string;
}

const GROUPS: { [K in ContainerKind]: GroupSpec } = {
    application: { kind: 'application', name: 'app', description: 'Application catalogs', defaultOutput: 'apps.blob' },
    binary: { kind: 'binary', name: 'bin', description: 'Binary package catalogs', defaultOutput: 'binaries.blob' },
    userdata: { kind: 'userdata', name: 'user', description: 'Mutable per-user data stores', defaultOutput: 'userdata.blob' },
};

//:: option parsers

export function parseList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function collectEnv(value: string, previous: Record<string, string>): Record<string, string> {
    let separator = value.indexOf('=');

    if (separator <= 0)
        throw new InvalidArgumentError(`Expected KEY=VALUE, got '${value}'.`);

    return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

function parseLevel(value: string): CompressionLevel {
    let level = Number(value);

    if (!isCompressionLevel(level))
        throw new InvalidArgumentError('Compression level must be an integer from 0 to 9.');

    return level;
}

function parseQuota(value: string): number {
    let quota = Number(value);

    if (!Number.isFinite(quota) || quota < 0)
        throw new InvalidArgumentError('Quota must be a non-negative number of megabytes.');

    return quota;
}

//:: option shapes

interface WriteOptions {
    level?: CompressionLevel;
}

interface BuildOptions extends WriteOptions {
    config: string;
    output: string;
}

interface CreateOptions {
    output: string;
    force?: boolean;
}

interface ExtractOptions {
    output: string;
    deps: boolean;
    verify: boolean;
}

interface ApplicationAddOptions extends WriteOptions {
    name?: string;
    version?: string;
    description?: string;
    deps?: string[];
}

interface BinaryAddOptions extends WriteOptions {
    provides?: string[];
    version?: string;
    description?: string;
    env: Record<string, string>;
    deps?: string[];
    architecture?: string;
    os?: string;
    autoDetect?: boolean;
}

interface UserAddOptions extends WriteOptions {
    description?: string;
    quota?: number;
}

interface UpdateOptions extends WriteOptions {
    mode: string;
}

/**
 * Builds the command table. Every action reports failures through
 * `io.logger.error` and marks the run as failed via `onFailure`.
 */
export function createProgram(io: CliIO = DEFAULT_IO, onFailure: (error: unknown) => void = () => {}) {
    const program = new Command();

    program
        .name('blobpack')
        .description('Package file trees into seekable container files')
        .version(VERSION)
        .enablePositionalOptions()
        .exitOverride()
        .configureOutput({
            writeOut: text => io.out(text.replace(/\n$/, '')),
            writeErr: text => io.logger.error(text.replace(/\n$/, '')),
        });

    const guard = <A extends unknown[]>(action: (...args: A) => Promise<void>) => async (...args: A) => {
        try {
            await action(...args);
        }
        catch (err) {
            io.logger.error(`Error: ${describeError(err)}`);
            onFailure(err);
        }
    };

    const writerOptions = (options: WriteOptions): ContainerWriterOptions => ({
        compressionLevel: options.level,
        logger: io.logger,
    });

    /** Opens the container for editing, or starts a new one when the file does not exist yet. */
    async function openWriter<K extends ContainerKind>(path: string, kind: K, options: WriteOptions) {
        return Fs.existsSync(path)
            ? ContainerWriter.loadExisting(path, kind, writerOptions(options))
            : new ContainerWriter(path, kind, writerOptions(options));
    }

    async function createEmpty(kind: ContainerKind, options: CreateOptions) {
        if (Fs.existsSync(options.output) && !options.force)
            throw new Error(`File '${options.output}' already exists (use --force to overwrite)`);

        let summary = await new ContainerWriter(options.output, kind, { logger: io.logger }).build();
        io.out(`Created empty ${kind} container: ${summary.path}`);
    }

    function addBuildCommands(group: Command, spec: GroupSpec) {
        group
            .command('build')
            .description('Build a container from a JSON config document')
            .requiredOption('-c, --config <file>', 'config document')
            .option('-o, --output <file>', 'output container', spec.defaultOutput)
            .option('-l, --level <level>', 'compression level (0-9)', parseLevel)
            .action(guard(async (options: BuildOptions) => {
                let summary = await buildFromConfig(options.config, options.output, spec.kind, writerOptions(options));
                io.out(Report.renderBuildSummary(summary));
            }));

        group
            .command('init')
            .description('Write a sample config document')
            .option('-o, --output <file>', 'config file to write', 'blob-config.json')
            .action(guard(async (options: { output: string }) => {
                await writeSampleConfig(spec.kind, options.output);
                io.out(`Created sample config: ${options.output}`);
                io.out(`Edit it, then run: blobpack ${spec.name} build -c ${options.output}`);
            }));
    }

    function addReadCommands(group: Command, spec: GroupSpec) {
        const open = (blob: string) => ContainerReader.open(blob, spec.kind, { logger: io.logger });

        group
            .command('list')
            .description('List the entries of a container')
            .argument('<blob>', 'container file')
            .action(guard(async (blob: string) => {
                let reader = await open(blob);
                io.out(Report.renderEntryList(reader.entries()));
            }));

        group
            .command('info')
            .description('Show the metadata of one entry')
            .argument('<blob>', 'container file')
            .argument('<key>', 'entry key')
            .action(guard(async (blob: string, key: string) => {
                let reader = await open(blob);
                let entry = reader.getMetadata(key);

                if (!entry)
                    throw new NotFoundError(key);

                io.out(Report.renderEntryInfo(entry));
            }));

        group
            .command('deps')
            .description('Show the dependency tree of an entry')
            .argument('<blob>', 'container file')
            .argument('<key>', 'entry key')
            .action(guard(async (blob: string, key: string) => {
                let reader = await open(blob);
                io.out(Report.renderDependencyTree(reader.dependencyTree(key)));
            }));

        group
            .command('extract')
            .description('Extract entries (and their dependencies) into a directory')
            .argument('<blob>', 'container file')
            .argument('<keys...>', 'entry keys')
            .option('-o, --output <dir>', 'destination directory', './extracted')
            .option('--no-deps', 'do not resolve dependencies')
            .option('--no-verify', 'skip checksum verification')
            .action(guard(async (blob: string, keys: string[], options: ExtractOptions) => {
                let reader = await open(blob);
                let report = await reader.extractMany(keys, options.output, { resolveDeps: options.deps, verify: options.verify });

                io.out(Report.renderExtractionReport(report));

                if (!report.success)
                    throw new Error(`${report.errors.size} entries failed to extract`);
            }));

        group
            .command('verify')
            .description('Check every entry against its checksum')
            .argument('<blob>', 'container file')
            .action(guard(async (blob: string) => {
                let reader = await open(blob);
                let report = await reader.verify();

                io.out(Report.renderVerificationReport(report));

                if (!report.success)
                    throw new Error(`${report.errors.size} entries failed verification`);
            }));
    }

    async function addAndBuild<K extends ContainerKind>(blob: string, kind: K, key: string, source: string, metadata: MetadataByKind[K], options: WriteOptions) {
        let writer = await openWriter(blob, kind, options);
        await writer.addEntry(key, source, metadata);
        io.out(Report.renderBuildSummary(await writer.build()));
    }

    //:: app

    const app = program.command(GROUPS.application.name).description(GROUPS.application.description);
    addBuildCommands(app, GROUPS.application);
    addReadCommands(app, GROUPS.application);

    app
        .command('add')
        .description('Add an application to a container, creating it if needed')
        .argument('<blob>', 'container file')
        .argument('<key>', 'entry key')
        .argument('<source>', 'source directory')
        .option('-n, --name <name>', 'display name')
        .option('-v, --version <version>', 'version string')
        .option('-d, --description <text>', 'description')
        .option('--deps <keys>', 'comma-separated dependency keys', parseList)
        .option('-l, --level <level>', 'compression level (0-9)', parseLevel)
        .action(guard(async (blob: string, key: string, source: string, options: ApplicationAddOptions) => {
            await addAndBuild(blob, 'application', key, source, {
                name: options.name,
                version: options.version,
                description: options.description,
                dependencies: options.deps,
            }, options);
        }));

    //:: bin

    const bin = program.command(GROUPS.binary.name).description(GROUPS.binary.description);
    addBuildCommands(bin, GROUPS.binary);
    addReadCommands(bin, GROUPS.binary);

    bin
        .command('create')
        .description('Create an empty binary container')
        .requiredOption('-o, --output <file>', 'container file')
        .option('-f, --force', 'overwrite an existing file')
        .action(guard(async (options: CreateOptions) => createEmpty('binary', options)));

    bin
        .command('add')
        .description('Add a binary package to a container, creating it if needed')
        .argument('<blob>', 'container file')
        .argument('<key>', 'entry key')
        .argument('<source>', 'package root directory')
        .option('-p, --provides <names>', 'comma-separated executable names', parseList)
        .option('-v, --version <version>', 'version string')
        .option('-d, --description <text>', 'description')
        .option('-e, --env <KEY=VALUE>', 'environment variable (repeatable)', collectEnv, {})
        .option('--deps <keys>', 'comma-separated dependency keys', parseList)
        .option('--architecture <arch>', 'target architecture')
        .option('--os <os>', 'target operating system')
        .option('-a, --auto-detect', 'derive provides from bin directories')
        .option('-l, --level <level>', 'compression level (0-9)', parseLevel)
        .action(guard(async (blob: string, key: string, source: string, options: BinaryAddOptions) => {
            let provides = options.provides ?? [];

            if (options.autoDetect && Fs.existsSync(source)) {
                let detected = await detectProvides(source);
                provides = Array.from(new Set([...provides, ...detected]));
                io.logger.info(`Detected executables: ${detected.join(', ') || 'none'}`);
            }

            await addAndBuild(blob, 'binary', key, source, {
                provides: provides,
                version: options.version,
                description: options.description,
                envVars: options.env,
                dependencies: options.deps,
                architecture: options.architecture,
                osType: options.os,
            }, options);
        }));

    //:: user

    const user = program.command(GROUPS.userdata.name).description(GROUPS.userdata.description);
    addBuildCommands(user, GROUPS.userdata);
    addReadCommands(user, GROUPS.userdata);

    const openStore = (blob: string, options: WriteOptions = {}) => UserDataStore.open(blob, writerOptions(options));

    user
        .command('create')
        .description('Create an empty user data store')
        .requiredOption('-o, --output <file>', 'container file')
        .option('-f, --force', 'overwrite an existing file')
        .action(guard(async (options: CreateOptions) => createEmpty('userdata', options)));

    user
        .command('add')
        .description('Add a user to the store, creating it if needed')
        .argument('<blob>', 'container file')
        .argument('<key>', 'user id')
        .argument('<source>', 'source directory')
        .option('-d, --description <text>', 'description')
        .option('-q, --quota <mb>', 'advisory quota in MB', parseQuota)
        .option('-l, --level <level>', 'compression level (0-9)', parseLevel)
        .action(guard(async (blob: string, key: string, source: string, options: UserAddOptions) => {
            let store = Fs.existsSync(blob)
                ? await openStore(blob, options)
                : UserDataStore.create(blob, writerOptions(options));

            await store.add(key, source, { description: options.description, quotaMb: options.quota });
            io.out(Report.renderBuildSummary(await store.build()));
        }));

    user
        .command('update')
        .description('Replace the data of a user')
        .argument('<blob>', 'container file')
        .argument('<key>', 'user id')
        .argument('<source>', 'source directory')
        .addOption(new Option('-m, --mode <mode>', 'merge also bumps the version counter').choices(UPDATE_MODES).default('replace'))
        .option('-l, --level <level>', 'compression level (0-9)', parseLevel)
        .action(guard(async (blob: string, key: string, source: string, options: UpdateOptions) => {
            if (!isUpdateMode(options.mode))
                throw new InvalidArgumentError(`Unknown update mode '${options.mode}'`);

            let store = await openStore(blob, options);
            let record = await store.update(key, source, options.mode);

            io.out(`Updated ${key} (${options.mode}), version ${record.version}`);
            io.out(Report.renderBuildSummary(await store.build()));
        }));

    user
        .command('remove')
        .description('Remove a user; the data bytes stay until compact')
        .argument('<blob>', 'container file')
        .argument('<key>', 'user id')
        .action(guard(async (blob: string, key: string) => {
            let store = await openStore(blob);
            store.remove(key);
            io.out(Report.renderBuildSummary(await store.build()));
        }));

    user
        .command('checkpoint')
        .description('Copy the store file as it is on disk')
        .argument('<blob>', 'container file')
        .option('-o, --output <file>', 'checkpoint file (generated when omitted)')
        .action(guard(async (blob: string, options: { output?: string }) => {
            let store = await openStore(blob);
            let target = await store.checkpoint(options.output);
            io.out(`Checkpoint created: ${target}`);
        }));

    user
        .command('compact')
        .description('Drop payload bytes no user points at')
        .argument('<blob>', 'container file')
        .action(guard(async (blob: string) => {
            let store = await openStore(blob);
            let reclaimed = store.compact();
            await store.build();
            io.out(`Reclaimed ${reclaimed} bytes`);
        }));

    return program;
}

/** Runs the CLI and resolves with the process exit code. */
export async function run(argv: string[], io: CliIO = DEFAULT_IO): Promise<number> {
    let status = 0;
    let program = createProgram(io, () => status = 1);

    try {
        await program.parseAsync(argv, { from: 'user' });
    }
    catch (err) {
        if (err instanceof CommanderError)
            return err.exitCode;

        throw err;
    }

    return status;
}

if (require.main === module) {
    run(process.argv.slice(2)).then(
        code => { process.exitCode = code; },
        (err: unknown) => {
            console.error(`Error: ${describeError(err)}`);
            process.exitCode = 1;
        },
    );
}
