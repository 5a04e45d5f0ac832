import * as Fs from 'fs';
import * as Path from 'path';
import { z } from 'zod';
import { BuildSummary, ContainerWriter, ContainerWriterOptions } from './containerWriter';
import { ContainerKind, DEFAULT_ARCHITECTURE, DEFAULT_ENTRY_VERSION, DEFAULT_OS_TYPE, isValidKey, MetadataByKind } from './entry';
import { ConfigError, describeError } from './errors/containerError';
import { consoleLogger } from './logger';

const keySchema = z.string().refine(isValidKey, 'keys must be a single path segment');

const applicationConfigSchema = z.object({
    applications: z.array(z.object({
        key: keySchema,
        name: z.string().optional(),
        path: z.string().min(1),
        version: z.string().default(DEFAULT_ENTRY_VERSION),
        dependencies: z.array(z.string()).default([]),
        description: z.string().optional(),
    })).default([]),
});

const binaryConfigSchema = z.object({
    binaries: z.array(z.object({
        key: keySchema,
        source: z.string().min(1),
        provides: z.array(z.string()).default([]),
        version: z.string().default(DEFAULT_ENTRY_VERSION),
        description: z.string().optional(),
        env: z.record(z.string()).default({}),
        dependencies: z.array(z.string()).default([]),
        architecture: z.string().default(DEFAULT_ARCHITECTURE),
        os: z.string().default(DEFAULT_OS_TYPE),
    })).default([]),
});

const userdataConfigSchema = z.object({
    users: z.array(z.object({
        key: keySchema,
        source: z.string().min(1),
        description: z.string().optional(),
        quotaMb: z.number().nonnegative().optional(),
    })).default([]),
});

export interface BatchItem<K extends ContainerKind> {
    key: string;
    /** Absolute, resolved against the config document's directory */
    sourcePath: string;
    metadata: MetadataByKind[K];
}

type BatchReaders = {
    [K in ContainerKind]: (document: unknown, baseDir: string) => BatchItem<K>[];
};

const BATCH_READERS: BatchReaders = {
    application: (document, baseDir) => parseDocument(applicationConfigSchema, document).applications.map(app => ({
        key: app.key,
        sourcePath: Path.resolve(baseDir, app.path),
        metadata: {
            name: app.name ?? app.key,
            version: app.version,
            dependencies: app.dependencies,
            description: app.description,
        },
    })),
    binary: (document, baseDir) => parseDocument(binaryConfigSchema, document).binaries.map(binary => ({
        key: binary.key,
        sourcePath: Path.resolve(baseDir, binary.source),
        metadata: {
            version: binary.version,
            description: binary.description,
            provides: binary.provides,
            envVars: binary.env,
            dependencies: binary.dependencies,
            architecture: binary.architecture,
            osType: binary.os,
        },
    })),
    userdata: (document, baseDir) => parseDocument(userdataConfigSchema, document).users.map(user => ({
        key: user.key,
        sourcePath: Path.resolve(baseDir, user.source),
        metadata: {
            description: user.description,
            quotaMb: user.quotaMb,
        },
    })),
};

function parseDocument<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, document: unknown): T {
    let result = schema.safeParse(document);

    if (!result.success) {
        let issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
        throw new ConfigError(`Invalid config: ${issues.join('; ')}`);
    }

    return result.data;
}

/** Reads a batch document (JSON) and returns its entries in document order. */
export async function loadBatchConfig<K extends ContainerKind>(configPath: string, kind: K): Promise<BatchItem<K>[]> {
    let text: string;
    let document: unknown;

    try {
        text = await Fs.promises.readFile(configPath, 'utf8');
    }
    catch (err) {
        throw new ConfigError(`Config file '${configPath}' could not be read: ${describeError(err)}`, { cause: err });
    }

    try {
        document = JSON.parse(text);
    }
    catch (err) {
        throw new ConfigError(`Config file '${configPath}' is not valid JSON: ${describeError(err)}`, { cause: err });
    }

    let reader = BATCH_READERS[kind];
    return reader(document, Path.dirname(Path.resolve(configPath)));
}

/**
 * Adds every entry of the document to a fresh container and builds it.
 * Entries whose source does not exist are skipped with a warning.
 */
export async function buildFromConfig<K extends ContainerKind>(configPath: string, outputPath: string, kind: K, options: ContainerWriterOptions = {}): Promise<BuildSummary> {
    let logger = options.logger ?? consoleLogger;
    let items = await loadBatchConfig(configPath, kind);
    let writer = new ContainerWriter(outputPath, kind, options);

    for (let item of items) {
        if (!Fs.existsSync(item.sourcePath)) {
            logger.warn(`Source '${item.sourcePath}' not found, skipping ${item.key}`);
            continue;
        }

        await writer.addEntry(item.key, item.sourcePath, item.metadata);
    }

    return writer.build();
}

export type SampleConfig =
    | z.input<typeof applicationConfigSchema>
    | z.input<typeof binaryConfigSchema>
    | z.input<typeof userdataConfigSchema>;

const SAMPLE_CONFIGS: { [K in ContainerKind]: SampleConfig } = {
    application: {
        applications: [
            { key: 'my-app', name: 'My Application', path: './apps/my-app', version: '1.0.0', dependencies: ['shared-lib'] },
            { key: 'shared-lib', name: 'Shared Library', path: './apps/shared-lib', version: '1.0.0', dependencies: [] },
        ],
    },
    binary: {
        binaries: [
            {
                key: 'db-client',
                source: './binaries/db-client',
                provides: ['db-client'],
                version: '1.0.0',
                description: 'Database command line client',
                env: { DB_HOST: 'localhost' },
                dependencies: ['libssl'],
            },
            { key: 'libssl', source: './binaries/libssl', version: '1.0.0', description: 'TLS library' },
        ],
    },
    userdata: {
        users: [
            { key: 'alice', source: './users/alice', description: 'Alice home directory', quotaMb: 512 },
            { key: 'bob', source: './users/bob' },
        ],
    },
};

/** Sample batch document written by `init`. */
export function sampleConfig(kind: ContainerKind): SampleConfig {
    return SAMPLE_CONFIGS[kind];
}

export async function writeSampleConfig(kind: ContainerKind, outputPath: string) {
    await Fs.promises.mkdir(Path.dirname(Path.resolve(outputPath)), { recursive: true });
    await Fs.promises.writeFile(outputPath, JSON.stringify(sampleConfig(kind), null, 2) + '\n');
}
